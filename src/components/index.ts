/**
 * colwrap - comment reflow for the terminal
 *
 * Component exports
 */
export { Intro } from './Intro.js';
export { Editor } from './Editor.js';
export { CommandInput, SLASH_COMMANDS, completeCommand, matchCommands } from './CommandInput.js';
export { CursorText } from './CursorText.js';
export { StatusBar, describeWrap } from './StatusBar.js';
export { DebugPanel } from './DebugPanel.js';

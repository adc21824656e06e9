/**
 * CLI - scratch editor that reflows line comments as you type
 */
import React, { useCallback, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';

import { CommandInput, DebugPanel, Editor, Intro, StatusBar, describeWrap } from './components/index.js';
import { useTextBuffer } from './hooks/useTextBuffer.js';
import { useWrapSettings } from './hooks/useWrapSettings.js';
import { getLineAndColumn, SETTINGS_FILE } from './utils/index.js';
import type { EditorSettings } from './utils/index.js';
import { dimensions } from './theme.js';
import type { WrapResult } from './wrap/index.js';

const HELP_TEXT = `Commands:
  /wrap             Wrap the comment on the cursor line
  /string           Split the string literal starting at the cursor
  /width <n>        Set the wrap column
  /delim <s>        Set the line-comment delimiter
  /autowrap         Toggle wrap on space
  /clear            Clear the buffer
  /save             Save settings to ${SETTINGS_FILE}
  /debug            Toggle debug panel
  exit              Quit`;

type FocusMode = 'edit' | 'command';

interface CLIProps {
  settings: EditorSettings;
  initialText?: string;
}

export function CLI({ settings: initialSettings, initialText = '' }: CLIProps) {
  const { exit } = useApp();

  const [mode, setMode] = useState<FocusMode>('edit');
  const [showDebug, setShowDebug] = useState(false);
  const [infoMessage, setInfoMessage] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [lastWrap, setLastWrap] = useState<WrapResult | null>(null);

  const buffer = useTextBuffer(initialText);
  const { settings, triggerOptions, setWidth, setDelimiter, toggleAutoWrap, save } = useWrapSettings(initialSettings);

  const { line, column } = getLineAndColumn(buffer.text, buffer.cursorPosition, settings.tabWidth);

  const handleCommand = useCallback((query: string) => {
    setMode('edit');
    setError(null);
    setInfoMessage(null);

    const [command, ...rest] = query.split(/\s+/);
    const arg = rest.join(' ');

    switch (command.toLowerCase()) {
      case 'exit':
      case 'quit':
        exit();
        return;

      case '/help':
        setInfoMessage(HELP_TEXT);
        return;

      case '/wrap': {
        const result = buffer.actions.wrapComment(settings);
        setLastWrap(result);
        setInfoMessage(describeWrap(result));
        return;
      }

      case '/string': {
        const result = buffer.actions.wrapString(settings);
        setLastWrap(result);
        setInfoMessage(describeWrap(result));
        return;
      }

      case '/width': {
        const width = Number(arg);
        if (!Number.isInteger(width) || width <= 0) {
          setError(`Width must be a positive integer, got "${arg}"`);
          return;
        }
        setWidth(width);
        setInfoMessage(`Width set to ${width}`);
        return;
      }

      case '/delim':
        if (!arg) {
          setError('Usage: /delim <delimiter>');
          return;
        }
        setDelimiter(arg);
        setInfoMessage(`Delimiter set to ${arg}`);
        return;

      case '/autowrap': {
        const enabled = toggleAutoWrap();
        setInfoMessage(`Auto-wrap ${enabled ? 'on' : 'off'}`);
        return;
      }

      case '/clear':
        buffer.actions.clear();
        setLastWrap(null);
        return;

      case '/save':
        if (save()) {
          setInfoMessage(`Settings saved to ${SETTINGS_FILE}`);
        } else {
          setError(`Failed to save settings to ${SETTINGS_FILE}`);
        }
        return;

      case '/debug':
        setShowDebug(prev => !prev);
        return;

      default:
        setError(`Unknown command: ${command}. Try /help`);
    }
  }, [exit, buffer.actions, settings, setWidth, setDelimiter, toggleAutoWrap, save]);

  // Ctrl+C quits from either focus
  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      exit();
    }
  });

  return (
    <Box flexDirection="column">
      <Intro width={settings.width} delimiter={settings.delimiter} />

      <Editor
        buffer={buffer}
        triggerOptions={triggerOptions}
        isActive={mode === 'edit'}
        onEscape={() => setMode('command')}
        onWrap={setLastWrap}
      />

      <StatusBar line={line} column={column} settings={settings} lastWrap={lastWrap} />

      {infoMessage && (
        <Box marginTop={1}>
          <Text color="cyan">{infoMessage}</Text>
        </Box>
      )}

      {error && (
        <Box marginTop={1}>
          <Text color="red">Error: {error}</Text>
        </Box>
      )}

      <Box marginTop={1}>
        <CommandInput
          onSubmit={handleCommand}
          onCancel={() => setMode('edit')}
          isActive={mode === 'command'}
        />
      </Box>

      <DebugPanel maxLines={dimensions.debugLines} show={showDebug} />
    </Box>
  );
}

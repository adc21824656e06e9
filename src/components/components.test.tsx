import React from 'react';
import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { StatusBar, describeWrap } from './StatusBar.js';
import { CursorText } from './CursorText.js';
import { completeCommand, matchCommands } from './CommandInput.js';
import { DEFAULT_SETTINGS } from '../utils/index.js';

describe('describeWrap', () => {
  it('summarises a wrap that created lines', () => {
    expect(describeWrap({ changed: true, cursor: 0, linesWrapped: 2, linesCreated: 1, stoppedBy: 'within-width' }))
      .toBe('wrapped 2 lines, +1 new');
  });

  it('summarises a merge', () => {
    expect(describeWrap({ changed: true, cursor: 0, linesWrapped: 1, linesCreated: 0, stoppedBy: 'within-width' }))
      .toBe('wrapped 1 line');
  });

  it('explains a skip', () => {
    expect(describeWrap({ changed: false, cursor: 0, reason: 'no-delimiter' })).toBe('not a comment');
  });
});

describe('matchCommands', () => {
  it('matches command prefixes', () => {
    expect(matchCommands('/w').map(c => c.cmd)).toEqual(['/wrap', '/width']);
  });

  it('stops matching once an argument is typed', () => {
    expect(matchCommands('/width 72')).toEqual([]);
    expect(matchCommands('wrap')).toEqual([]);
  });
});

describe('completeCommand', () => {
  it('completes a unique match with a trailing space', () => {
    expect(completeCommand('/wi')).toBe('/width ');
    expect(completeCommand('/a')).toBe('/autowrap ');
  });

  it('extends to the common prefix of several matches', () => {
    expect(completeCommand('/d')).toBe('/de');
  });

  it('returns null when Tab would change nothing', () => {
    expect(completeCommand('/w')).toBeNull();
    expect(completeCommand('/x')).toBeNull();
    expect(completeCommand('/width 72')).toBeNull();
  });
});

describe('StatusBar', () => {
  it('shows position and settings', () => {
    const { lastFrame } = render(
      <StatusBar line={2} column={4} settings={DEFAULT_SETTINGS} lastWrap={null} />
    );
    const frame = lastFrame() ?? '';

    expect(frame).toContain('Ln 3, Col 5');
    expect(frame).toContain('width 80');
    expect(frame).toContain('auto-wrap on');
  });
});

describe('CursorText', () => {
  it('renders every line', () => {
    const { lastFrame } = render(<CursorText text={'first\nsecond'} cursorPosition={0} />);
    const lines = (lastFrame() ?? '').split('\n');

    expect(lines).toHaveLength(2);
    expect(lines[1]).toBe('second');
  });
});

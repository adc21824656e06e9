import React from 'react';
import { describe, it, expect, vi } from 'vitest';
import { render } from 'ink-testing-library';
import { Editor } from './Editor.js';
import { useTextBuffer } from '../hooks/useTextBuffer.js';
import type { UseTextBufferResult } from '../hooks/useTextBuffer.js';
import { DEFAULT_TRIGGER_OPTIONS } from '../wrap/index.js';
import type { WrapResult } from '../wrap/index.js';

const tick = () => new Promise(resolve => setTimeout(resolve, 20));

function setup(initialText: string) {
  const state: { latest: UseTextBufferResult | null } = { latest: null };
  const onWrap = vi.fn<(result: WrapResult) => void>();

  function Scratch() {
    const buffer = useTextBuffer(initialText);
    state.latest = buffer;
    return (
      <Editor
        buffer={buffer}
        triggerOptions={{ ...DEFAULT_TRIGGER_OPTIONS, width: 20 }}
        isActive
        onEscape={() => {}}
        onWrap={onWrap}
      />
    );
  }

  return { state, onWrap, ...render(<Scratch />) };
}

describe('Editor', () => {
  it('wraps the comment when a space is typed past the width', async () => {
    const { state, onWrap, stdin, lastFrame } = setup('// aaa bbb ccc ddd eee');
    await tick();

    stdin.write(' ');
    await tick();

    expect(state.latest?.text).toBe('// aaa bbb ccc ddd\n// eee ');
    expect(state.latest?.cursorPosition).toBe(26);
    expect(onWrap).toHaveBeenCalledTimes(1);
    expect(onWrap.mock.calls[0][0].changed).toBe(true);
    expect(lastFrame()).toContain('// aaa bbb ccc ddd');
  });

  it('feeds a pasted chunk through the trigger key by key', async () => {
    const { state, onWrap, stdin } = setup('// aaa bbb ccc ddd');
    await tick();

    stdin.write(' eee ');
    await tick();

    expect(state.latest?.text).toBe('// aaa bbb ccc ddd\n// eee ');
    expect(onWrap.mock.calls.map(([result]) => result.changed)).toEqual([false, true]);
  });

  it('does not wrap when auto-wrap is off', async () => {
    const state: { latest: UseTextBufferResult | null } = { latest: null };

    function Plain() {
      const buffer = useTextBuffer('// aaa bbb ccc ddd eee');
      state.latest = buffer;
      return (
        <Editor
          buffer={buffer}
          triggerOptions={{ ...DEFAULT_TRIGGER_OPTIONS, width: 20, enabled: false }}
          isActive
          onEscape={() => {}}
        />
      );
    }

    const { stdin } = render(<Plain />);
    await tick();
    stdin.write(' ');
    await tick();

    expect(state.latest?.text).toBe('// aaa bbb ccc ddd eee ');
  });
});

import { useCallback, useRef, useState } from 'react';
import { findPrevWordStart } from '../utils/index.js';
import {
  StringTextBuffer,
  handleTriggerKey,
  wrapCommentAtPosition,
  wrapStringAtPosition,
} from '../wrap/index.js';
import type { TriggerOptions, TriggerResult, WrapOptions, WrapResult } from '../wrap/index.js';

export interface TextBufferState {
  text: string;
  cursorPosition: number;
}

export interface TextBufferActions {
  /** Plain insertion, no wrapping */
  insert: (input: string) => void;
  /** Insert one typed key through the wrap trigger */
  typeKey: (key: string, options: TriggerOptions) => TriggerResult;
  deleteBackward: () => void;
  deleteWordBackward: () => void;
  moveCursor: (position: number) => void;
  setValue: (value: string) => void;
  clear: () => void;
  wrapComment: (options: WrapOptions) => WrapResult;
  wrapString: (options: WrapOptions) => WrapResult;
}

export interface UseTextBufferResult extends TextBufferState {
  actions: TextBufferActions;
}

export function useTextBuffer(initialText = ''): UseTextBufferResult {
  const [state, setState] = useState<TextBufferState>({
    text: initialText,
    cursorPosition: initialText.length,
  });
  // Keystrokes can arrive faster than renders; edits always read the ref
  const stateRef = useRef(state);

  const commit = useCallback((next: TextBufferState) => {
    stateRef.current = next;
    setState(next);
  }, []);

  const insert = useCallback((input: string) => {
    const { text, cursorPosition } = stateRef.current;
    commit({
      text: text.slice(0, cursorPosition) + input + text.slice(cursorPosition),
      cursorPosition: cursorPosition + input.length,
    });
  }, [commit]);

  const typeKey = useCallback((key: string, options: TriggerOptions): TriggerResult => {
    const { text, cursorPosition } = stateRef.current;
    const buffer = new StringTextBuffer(text);
    const result = handleTriggerKey(buffer, cursorPosition, key, options);
    commit({ text: buffer.text, cursorPosition: result.cursor });
    return result;
  }, [commit]);

  const deleteBackward = useCallback(() => {
    const { text, cursorPosition } = stateRef.current;
    if (cursorPosition === 0) return;
    commit({
      text: text.slice(0, cursorPosition - 1) + text.slice(cursorPosition),
      cursorPosition: cursorPosition - 1,
    });
  }, [commit]);

  const deleteWordBackward = useCallback(() => {
    const { text, cursorPosition } = stateRef.current;
    const start = findPrevWordStart(text, cursorPosition);
    commit({
      text: text.slice(0, start) + text.slice(cursorPosition),
      cursorPosition: start,
    });
  }, [commit]);

  const moveCursor = useCallback((position: number) => {
    const { text } = stateRef.current;
    commit({ text, cursorPosition: Math.max(0, Math.min(position, text.length)) });
  }, [commit]);

  const setValue = useCallback((value: string) => {
    commit({ text: value, cursorPosition: value.length });
  }, [commit]);

  const clear = useCallback(() => {
    commit({ text: '', cursorPosition: 0 });
  }, [commit]);

  const wrapComment = useCallback((options: WrapOptions): WrapResult => {
    const { text, cursorPosition } = stateRef.current;
    const buffer = new StringTextBuffer(text);
    const result = wrapCommentAtPosition(buffer, cursorPosition, options);
    if (result.changed) {
      commit({ text: buffer.text, cursorPosition: result.cursor });
    }
    return result;
  }, [commit]);

  const wrapString = useCallback((options: WrapOptions): WrapResult => {
    const { text, cursorPosition } = stateRef.current;
    const buffer = new StringTextBuffer(text);
    const result = wrapStringAtPosition(buffer, cursorPosition, options);
    if (result.changed) {
      commit({ text: buffer.text, cursorPosition: result.cursor });
    }
    return result;
  }, [commit]);

  return {
    ...state,
    actions: {
      insert,
      typeKey,
      deleteBackward,
      deleteWordBackward,
      moveCursor,
      setValue,
      clear,
      wrapComment,
      wrapString,
    },
  };
}

/**
 * Shared types for the wrap core.
 */

/** UTF-16 offset into a buffer */
export type Position = number;

/** Zero-based display column within a line */
export type Column = number;

/**
 * A bounded view over one line. `end` excludes the line terminator.
 */
export interface Line {
  start: Position;
  end: Position;
}

export interface WrapOptions {
  /** Maximum permitted column (default: 80) */
  width: number;
  /** Line-comment marker (default: '//') */
  delimiter: string;
  /** Tab stop interval used for column arithmetic (default: 8) */
  tabWidth: number;
}

export interface StringWrapOptions {
  startDelim: string;
  endDelim: string;
  /** Appended to close a fragment, e.g. a continuation escape */
  lineEnd: string;
  /** Prefix for the next fragment */
  lineContinue: string;
  /** Escape character inside the literal; empty disables escaping */
  escape: string;
}

export interface IndentationProfile {
  /** Display column of the delimiter start */
  delimiterIndent: Column;
  /** Characters between delimiter end and the first letter or digit */
  contentIndent: number;
  delimiterPos: Position;
  contentStart: Position;
}

export type WrapSkipReason =
  | 'within-width'
  | 'no-delimiter'
  | 'no-word-boundary'
  | 'no-string'
  | 'terminated'
  | 'iteration-limit';

export type WrapResult =
  | {
      changed: true;
      cursor: Position;
      /** Lines that had overflow moved off them */
      linesWrapped: number;
      /** Continuation lines created (as opposed to merged into) */
      linesCreated: number;
      /** Why the cascade stopped on its last line */
      stoppedBy: WrapSkipReason;
    }
  | {
      changed: false;
      cursor: Position;
      reason: WrapSkipReason;
    };

export interface TriggerOptions extends WrapOptions {
  enabled: boolean;
  triggerKeys: readonly string[];
}

export interface TriggerResult {
  cursor: Position;
  /** null when the key was inserted without consulting the wrapper */
  wrap: WrapResult | null;
}

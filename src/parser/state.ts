/**
 * @module parser/state
 *
 * Immutable cursor over a sequence of lines, and the result type every
 * parser returns. Nothing in this module mutates a state it was given.
 */

import * as Maybe from '../functional/maybe.js';
import { DEFAULT_CODE_LANG } from '../config/engine-config.js';

export type ParserSection = 'description' | 'example';

export interface ParserContext {
  /** True between an opening and a closing code fence */
  readonly inCodeBlock: boolean;
  /** Language tag of the open (or most recent) code fence */
  readonly codeBlockLang: string;
  readonly section: ParserSection;
}

export interface ParserState {
  readonly lines: readonly string[];
  /** 1-based; `lines.length + 1` means end of input */
  readonly position: number;
  readonly context: ParserContext;
}

export interface ParseSuccess<T> {
  readonly success: true;
  readonly value: T;
  readonly nextState: ParserState;
}

export interface ParseFailure {
  readonly success: false;
}

export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

export type Parser<T> = (state: ParserState) => ParseResult<T>;

export function createContext(codeBlockLang: string = DEFAULT_CODE_LANG): ParserContext {
  return { inCodeBlock: false, codeBlockLang, section: 'description' };
}

export function createState(
  lines: readonly string[],
  position: number = 1,
  context: ParserContext = createContext()
): ParserState {
  return {
    lines: Object.freeze([...lines]),
    position: clampPosition(position, lines.length),
    context,
  };
}

function clampPosition(position: number, length: number): number {
  return Math.min(Math.max(1, Math.floor(position)), length + 1);
}

export function isAtEnd(state: ParserState): boolean {
  return state.position > state.lines.length;
}

export function currentLine(state: ParserState): Maybe.Maybe<string> {
  return isAtEnd(state) ? Maybe.Nothing : Maybe.fromNullable(state.lines[state.position - 1]);
}

/**
 * Move the cursor forward. Never moves past `lines.length + 1`.
 */
export function advance(state: ParserState, steps: number = 1): ParserState {
  return {
    ...state,
    position: clampPosition(state.position + Math.max(0, steps), state.lines.length),
  };
}

export function withContext(state: ParserState, updates: Partial<ParserContext>): ParserState {
  return { ...state, context: { ...state.context, ...updates } };
}

export function success<T>(value: T, nextState: ParserState): ParseResult<T> {
  return { success: true, value, nextState };
}

const FAILURE: ParseFailure = Object.freeze({ success: false });

export function failure<T = never>(): ParseResult<T> {
  return FAILURE;
}

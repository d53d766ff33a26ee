/**
 * @module parser/combinators
 *
 * Line-oriented parser combinators. Every parser is a pure function from
 * a ParserState to a ParseResult; a parser that fails consumes nothing.
 */

import * as Maybe from '../functional/maybe.js';
import {
  advance,
  currentLine,
  failure,
  success,
  type ParseResult,
  type Parser,
  type ParserState,
} from './state.js';

/**
 * Accept the current line when `predicate` holds for it. Fails at end of input.
 */
export function satisfy(predicate: (line: string) => boolean): Parser<string> {
  return (state) => {
    const line = currentLine(state);
    if (Maybe.isJust(line) && predicate(line.value)) {
      return success(line.value, advance(state));
    }
    return failure();
  };
}

/**
 * Accept the current line when it matches `pattern`; the value is the match.
 */
export function match(pattern: RegExp): Parser<RegExpMatchArray> {
  const matcher = new RegExp(pattern.source, pattern.flags.replace('g', ''));
  return (state) => {
    const result = satisfy((line) => matcher.test(line))(state);
    if (!result.success) {
      return failure();
    }
    const groups = result.value.match(matcher);
    return groups ? success(groups, result.nextState) : failure();
  };
}

export function map<T, U>(transform: (value: T) => U, parser: Parser<T>): Parser<U> {
  return (state) => {
    const result = parser(state);
    return result.success ? success(transform(result.value), result.nextState) : failure();
  };
}

/**
 * Monadic sequencing: run `parser`, then the parser `next` builds from its value.
 */
export function bind<T, U>(next: (value: T) => Parser<U>, parser: Parser<T>): Parser<U> {
  return (state) => {
    const result = parser(state);
    return result.success ? next(result.value)(result.nextState) : failure();
  };
}

/**
 * First success among `parsers`, each tried from the same state.
 */
export function choice<T>(parsers: ReadonlyArray<Parser<T>>): Parser<T> {
  return (state) => {
    for (const parser of parsers) {
      const result = parser(state);
      if (result.success) {
        return result;
      }
    }
    return failure();
  };
}

/**
 * Zero or more applications of `parser`. Always succeeds. Stops early if an
 * application succeeds without moving the cursor.
 */
export function many<T>(parser: Parser<T>): Parser<T[]> {
  return (state) => {
    const values: T[] = [];
    let current: ParserState = state;
    for (;;) {
      const result: ParseResult<T> = parser(current);
      if (!result.success) {
        break;
      }
      values.push(result.value);
      const moved = result.nextState.position > current.position;
      current = result.nextState;
      if (!moved) {
        break;
      }
    }
    return success(values, current);
  };
}

export function optional<T>(parser: Parser<T>): Parser<Maybe.Maybe<T>> {
  return (state) => {
    const result = parser(state);
    return result.success ? success(Maybe.Just(result.value), result.nextState) : success(Maybe.Nothing, state);
  };
}

/**
 * Try `parser` at the cursor and on each of the following lines, at most
 * `limit` positions in total. The first success wins.
 */
export function scanAhead<T>(limit: number, parser: Parser<T>): Parser<T> {
  return (state) => {
    let probe = state;
    for (let i = 0; i < limit && probe.position <= probe.lines.length; i++) {
      const result = parser(probe);
      if (result.success) {
        return result;
      }
      probe = advance(probe);
    }
    return failure();
  };
}

/**
 * Tests for the primitive line combinators
 */

import * as Maybe from '../../../src/functional/maybe.js';
import { bind, choice, many, map, match, optional, satisfy, scanAhead } from '../../../src/parser/combinators.js';
import { createState, success, type Parser } from '../../../src/parser/state.js';

const lines = ['-- one', '-- two', 'code', '', 'function f()'];
const start = createState(lines);

const comment = satisfy((line) => line.startsWith('--'));

describe('satisfy', () => {
  it('consumes a matching line', () => {
    const result = comment(start);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value).toBe('-- one');
      expect(result.nextState.position).toBe(2);
    }
  });

  it('fails without consuming', () => {
    expect(comment(createState(lines, 3))).toEqual({ success: false });
  });

  it('fails at end of input', () => {
    expect(satisfy(() => true)(createState(lines, 6)).success).toBe(false);
  });
});

describe('match', () => {
  it('returns the match groups', () => {
    const result = match(/^--\s*(\w+)/)(start);

    expect(result.success && result.value[1]).toBe('one');
  });

  it('ignores a global flag', () => {
    const parser = match(/^--\s*(\w+)/g);

    expect(parser(start).success).toBe(true);
    expect(parser(start).success).toBe(true);
  });
});

describe('map / bind', () => {
  it('map transforms the value', () => {
    const result = map((line: string) => line.length, comment)(start);

    expect(result.success && result.value).toBe(6);
  });

  it('bind sequences two parsers', () => {
    const pair = bind((first: string) => map((second: string) => [first, second], comment), comment);
    const result = pair(start);

    expect(result.success && result.value).toEqual(['-- one', '-- two']);
    expect(result.success && result.nextState.position).toBe(3);
  });

  it('bind fails when the second parser fails', () => {
    const triple = bind(() => bind(() => comment, comment), comment);

    expect(triple(start).success).toBe(false);
  });
});

describe('choice', () => {
  it('returns the first success', () => {
    const parser = choice([map(() => 'comment', comment), map(() => 'any', satisfy(() => true))]);

    expect(parser(start)).toMatchObject({ success: true, value: 'comment' });
    expect(parser(createState(lines, 3))).toMatchObject({ success: true, value: 'any' });
  });

  it('fails when every alternative fails', () => {
    expect(choice([comment])(createState(lines, 3)).success).toBe(false);
  });
});

describe('many', () => {
  it('collects consecutive successes', () => {
    const result = many(comment)(start);

    expect(result.success && result.value).toEqual(['-- one', '-- two']);
    expect(result.success && result.nextState.position).toBe(3);
  });

  it('succeeds with an empty list', () => {
    const state = createState(lines, 3);
    const result = many(comment)(state);

    expect(result).toEqual({ success: true, value: [], nextState: state });
  });

  it('stops on a parser that does not advance', () => {
    const stuck: Parser<number> = (state) => success(1, state);

    expect(many(stuck)(start)).toMatchObject({ success: true, value: [1] });
  });
});

describe('optional', () => {
  it('wraps a success in Just', () => {
    const result = optional(comment)(start);

    expect(result.success && result.value).toEqual(Maybe.Just('-- one'));
  });

  it('succeeds with Nothing on the original state', () => {
    const state = createState(lines, 3);
    const result = optional(comment)(state);

    expect(result).toEqual({ success: true, value: Maybe.Nothing, nextState: state });
  });
});

describe('scanAhead', () => {
  const definition = satisfy((line) => line.startsWith('function'));

  it('finds a match within the limit', () => {
    const result = scanAhead(5, definition)(start);

    expect(result.success && result.value).toBe('function f()');
    expect(result.success && result.nextState.position).toBe(6);
  });

  it('counts the starting line toward the limit', () => {
    expect(scanAhead(4, definition)(start).success).toBe(false);
    expect(scanAhead(1, definition)(createState(lines, 5)).success).toBe(true);
  });

  it('fails with a zero limit', () => {
    expect(scanAhead(0, definition)(createState(lines, 5)).success).toBe(false);
  });
});

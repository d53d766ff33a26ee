/**
 * Tests for function definition recognition
 */

import * as Maybe from '../../../src/functional/maybe.js';
import { extractSignature, functionDefinition, splitParams } from '../../../src/annotations/signature.js';
import { createState } from '../../../src/parser/state.js';

describe('extractSignature', () => {
  it('recognizes a qualified declaration', () => {
    expect(extractSignature('function Array.map(f, xs)', 12)).toEqual(
      Maybe.Just({ name: 'Array.map', params: ['f', 'xs'], line: 12 })
    );
  });

  it('recognizes a local declaration', () => {
    expect(extractSignature('local function helper(x)', 3)).toEqual(
      Maybe.Just({ name: 'helper', params: ['x'], line: 3 })
    );
  });

  it('recognizes an indented declaration', () => {
    expect(extractSignature('    function M.a.b.c()', 1)).toEqual(
      Maybe.Just({ name: 'M.a.b.c', params: [], line: 1 })
    );
  });

  it('recognizes an assignment', () => {
    expect(extractSignature('Array.filter = function(pred, xs)', 24)).toEqual(
      Maybe.Just({ name: 'Array.filter', params: ['pred', 'xs'], line: 24 })
    );
    expect(extractSignature('local inc = function (n) return n + 1 end', 2)).toEqual(
      Maybe.Just({ name: 'inc', params: ['n'], line: 2 })
    );
  });

  it('keeps varargs and trims whitespace', () => {
    expect(extractSignature('function log( fmt ,  ... )', 1)).toEqual(
      Maybe.Just({ name: 'log', params: ['fmt', '...'], line: 1 })
    );
  });

  it('rejects control flow before the keyword', () => {
    expect(extractSignature('if ok then function M.f(x) end', 1)).toBe(Maybe.Nothing);
    expect(extractSignature('return function M.g(x)', 1)).toBe(Maybe.Nothing);
  });

  it('rejects commented-out definitions', () => {
    expect(extractSignature('-- function M.old(x)', 1)).toBe(Maybe.Nothing);
  });

  it('rejects anonymous functions and other lines', () => {
    expect(extractSignature('table.sort(xs, function(a, b) return a < b end)', 1)).toBe(Maybe.Nothing);
    expect(extractSignature('local functions = {}', 1)).toBe(Maybe.Nothing);
    expect(extractSignature('', 1)).toBe(Maybe.Nothing);
  });
});

describe('splitParams', () => {
  it('drops empty entries', () => {
    expect(splitParams(' a, ,b ')).toEqual(['a', 'b']);
    expect(splitParams('')).toEqual([]);
  });
});

describe('functionDefinition', () => {
  it('consumes the definition line and records its position', () => {
    const state = createState(['x = 1', 'function f(a)'], 2);
    const result = functionDefinition(state);

    expect(result.success && result.value).toEqual({ name: 'f', params: ['a'], line: 2 });
    expect(result.success && result.nextState.position).toBe(3);
  });

  it('fails on other lines', () => {
    expect(functionDefinition(createState(['x = 1'])).success).toBe(false);
  });
});

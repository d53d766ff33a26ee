/**
 * Tests for the annotation line rules
 */

import {
  commentLevel,
  createAnnotationGrammar,
  isBlankLine,
  isCommentLine,
  createTypeTailReader,
} from '../../../src/annotations/grammar.js';
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from '../../../src/config/engine-config.js';
import { createState, withContext, type Parser } from '../../../src/parser/state.js';
import type { TypeTail } from '../../../src/type-parser/type-parser.js';

const grammar = createAnnotationGrammar(DEFAULT_ENGINE_CONFIG);

function run<T>(parser: Parser<T>, line: string, inCodeBlock = false): T | undefined {
  const state = withContext(createState([line]), { inCodeBlock });
  const result = parser(state);
  return result.success ? result.value : undefined;
}

describe('line classification', () => {
  it('recognizes rich and plain comment markers', () => {
    expect(commentLevel('---@param x')).toBe('rich');
    expect(commentLevel('  -- note')).toBe('plain');
    expect(commentLevel('local x = 1 -- trailing')).toBeNull();
  });

  it('isCommentLine accepts indented markers only at line start', () => {
    expect(isCommentLine('    --- doc')).toBe(true);
    expect(isCommentLine('x = 1 -- doc')).toBe(false);
    expect(isCommentLine('- list')).toBe(false);
  });

  it('isBlankLine accepts whitespace-only lines', () => {
    expect(isBlankLine('')).toBe(true);
    expect(isBlankLine(' \t ')).toBe(true);
    expect(isBlankLine('--')).toBe(false);
  });
});

describe('generic rule', () => {
  it('takes the first name with the default type', () => {
    expect(run(grammar.annotation, '---@generic T, U')).toEqual({ kind: 'generic', name: 'T', type: 'any' });
  });
});

describe('param rule', () => {
  it('parses name, type and description', () => {
    expect(run(grammar.annotation, '--- @param x number # the input')).toEqual({
      kind: 'param',
      name: 'x',
      type: 'number',
      description: 'the input',
      optional: false,
    });
  });

  it('marks an optional type', () => {
    expect(run(grammar.annotation, '---@param y string?')).toEqual({
      kind: 'param',
      name: 'y',
      type: 'string?',
      description: '',
      optional: true,
    });
  });

  it('strips an optional marker from the name', () => {
    expect(run(grammar.annotation, '---@param opts? table # settings')).toEqual({
      kind: 'param',
      name: 'opts',
      type: 'table',
      description: 'settings',
      optional: true,
    });
  });

  it('fills a missing type with the default', () => {
    expect(run(grammar.param, '---@param x # note')).toEqual({
      kind: 'param',
      name: 'x',
      type: 'any',
      description: 'note',
      optional: false,
    });
  });

  it('falls back to splitting on # when the type does not parse', () => {
    expect(run(grammar.param, '---@param t table<string # oops')).toEqual({
      kind: 'param',
      name: 't',
      type: 'table<string',
      description: 'oops',
      optional: false,
    });
  });

  it('reads a param without a type as description', () => {
    expect(run(grammar.param, '---@param x')).toBeUndefined();
    expect(run(grammar.annotation, '---@param x')).toEqual({ kind: 'description', text: '@param x' });
  });

  it('treats trailing spaces after the name like no type', () => {
    expect(run(grammar.param, '---@param x   ')).toBeUndefined();
    expect(run(grammar.annotation, '---@param x   ')).toEqual({ kind: 'description', text: '@param x' });
  });
});

describe('return rule', () => {
  it('accepts @return and @returns', () => {
    expect(run(grammar.annotation, '---@return number # doubled value')).toEqual({
      kind: 'return',
      type: 'number',
      description: 'doubled value',
    });
    expect(run(grammar.annotation, '---@returns boolean')).toEqual({
      kind: 'return',
      type: 'boolean',
      description: '',
    });
  });

  it('reads a bare return with trailing spaces as description', () => {
    expect(run(grammar.returns, '---@return   ')).toBeUndefined();
    expect(run(grammar.annotation, '---@return   ')).toEqual({ kind: 'description', text: '@return' });
  });

  it('uses the configured default return type', () => {
    const custom = createAnnotationGrammar(resolveEngineConfig({ defaultReturnType: 'nil' }));
    expect(run(custom.returns, '---@return # nothing useful')).toEqual({
      kind: 'return',
      type: 'nil',
      description: 'nothing useful',
    });
  });
});

describe('fences', () => {
  it('opens with the tagged language', () => {
    expect(run(grammar.annotation, '---```js')).toEqual({ kind: 'codeBlockStart', lang: 'js' });
  });

  it('opens a bare fence with the default language', () => {
    expect(run(grammar.annotation, '--- ```')).toEqual({ kind: 'codeBlockStart', lang: 'lua' });
  });

  it('closes on a bare fence inside a code block', () => {
    expect(run(grammar.annotation, '---```', true)).toEqual({ kind: 'codeBlockEnd' });
  });

  it('keeps a tagged fence inside a code block as code', () => {
    expect(run(grammar.annotation, '---```lua', true)).toEqual({ kind: 'description', text: '```lua' });
  });

  it('keeps annotations and indentation inside a code block', () => {
    expect(run(grammar.annotation, '---@param x number', true)).toEqual({
      kind: 'description',
      text: '@param x number',
    });
    expect(run(grammar.annotation, '---   return y  ', true)).toEqual({ kind: 'description', text: '  return y' });
  });
});

describe('prose', () => {
  it('trims description text', () => {
    expect(run(grammar.annotation, '---   Adds two numbers.  ')).toEqual({
      kind: 'description',
      text: 'Adds two numbers.',
    });
  });

  it('reads plain comments as description', () => {
    expect(run(grammar.annotation, '-- see also: sum')).toEqual({ kind: 'description', text: 'see also: sum' });
  });

  it('reads unknown directives as description', () => {
    expect(run(grammar.annotation, '---@deprecated use sum')).toEqual({
      kind: 'description',
      text: '@deprecated use sum',
    });
  });

  it('ignores empty comments and reserved headers', () => {
    expect(run(grammar.annotation, '---')).toBeNull();
    expect(run(grammar.annotation, '--- Behaviour notes:')).toBeNull();
    expect(run(grammar.annotation, '---behavior')).toBeNull();
    expect(run(grammar.annotation, '--- PERFORMANCE NOTE')).toBeNull();
  });

  it('keeps prose after a header word', () => {
    expect(run(grammar.annotation, '---Behaviour: returns nil on empty')).toEqual({
      kind: 'description',
      text: 'Behaviour: returns nil on empty',
    });
  });

  it('does not ignore prose that starts like a header', () => {
    expect(run(grammar.annotation, '--- Performance is linear.')).toEqual({
      kind: 'description',
      text: 'Performance is linear.',
    });
  });

  it('fails on code lines', () => {
    expect(run(grammar.annotation, 'local x = 1')).toBeUndefined();
  });
});

describe('createTypeTailReader', () => {
  it('returns the same result object for a repeated tail', () => {
    const read = createTypeTailReader();

    expect(read('number # count')).toBe(read('number # count'));
  });

  it('gives each reader its own cache', () => {
    const first = createTypeTailReader();
    const second = createTypeTailReader();

    expect(first('string')).toEqual(second('string'));
    expect(first('string')).not.toBe(second('string'));
  });

  it('fills a caller-supplied cache', () => {
    const cache = new Map<string, TypeTail>();
    const read = createTypeTailReader(cache);
    read('table<string # broken');

    expect(cache.get('table<string # broken')).toEqual({ type: 'table<string', description: 'broken', optional: false });
  });
});

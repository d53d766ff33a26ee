/**
 * @module annotations/grammar
 *
 * Line rules for the annotation comment syntax. Each rule is a
 * `map(extractor, match(shape))` over a raw source line, so the comment
 * marker is part of every shape.
 *
 * Recognized comment markers:
 *   ---  rich marker (annotations)
 *   --   plain marker (usually prose, still scanned)
 */

import { memoize, type MemoCache } from '../functional/index.js';
import { choice, map, match, satisfy } from '../parser/combinators.js';
import type { Parser } from '../parser/state.js';
import { parseTypeTail, type TypeTail } from '../type-parser/type-parser.js';
import type { EngineConfig } from '../config/engine-config.js';
import type { AnnotationToken } from './types.js';

export const RICH_MARKER = '---';
export const PLAIN_MARKER = '--';

const COMMENT_LINE = /^\s*---?/;
const RICH_COMMENT_LINE = /^\s*---/;

const GENERIC_LINE = /^\s*---?\s*@generic\s+(\w+)/;
const PARAM_LINE = /^\s*---?\s*@param\s+([\w.]+\??)\s+(\S.*?)\s*$/;
const RETURN_LINE = /^\s*---?\s*@returns?\s+(\S.*?)\s*$/;
const FENCE_OPEN_LINE = /^\s*---?\s*```\s*(\w*)/;
const FENCE_CLOSE_LINE = /^\s*---?\s*```\s*$/;
const CODE_LINE = /^\s*---?(.*)$/;
const EMPTY_COMMENT_LINE = /^\s*---?\s*$/;
const SECTION_HEADER_LINE = /^\s*---?\s*(?:behaviou?r|performance)(?:\s+notes?)?\s*:?\s*$/i;
const DESCRIPTION_LINE = /^\s*---?\s*(.*?)\s*$/;

export type CommentLevel = 'rich' | 'plain';

export function isCommentLine(line: string): boolean {
  return COMMENT_LINE.test(line);
}

export function isBlankLine(line: string): boolean {
  return line.trim() === '';
}

export function commentLevel(line: string): CommentLevel | null {
  if (RICH_COMMENT_LINE.test(line)) return 'rich';
  if (COMMENT_LINE.test(line)) return 'plain';
  return null;
}

/**
 * Split on the first `#` when the type tail does not parse.
 */
function splitOnDelimiter(tail: string): TypeTail {
  const index = tail.indexOf('#');
  const type = (index >= 0 ? tail.slice(0, index) : tail).trim();
  const description = index >= 0 ? tail.slice(index + 1).trim() : '';
  return { type, description, optional: type.includes('?') };
}

/**
 * Memoized type-tail reader. Each reader owns `cache`; tails repeat heavily
 * within one file (`string`, `number # ...`).
 */
export function createTypeTailReader(
  cache: MemoCache<string, TypeTail> = new Map<string, TypeTail>()
): (tail: string) => TypeTail {
  return memoize((tail: string): TypeTail => parseTypeTail(tail) ?? splitOnDelimiter(tail), cache);
}

/** Strip the marker and one following space, keeping code indentation */
function codeText(rest: string): string {
  return rest.replace(/^ /, '').trimEnd();
}

export interface AnnotationGrammar {
  readonly blankLine: Parser<string>;
  readonly generic: Parser<AnnotationToken>;
  readonly param: Parser<AnnotationToken>;
  readonly returns: Parser<AnnotationToken>;
  readonly codeBlockStart: Parser<AnnotationToken>;
  readonly codeBlockEnd: Parser<AnnotationToken>;
  /** Verbatim line inside a fenced example */
  readonly codeLine: Parser<AnnotationToken>;
  readonly description: Parser<AnnotationToken>;
  /** Empty comment lines and reserved section headers; produce no token */
  readonly ignored: Parser<null>;
  /**
   * One comment line to a token (or null), honoring fence state from the
   * parser context. Fails on anything that is not a comment line.
   */
  readonly annotation: Parser<AnnotationToken | null>;
}

export function createAnnotationGrammar(config: EngineConfig): AnnotationGrammar {
  const readTypeTail = createTypeTailReader();
  const blankLine = satisfy(isBlankLine);

  const generic = map(
    (m): AnnotationToken => ({ kind: 'generic', name: m[1], type: config.defaultParamType }),
    match(GENERIC_LINE)
  );

  const param = map((m): AnnotationToken => {
    const rawName = m[1];
    const nameOptional = rawName.endsWith('?');
    const tail = readTypeTail(m[2]);
    return {
      kind: 'param',
      name: nameOptional ? rawName.slice(0, -1) : rawName,
      type: tail.type || config.defaultParamType,
      description: tail.description,
      optional: nameOptional || tail.optional,
    };
  }, match(PARAM_LINE));

  const returns = map((m): AnnotationToken => {
    const tail = readTypeTail(m[1]);
    return {
      kind: 'return',
      type: tail.type || config.defaultReturnType,
      description: tail.description,
    };
  }, match(RETURN_LINE));

  const codeBlockStart = map(
    (m): AnnotationToken => ({ kind: 'codeBlockStart', lang: m[1] || config.defaultCodeLang }),
    match(FENCE_OPEN_LINE)
  );

  const codeBlockEnd = map((): AnnotationToken => ({ kind: 'codeBlockEnd' }), match(FENCE_CLOSE_LINE));

  const codeLine = map(
    (m): AnnotationToken => ({ kind: 'description', text: codeText(m[1]) }),
    match(CODE_LINE)
  );

  const description = map(
    (m): AnnotationToken => ({ kind: 'description', text: m[1] }),
    match(DESCRIPTION_LINE)
  );

  const ignored = map((): null => null, choice([match(EMPTY_COMMENT_LINE), match(SECTION_HEADER_LINE)]));

  const proseRules = choice<AnnotationToken | null>([
    generic,
    param,
    returns,
    codeBlockStart,
    ignored,
    description,
  ]);

  const exampleRules = choice<AnnotationToken | null>([codeBlockEnd, codeLine]);

  const annotation: Parser<AnnotationToken | null> = (state) =>
    state.context.inCodeBlock ? exampleRules(state) : proseRules(state);

  return {
    blankLine,
    generic,
    param,
    returns,
    codeBlockStart,
    codeBlockEnd,
    codeLine,
    description,
    ignored,
    annotation,
  };
}

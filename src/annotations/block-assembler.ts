/**
 * @module annotations/block-assembler
 *
 * Folds one run of comment lines into a DocumentationBlock.
 *
 * The run starts at a comment line and continues across blank lines as
 * long as another comment line follows. It ends at the first other line;
 * the returned state points just past the last comment line.
 */

import { bind, many } from '../parser/combinators.js';
import { failure, success, withContext, type Parser, type ParserState } from '../parser/state.js';
import type { EngineConfig } from '../config/engine-config.js';
import type { AnnotationGrammar } from './grammar.js';
import type { AnnotationToken, DocumentationBlock, ExampleDoc } from './types.js';

interface BlockAccumulator {
  readonly block: DocumentationBlock;
  /** Lines of the open example, or null in prose mode */
  readonly code: readonly string[] | null;
  readonly codeLang: string;
}

export function emptyBlock(config: EngineConfig): DocumentationBlock {
  return {
    description: [],
    params: [],
    returns: { type: config.defaultReturnType, description: '' },
    generics: [],
    examples: [],
  };
}

/**
 * Apply one token to the accumulator. Pure; returns a new accumulator.
 */
function applyToken(acc: BlockAccumulator, token: AnnotationToken | null): BlockAccumulator {
  if (token === null) {
    return acc;
  }
  const { block } = acc;
  switch (token.kind) {
    case 'generic':
      return { ...acc, block: { ...block, generics: [...block.generics, { name: token.name, type: token.type }] } };
    case 'param':
      return {
        ...acc,
        block: {
          ...block,
          params: [
            ...block.params,
            { name: token.name, type: token.type, description: token.description, optional: token.optional },
          ],
        },
      };
    case 'return':
      return { ...acc, block: { ...block, returns: { type: token.type, description: token.description } } };
    case 'codeBlockStart':
      return { ...acc, code: [], codeLang: token.lang };
    case 'codeBlockEnd': {
      if (acc.code === null) {
        return acc;
      }
      const example: ExampleDoc = { lang: acc.codeLang, code: acc.code.join('\n') };
      return { ...acc, code: null, block: { ...block, examples: [...block.examples, example] } };
    }
    case 'description':
      if (acc.code !== null) {
        return { ...acc, code: [...acc.code, token.text] };
      }
      return { ...acc, block: { ...block, description: [...block.description, token.text] } };
  }
}

/**
 * Mirror the accumulator's fence state into the parser context so the
 * grammar picks the right rule set for the next line.
 */
function syncContext(state: ParserState, acc: BlockAccumulator): ParserState {
  return acc.code !== null
    ? withContext(state, { inCodeBlock: true, codeBlockLang: acc.codeLang, section: 'example' })
    : withContext(state, { inCodeBlock: false, section: 'description' });
}

/**
 * Parser for one documentation block. Fails (consuming nothing) when the
 * cursor is not on a comment line. An example whose fence never closes is
 * dropped.
 */
export function documentationBlock(grammar: AnnotationGrammar, config: EngineConfig): Parser<DocumentationBlock> {
  // blank lines are only consumed when a comment line follows them
  const nextAnnotation = bind(() => grammar.annotation, many(grammar.blankLine));

  return (state) => {
    const first = grammar.annotation(state);
    if (!first.success) {
      return failure();
    }

    let acc = applyToken(
      { block: emptyBlock(config), code: null, codeLang: config.defaultCodeLang },
      first.value
    );
    let current = syncContext(first.nextState, acc);

    for (;;) {
      const next = nextAnnotation(current);
      if (!next.success) {
        break;
      }
      acc = applyToken(acc, next.value);
      current = syncContext(next.nextState, acc);
    }

    const closed = withContext(current, {
      inCodeBlock: false,
      codeBlockLang: config.defaultCodeLang,
      section: 'description',
    });
    return success(acc.block, closed);
  };
}

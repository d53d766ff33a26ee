/**
 * @module annotations/extract
 *
 * Entry point of the annotation engine: lines in, function records out.
 *
 * The engine is synchronous and pure. Calls on different inputs share no
 * state, so files can be processed in parallel by separate workers.
 */

import * as Maybe from '../functional/maybe.js';
import { resolveEngineConfig, type EngineConfig, type EngineOptions } from '../config/engine-config.js';
import { advance, createContext, createState, isAtEnd, type ParserState } from '../parser/state.js';
import { createAnnotationGrammar } from './grammar.js';
import { documentationBlock } from './block-assembler.js';
import { buildRecord, findDefinition, isPrivateName } from './merge.js';
import type { FunctionRecord } from './types.js';

export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

/**
 * Extract documented functions from a fully materialized line sequence.
 *
 * Invalid options throw a ConfigurationError before any line is read.
 * Malformed comment blocks never throw; they are skipped or read as prose.
 */
export function extractFunctions(lines: readonly string[], options: EngineOptions = {}): FunctionRecord[] {
  const config: EngineConfig = resolveEngineConfig(options);
  const grammar = createAnnotationGrammar(config);
  const block = documentationBlock(grammar, config);
  const definition = findDefinition(config);
  const isPrivate = isPrivateName(config.privatePrefix);

  const records: FunctionRecord[] = [];
  let state: ParserState = createState(lines, 1, createContext(config.defaultCodeLang));

  while (!isAtEnd(state)) {
    const blockResult = block(state);
    if (!blockResult.success) {
      state = advance(state);
      continue;
    }

    const afterBlock = blockResult.nextState;
    const found = definition(afterBlock);
    if (found.success && Maybe.isJust(found.value)) {
      const record = buildRecord(found.value.value, blockResult.value, config);
      if (!isPrivate(record.name)) {
        records.push(record);
      }
      state = found.nextState;
    } else {
      // No definition within the window: the block documents nothing
      state = afterBlock;
    }
  }

  return records;
}

export function extractFunctionsFromText(text: string, options: EngineOptions = {}): FunctionRecord[] {
  return extractFunctions(splitLines(text), options);
}

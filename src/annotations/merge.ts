/**
 * @module annotations/merge
 *
 * Joins a documentation block with the function definition that follows it.
 */

import * as Maybe from '../functional/maybe.js';
import { curry2 } from '../functional/index.js';
import { map, scanAhead } from '../parser/combinators.js';
import type { Parser } from '../parser/state.js';
import type { EngineConfig } from '../config/engine-config.js';
import { functionDefinition } from './signature.js';
import type { DocumentationBlock, FunctionRecord, FunctionSignature, ParamDoc } from './types.js';

/**
 * Search at most `config.lookahead` lines for the definition a block
 * documents. The first definition in the window wins.
 */
export function findDefinition(config: EngineConfig): Parser<Maybe.Maybe<FunctionSignature>> {
  return scanAhead(
    config.lookahead,
    map((signature) => Maybe.Just(signature), functionDefinition)
  );
}

export const findParam = curry2(
  (params: readonly ParamDoc[], name: string): Maybe.Maybe<ParamDoc> =>
    Maybe.fromNullable(params.find((param) => param.name === name))
);

/**
 * One entry per declared parameter, in declaration order. Documented
 * parameters are used verbatim; the rest get the default type. Documented
 * names missing from the signature are dropped.
 */
export function mergeParams(
  signature: FunctionSignature,
  block: DocumentationBlock,
  config: EngineConfig
): ParamDoc[] {
  const lookup = findParam(block.params);
  return signature.params.map((name) =>
    Maybe.fromMaybe<ParamDoc>(
      { name, type: config.defaultParamType, description: '', optional: false },
      lookup(name)
    )
  );
}

export function buildRecord(
  signature: FunctionSignature,
  block: DocumentationBlock,
  config: EngineConfig
): FunctionRecord {
  return {
    name: signature.name,
    params: mergeParams(signature, block, config),
    returns: block.returns,
    generics: block.generics,
    description: block.description.join(' '),
    examples: block.examples,
    line: signature.line,
  };
}

/**
 * True when any dotted segment of `name` starts with `prefix`.
 */
export const isPrivateName = curry2(
  (prefix: string, name: string): boolean =>
    name.split('.').some((segment) => segment.startsWith(prefix))
);

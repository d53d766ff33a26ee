/**
 * docscan
 *
 * Extracts function documentation (parameters, generics, return type,
 * description, examples) from annotation comments in source files.
 */

// Engine
export { extractFunctions, extractFunctionsFromText, splitLines } from './annotations/extract.js';
export type {
  AnnotationKind,
  AnnotationToken,
  DocumentationBlock,
  ExampleDoc,
  FunctionRecord,
  FunctionSignature,
  GenericDoc,
  ParamDoc,
  ReturnDoc,
} from './annotations/types.js';

// Grammar building blocks
export {
  createAnnotationGrammar,
  commentLevel,
  isBlankLine,
  isCommentLine,
  createTypeTailReader,
  PLAIN_MARKER,
  RICH_MARKER,
} from './annotations/grammar.js';
export type { AnnotationGrammar, CommentLevel } from './annotations/grammar.js';
export { documentationBlock, emptyBlock } from './annotations/block-assembler.js';
export { extractSignature, functionDefinition, splitParams } from './annotations/signature.js';
export { buildRecord, findDefinition, findParam, isPrivateName, mergeParams } from './annotations/merge.js';
export { parseTypeTail, getTypeTailGrammar } from './type-parser/type-parser.js';
export type { TypeTail } from './type-parser/type-parser.js';

// Parser combinators
export * from './parser/state.js';
export { bind, choice, many, map, match, optional, satisfy, scanAhead } from './parser/combinators.js';

// Combinator runtime
export { compose, curry2, curry3, memoize, pipe, Maybe } from './functional/index.js';
export type { Curried2, Curried3, MemoCache, MaybeValue } from './functional/index.js';

// Configuration
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_LOOKAHEAD,
  DEFAULT_PRIVATE_PREFIX,
  DEFAULT_RETURN_TYPE,
  resolveEngineConfig,
} from './config/engine-config.js';
export type { EngineConfig, EngineOptions } from './config/engine-config.js';
export { ConfigurationError } from './config/ConfigurationError.js';
export { loadConfig, validateConfig, CONFIG_FILE_NAMES } from './config/loader.js';
export type { DocscanConfig, CliConfigOverrides, LoadConfigOptions } from './config/loader.js';

// Ordering
export {
  detectPrimaryObject,
  parseHierarchicalName,
  sortHierarchically,
  sortRecords,
  SORT_MODES,
} from './sorting/hierarchical.js';
export type { NameHierarchy, SortMode } from './sorting/hierarchical.js';

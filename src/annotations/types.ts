/**
 * @module annotations/types
 *
 * Records produced by the annotation engine. These form the document
 * object model handed to renderers; all strings are passed through as
 * scanned, apart from trimming and default-filling.
 */

export interface ParamDoc {
  readonly name: string;
  readonly type: string;
  readonly description: string;
  readonly optional: boolean;
}

export interface ReturnDoc {
  readonly type: string;
  readonly description: string;
}

export interface GenericDoc {
  readonly name: string;
  readonly type: string;
}

export interface ExampleDoc {
  readonly lang: string;
  readonly code: string;
}

/**
 * One recognized comment line. Consumed by the block assembler and then dropped.
 */
export type AnnotationToken =
  | { readonly kind: 'generic'; readonly name: string; readonly type: string }
  | {
      readonly kind: 'param';
      readonly name: string;
      readonly type: string;
      readonly description: string;
      readonly optional: boolean;
    }
  | { readonly kind: 'return'; readonly type: string; readonly description: string }
  | { readonly kind: 'codeBlockStart'; readonly lang: string }
  | { readonly kind: 'codeBlockEnd' }
  | { readonly kind: 'description'; readonly text: string };

export type AnnotationKind = AnnotationToken['kind'];

export interface DocumentationBlock {
  readonly description: readonly string[];
  readonly params: readonly ParamDoc[];
  readonly returns: ReturnDoc;
  readonly generics: readonly GenericDoc[];
  readonly examples: readonly ExampleDoc[];
}

export interface FunctionSignature {
  /** Qualified (dotted) name */
  readonly name: string;
  readonly params: readonly string[];
  /** 1-based line of the definition */
  readonly line: number;
}

export interface FunctionRecord {
  readonly name: string;
  readonly params: readonly ParamDoc[];
  readonly returns: ReturnDoc;
  readonly generics: readonly GenericDoc[];
  readonly description: string;
  readonly examples: readonly ExampleDoc[];
  readonly line: number;
}

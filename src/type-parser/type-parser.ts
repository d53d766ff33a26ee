/**
 * @module type-parser/type-parser
 *
 * Parser for the tail of `@param` / `@return` annotations using Chevrotain.
 *
 * A tail is one type term followed by free text:
 *   fun(x: T): U # Transformation function
 *   table<string, number>|nil the lookup table
 *   string?
 */

import { CstParser, type CstNode, type IToken } from 'chevrotain';
import {
  TypeLexer,
  AnyToken,
  InnerToken,
  Hash,
  LParen,
  RParen,
  LAngle,
  RAngle,
  LSquare,
  RSquare,
  LCurly,
  RCurly,
  Colon,
  Pipe,
  Question,
  FunKeyword,
  Word,
  allTokens,
} from './tokens.js';

// =============================================================================
// Parser Result Types
// =============================================================================

export interface TypeTail {
  /** Source text of the type term; empty when the tail has none */
  type: string;
  description: string;
  /** A top-level `?` suffix marks the value as optional */
  optional: boolean;
}

// =============================================================================
// Parser Definition
// =============================================================================

class TypeTailParser extends CstParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  // Entry rule: [type] [#] description...
  public annotationTail = this.RULE('annotationTail', () => {
    this.OPTION(() => {
      this.SUBRULE(this.typeExpression);
    });
    this.OPTION2(() => {
      this.CONSUME(Hash, { LABEL: 'delimiter' });
    });
    this.MANY(() => {
      this.CONSUME(AnyToken, { LABEL: 'rest' });
    });
  });

  // member | member | ...
  private typeExpression = this.RULE('typeExpression', () => {
    this.SUBRULE(this.unionMember);
    this.MANY(() => {
      this.CONSUME(Pipe);
      this.SUBRULE2(this.unionMember);
    });
  });

  // primary followed by any number of `?` or `[]`
  private unionMember = this.RULE('unionMember', () => {
    this.SUBRULE(this.primaryType);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Question) },
        {
          ALT: () => {
            this.CONSUME(LSquare);
            this.CONSUME(RSquare);
          },
        },
      ]);
    });
  });

  private primaryType = this.RULE('primaryType', () => {
    this.OR([
      {
        // fun(params): result
        ALT: () => {
          this.CONSUME(FunKeyword);
          this.SUBRULE(this.parenGroup);
          this.OPTION(() => {
            this.CONSUME(Colon);
            this.SUBRULE(this.typeExpression);
          });
        },
      },
      {
        // name or name<args>
        ALT: () => {
          this.CONSUME(Word);
          this.OPTION2(() => {
            this.SUBRULE(this.angleGroup);
          });
        },
      },
      { ALT: () => this.SUBRULE2(this.parenGroup) },
      { ALT: () => this.SUBRULE(this.curlyGroup) },
    ]);
  });

  private parenGroup = this.RULE('parenGroup', () => {
    this.CONSUME(LParen);
    this.MANY(() => {
      this.SUBRULE(this.groupItem);
    });
    this.CONSUME(RParen);
  });

  private angleGroup = this.RULE('angleGroup', () => {
    this.CONSUME(LAngle);
    this.MANY(() => {
      this.SUBRULE(this.groupItem);
    });
    this.CONSUME(RAngle);
  });

  private squareGroup = this.RULE('squareGroup', () => {
    this.CONSUME(LSquare);
    this.MANY(() => {
      this.SUBRULE(this.groupItem);
    });
    this.CONSUME(RSquare);
  });

  private curlyGroup = this.RULE('curlyGroup', () => {
    this.CONSUME(LCurly);
    this.MANY(() => {
      this.SUBRULE(this.groupItem);
    });
    this.CONSUME(RCurly);
  });

  // Anything balanced inside a group
  private groupItem = this.RULE('groupItem', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.parenGroup) },
      { ALT: () => this.SUBRULE(this.angleGroup) },
      { ALT: () => this.SUBRULE(this.squareGroup) },
      { ALT: () => this.SUBRULE(this.curlyGroup) },
      { ALT: () => this.CONSUME(InnerToken) },
    ]);
  });
}

// =============================================================================
// Parser Instance (singleton)
// =============================================================================

const parserInstance = new TypeTailParser();

// =============================================================================
// CST Visitor
// =============================================================================

const BaseVisitor = parserInstance.getBaseCstVisitorConstructor();

/** Half-open source range [start, end) */
interface Span {
  start: number;
  end: number;
  optional: boolean;
}

interface TailSpans {
  type?: Span;
  descriptionStart?: number;
}

interface AnnotationTailContext {
  typeExpression?: CstNode[];
  delimiter?: IToken[];
  rest?: IToken[];
}

interface TypeExpressionContext {
  unionMember: CstNode[];
  Pipe?: IToken[];
}

interface UnionMemberContext {
  primaryType: CstNode[];
  Question?: IToken[];
  LSquare?: IToken[];
  RSquare?: IToken[];
}

interface PrimaryTypeContext {
  FunKeyword?: IToken[];
  Word?: IToken[];
  Colon?: IToken[];
  parenGroup?: CstNode[];
  angleGroup?: CstNode[];
  curlyGroup?: CstNode[];
  typeExpression?: CstNode[];
}

interface GroupContext {
  LParen?: IToken[];
  RParen?: IToken[];
  LAngle?: IToken[];
  RAngle?: IToken[];
  LSquare?: IToken[];
  RSquare?: IToken[];
  LCurly?: IToken[];
  RCurly?: IToken[];
}

function tokenSpan(token: IToken): Span {
  return { start: token.startOffset, end: token.startOffset + token.image.length, optional: false };
}

function mergeSpans(first: Span, rest: Span[]): Span {
  return rest.reduce<Span>(
    (acc, span) => ({
      start: Math.min(acc.start, span.start),
      end: Math.max(acc.end, span.end),
      optional: acc.optional || span.optional,
    }),
    first
  );
}

function groupSpan(ctx: GroupContext): Span {
  const tokens = [
    ...(ctx.LParen ?? []),
    ...(ctx.RParen ?? []),
    ...(ctx.LAngle ?? []),
    ...(ctx.RAngle ?? []),
    ...(ctx.LSquare ?? []),
    ...(ctx.RSquare ?? []),
    ...(ctx.LCurly ?? []),
    ...(ctx.RCurly ?? []),
  ].map(tokenSpan);
  const [first, ...rest] = tokens;
  return mergeSpans(first, rest);
}

class TypeTailVisitor extends BaseVisitor {
  constructor() {
    super();
    this.validateVisitor();
  }

  annotationTail(ctx: AnnotationTailContext): TailSpans {
    const result: TailSpans = {};
    if (ctx.typeExpression) {
      result.type = this.visit(ctx.typeExpression);
    }
    if (ctx.delimiter) {
      result.descriptionStart = tokenSpan(ctx.delimiter[0]).end;
    } else if (ctx.rest) {
      result.descriptionStart = ctx.rest[0].startOffset;
    }
    return result;
  }

  typeExpression(ctx: TypeExpressionContext): Span {
    const members: Span[] = ctx.unionMember.map((node) => this.visit(node));
    const [first, ...rest] = members;
    return mergeSpans(first, rest);
  }

  unionMember(ctx: UnionMemberContext): Span {
    const primary: Span = this.visit(ctx.primaryType);
    const suffixes = [...(ctx.Question ?? []), ...(ctx.LSquare ?? []), ...(ctx.RSquare ?? [])].map(tokenSpan);
    // Only a `?` directly on this member counts; a `?` nested inside a group does not
    const merged = mergeSpans({ ...primary, optional: false }, suffixes);
    return { ...merged, optional: (ctx.Question?.length ?? 0) > 0 };
  }

  primaryType(ctx: PrimaryTypeContext): Span {
    const spans: Span[] = [
      ...(ctx.FunKeyword ?? []).map(tokenSpan),
      ...(ctx.Word ?? []).map(tokenSpan),
      ...(ctx.Colon ?? []).map(tokenSpan),
    ];
    for (const node of [
      ...(ctx.parenGroup ?? []),
      ...(ctx.angleGroup ?? []),
      ...(ctx.curlyGroup ?? []),
      ...(ctx.typeExpression ?? []),
    ]) {
      const span: Span = this.visit(node);
      spans.push({ ...span, optional: false });
    }
    const [first, ...rest] = spans;
    return mergeSpans(first, rest);
  }

  parenGroup(ctx: GroupContext): Span {
    return groupSpan(ctx);
  }

  angleGroup(ctx: GroupContext): Span {
    return groupSpan(ctx);
  }

  squareGroup(ctx: GroupContext): Span {
    return groupSpan(ctx);
  }

  curlyGroup(ctx: GroupContext): Span {
    return groupSpan(ctx);
  }

  // Group contents only matter through the enclosing brackets
  groupItem(): void {}
}

const visitorInstance = new TypeTailVisitor();

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse the text after an annotation's name (or after `@return`).
 * Returns null when the brackets in the type do not balance.
 */
export function parseTypeTail(input: string, warnings?: string[]): TypeTail | null {
  const lexResult = TypeLexer.tokenize(input);

  if (lexResult.errors.length > 0) {
    return null;
  }

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.annotationTail();

  if (parserInstance.errors.length > 0) {
    const firstError = parserInstance.errors[0];
    const truncatedInput = input.length > 60 ? input.substring(0, 60) + '...' : input;
    warnings?.push(
      `Failed to parse annotation type: "${truncatedInput}"\n` +
        `  Error: ${firstError.message}\n` +
        `  Expected format: <type> [# description]`
    );
    return null;
  }

  const spans: TailSpans = visitorInstance.visit(cst);
  const type = spans.type ? input.slice(spans.type.start, spans.type.end) : '';
  const description = spans.descriptionStart !== undefined ? input.slice(spans.descriptionStart).trim() : '';

  return {
    type,
    description,
    optional: spans.type?.optional ?? false,
  };
}

/**
 * Get serialized grammar for documentation/diagram generation.
 */
export function getTypeTailGrammar() {
  return parserInstance.getSerializedGastProductions();
}

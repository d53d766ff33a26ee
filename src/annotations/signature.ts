/**
 * @module annotations/signature
 *
 * Lightweight recognition of function definition lines:
 *
 *   function Array.map(f, xs)
 *   local function helper(x)
 *   Array.filter = function(pred, xs)
 *
 * Pattern matching only; unusual formatting may be missed, but no input
 * makes it throw.
 */

import * as Maybe from '../functional/maybe.js';
import { advance, currentLine, failure, success, type Parser } from '../parser/state.js';
import type { FunctionSignature } from './types.js';

const QUALIFIED_NAME = String.raw`[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*`;

const DECLARATION = new RegExp(String.raw`^(.*?)\bfunction\s+(${QUALIFIED_NAME})\s*\(([^)]*)\)`);
const ASSIGNMENT = new RegExp(String.raw`^\s*(?:local\s+)?(${QUALIFIED_NAME})\s*=\s*function\s*\(([^)]*)\)`);

/** Keywords that mark a line as control flow rather than a definition */
const CONTROL_KEYWORDS = /\b(?:if|then|elseif|else|for|while|do|repeat|until|return)\b/;

export function splitParams(raw: string): string[] {
  return raw
    .split(',')
    .map((param) => param.trim())
    .filter((param) => param.length > 0);
}

function fromDeclaration(line: string): Maybe.Maybe<{ name: string; params: string }> {
  const m = line.match(DECLARATION);
  if (!m) return Maybe.Nothing;
  const prefix = m[1];
  if (prefix.includes('--') || CONTROL_KEYWORDS.test(prefix)) return Maybe.Nothing;
  return Maybe.Just({ name: m[2], params: m[3] });
}

function fromAssignment(line: string): Maybe.Maybe<{ name: string; params: string }> {
  const m = line.match(ASSIGNMENT);
  return m ? Maybe.Just({ name: m[1], params: m[2] }) : Maybe.Nothing;
}

/**
 * Recognize a function definition on `line` (found at 1-based `lineNumber`).
 */
export function extractSignature(line: string, lineNumber: number): Maybe.Maybe<FunctionSignature> {
  const declared = fromDeclaration(line);
  const found = Maybe.isJust(declared) ? declared : fromAssignment(line);
  return Maybe.map(
    ({ name, params }) => ({ name, params: splitParams(params), line: lineNumber }),
    found
  );
}

/**
 * Parser form of {@link extractSignature}: consumes the definition line.
 */
export const functionDefinition: Parser<FunctionSignature> = (state) => {
  const signature = Maybe.bind((line) => extractSignature(line, state.position), currentLine(state));
  return Maybe.isJust(signature) ? success(signature.value, advance(state)) : failure();
};

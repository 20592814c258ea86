/**
 * typeWrapper.ts
 *
 * Reduces a field's output-type signature to one of the six s2dm type wrapper
 * patterns. Only a single list level is representable; nested lists and any
 * other modifier sequence are rejected rather than approximated.
 */

import type { TypeModifier, TypeSignature, TypeWrapperPattern } from "../types/schema";
import { createUnsupportedShapeError } from "../types/errors";

export interface ClassifiedType {
  pattern: TypeWrapperPattern;
  baseTypeName: string;
}

// keyed by the modifier sequence, innermost first
const PATTERN_BY_MODIFIERS: ReadonlyMap<string, TypeWrapperPattern> = new Map([
  ["", "bare"],
  ["NON_NULL", "nonNull"],
  ["LIST", "list"],
  ["NON_NULL,LIST", "listOfNonNull"],
  ["LIST,NON_NULL", "nonNullList"],
  ["NON_NULL,LIST,NON_NULL", "nonNullListOfNonNull"],
]);

const NAMED_TYPE = /^[_A-Za-z][_0-9A-Za-z]*$/;

/**
 * Render a signature back to SDL notation, e.g. `[Door!]!`.
 */
export function formatTypeSignature(signature: TypeSignature): string {
  let rendered = signature.baseTypeName;
  for (const modifier of signature.modifiers) {
    rendered = modifier === "LIST" ? `[${rendered}]` : `${rendered}!`;
  }
  return rendered;
}

/**
 * Classify a signature. `path` is only used to label the error.
 */
export function classifyTypeSignature(signature: TypeSignature, path?: string): ClassifiedType {
  const pattern = PATTERN_BY_MODIFIERS.get(signature.modifiers.join(","));
  if (!pattern || signature.baseTypeName.length === 0) {
    throw createUnsupportedShapeError(formatTypeSignature(signature), path);
  }
  return { pattern, baseTypeName: signature.baseTypeName };
}

/**
 * Parse SDL type notation (`Door`, `[Door!]!`, `[[Door]]`) into a signature.
 * Malformed text throws UNSUPPORTED_SHAPE; nested lists parse but do not
 * classify.
 */
export function parseTypeSignature(text: string): TypeSignature {
  const source = text.replace(/\s+/g, "");
  const modifiersOuterFirst: TypeModifier[] = [];
  let rest = source;

  while (rest.length > 0) {
    if (rest.endsWith("!")) {
      modifiersOuterFirst.push("NON_NULL");
      rest = rest.slice(0, -1);
    } else if (rest.startsWith("[") && rest.endsWith("]")) {
      modifiersOuterFirst.push("LIST");
      rest = rest.slice(1, -1);
    } else {
      break;
    }
  }

  if (!NAMED_TYPE.test(rest)) {
    throw createUnsupportedShapeError(text);
  }
  return { baseTypeName: rest, modifiers: modifiersOuterFirst.reverse() };
}

/**
 * @fileoverview Normalized schema model consumed by the materializer.
 * The model is produced by an external parser (see utils/schemaModel for the
 * graphql-js adapter) and is treated as read-only input.
 */

/** Modifier applied to a type reference, innermost first. */
export type TypeModifier = "NON_NULL" | "LIST";

/**
 * Raw output-type signature of a field: `[Door!]!` is
 * `{ baseTypeName: "Door", modifiers: ["NON_NULL", "LIST", "NON_NULL"] }`.
 */
export interface TypeSignature {
  baseTypeName: string;
  modifiers: readonly TypeModifier[];
}

export const TYPE_WRAPPER_PATTERNS = [
  "bare",
  "nonNull",
  "list",
  "listOfNonNull",
  "nonNullList",
  "nonNullListOfNonNull",
] as const;

export type TypeWrapperPattern = (typeof TYPE_WRAPPER_PATTERNS)[number];

export interface FieldDefinition {
  name: string;
  ownerTypeName: string;
  type: TypeSignature;
}

export interface EnumValueDefinition {
  name: string;
  ownerEnumName: string;
}

interface NamedDefinition {
  name: string;
  /** Schema description; a non-blank value becomes skos:definition */
  description?: string;
}

export interface FieldContainerDefinition extends NamedDefinition {
  kind: "Object" | "Interface" | "InputObject";
  fields: readonly FieldDefinition[];
}

export interface UnionDefinition extends NamedDefinition {
  kind: "Union";
  memberTypeNames: readonly string[];
}

export interface EnumDefinition extends NamedDefinition {
  kind: "Enum";
  values: readonly EnumValueDefinition[];
}

export interface ScalarDefinition extends NamedDefinition {
  kind: "Scalar";
}

export type TypeDefinition =
  | FieldContainerDefinition
  | UnionDefinition
  | EnumDefinition
  | ScalarDefinition;

export type TypeDefinitionKind = TypeDefinition["kind"];

export interface SchemaModel {
  types: readonly TypeDefinition[];
  /** Names of the query/mutation/subscription root types */
  rootTypeNames: readonly string[];
}

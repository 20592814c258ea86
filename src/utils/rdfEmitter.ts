/**
 * rdfEmitter.ts
 *
 * Materializes a SchemaModel into SKOS concepts annotated with the s2dm
 * vocabulary. Each retained type definition is turned into quads by
 * emitTypeDefinition, a pure function of that definition and the frozen
 * emission context; materializeSchema merges the per-type results into one
 * TripleSet. Any error aborts the whole run, so no partial set escapes.
 */

import { DataFactory } from "n3";
import type { Quad } from "@rdfjs/types";
import { RDF, S2DM, SKOS, s2dmTerm } from "../constants/vocabularies";
import { createConceptUriGenerator, isBuiltinScalar, qualifiedPath } from "../lib/conceptUri";
import type { ConceptUriGenerator } from "../lib/conceptUri";
import { classifyTypeSignature } from "../lib/typeWrapper";
import type { MaterializeConfig, MaterializeOptions } from "../types/config";
import { createDuplicateDefinitionError, createRootTypeReferenceError } from "../types/errors";
import type {
  EnumDefinition,
  FieldContainerDefinition,
  FieldDefinition,
  ScalarDefinition,
  SchemaModel,
  TypeDefinition,
  TypeDefinitionKind,
  UnionDefinition,
} from "../types/schema";
import { debug, incr } from "./debugLog";
import { normalizeMaterializeConfig } from "./normalizers";
import { TripleSet } from "./tripleSet";

const { namedNode, literal, quad } = DataFactory;

export const INTROSPECTION_PREFIX = "__";

/** s2dm class asserted for each definition kind */
export const KIND_CLASS: Readonly<Record<TypeDefinitionKind, string>> = {
  Object: S2DM.ObjectType,
  Interface: S2DM.InterfaceType,
  InputObject: S2DM.InputObjectType,
  Union: S2DM.UnionType,
  Enum: S2DM.EnumType,
  Scalar: S2DM.ScalarType,
};

export interface EmissionContext {
  readonly config: MaterializeConfig;
  readonly uris: ConceptUriGenerator;
  readonly rootTypeNames: ReadonlySet<string>;
}

export interface MaterializationWarning {
  code: "EMPTY_SCHEMA";
  message: string;
}

export interface MaterializationStats {
  retainedTypes: number;
  excludedTypes: number;
  triples: number;
}

export interface MaterializationResult {
  triples: TripleSet;
  warnings: MaterializationWarning[];
  stats: MaterializationStats;
}

/**
 * Optional extension point run once per materialization, after the per-type
 * emission. Its quads join the same TripleSet, so directive-driven or other
 * project-specific triples get the canonical serialization for free.
 */
export type DirectiveTripleHandler = (model: SchemaModel, context: EmissionContext) => Iterable<Quad>;

export interface MaterializeHooks {
  directiveTripleHandler?: DirectiveTripleHandler;
}

export function createEmissionContext(
  config: MaterializeConfig,
  rootTypeNames: Iterable<string> = [],
): EmissionContext {
  return Object.freeze({
    config,
    uris: createConceptUriGenerator(config),
    rootTypeNames: new Set(rootTypeNames),
  });
}

export function isIntrospectionTypeName(name: string): boolean {
  return name.startsWith(INTROSPECTION_PREFIX);
}

/**
 * Root operation types, introspection types and built-in scalars never
 * become concepts of their own.
 */
export function isExcludedDefinition(
  definition: TypeDefinition,
  rootTypeNames: ReadonlySet<string>,
): boolean {
  if (isIntrospectionTypeName(definition.name)) return true;
  if (rootTypeNames.has(definition.name)) return true;
  return definition.kind === "Scalar" && isBuiltinScalar(definition.name);
}

function conceptHeader(
  uri: string,
  label: string,
  kindClass: string,
  context: EmissionContext,
  description?: string,
): Quad[] {
  const subject = namedNode(uri);
  const { language } = context.config;
  const quads = [
    quad(subject, namedNode(RDF.type), namedNode(SKOS.Concept)),
    quad(subject, namedNode(RDF.type), namedNode(kindClass)),
    quad(subject, namedNode(SKOS.prefLabel), literal(label, language)),
  ];
  if (description && description.trim()) {
    // definitions stay untagged; only labels carry the configured language
    quads.push(quad(subject, namedNode(SKOS.definition), literal(description)));
  }
  return quads;
}

function assertUniqueNames(ownerName: string, names: readonly string[]) {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) throw createDuplicateDefinitionError(qualifiedPath(ownerName, name));
    seen.add(name);
  }
}

function emitField(typeUri: string, field: FieldDefinition, context: EmissionContext): Quad[] {
  const path = qualifiedPath(field.ownerTypeName, field.name);
  const { pattern, baseTypeName } = classifyTypeSignature(field.type, path);

  if (context.config.rootReferencePolicy === "reject" && context.rootTypeNames.has(baseTypeName)) {
    throw createRootTypeReferenceError(path, baseTypeName);
  }

  const fieldUri = context.uris.fieldUri(field.ownerTypeName, field.name);
  const subject = namedNode(fieldUri);
  return [
    quad(namedNode(typeUri), namedNode(S2DM.hasField), subject),
    ...conceptHeader(fieldUri, path, S2DM.Field, context),
    quad(subject, namedNode(S2DM.hasOutputType), namedNode(context.uris.outputTypeUri(baseTypeName))),
    quad(subject, namedNode(S2DM.usesTypeWrapperPattern), namedNode(s2dmTerm(pattern))),
  ];
}

function emitFieldContainer(definition: FieldContainerDefinition, context: EmissionContext): Quad[] {
  assertUniqueNames(definition.name, definition.fields.map((field) => field.name));
  const typeUri = context.uris.typeUri(definition.name);
  const quads = conceptHeader(typeUri, definition.name, KIND_CLASS[definition.kind], context, definition.description);
  for (const field of definition.fields) {
    quads.push(...emitField(typeUri, { ...field, ownerTypeName: definition.name }, context));
  }
  return quads;
}

function emitUnion(definition: UnionDefinition, context: EmissionContext): Quad[] {
  const unionUri = context.uris.typeUri(definition.name);
  const quads = conceptHeader(unionUri, definition.name, S2DM.UnionType, context, definition.description);
  for (const memberName of definition.memberTypeNames) {
    quads.push(quad(namedNode(unionUri), namedNode(S2DM.hasUnionMember), namedNode(context.uris.typeUri(memberName))));
  }
  return quads;
}

function emitEnum(definition: EnumDefinition, context: EmissionContext): Quad[] {
  assertUniqueNames(definition.name, definition.values.map((value) => value.name));
  const enumUri = context.uris.typeUri(definition.name);
  const quads = conceptHeader(enumUri, definition.name, S2DM.EnumType, context, definition.description);
  for (const value of definition.values) {
    const valueUri = context.uris.enumValueUri(definition.name, value.name);
    quads.push(quad(namedNode(enumUri), namedNode(S2DM.hasEnumValue), namedNode(valueUri)));
    quads.push(...conceptHeader(valueUri, qualifiedPath(definition.name, value.name), S2DM.EnumValue, context));
  }
  return quads;
}

function emitScalar(definition: ScalarDefinition, context: EmissionContext): Quad[] {
  if (isBuiltinScalar(definition.name)) return [];
  const uri = context.uris.typeUri(definition.name);
  return conceptHeader(uri, definition.name, S2DM.ScalarType, context, definition.description);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled type definition: ${JSON.stringify(value)}`);
}

/**
 * Quads for one type definition and everything it owns (fields, enum values).
 */
export function emitTypeDefinition(definition: TypeDefinition, context: EmissionContext): Quad[] {
  switch (definition.kind) {
    case "Object":
    case "Interface":
    case "InputObject":
      return emitFieldContainer(definition, context);
    case "Union":
      return emitUnion(definition, context);
    case "Enum":
      return emitEnum(definition, context);
    case "Scalar":
      return emitScalar(definition, context);
    default:
      return assertNever(definition);
  }
}

/**
 * Materialize a whole schema model. Options are validated first; an already
 * normalized MaterializeConfig passes through unchanged.
 */
export function materializeSchema(
  model: SchemaModel,
  options: MaterializeOptions | MaterializeConfig,
  hooks: MaterializeHooks = {},
): MaterializationResult {
  const config = normalizeMaterializeConfig(options);
  const context = createEmissionContext(config, model.rootTypeNames);

  const retained = model.types.filter((definition) => !isExcludedDefinition(definition, context.rootTypeNames));
  assertUniqueTypeNames(retained);

  // per-type emission shares nothing mutable; the merge below is the only join point
  const perType = retained.map((definition) => emitTypeDefinition(definition, context));
  const extra = hooks.directiveTripleHandler ? [...hooks.directiveTripleHandler(model, context)] : [];
  const triples = TripleSet.fromQuads([...perType.flat(), ...extra]);

  const warnings: MaterializationWarning[] = [];
  if (retained.length === 0) {
    const message = "Schema has no type definitions left after excluding root operation and introspection types";
    debug("materialize.emptySchema", { types: model.types.length });
    warnings.push({ code: "EMPTY_SCHEMA", message });
  }

  if (extra.length > 0) debug("materialize.directiveTriples", { count: extra.length });

  const stats: MaterializationStats = {
    retainedTypes: retained.length,
    excludedTypes: model.types.length - retained.length,
    triples: triples.size,
  };
  incr("materialize.runs");
  debug("materialize.done", { ...stats, namespace: config.namespace });
  return { triples, warnings, stats };
}

function assertUniqueTypeNames(definitions: readonly TypeDefinition[]) {
  const seen = new Set<string>();
  for (const definition of definitions) {
    if (seen.has(definition.name)) throw createDuplicateDefinitionError(definition.name);
    seen.add(definition.name);
  }
}

/**
 * conceptUri.ts
 *
 * Stable concept IRIs for schema elements. The qualified path of an element
 * (`Type`, `Type.field`, `Enum.VALUE`) is appended to the configured
 * namespace, one percent-escaped segment per name, joined by '.'.
 *
 * Notes:
 * - Segments are escaped with encodeURIComponent, which is injective, so two
 *   distinct paths never share an IRI. '.' is left alone by that encoding and
 *   is the path separator, so a name containing it is rejected.
 * - GraphQL names ([_A-Za-z][_0-9A-Za-z]*) pass through unchanged.
 * - Built-in scalars resolve into the s2dm vocabulary, never the user namespace.
 */

import { s2dmTerm } from "../constants/vocabularies";
import type { MaterializeConfig } from "../types/config";
import { createInvalidIdentifierError } from "../types/errors";

export const BUILTIN_SCALARS: ReadonlySet<string> = new Set(["Int", "Float", "String", "Boolean", "ID"]);

export const PATH_SEPARATOR = ".";

export function isBuiltinScalar(name: string): boolean {
  return BUILTIN_SCALARS.has(name);
}

export function qualifiedPath(ownerName: string, memberName: string): string {
  return `${ownerName}${PATH_SEPARATOR}${memberName}`;
}

/**
 * encodeNameSegment
 * Percent-escape one name for use inside a concept IRI. `path` labels errors.
 */
export function encodeNameSegment(name: string, path: string = name): string {
  if (name.length === 0) {
    throw createInvalidIdentifierError(path, "name is empty");
  }
  if (name.includes(PATH_SEPARATOR)) {
    throw createInvalidIdentifierError(path, `name '${name}' contains the path separator '${PATH_SEPARATOR}'`);
  }
  try {
    return encodeURIComponent(name);
  } catch (err) {
    if (err instanceof URIError) {
      throw createInvalidIdentifierError(path, `name '${name}' is not well-formed Unicode`);
    }
    throw err;
  }
}

export interface ConceptUriGenerator {
  readonly namespace: string;
  typeUri(typeName: string): string;
  fieldUri(typeName: string, fieldName: string): string;
  enumValueUri(enumName: string, valueName: string): string;
  /** Target of s2dm:hasOutputType: built-in scalars map into s2dm */
  outputTypeUri(typeName: string): string;
}

export function createConceptUriGenerator(
  config: Pick<MaterializeConfig, "namespace">,
): ConceptUriGenerator {
  const { namespace } = config;

  const memberUri = (ownerName: string, memberName: string) => {
    const path = qualifiedPath(ownerName, memberName);
    return `${namespace}${encodeNameSegment(ownerName, path)}${PATH_SEPARATOR}${encodeNameSegment(memberName, path)}`;
  };

  return {
    namespace,
    typeUri: (typeName) => `${namespace}${encodeNameSegment(typeName)}`,
    fieldUri: memberUri,
    enumValueUri: memberUri,
    outputTypeUri: (typeName) =>
      isBuiltinScalar(typeName) ? s2dmTerm(typeName) : `${namespace}${encodeNameSegment(typeName)}`,
  };
}

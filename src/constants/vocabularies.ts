/**
 * Vocabulary IRIs used by the materializer.
 *
 * Single source of truth for the RDF, SKOS and s2dm terms so that emitter,
 * serializer and tests never spell an IRI by hand.
 */

// ============================================================================
// RDF (Resource Description Framework)
// https://www.w3.org/1999/02/22-rdf-syntax-ns
// ============================================================================

export const RDF = {
  namespace: "http://www.w3.org/1999/02/22-rdf-syntax-ns#",
  type: "http://www.w3.org/1999/02/22-rdf-syntax-ns#type",
} as const;

// ============================================================================
// SKOS (Simple Knowledge Organization System)
// https://www.w3.org/2004/02/skos/core
// ============================================================================

export const SKOS = {
  namespace: "http://www.w3.org/2004/02/skos/core#",
  Concept: "http://www.w3.org/2004/02/skos/core#Concept",
  prefLabel: "http://www.w3.org/2004/02/skos/core#prefLabel",
  definition: "http://www.w3.org/2004/02/skos/core#definition",
} as const;

// ============================================================================
// s2dm ontology
// https://covesa.global/models/s2dm
// ============================================================================

const S2DM_NS = "https://covesa.global/models/s2dm#";

export const S2DM = {
  namespace: S2DM_NS,

  // element kinds
  ObjectType: `${S2DM_NS}ObjectType`,
  InterfaceType: `${S2DM_NS}InterfaceType`,
  InputObjectType: `${S2DM_NS}InputObjectType`,
  UnionType: `${S2DM_NS}UnionType`,
  EnumType: `${S2DM_NS}EnumType`,
  ScalarType: `${S2DM_NS}ScalarType`,
  Field: `${S2DM_NS}Field`,
  EnumValue: `${S2DM_NS}EnumValue`,

  // structural predicates
  hasField: `${S2DM_NS}hasField`,
  hasOutputType: `${S2DM_NS}hasOutputType`,
  usesTypeWrapperPattern: `${S2DM_NS}usesTypeWrapperPattern`,
  hasUnionMember: `${S2DM_NS}hasUnionMember`,
  hasEnumValue: `${S2DM_NS}hasEnumValue`,
} as const;

/**
 * Term for a s2dm local name, e.g. a wrapper pattern (`list`) or a built-in
 * scalar (`String`).
 */
export function s2dmTerm(localName: string): string {
  return `${S2DM_NS}${localName}`;
}

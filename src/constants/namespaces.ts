import { RDF, S2DM, SKOS } from "./vocabularies";

export const DEFAULT_CONCEPT_PREFIX = "ns";
export const DEFAULT_LABEL_LANGUAGE = "en";
export const DEFAULT_ARTIFACT_BASE_NAME = "schema";

export type NamespaceRegistryEntry = {
  prefix: string;
  namespace: string;
};

/**
 * Prefixes every Turtle artifact declares, in declaration order. The concept
 * prefix chosen by the caller is appended after these and may not shadow them.
 */
export const FIXED_NAMESPACE_REGISTRY: readonly NamespaceRegistryEntry[] = [
  { prefix: "rdf", namespace: RDF.namespace },
  { prefix: "skos", namespace: SKOS.namespace },
  { prefix: "s2dm", namespace: S2DM.namespace },
];

export const RESERVED_PREFIXES: ReadonlySet<string> = new Set(
  FIXED_NAMESPACE_REGISTRY.map((entry) => entry.prefix),
);

export function buildNamespaceRegistry(
  prefix: string,
  namespace: string,
): NamespaceRegistryEntry[] {
  return [...FIXED_NAMESPACE_REGISTRY, { prefix, namespace }];
}

export function registryToPrefixMap(
  registry: readonly NamespaceRegistryEntry[],
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of registry) {
    result[entry.prefix] = entry.namespace;
  }
  return result;
}

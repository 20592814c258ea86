/**
 * How a field whose output type is a root operation type is handled.
 * - "emit": the hasOutputType reference is emitted, the root type itself is not
 * - "reject": materialization fails with ROOT_TYPE_REFERENCE
 */
export type RootReferencePolicy = "emit" | "reject";

/** Options as accepted from callers (CLI flags, library users). */
export interface MaterializeOptions {
  /** Absolute IRI ending in '#', '/' or ':' */
  namespace: string;
  /** Turtle prefix bound to the namespace, default "ns" */
  prefix?: string;
  /** BCP 47 tag for skos:prefLabel, default "en" */
  language?: string;
  rootReferencePolicy?: RootReferencePolicy;
}

/** Validated, immutable configuration threaded through every component. */
export interface MaterializeConfig {
  readonly namespace: string;
  readonly prefix: string;
  readonly language: string;
  readonly rootReferencePolicy: RootReferencePolicy;
}

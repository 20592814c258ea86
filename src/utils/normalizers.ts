import {
  DEFAULT_CONCEPT_PREFIX,
  DEFAULT_LABEL_LANGUAGE,
  RESERVED_PREFIXES,
} from "../constants/namespaces";
import type {
  MaterializeConfig,
  MaterializeOptions,
  RootReferencePolicy,
} from "../types/config";
import { createInvalidConfigError } from "../types/errors";
import { assertString, invariant } from "./guards";

const IRI_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/;
const IRI_FORBIDDEN = /[\s<>"{}|^`\\]/;
const NAMESPACE_TERMINATORS = ["#", "/", ":"];
const PREFIX_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;
const LANGUAGE_TAG = /^[A-Za-z]{1,8}(-[A-Za-z0-9]{1,8})*$/;
const ROOT_REFERENCE_POLICIES: readonly RootReferencePolicy[] = ["emit", "reject"];

export function normalizeNamespace(value: unknown): string {
  assertString(value, () => createInvalidConfigError("namespace", "must be a string", value));
  invariant(IRI_SCHEME.test(value), () =>
    createInvalidConfigError("namespace", `'${value}' is not an absolute IRI`, value),
  );
  invariant(!IRI_FORBIDDEN.test(value), () =>
    createInvalidConfigError("namespace", `'${value}' contains characters not allowed in an IRI`, value),
  );
  const scheme = IRI_SCHEME.exec(value)?.[0] ?? "";
  invariant(value.length > scheme.length + 1, () =>
    createInvalidConfigError("namespace", `'${value}' has nothing after its scheme`, value),
  );
  invariant(
    NAMESPACE_TERMINATORS.some((terminator) => value.endsWith(terminator)),
    () => createInvalidConfigError("namespace", `'${value}' must end with '#', '/' or ':'`, value),
  );
  return value;
}

export function normalizePrefix(value: unknown): string {
  if (value === undefined) return DEFAULT_CONCEPT_PREFIX;
  assertString(value, () => createInvalidConfigError("prefix", "must be a string", value));
  invariant(PREFIX_PATTERN.test(value), () =>
    createInvalidConfigError("prefix", `'${value}' is not a valid Turtle prefix`, value),
  );
  invariant(!RESERVED_PREFIXES.has(value), () =>
    createInvalidConfigError("prefix", `'${value}' is reserved for a built-in vocabulary`, value),
  );
  return value;
}

/**
 * Language tags are compared case-insensitively in RDF; the lower-case form
 * is what ends up in both artifacts.
 */
export function normalizeLanguage(value: unknown): string {
  if (value === undefined) return DEFAULT_LABEL_LANGUAGE;
  assertString(value, () => createInvalidConfigError("language", "must be a string", value));
  invariant(LANGUAGE_TAG.test(value), () =>
    createInvalidConfigError("language", `'${value}' is not a BCP 47 language tag`, value),
  );
  return value.toLowerCase();
}

function isRootReferencePolicy(value: unknown): value is RootReferencePolicy {
  return ROOT_REFERENCE_POLICIES.some((policy) => policy === value);
}

export function normalizeRootReferencePolicy(value: unknown): RootReferencePolicy {
  if (value === undefined) return "emit";
  invariant(isRootReferencePolicy(value), () =>
    createInvalidConfigError("rootReferencePolicy", "must be 'emit' or 'reject'", value),
  );
  return value;
}

export function normalizeMaterializeConfig(options: MaterializeOptions): MaterializeConfig {
  return Object.freeze({
    namespace: normalizeNamespace(options.namespace),
    prefix: normalizePrefix(options.prefix),
    language: normalizeLanguage(options.language),
    rootReferencePolicy: normalizeRootReferencePolicy(options.rootReferencePolicy),
  });
}

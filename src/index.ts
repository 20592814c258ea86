export * from "./types/schema";
export * from "./types/config";
export * from "./types/errors";
export * from "./constants/vocabularies";
export * from "./constants/namespaces";
export * from "./lib/typeWrapper";
export * from "./lib/conceptUri";
export { TripleSet } from "./utils/tripleSet";
export * from "./utils/rdfEmitter";
export * from "./utils/rdfSerialization";
export * from "./utils/rdfArtifacts";
export * from "./utils/schemaModel";
export * from "./utils/schemaLoader";
export { normalizeMaterializeConfig } from "./utils/normalizers";
export { getSummary, resetSummary, setDebugEnabled } from "./utils/debugLog";
export { parseCliArgs, runCli } from "./cli";
export type { CliOptions, ParsedCli } from "./cli";

/**
 * Command line front end: load SDL, materialize, write schema.nt / schema.ttl.
 *
 * parseCliArgs is pure; runCli returns the process exit code instead of
 * exiting so it can be driven from tests.
 */

import { DEFAULT_ARTIFACT_BASE_NAME } from "./constants/namespaces";
import { formatMaterializeError, serializeMaterializeError } from "./types/errors";
import { setDebugEnabled, timedAsync } from "./utils/debugLog";
import { isNonEmptyString } from "./utils/guards";
import { normalizeMaterializeConfig } from "./utils/normalizers";
import { writeRdfArtifacts } from "./utils/rdfArtifacts";
import { materializeSchema } from "./utils/rdfEmitter";
import { loadSchemaModel } from "./utils/schemaLoader";

export const VERSION = "0.1.0";
export const HELP = `
s2dm-schema-rdf v${VERSION}

Materialize a GraphQL schema as SKOS concepts annotated with the s2dm vocabulary.

Usage:
  s2dm-schema-rdf -s <schema> -o <dir> --namespace <iri> [options]

Options:
  -s, --schema <path|url>     GraphQL SDL file, directory or http(s) URL (repeatable)
  -o, --output <dir>          Directory receiving <base-name>.nt and <base-name>.ttl
  --namespace <iri>           Concept namespace, ending in '#', '/' or ':'
  --prefix <prefix>           Turtle prefix for the namespace (default: ns)
  --language <tag>            Language tag of skos:prefLabel (default: en)
  --base-name <name>          Artifact file name without extension (default: ${DEFAULT_ARTIFACT_BASE_NAME})
  --reject-root-references    Fail when a field's output type is a root operation type
  --debug                     Print debug logs to stderr
  --help, -h                  Show this help
  --version, -v               Show version

Examples:
  s2dm-schema-rdf -s schemas/ -o out --namespace https://example.org/vehicle#
  s2dm-schema-rdf -s cabin.graphql -o out --namespace https://example.org/vss# --prefix vss
`;

export interface CliOptions {
  schemas: string[];
  outputDir: string;
  namespace: string;
  prefix?: string;
  language?: string;
  baseName: string;
  rejectRootReferences: boolean;
  debug: boolean;
}

export type ParsedCli =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; options: CliOptions }
  | { kind: "error"; message: string };

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

const VALUE_FLAGS: Readonly<Record<string, string>> = {
  "-s": "schema",
  "--schema": "schema",
  "-o": "output",
  "--output": "output",
  "--namespace": "namespace",
  "--prefix": "prefix",
  "--language": "language",
  "--base-name": "baseName",
};

export function parseCliArgs(argv: readonly string[]): ParsedCli {
  if (argv.includes("--help") || argv.includes("-h")) return { kind: "help" };
  if (argv.includes("--version") || argv.includes("-v")) return { kind: "version" };

  const schemas: string[] = [];
  const values: Record<string, string> = {};
  let rejectRootReferences = false;
  let debug = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    if (flag === "--reject-root-references") {
      rejectRootReferences = true;
      continue;
    }
    if (flag === "--debug") {
      debug = true;
      continue;
    }

    const key = VALUE_FLAGS[flag];
    if (!key) {
      return { kind: "error", message: `Unknown argument '${arg}'` };
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (!isNonEmptyString(value)) {
      return { kind: "error", message: `Option ${flag} requires a value` };
    }

    if (key === "schema") schemas.push(value);
    else values[key] = value;
  }

  if (schemas.length === 0) return { kind: "error", message: "At least one --schema is required" };
  if (!values.output) return { kind: "error", message: "--output is required" };
  if (!values.namespace) return { kind: "error", message: "--namespace is required" };

  return {
    kind: "run",
    options: {
      schemas,
      outputDir: values.output,
      namespace: values.namespace,
      prefix: values.prefix,
      language: values.language,
      baseName: values.baseName ?? DEFAULT_ARTIFACT_BASE_NAME,
      rejectRootReferences,
      debug,
    },
  };
}

export async function runCli(argv: readonly string[], io: CliIo = consoleIo): Promise<number> {
  const parsed = parseCliArgs(argv);
  switch (parsed.kind) {
    case "help":
      io.stdout(HELP);
      return 0;
    case "version":
      io.stdout(VERSION);
      return 0;
    case "error":
      io.stderr(`Error: ${parsed.message}`);
      io.stderr("Run with --help for usage.");
      return 1;
    case "run":
      break;
  }

  const { options } = parsed;
  if (options.debug) setDebugEnabled(true);

  try {
    const config = normalizeMaterializeConfig({
      namespace: options.namespace,
      prefix: options.prefix,
      language: options.language,
      rootReferencePolicy: options.rejectRootReferences ? "reject" : "emit",
    });

    const { result, written } = await timedAsync("cli.run", { schemas: options.schemas }, async () => {
      const model = await loadSchemaModel(options.schemas);
      const materialized = materializeSchema(model, config);
      const paths = await writeRdfArtifacts(materialized.triples, config, options.outputDir, options.baseName);
      return { result: materialized, written: paths };
    });

    for (const warning of result.warnings) {
      io.stderr(`Warning: [${warning.code}] ${warning.message}`);
    }
    io.stdout(`Wrote ${result.stats.triples} triples to ${written.ntriplesPath} and ${written.turtlePath}`);
    return 0;
  } catch (err) {
    io.stderr(formatMaterializeError(serializeMaterializeError(err)));
    return 1;
  }
}

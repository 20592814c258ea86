/**
 * schemaLoader.ts
 *
 * Collects GraphQL SDL from files, directories and URLs and builds one
 * GraphQLSchema from it.
 *
 * Behavior:
 * - Directories are walked recursively; `.graphql` and `.gql` files are taken
 *   in sorted path order so the concatenated SDL is stable across platforms.
 * - `http://` and `https://` sources are fetched with a timeout.
 * - Sources are concatenated in the order given and built with graphql-js
 *   `buildSchema`, which validates the SDL.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { buildSchema } from "graphql";
import type { GraphQLSchema } from "graphql";
import { createSchemaLoadError } from "../types/errors";
import type { SchemaModel } from "../types/schema";
import { debug } from "./debugLog";
import { fetchText } from "./fetcher";
import { toSchemaModel } from "./schemaModel";

export const SCHEMA_FILE_EXTENSIONS: readonly string[] = [".graphql", ".gql"];

export interface SchemaSource {
  /** File path or URL the SDL came from */
  origin: string;
  sdl: string;
}

export interface LoadSchemaOptions {
  fetchTimeoutMs?: number;
}

export function isUrlSource(input: string): boolean {
  return /^https?:\/\//i.test(input);
}

export function isSchemaFile(filePath: string): boolean {
  return SCHEMA_FILE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function listSchemaFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listSchemaFiles(fullPath)));
    } else if (entry.isFile() && isSchemaFile(entry.name)) {
      files.push(fullPath);
    }
  }
  return files;
}

async function readLocalSource(input: string): Promise<SchemaSource[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(input)).isDirectory();
  } catch (err) {
    throw createSchemaLoadError(input, describeError(err), err);
  }

  const files = isDirectory ? await listSchemaFiles(input) : [input];
  const sources: SchemaSource[] = [];
  for (const file of files) {
    try {
      sources.push({ origin: file, sdl: await readFile(file, "utf-8") });
    } catch (err) {
      throw createSchemaLoadError(file, describeError(err), err);
    }
  }
  return sources;
}

export async function collectSchemaSources(
  inputs: readonly string[],
  options: LoadSchemaOptions = {},
): Promise<SchemaSource[]> {
  const sources: SchemaSource[] = [];
  for (const input of inputs) {
    if (isUrlSource(input)) {
      try {
        sources.push({ origin: input, sdl: await fetchText(input, options.fetchTimeoutMs) });
      } catch (err) {
        throw createSchemaLoadError(input, describeError(err), err);
      }
    } else {
      sources.push(...(await readLocalSource(input)));
    }
  }
  if (sources.length === 0) {
    throw createSchemaLoadError(inputs.join(", ") || "<none>", "no GraphQL SDL sources found");
  }
  debug("schema.sources", { count: sources.length, origins: sources.map((source) => source.origin) });
  return sources;
}

export function buildSchemaFromSources(sources: readonly SchemaSource[]): GraphQLSchema {
  const sdl = sources.map((source) => source.sdl).join("\n");
  try {
    return buildSchema(sdl);
  } catch (err) {
    const origin = sources.map((source) => source.origin).join(", ");
    throw createSchemaLoadError(origin, describeError(err), err);
  }
}

export async function loadSchema(inputs: readonly string[], options?: LoadSchemaOptions): Promise<GraphQLSchema> {
  return buildSchemaFromSources(await collectSchemaSources(inputs, options));
}

export async function loadSchemaModel(inputs: readonly string[], options?: LoadSchemaOptions): Promise<SchemaModel> {
  return toSchemaModel(await loadSchema(inputs, options));
}

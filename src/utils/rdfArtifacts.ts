import { mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_ARTIFACT_BASE_NAME } from "../constants/namespaces";
import type { MaterializeConfig } from "../types/config";
import { createArtifactWriteError } from "../types/errors";
import { info } from "./debugLog";
import { serializeGroupedTurtle, serializeSortedNTriples } from "./rdfSerialization";
import type { TripleSet } from "./tripleSet";

export interface RdfArtifacts {
  /** Sorted N-Triples */
  ntriples: string;
  /** Subject-grouped Turtle */
  turtle: string;
}

export interface WrittenArtifacts {
  ntriplesPath: string;
  turtlePath: string;
}

export async function renderRdfArtifacts(
  triples: TripleSet,
  config: Pick<MaterializeConfig, "namespace" | "prefix">,
): Promise<RdfArtifacts> {
  return {
    ntriples: serializeSortedNTriples(triples),
    turtle: await serializeGroupedTurtle(triples, config),
  };
}

interface StagedArtifact {
  target: string;
  temp: string;
  backup: string;
  content: string;
}

async function isExistingFile(target: string): Promise<boolean> {
  try {
    const stats = await stat(target);
    if (!stats.isFile()) throw new Error("target exists and is not a regular file");
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

async function removeFiles(paths: readonly string[]) {
  for (const target of paths) {
    await rm(target, { force: true });
  }
}

/**
 * Move every staged file into place. Targets that already exist are first
 * moved aside; if any step fails, the previous files are restored so the
 * output directory never holds a mismatched pair.
 */
async function commitStaged(staged: readonly StagedArtifact[]) {
  const replaced: StagedArtifact[] = [];
  const created: StagedArtifact[] = [];
  let current: StagedArtifact | undefined;
  try {
    for (const artifact of staged) {
      current = artifact;
      if (await isExistingFile(artifact.target)) {
        await rename(artifact.target, artifact.backup);
        replaced.push(artifact);
      }
      await rename(artifact.temp, artifact.target);
      created.push(artifact);
    }
  } catch (err) {
    for (const artifact of created) {
      await rm(artifact.target, { force: true });
    }
    for (const artifact of replaced) {
      await rename(artifact.backup, artifact.target);
    }
    await removeFiles(staged.map((artifact) => artifact.temp));
    throw createArtifactWriteError(current?.target ?? "", err);
  }
  await removeFiles(replaced.map((artifact) => artifact.backup));
}

/**
 * Render both artifacts in memory first, then write `<baseName>.nt` and
 * `<baseName>.ttl` into outputDir (created when missing).
 *
 * Both files are staged as `<target>.tmp` and only moved into place once
 * every write succeeded. On failure no target is left changed.
 */
export async function writeRdfArtifacts(
  triples: TripleSet,
  config: Pick<MaterializeConfig, "namespace" | "prefix">,
  outputDir: string,
  baseName: string = DEFAULT_ARTIFACT_BASE_NAME,
): Promise<WrittenArtifacts> {
  const artifacts = await renderRdfArtifacts(triples, config);
  const ntriplesPath = path.join(outputDir, `${baseName}.nt`);
  const turtlePath = path.join(outputDir, `${baseName}.ttl`);
  const targets: Array<[string, string]> = [
    [ntriplesPath, artifacts.ntriples],
    [turtlePath, artifacts.turtle],
  ];
  const staged: StagedArtifact[] = targets.map(([target, content]) => ({
    target,
    temp: `${target}.tmp`,
    backup: `${target}.bak`,
    content,
  }));

  try {
    await mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw createArtifactWriteError(outputDir, err);
  }

  // reject unusable targets before anything touches the directory
  for (const artifact of staged) {
    try {
      await isExistingFile(artifact.target);
    } catch (err) {
      throw createArtifactWriteError(artifact.target, err);
    }
  }

  for (const artifact of staged) {
    try {
      await writeFile(artifact.temp, artifact.content, "utf-8");
    } catch (err) {
      await removeFiles(staged.map((candidate) => candidate.temp));
      throw createArtifactWriteError(artifact.target, err);
    }
  }
  await commitStaged(staged);

  info("artifacts.written", { ntriplesPath, turtlePath, triples: triples.size });
  return { ntriplesPath, turtlePath };
}

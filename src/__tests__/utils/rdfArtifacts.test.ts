import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { normalizeMaterializeConfig } from "../../utils/normalizers";
import { renderRdfArtifacts, writeRdfArtifacts } from "../../utils/rdfArtifacts";
import { materializeSchema } from "../../utils/rdfEmitter";
import { TEST_OPTIONS, cabinModel } from "../fixtures/schemaFixtures";
import { captureMaterializeErrorAsync, makeTempDir, removeTempDir } from "./testHelpers";

const config = normalizeMaterializeConfig(TEST_OPTIONS);

describe("writeRdfArtifacts", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test("writes schema.nt and schema.ttl into a new output directory", async () => {
    const { triples } = materializeSchema(cabinModel(), config);
    const outputDir = path.join(dir, "out", "rdf");

    const written = await writeRdfArtifacts(triples, config, outputDir);
    expect(written).toEqual({
      ntriplesPath: path.join(outputDir, "schema.nt"),
      turtlePath: path.join(outputDir, "schema.ttl"),
    });

    const expected = await renderRdfArtifacts(triples, config);
    expect(await readFile(written.ntriplesPath, "utf-8")).toBe(expected.ntriples);
    expect(await readFile(written.turtlePath, "utf-8")).toBe(expected.turtle);
  });

  test("honors a custom base name", async () => {
    const { triples } = materializeSchema(cabinModel(), config);
    const written = await writeRdfArtifacts(triples, config, dir, "cabin");
    expect(path.basename(written.ntriplesPath)).toBe("cabin.nt");
    expect(path.basename(written.turtlePath)).toBe("cabin.ttl");
  });

  test("replaces a previous pair and leaves no staging files behind", async () => {
    const { triples } = materializeSchema(cabinModel(), config);
    await writeFile(path.join(dir, "schema.nt"), "old\n", "utf-8");
    await writeFile(path.join(dir, "schema.ttl"), "old\n", "utf-8");

    await writeRdfArtifacts(triples, config, dir);

    const expected = await renderRdfArtifacts(triples, config);
    expect((await readdir(dir)).sort()).toEqual(["schema.nt", "schema.ttl"]);
    expect(await readFile(path.join(dir, "schema.nt"), "utf-8")).toBe(expected.ntriples);
    expect(await readFile(path.join(dir, "schema.ttl"), "utf-8")).toBe(expected.turtle);
  });

  test("writes no N-Triples file when the Turtle target is unusable", async () => {
    const { triples } = materializeSchema(cabinModel(), config);
    const turtlePath = path.join(dir, "schema.ttl");
    await mkdir(turtlePath);

    const err = await captureMaterializeErrorAsync(() => writeRdfArtifacts(triples, config, dir));
    expect(err.code).toBe("ARTIFACT_WRITE_ERROR");
    expect(err.error.details).toEqual({ target: turtlePath });
    expect(await readdir(dir)).toEqual(["schema.ttl"]);
  });

  test("keeps the previous N-Triples file when the Turtle target is unusable", async () => {
    const { triples } = materializeSchema(cabinModel(), config);
    const ntriplesPath = path.join(dir, "schema.nt");
    await writeFile(ntriplesPath, "previous\n", "utf-8");
    await mkdir(path.join(dir, "schema.ttl"));

    const err = await captureMaterializeErrorAsync(() => writeRdfArtifacts(triples, config, dir));
    expect(err.code).toBe("ARTIFACT_WRITE_ERROR");
    expect(await readFile(ntriplesPath, "utf-8")).toBe("previous\n");
    expect((await readdir(dir)).sort()).toEqual(["schema.nt", "schema.ttl"]);
  });

  test("reports an unwritable target as ARTIFACT_WRITE_ERROR", async () => {
    const { triples } = materializeSchema(cabinModel(), config);
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "not a directory", "utf-8");

    const err = await captureMaterializeErrorAsync(() =>
      writeRdfArtifacts(triples, config, path.join(blocker, "out")),
    );
    expect(err.code).toBe("ARTIFACT_WRITE_ERROR");
    expect(err.error.details).toEqual({ target: path.join(blocker, "out") });
  });
});

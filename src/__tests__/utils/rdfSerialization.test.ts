import { describe, test, expect } from "vitest";
import { DataFactory, Parser } from "n3";
import { RDF, SKOS } from "../../constants/vocabularies";
import { materializeSchema } from "../../utils/rdfEmitter";
import {
  compareQuads,
  predicateRank,
  renderNTriplesLine,
  serializeGroupedTurtle,
  serializeSortedNTriples,
} from "../../utils/rdfSerialization";
import { TripleSet } from "../../utils/tripleSet";
import { CABIN_TRIPLE_COUNT, TEST_NAMESPACE, TEST_OPTIONS, cabinModel, ns } from "../fixtures/schemaFixtures";

const { namedNode, literal, quad } = DataFactory;

const turtleConfig = { namespace: TEST_NAMESPACE, prefix: "vss" };

function cabinTriples(): TripleSet {
  return materializeSchema(cabinModel(), TEST_OPTIONS).triples;
}

describe("serializeSortedNTriples", () => {
  test("renders one sorted line per triple with a trailing newline", () => {
    const triples = TripleSet.fromQuads([
      quad(namedNode(ns("B")), namedNode(SKOS.prefLabel), literal("B", "en")),
      quad(namedNode(ns("A")), namedNode(RDF.type), namedNode(SKOS.Concept)),
    ]);
    expect(serializeSortedNTriples(triples)).toBe(
      "<https://example.org/vss#A> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://www.w3.org/2004/02/skos/core#Concept> .\n" +
        "<https://example.org/vss#B> <http://www.w3.org/2004/02/skos/core#prefLabel> \"B\"@en .\n",
    );
  });

  test("renders the empty set as an empty string", () => {
    expect(serializeSortedNTriples(TripleSet.empty())).toBe("");
  });

  test("escapes literal content", () => {
    const triples = TripleSet.fromQuads([
      quad(namedNode(ns("Door")), namedNode(SKOS.definition), literal('Front "driver" door', "en")),
    ]);
    expect(serializeSortedNTriples(triples)).toBe(
      '<https://example.org/vss#Door> <http://www.w3.org/2004/02/skos/core#definition> "Front \\"driver\\" door"@en .\n',
    );
  });

  test("cabin output is sorted, stable and complete", () => {
    const first = serializeSortedNTriples(cabinTriples());
    const lines = first.trimEnd().split("\n");
    expect(lines).toHaveLength(CABIN_TRIPLE_COUNT);
    expect([...lines].sort()).toEqual(lines);
    expect(lines[0]).toBe(
      "<https://example.org/vss#Cabin.doors> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://www.w3.org/2004/02/skos/core#Concept> .",
    );
    expect(lines).toContain(
      "<https://example.org/vss#Cabin.doors> <https://covesa.global/models/s2dm#hasOutputType> <https://example.org/vss#Door> .",
    );
    expect(serializeSortedNTriples(cabinTriples())).toBe(first);
  });
});

describe("compareQuads", () => {
  test("orders by subject, then predicate, then object", () => {
    const a = quad(namedNode(ns("A")), namedNode(SKOS.prefLabel), literal("A", "en"));
    const b = quad(namedNode(ns("A")), namedNode(RDF.type), namedNode(SKOS.Concept));
    const c = quad(namedNode(ns("B")), namedNode(RDF.type), namedNode(SKOS.Concept));
    expect([c, a, b].sort(compareQuads)).toEqual([b, a, c]);
    expect(compareQuads(a, a)).toBe(0);
  });

  test("renderNTriplesLine matches the serialized line", () => {
    const q = quad(namedNode(ns("A")), namedNode(SKOS.prefLabel), literal("A", "en"));
    expect(renderNTriplesLine(q)).toBe(
      '<https://example.org/vss#A> <http://www.w3.org/2004/02/skos/core#prefLabel> "A"@en .',
    );
  });
});

describe("serializeGroupedTurtle", () => {
  test("parses back to exactly the same triples", async () => {
    const triples = cabinTriples();
    const turtle = await serializeGroupedTurtle(triples, turtleConfig);
    const reparsed = TripleSet.fromQuads(new Parser().parse(turtle));
    expect(reparsed.size).toBe(CABIN_TRIPLE_COUNT);
    expect(serializeSortedNTriples(reparsed)).toBe(serializeSortedNTriples(triples));
  });

  test("declares the vocabulary prefixes and the concept prefix", async () => {
    const turtle = await serializeGroupedTurtle(cabinTriples(), turtleConfig);
    expect(turtle).toContain("@prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#>.");
    expect(turtle).toContain("@prefix skos: <http://www.w3.org/2004/02/skos/core#>.");
    expect(turtle).toContain("@prefix s2dm: <https://covesa.global/models/s2dm#>.");
    expect(turtle).toContain("@prefix vss: <https://example.org/vss#>.");
  });

  test("groups each subject's predicates with type and label first", async () => {
    const turtle = await serializeGroupedTurtle(cabinTriples(), turtleConfig);
    expect(turtle).toContain(
      'vss:Door a skos:Concept, s2dm:ObjectType;\n    skos:prefLabel "Door"@en;\n    s2dm:hasField <https://example.org/vss#Door.isOpen>.\n',
    );
  });

  test("is identical across runs", async () => {
    const first = await serializeGroupedTurtle(cabinTriples(), turtleConfig);
    expect(await serializeGroupedTurtle(cabinTriples(), turtleConfig)).toBe(first);
  });

  test("an empty set yields only prefix declarations", async () => {
    const turtle = await serializeGroupedTurtle(TripleSet.empty(), turtleConfig);
    expect(new Parser().parse(turtle)).toEqual([]);
  });
});

describe("predicateRank", () => {
  test("puts rdf:type first and unknown predicates last", () => {
    expect(predicateRank(RDF.type)).toBe(0);
    expect(predicateRank(SKOS.prefLabel)).toBe(1);
    expect(predicateRank("https://example.org/other")).toBe(8);
  });
});

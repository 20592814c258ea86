import { describe, test, expect } from "vitest";
import { DataFactory } from "n3";
import { RDF, SKOS } from "../../constants/vocabularies";
import { TripleSet } from "../../utils/tripleSet";
import { ns } from "../fixtures/schemaFixtures";

const { namedNode, literal, quad } = DataFactory;

describe("TripleSet", () => {
  test("collapses identical triples", () => {
    const concept = quad(namedNode(ns("Door")), namedNode(RDF.type), namedNode(SKOS.Concept));
    const triples = TripleSet.fromQuads([concept, concept, quad(concept.subject, concept.predicate, concept.object)]);
    expect(triples.size).toBe(1);
  });

  test("looks triples up by IRI strings or terms", () => {
    const triples = TripleSet.fromQuads([
      quad(namedNode(ns("Door")), namedNode(RDF.type), namedNode(SKOS.Concept)),
      quad(namedNode(ns("Door")), namedNode(SKOS.prefLabel), literal("Door", "en")),
      quad(namedNode(ns("Seat")), namedNode(RDF.type), namedNode(SKOS.Concept)),
    ]);
    expect(triples.has(ns("Door"), RDF.type, SKOS.Concept)).toBe(true);
    expect(triples.has(ns("Door"), SKOS.prefLabel, literal("Door", "en"))).toBe(true);
    expect(triples.has(ns("Door"), SKOS.prefLabel, literal("Door", "de"))).toBe(false);
    expect(triples.subjects(RDF.type, SKOS.Concept).map((term) => term.value).sort()).toEqual([ns("Door"), ns("Seat")]);
  });

  test("puts every triple in the default graph", () => {
    const triples = TripleSet.fromQuads([
      quad(namedNode(ns("Door")), namedNode(RDF.type), namedNode(SKOS.Concept), namedNode("urn:graph")),
    ]);
    expect(triples.quads().map((q) => q.graph.termType)).toEqual(["DefaultGraph"]);
  });
});

import { Writer } from "n3";
import type { Quad } from "@rdfjs/types";
import { buildNamespaceRegistry, registryToPrefixMap } from "../constants/namespaces";
import { RDF, S2DM, SKOS } from "../constants/vocabularies";
import type { MaterializeConfig } from "../types/config";
import type { TripleSet } from "./tripleSet";

/**
 * Canonical serialization of a TripleSet.
 *
 * Both renderings are pure functions of the set: the order is derived from the
 * rendered N-Triples terms via compareQuads, never from store iteration order.
 */

export interface RenderedQuad {
  subject: string;
  predicate: string;
  object: string;
}

// line mode writer: no prefixes, full IRIs, N-Triples escaping
const lineWriter = new Writer({ format: "N-Triples" });

/**
 * Split a quad into its N-Triples term renderings. Subjects and predicates
 * are IRIs without whitespace, so the first two spaces delimit them.
 */
export function renderQuadTerms(quad: Quad): RenderedQuad {
  const line = lineWriter.quadToString(quad.subject, quad.predicate, quad.object).trimEnd();
  const first = line.indexOf(" ");
  const second = line.indexOf(" ", first + 1);
  return {
    subject: line.slice(0, first),
    predicate: line.slice(first + 1, second),
    object: line.slice(second + 1).replace(/\s*\.$/, ""),
  };
}

export function renderNTriplesLine(quad: Quad): string {
  const { subject, predicate, object } = renderQuadTerms(quad);
  return `${subject} ${predicate} ${object} .`;
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareRendered(a: RenderedQuad, b: RenderedQuad): number {
  return (
    compareStrings(a.subject, b.subject) ||
    compareStrings(a.predicate, b.predicate) ||
    compareStrings(a.object, b.object)
  );
}

/**
 * The single total order over triples: rendered subject, then predicate, then
 * object, compared by UTF-16 code units (locale independent).
 */
export function compareQuads(a: Quad, b: Quad): number {
  return compareRendered(renderQuadTerms(a), renderQuadTerms(b));
}

/**
 * Sorted N-Triples: one `subject predicate object .` line per triple, newline
 * terminated. An empty set renders as the empty string.
 */
export function serializeSortedNTriples(triples: TripleSet): string {
  const lines = triples
    .quads()
    .map(renderQuadTerms)
    .sort(compareRendered)
    .map(({ subject, predicate, object }) => `${subject} ${predicate} ${object} .`);
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

/** Predicate order inside a Turtle subject block; others follow, sorted. */
export const PREDICATE_ORDER: readonly string[] = [
  RDF.type,
  SKOS.prefLabel,
  SKOS.definition,
  S2DM.hasField,
  S2DM.hasOutputType,
  S2DM.usesTypeWrapperPattern,
  S2DM.hasUnionMember,
  S2DM.hasEnumValue,
];

export function predicateRank(predicateIri: string): number {
  const index = PREDICATE_ORDER.indexOf(predicateIri);
  return index === -1 ? PREDICATE_ORDER.length : index;
}

/**
 * Order used for the grouped form: subjects as in the flat form, then the
 * fixed predicate order, then canonical order.
 */
export function compareForGrouping(a: Quad, b: Quad): number {
  const ra = renderQuadTerms(a);
  const rb = renderQuadTerms(b);
  return (
    compareStrings(ra.subject, rb.subject) ||
    predicateRank(a.predicate.value) - predicateRank(b.predicate.value) ||
    compareRendered(ra, rb)
  );
}

/**
 * Subject-grouped Turtle with prefix declarations for rdf, skos, s2dm and the
 * configured concept prefix. Predicates sharing a subject are joined with ';'
 * and objects sharing a predicate with ','.
 */
export async function serializeGroupedTurtle(
  triples: TripleSet,
  config: Pick<MaterializeConfig, "namespace" | "prefix">,
): Promise<string> {
  const writer = new Writer({
    prefixes: registryToPrefixMap(buildNamespaceRegistry(config.prefix, config.namespace)),
    format: "Turtle",
  });
  writer.addQuads(triples.quads().sort(compareForGrouping));
  return new Promise<string>((resolve, reject) => {
    writer.end((err, result) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(result);
    });
  });
}

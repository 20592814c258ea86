import { DataFactory, Store } from "n3";
import type { Quad, Term } from "@rdfjs/types";

const { namedNode, defaultGraph } = DataFactory;

type TermInput = Term | string;

/** Bare strings are IRIs. */
function toTerm(value: TermInput): Term {
  return typeof value === "string" ? namedNode(value) : value;
}

/**
 * Triple set produced by one materialization run.
 *
 * Backed by an n3 Store, so identical triples collapse into one (RDF graph
 * semantics). All triples live in the default graph. The set is assembled
 * once through fromQuads and is read-only afterwards.
 */
export class TripleSet {
  private readonly store: Store;

  private constructor(store: Store) {
    this.store = store;
  }

  static fromQuads(quads: Iterable<Quad>): TripleSet {
    const store = new Store();
    for (const quad of quads) {
      store.addQuad(quad.subject, quad.predicate, quad.object, defaultGraph());
    }
    return new TripleSet(store);
  }

  static empty(): TripleSet {
    return new TripleSet(new Store());
  }

  get size(): number {
    return this.store.size;
  }

  quads(): Quad[] {
    return this.store.getQuads(null, null, null, null);
  }

  has(subject: TermInput, predicate: TermInput, object: TermInput): boolean {
    return this.store.countQuads(toTerm(subject), toTerm(predicate), toTerm(object), null) > 0;
  }

  objects(subject: TermInput, predicate: TermInput): Term[] {
    return this.store.getObjects(toTerm(subject), toTerm(predicate), null);
  }

  subjects(predicate: TermInput, object: TermInput): Term[] {
    return this.store.getSubjects(toTerm(predicate), toTerm(object), null);
  }
}

import yaml from "js-yaml";
import {
  AmbiguousConstructionError,
  AnnotationKindMismatchError,
  AnnotationNotFoundError,
  MalformedExpressionError,
} from "./errors.js";
import {
  homCodom,
  homToDiagram,
  obToSexpr,
  otimesOb,
  parseHomSexpr,
  parseObSexpr,
  type SemanticGraph,
  type SemanticHom,
  type SemanticOb,
} from "./doctrine.js";
import { deepEqual, isRecord, readText } from "./util.js";

/** Function annotation: its definition is a morphism. */
export type HomAnnotation = {
  kind: "hom";
  name: string;
  definition: SemanticHom;
};

/** Type annotation: an object plus the morphisms projecting its slots. */
export type ObAnnotation = {
  kind: "ob";
  name: string;
  definition: SemanticOb;
  slots: SemanticHom[];
};

export type Annotation = HomAnnotation | ObAnnotation;

export interface AnnotationResolver {
  /** Throws AnnotationNotFoundError for an unknown name. */
  lookup(name: string): Annotation;
}

export interface Constructions {
  /** Diagram that builds an instance of `ob`. */
  construct(ob: SemanticOb): SemanticGraph;
}

/** Everything enrichment needs from the ontology, passed to each call. */
export type Ontology = AnnotationResolver & Constructions;

export function loadHomAnnotation(resolver: AnnotationResolver, name: string): HomAnnotation {
  const note = resolver.lookup(name);
  if (note.kind !== "hom") throw new AnnotationKindMismatchError(name, "hom", note.kind);
  return note;
}

export function loadObAnnotation(resolver: AnnotationResolver, name: string): ObAnnotation {
  const note = resolver.lookup(name);
  if (note.kind !== "ob") throw new AnnotationKindMismatchError(name, "ob", note.kind);
  return note;
}

function parseAnnotation(entry: unknown): Annotation {
  if (!isRecord(entry) || typeof entry.name !== "string") {
    throw new MalformedExpressionError(`Annotation entry without a name: ${JSON.stringify(entry)}`);
  }
  const name = entry.name;
  if (entry.kind === "function") {
    return { kind: "hom", name, definition: parseHomSexpr(entry.definition) };
  }
  if (entry.kind === "type") {
    const slots = Array.isArray(entry.slots) ? entry.slots.map(parseHomSexpr) : [];
    return { kind: "ob", name, definition: parseObSexpr(entry.definition), slots };
  }
  throw new MalformedExpressionError(`Annotation "${name}" has unknown kind ${JSON.stringify(entry.kind)}`);
}

/**
 * In-memory ontology, usually loaded from a YAML document:
 *
 *   annotations:
 *     - name: python/pandas/read-csv
 *       kind: function
 *       definition: ["Hom", "read-table", ["Ob", "file"], ["Ob", "table"]]
 */
export class OntologyStore implements Ontology {
  private readonly notes = new Map<string, Annotation>();

  constructor(annotations: Annotation[] = []) {
    for (const a of annotations) this.notes.set(a.name, a);
  }

  static fromYaml(text: string): OntologyStore {
    const doc: unknown = yaml.load(text);
    const entries = isRecord(doc) && Array.isArray(doc.annotations) ? doc.annotations : [];
    return new OntologyStore(entries.map(parseAnnotation));
  }

  static fromFile(path: string): OntologyStore {
    return OntologyStore.fromYaml(readText(path));
  }

  get size(): number {
    return this.notes.size;
  }

  lookup(name: string): Annotation {
    const note = this.notes.get(name);
    if (!note) throw new AnnotationNotFoundError(name);
    return note;
  }

  /**
   * The constructor takes one input per slot of the type defining `ob`.
   * Types that define the same object must agree on its slots.
   */
  construct(ob: SemanticOb): SemanticGraph {
    const owners = Array.from(this.notes.values()).filter(
      (n): n is ObAnnotation => n.kind === "ob" && deepEqual(n.definition, ob)
    );
    const slots = owners[0]?.slots ?? [];
    if (owners.some((n) => !deepEqual(n.slots, slots))) {
      throw new AmbiguousConstructionError(JSON.stringify(obToSexpr(ob)), owners.map((n) => n.name));
    }
    const dom = otimesOb(...slots.map(homCodom));
    return homToDiagram({ kind: "construct", ob, dom });
  }
}

import { collapseUnannotatedBoxes } from "./collapse.js";
import {
  homToDiagram,
  type SemanticElem,
  type SemanticGraph,
  type SemanticOb,
  type SemanticTypeGraph,
  type SemanticValue,
} from "./doctrine.js";
import { DanglingWireError, IndexOutOfRangeError, UnknownAnnotationKindError } from "./errors.js";
import { loadHomAnnotation, loadObAnnotation, type AnnotationResolver, type Ontology } from "./ontology.js";
import type { JsonValue, Metadata } from "./util.js";
import { Box, formatWire, INPUT_ID, OUTPUT_ID, WiringDiagram, type PortRef, type Wire } from "./wiring.js";

// Raw flow graph

export const ANNOTATION_KINDS = ["function", "construct", "slot"] as const;
export type AnnotationKind = (typeof ANNOTATION_KINDS)[number];

export function parseAnnotationKind(label: string): AnnotationKind {
  const kind = ANNOTATION_KINDS.find((k) => k === label);
  if (!kind) throw new UnknownAnnotationKindError(label);
  return kind;
}

export type RawNode = {
  metadata: Metadata;
  annotation?: string;
  annotationIndex?: number;
  annotationKind: AnnotationKind;
};

export type RawPort = {
  metadata: Metadata;
  annotation?: string;
  annotationIndex?: number;
  id?: string;
  value?: JsonValue;
};

export type RawGraph = WiringDiagram<RawNode, RawPort>;

export function rawNode(fields: Partial<RawNode> = {}): RawNode {
  return { metadata: {}, annotationKind: "function", ...fields };
}

export function rawPort(fields: Partial<RawPort> = {}): RawPort {
  return { metadata: {}, ...fields };
}

/** What a raw box's annotation asks for, as a closed variant. */
export type BoxAnnotation =
  | { kind: "none" }
  | { kind: "function"; name: string }
  | { kind: "construct"; name: string }
  | { kind: "slot"; name: string; index?: number };

export function boxAnnotation(node: RawNode): BoxAnnotation {
  const name = node.annotation;
  if (name === undefined) return { kind: "none" };
  switch (node.annotationKind) {
    case "function":
      return { kind: "function", name };
    case "construct":
      return { kind: "construct", name };
    case "slot":
      return { kind: "slot", name, index: node.annotationIndex };
  }
}

// Semantic enrichment

export type EnrichOptions = {
  /** Ports carry full elements (object, id, value) rather than bare objects. */
  elements: boolean;
  /** Origin of annotation indices stored in the ontology and raw graph. */
  indexOrigin: 0 | 1;
  /** What to do with a raw wire whose port vanished during expansion. */
  danglingWires: "error" | "drop";
};

export const defaultEnrichOptions: EnrichOptions = {
  elements: true,
  indexOrigin: 0,
  danglingWires: "error",
};

type Semantic = WiringDiagram<SemanticValue, SemanticElem>;

/** Types of raw ports: the definition of each port's type annotation, if any. */
export function typePorts(resolver: AnnotationResolver, ports: RawPort[]): (SemanticOb | undefined)[] {
  return ports.map((port) =>
    port.annotation === undefined ? undefined : loadObAnnotation(resolver, port.annotation).definition
  );
}

export function toSemanticPorts(resolver: AnnotationResolver, ports: RawPort[]): SemanticElem[] {
  const types = typePorts(resolver, ports);
  return ports.map((port, i) => {
    const elem: SemanticElem = {};
    const ob = types[i];
    if (ob !== undefined) elem.ob = ob;
    if (port.id !== undefined) elem.id = port.id;
    if (port.value !== undefined) elem.value = port.value;
    return elem;
  });
}

function interiorPort(index: number | undefined, origin: number): number | undefined {
  return index === undefined ? undefined : index - origin;
}

/**
 * Expand one raw box. Unannotated boxes stay atomic; annotated boxes become a
 * semantic diagram with the same boundary as the raw box.
 */
export function expandBox(
  ontology: Ontology,
  raw: Box<RawNode, RawPort>,
  inputs: SemanticElem[],
  outputs: SemanticElem[],
  options: Pick<EnrichOptions, "indexOrigin"> = defaultEnrichOptions
): Box<SemanticValue, SemanticElem> | SemanticGraph {
  const note = boxAnnotation(raw.value);
  switch (note.kind) {
    case "none":
      return new Box<SemanticValue, SemanticElem>(null, inputs, outputs);

    case "function": {
      const hom = loadHomAnnotation(ontology, note.name);
      const f = new WiringDiagram<SemanticValue, SemanticElem>(inputs, outputs);
      const interior = homToDiagram(hom.definition);
      const v = f.addBox(interior);
      raw.inputPorts.forEach((port, i) => {
        const k = interiorPort(port.annotationIndex, options.indexOrigin);
        if (k === undefined) return;
        if (k < 0 || k >= interior.inputPorts.length) {
          throw new IndexOutOfRangeError(
            `input of "${note.name}"`,
            port.annotationIndex,
            interior.inputPorts.length,
            options.indexOrigin
          );
        }
        f.addWire({ source: { box: INPUT_ID, port: i }, target: { box: v, port: k } });
      });
      raw.outputPorts.forEach((port, i) => {
        const k = interiorPort(port.annotationIndex, options.indexOrigin);
        if (k === undefined) return;
        if (k < 0 || k >= interior.outputPorts.length) {
          throw new IndexOutOfRangeError(
            `output of "${note.name}"`,
            port.annotationIndex,
            interior.outputPorts.length,
            options.indexOrigin
          );
        }
        f.addWire({ source: { box: v, port: k }, target: { box: OUTPUT_ID, port: i } });
      });
      f.substitute(v);
      f.compact();
      return f;
    }

    case "construct": {
      const ob = loadObAnnotation(ontology, note.name);
      return ontology.construct(ob.definition);
    }

    case "slot": {
      const ob = loadObAnnotation(ontology, note.name);
      const k = interiorPort(note.index, options.indexOrigin);
      const slot = k === undefined ? undefined : ob.slots[k];
      if (!slot) {
        throw new IndexOutOfRangeError(`slot of "${note.name}"`, note.index, ob.slots.length, options.indexOrigin);
      }
      return homToDiagram(slot);
    }
  }
}

/**
 * Ports of a function box that carry no annotation index. The expanded box
 * keeps them on its boundary, but nothing inside is wired to them.
 */
export function unboundPorts(raw: Box<RawNode, RawPort>): { inputs: number[]; outputs: number[] } {
  if (boxAnnotation(raw.value).kind !== "function") return { inputs: [], outputs: [] };
  const unindexed = (ports: RawPort[]) =>
    ports.flatMap((port, i) => (port.annotationIndex === undefined ? [i] : []));
  return { inputs: unindexed(raw.inputPorts), outputs: unindexed(raw.outputPorts) };
}

type Unbound = { inputs: PortRef[]; outputs: PortRef[] };

/**
 * Steps 1 and 2 of enrichment: type the boundary and place every expanded box
 * under the handle its raw box had. Returns the handles whose nested diagram
 * still awaits substitution, in handle order, and the ports whose wires
 * substitution would lose.
 */
export function placeBoxes(
  ontology: Ontology,
  raw: RawGraph,
  options: EnrichOptions = defaultEnrichOptions
): { diagram: Semantic; pending: number[]; unbound: Unbound } {
  const diagram = new WiringDiagram<SemanticValue, SemanticElem>(
    toSemanticPorts(ontology, raw.inputPorts),
    toSemanticPorts(ontology, raw.outputPorts)
  );
  const pending: number[] = [];
  const unbound: Unbound = { inputs: [], outputs: [] };
  for (const v of raw.boxIds()) {
    const rawBox = raw.box(v);
    if (rawBox instanceof WiringDiagram) {
      diagram.insertBox(v, enrichElements(ontology, rawBox, options));
      continue;
    }
    const inputs = toSemanticPorts(ontology, rawBox.inputPorts);
    const outputs = toSemanticPorts(ontology, rawBox.outputPorts);
    const semBox = expandBox(ontology, rawBox, inputs, outputs, options);
    diagram.insertBox(v, semBox);
    if (semBox instanceof WiringDiagram) pending.push(v);
    const ports = unboundPorts(rawBox);
    unbound.inputs.push(...ports.inputs.map((port) => ({ box: v, port })));
    unbound.outputs.push(...ports.outputs.map((port) => ({ box: v, port })));
  }
  return { diagram, pending, unbound };
}

const sameRef = (a: PortRef, b: PortRef) => a.box === b.box && a.port === b.port;

function danglingReason(diagram: Semantic, unbound: Unbound, w: Wire): string | undefined {
  if (!diagram.hasSource(w.source) || !diagram.hasTarget(w.target)) return "its port is missing after expansion";
  if (unbound.outputs.some((r) => sameRef(r, w.source)) || unbound.inputs.some((r) => sameRef(r, w.target))) {
    return "its port has no annotation index";
  }
  return undefined;
}

function copyWires(
  diagram: Semantic,
  wires: readonly Wire[],
  unbound: Unbound,
  policy: EnrichOptions["danglingWires"]
): void {
  for (const w of wires) {
    const reason = danglingReason(diagram, unbound, w);
    if (reason === undefined) {
      diagram.addWire(w);
      continue;
    }
    if (policy === "error") throw new DanglingWireError(formatWire(w));
    console.warn(`enrich: dropping wire ${formatWire(w)}, ${reason}`);
  }
}

function enrichElements(ontology: Ontology, raw: RawGraph, options: EnrichOptions): Semantic {
  const { diagram, pending, unbound } = placeBoxes(ontology, raw, options);
  // Wires go in before any substitution so raw handles still address them.
  copyWires(diagram, raw.wires(), unbound, options.danglingWires);
  diagram.substitute(pending);
  diagram.compact();
  return collapseUnannotatedBoxes(diagram);
}

/**
 * Convert a raw flow graph into a semantic flow graph. Nothing is returned
 * unless every box and wire enriches cleanly.
 */
export function toSemanticGraph(
  ontology: Ontology,
  raw: RawGraph,
  options?: Partial<EnrichOptions> & { elements?: true }
): SemanticGraph;
export function toSemanticGraph(
  ontology: Ontology,
  raw: RawGraph,
  options: Partial<EnrichOptions> & { elements: false }
): SemanticTypeGraph;
export function toSemanticGraph(
  ontology: Ontology,
  raw: RawGraph,
  options: Partial<EnrichOptions>
): SemanticGraph | SemanticTypeGraph;
export function toSemanticGraph(
  ontology: Ontology,
  raw: RawGraph,
  options: Partial<EnrichOptions> = {}
): SemanticGraph | SemanticTypeGraph {
  const opts: EnrichOptions = { ...defaultEnrichOptions, ...options };
  const sem = enrichElements(ontology, raw, opts);
  return opts.elements ? sem : sem.mapPorts((p) => p.ob);
}

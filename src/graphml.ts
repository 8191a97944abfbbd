import { pathToFileURL } from "url";
import { XMLBuilder, XMLParser } from "fast-xml-parser";
import {
  homToSexpr,
  obToSexpr,
  parseHomSexpr,
  parseObSexpr,
  parseSexprText,
  type SemanticElem,
  type SemanticGraph,
  type SemanticOb,
  type SemanticTypeGraph,
  type SemanticValue,
} from "./doctrine.js";
import { GraphmlError } from "./errors.js";
import { parseAnnotationKind, type RawGraph, type RawNode, type RawPort } from "./flow_graph.js";
import { asArray, isJsonValue, isRecord, readText, writeText, type JsonValue, type Metadata } from "./util.js";
import { Box, INPUT_ID, OUTPUT_ID, WiringDiagram, type PortRef } from "./wiring.js";

type DataType = "string" | "int" | "double" | "boolean" | "json";
type XmlElement = Record<string, unknown>;

/** How box values and port values map to GraphML `<data>` entries. */
export type GraphmlCodec<V, P> = {
  encodeBox(value: V): Metadata;
  decodeBox(data: Metadata): V;
  encodePort(port: P): Metadata;
  decodePort(data: Metadata): P;
};

const GRAPHML_NS = "http://graphml.graphdrawing.org/xmlns";

function dataType(v: JsonValue): DataType {
  if (typeof v === "string") return "string";
  if (typeof v === "boolean") return "boolean";
  if (typeof v === "number") return Number.isInteger(v) ? "int" : "double";
  return "json";
}

function encodeText(v: JsonValue): string {
  return typeof v === "string" ? v : typeof v === "number" || typeof v === "boolean" ? String(v) : JSON.stringify(v);
}

function decodeText(text: string, type: DataType, key: string): JsonValue {
  switch (type) {
    case "string":
      return text;
    case "boolean":
      return text.trim() === "true";
    case "int":
    case "double": {
      const n = Number(text.trim());
      if (text.trim() === "" || !Number.isFinite(n)) throw new GraphmlError(`Data "${key}" is not a number: ${text}`);
      return n;
    }
    case "json": {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        throw new GraphmlError(`Data "${key}" is not JSON: ${text}`);
      }
      if (!isJsonValue(parsed)) throw new GraphmlError(`Data "${key}" is not JSON: ${text}`);
      return parsed;
    }
  }
}

// Writing

class KeyRegistry {
  private readonly ids = new Map<string, string>();
  readonly decls: XmlElement[] = [];

  id(domain: "node" | "port", name: string, type: DataType): string {
    const k = `${domain}|${name}|${type}`;
    let id = this.ids.get(k);
    if (!id) {
      id = `d${this.decls.length}`;
      this.ids.set(k, id);
      this.decls.push({ "@_id": id, "@_for": domain, "@_attr.name": name, "@_attr.type": type });
    }
    return id;
  }
}

function dataElements(keys: KeyRegistry, domain: "node" | "port", data: Metadata): XmlElement[] {
  return Object.entries(data).map(([name, v]) => ({
    "@_key": keys.id(domain, name, dataType(v)),
    "#text": encodeText(v),
  }));
}

function withChildren(el: XmlElement, tag: string, children: XmlElement[]): XmlElement {
  if (children.length > 0) el[tag] = children;
  return el;
}

function portElements<V, P>(keys: KeyRegistry, codec: GraphmlCodec<V, P>, inputs: P[], outputs: P[]): XmlElement[] {
  const port = (name: string, p: P) => withChildren({ "@_name": name }, "data", dataElements(keys, "port", codec.encodePort(p)));
  return [...inputs.map((p, i) => port(`in:${i}`, p)), ...outputs.map((p, i) => port(`out:${i}`, p))];
}

function diagramElement<V, P>(
  d: WiringDiagram<V, P>,
  id: string,
  codec: GraphmlCodec<V, P>,
  keys: KeyRegistry
): XmlElement {
  const el: XmlElement = { "@_id": id };
  if (d.value !== null) withChildren(el, "data", dataElements(keys, "node", codec.encodeBox(d.value)));
  withChildren(el, "port", portElements(keys, codec, d.inputPorts, d.outputPorts));

  const nodes = d.boxIds().map((h) => {
    const b = d.box(h);
    const childId = `${id}:${h}`;
    if (b instanceof WiringDiagram) return diagramElement(b, childId, codec, keys);
    const node: XmlElement = { "@_id": childId };
    withChildren(node, "data", dataElements(keys, "node", codec.encodeBox(b.value)));
    return withChildren(node, "port", portElements(keys, codec, b.inputPorts, b.outputPorts));
  });
  const end = (ref: PortRef, side: "source" | "target"): [string, string] => {
    if (ref.box === INPUT_ID) return [id, `in:${ref.port}`];
    if (ref.box === OUTPUT_ID) return [id, `out:${ref.port}`];
    return [`${id}:${ref.box}`, `${side === "source" ? "out" : "in"}:${ref.port}`];
  };
  const edges = d.wires().map((w) => {
    const [source, sourceport] = end(w.source, "source");
    const [target, targetport] = end(w.target, "target");
    return { "@_source": source, "@_sourceport": sourceport, "@_target": target, "@_targetport": targetport };
  });
  const graph: XmlElement = { "@_id": `${id}:`, "@_edgedefault": "directed" };
  withChildren(graph, "node", nodes);
  withChildren(graph, "edge", edges);
  el.graph = graph;
  return el;
}

export function writeGraphml<V, P>(d: WiringDiagram<V, P>, codec: GraphmlCodec<V, P>): string {
  const keys = new KeyRegistry();
  const root = diagramElement(d, "n", codec, keys);
  const doc = {
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    graphml: {
      "@_xmlns": GRAPHML_NS,
      key: keys.decls,
      graph: { "@_id": "G", "@_edgedefault": "directed", node: root },
    },
  };
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true,
  });
  return builder.build(doc);
}

// Reading

type KeyMap = Map<string, { name: string; type: DataType }>;

function attr(el: XmlElement, name: string): string | undefined {
  const v = el[`@_${name}`];
  return typeof v === "string" ? v : undefined;
}

function children(el: XmlElement, tag: string): XmlElement[] {
  return asArray<unknown>(el[tag]).filter(isRecord);
}

function asDataType(v: string | undefined): DataType {
  switch (v) {
    case "int":
    case "long":
      return "int";
    case "double":
    case "float":
      return "double";
    case "boolean":
    case "json":
      return v;
    default:
      return "string";
  }
}

function readData(el: XmlElement, keys: KeyMap): Metadata {
  const out: Metadata = {};
  for (const d of asArray<unknown>(el.data)) {
    const keyId = isRecord(d) ? attr(d, "key") : undefined;
    if (!isRecord(d) || !keyId) continue;
    const text = d["#text"];
    const key: { name: string; type: DataType } = keys.get(keyId) ?? { name: keyId, type: "string" };
    out[key.name] = decodeText(typeof text === "string" ? text : "", key.type, key.name);
  }
  return out;
}

function portIndex(name: string | undefined, side: "in" | "out"): number | undefined {
  const m = /^(in|out):(\d+)$/.exec(name ?? "");
  return m && m[1] === side ? Number(m[2]) : undefined;
}

function readPorts<V, P>(el: XmlElement, side: "in" | "out", codec: GraphmlCodec<V, P>, keys: KeyMap): P[] {
  const found: [number, P][] = [];
  for (const p of children(el, "port")) {
    const i = portIndex(attr(p, "name"), side);
    if (i !== undefined) found.push([i, codec.decodePort(readData(p, keys))]);
  }
  found.sort((a, b) => a[0] - b[0]);
  found.forEach(([i], k) => {
    if (i !== k) throw new GraphmlError(`Node "${attr(el, "id")}" has no port ${side}:${k}`);
  });
  return found.map(([, p]) => p);
}

function readDiagram<V, P>(el: XmlElement, codec: GraphmlCodec<V, P>, keys: KeyMap): WiringDiagram<V, P> {
  const id = attr(el, "id") ?? "";
  const data = readData(el, keys);
  const d = new WiringDiagram<V, P>(
    readPorts(el, "in", codec, keys),
    readPorts(el, "out", codec, keys),
    Object.keys(data).length > 0 ? codec.decodeBox(data) : null
  );
  const graph = children(el, "graph")[0];
  if (!graph) return d;

  const handles = new Map<string, number>();
  for (const child of children(graph, "node")) {
    const childId = attr(child, "id") ?? "";
    const handle = Number(childId.slice(childId.lastIndexOf(":") + 1));
    if (!Number.isInteger(handle)) throw new GraphmlError(`Node id "${childId}" does not end in a box handle`);
    handles.set(childId, handle);
    if (children(child, "graph").length > 0) {
      d.insertBox(handle, readDiagram(child, codec, keys));
    } else {
      d.insertBox(
        handle,
        new Box(codec.decodeBox(readData(child, keys)), readPorts(child, "in", codec, keys), readPorts(child, "out", codec, keys))
      );
    }
  }

  const end = (node: string | undefined, port: string | undefined, side: "source" | "target"): PortRef => {
    const boundary = side === "source" ? "in" : "out";
    const own = side === "source" ? "out" : "in";
    if (node === id) {
      const i = portIndex(port, boundary);
      if (i !== undefined) return { box: boundary === "in" ? INPUT_ID : OUTPUT_ID, port: i };
    }
    const box = node === undefined ? undefined : handles.get(node);
    const i = portIndex(port, own);
    if (box === undefined || i === undefined) throw new GraphmlError(`Edge endpoint ${node}:${port} is not a port`);
    return { box, port: i };
  };
  for (const e of children(graph, "edge")) {
    d.addWire({
      source: end(attr(e, "source"), attr(e, "sourceport"), "source"),
      target: end(attr(e, "target"), attr(e, "targetport"), "target"),
    });
  }
  return d;
}

export function readGraphml<V, P>(text: string, codec: GraphmlCodec<V, P>): WiringDiagram<V, P> {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseTagValue: false,
    trimValues: false,
  });
  const doc: unknown = parser.parse(text);
  const graphml = isRecord(doc) ? doc.graphml : undefined;
  if (!isRecord(graphml)) throw new GraphmlError("Document has no <graphml> root");

  const keys: KeyMap = new Map();
  for (const k of children(graphml, "key")) {
    const keyId = attr(k, "id");
    const name = attr(k, "attr.name");
    if (keyId && name) keys.set(keyId, { name, type: asDataType(attr(k, "attr.type")) });
  }
  const root = children(graphml, "graph").flatMap((g) => children(g, "node"))[0];
  if (!root) throw new GraphmlError("Document has no diagram node");
  return readDiagram(root, codec, keys);
}

// Codecs

function take(data: Metadata, key: string): JsonValue | undefined {
  const v = data[key];
  delete data[key];
  return v;
}

function takeString(data: Metadata, key: string): string | undefined {
  const v = take(data, key);
  return v === undefined || v === null ? undefined : encodeText(v);
}

function takeInt(data: Metadata, key: string): number | undefined {
  const v = take(data, key);
  if (v === undefined) return undefined;
  if (typeof v !== "number" || !Number.isInteger(v)) throw new GraphmlError(`"${key}" must be an integer, got ${JSON.stringify(v)}`);
  return v;
}

function withDefined(entries: [string, JsonValue | undefined][]): Metadata {
  const out: Metadata = {};
  for (const [k, v] of entries) if (v !== undefined) out[k] = v;
  return out;
}

export const rawCodec: GraphmlCodec<RawNode, RawPort> = {
  encodeBox: (node) =>
    withDefined([
      ...Object.entries(node.metadata),
      ["annotation", node.annotation],
      ["annotation_index", node.annotationIndex],
      ["annotation_kind", node.annotationKind],
    ]),
  decodeBox: (input) => {
    const data = { ...input };
    const annotation = takeString(data, "annotation");
    const annotationIndex = takeInt(data, "annotation_index");
    const kind = takeString(data, "annotation_kind");
    const node: RawNode = { metadata: data, annotationKind: kind === undefined ? "function" : parseAnnotationKind(kind) };
    if (annotation !== undefined) node.annotation = annotation;
    if (annotationIndex !== undefined) node.annotationIndex = annotationIndex;
    return node;
  },
  encodePort: (port) =>
    withDefined([
      ...Object.entries(port.metadata),
      ["annotation", port.annotation],
      ["annotation_index", port.annotationIndex],
      ["id", port.id],
      ["value", port.value],
    ]),
  decodePort: (input) => {
    const data = { ...input };
    const port: RawPort = { metadata: {} };
    const annotation = takeString(data, "annotation");
    const annotationIndex = takeInt(data, "annotation_index");
    const id = takeString(data, "id");
    const value = take(data, "value");
    port.metadata = data;
    if (annotation !== undefined) port.annotation = annotation;
    if (annotationIndex !== undefined) port.annotationIndex = annotationIndex;
    if (id !== undefined) port.id = id;
    if (value !== undefined) port.value = value;
    return port;
  },
};

function sexprData(v: JsonValue): unknown {
  return typeof v === "string" ? parseSexprText(v) : v;
}

const semanticBoxCodec: Pick<GraphmlCodec<SemanticValue, unknown>, "encodeBox" | "decodeBox"> = {
  encodeBox: (hom): Metadata => (hom === null ? {} : { expression: homToSexpr(hom) }),
  decodeBox: (data) => (data.expression === undefined ? null : parseHomSexpr(sexprData(data.expression))),
};

export const semanticCodec: GraphmlCodec<SemanticValue, SemanticElem> = {
  ...semanticBoxCodec,
  encodePort: (elem) =>
    withDefined([
      ["ob", elem.ob === undefined ? undefined : obToSexpr(elem.ob)],
      ["id", elem.id],
      ["value", elem.value],
    ]),
  decodePort: (data) => {
    const elem: SemanticElem = {};
    if (data.ob !== undefined) elem.ob = parseObSexpr(sexprData(data.ob));
    if (data.id !== undefined) elem.id = encodeText(data.id);
    if (data.value !== undefined) elem.value = data.value;
    return elem;
  },
};

export const semanticTypeCodec: GraphmlCodec<SemanticValue, SemanticOb | undefined> = {
  ...semanticBoxCodec,
  encodePort: (ob): Metadata => (ob === undefined ? {} : { ob: obToSexpr(ob) }),
  decodePort: (data) => (data.ob === undefined ? undefined : parseObSexpr(sexprData(data.ob))),
};

export const readRawGraph = (xml: string): RawGraph => readGraphml(xml, rawCodec);
export const readRawGraphFile = (path: string): RawGraph => readRawGraph(readText(path));
export const writeRawGraph = (d: RawGraph): string => writeGraphml(d, rawCodec);

export function readSemanticGraph(xml: string, options?: { elements?: true }): SemanticGraph;
export function readSemanticGraph(xml: string, options: { elements: false }): SemanticTypeGraph;
export function readSemanticGraph(xml: string, options: { elements?: boolean } = {}): SemanticGraph | SemanticTypeGraph {
  return options.elements === false ? readGraphml(xml, semanticTypeCodec) : readGraphml(xml, semanticCodec);
}

export const writeSemanticGraph = (d: SemanticGraph): string => writeGraphml(d, semanticCodec);
export const writeSemanticTypeGraph = (d: SemanticTypeGraph): string => writeGraphml(d, semanticTypeCodec);

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const graph = readRawGraphFile(input);
  writeText(output, writeRawGraph(graph));
  console.error(`graphml: boxes=${graph.boxIds().length} wires=${graph.wires().length}`);
}

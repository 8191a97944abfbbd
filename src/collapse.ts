import { INPUT_ID, OUTPUT_ID, WiringDiagram } from "./wiring.js";

type Adjacency = Map<number, Set<number>>;

/** Box-to-box edges of a diagram; the boundary is left out. */
export function boxGraph<V, P>(diagram: WiringDiagram<V, P>): Adjacency {
  const graph: Adjacency = new Map(diagram.boxIds().map((id) => [id, new Set<number>()]));
  for (const w of diagram.wires()) {
    const s = w.source.box;
    const t = w.target.box;
    if (s === INPUT_ID || t === OUTPUT_ID) continue;
    graph.get(s)?.add(t);
  }
  return graph;
}

function reachableFrom(graph: Adjacency, start: number): Set<number> {
  const seen = new Set<number>();
  const stack = Array.from(graph.get(start) ?? []);
  while (stack.length > 0) {
    const v = stack.pop();
    if (v === undefined || seen.has(v)) continue;
    seen.add(v);
    for (const next of graph.get(v) ?? []) stack.push(next);
  }
  return seen;
}

/** Transitive closure of the box graph: for each box, the boxes it reaches. */
export function reachability<V, P>(diagram: WiringDiagram<V, P>): Map<number, Set<number>> {
  const graph = boxGraph(diagram);
  return new Map(Array.from(graph.keys()).map((id) => [id, reachableFrom(graph, id)]));
}

function reverse(graph: Adjacency): Adjacency {
  const out: Adjacency = new Map(Array.from(graph.keys()).map((id) => [id, new Set<number>()]));
  for (const [u, vs] of graph) {
    for (const v of vs) out.get(v)?.add(u);
  }
  return out;
}

function quotient(graph: Adjacency, rep: (v: number) => number): Adjacency {
  const out: Adjacency = new Map();
  for (const u of graph.keys()) {
    if (!out.has(rep(u))) out.set(rep(u), new Set<number>());
  }
  for (const [u, vs] of graph) {
    for (const v of vs) {
      if (rep(u) !== rep(v)) out.get(rep(u))?.add(rep(v));
    }
  }
  return out;
}

/**
 * Merge maximal runs of unannotated boxes (value null) into single
 * encapsulated boxes. Two groups merge only if the merged group sits on no
 * cycle and every annotated box reaching it already reaches every annotated
 * box it reaches, so the order among annotated boxes is untouched.
 */
export function collapseUnannotatedBoxes<V, P>(diagram: WiringDiagram<V, P>): WiringDiagram<V, P> {
  const ids = diagram.boxIds();
  const graph = boxGraph(diagram);
  const annotated = new Set(ids.filter((id) => diagram.box(id).value !== null));

  const parent = new Map(ids.map((id) => [id, id]));
  const find = (v: number): number => {
    let r = v;
    while (parent.get(r) !== r) r = parent.get(r) ?? r;
    parent.set(v, r);
    return r;
  };

  const canMerge = (a: number, b: number): boolean => {
    const current = quotient(graph, find);
    const merged = quotient(graph, (v) => (find(v) === b ? a : find(v)));
    const below = reachableFrom(merged, a);
    const above = reachableFrom(reverse(merged), a);
    for (const v of below) {
      if (above.has(v)) return false;
    }
    const reach = new Map<number, Set<number>>();
    for (const u of above) {
      if (!annotated.has(u)) continue;
      if (!reach.has(u)) reach.set(u, reachableFrom(current, u));
      for (const v of below) {
        if (annotated.has(v) && !reach.get(u)?.has(v)) return false;
      }
    }
    return true;
  };

  const candidates: [number, number][] = [];
  for (const [p, children] of graph) {
    if (annotated.has(p)) continue;
    for (const c of children) {
      if (!annotated.has(c)) candidates.push([p, c]);
    }
  }
  candidates.sort((x, y) => x[0] - y[0] || x[1] - y[1]);

  let changed = true;
  while (changed) {
    changed = false;
    for (const [p, c] of candidates) {
      const a = find(p);
      const b = find(c);
      if (a === b || !canMerge(a, b)) continue;
      parent.set(b, a);
      changed = true;
    }
  }

  const groups = new Map<number, number[]>();
  for (const id of ids) {
    if (annotated.has(id)) continue;
    const r = find(id);
    groups.set(r, [...(groups.get(r) ?? []), id]);
  }
  // Lone boxes are only worth wrapping when wrapping drops unused ports.
  const components = Array.from(groups.values()).filter(
    (members) => members.length > 1 || hasUnwiredPort(diagram, members[0])
  );
  for (const members of components) diagram.encapsulate(members, null);
  diagram.compact();
  return diagram;
}

function hasUnwiredPort<V, P>(diagram: WiringDiagram<V, P>, handle: number): boolean {
  const box = diagram.box(handle);
  const wires = diagram.wires();
  const inputs = box.inputPorts.some((_, i) => !wires.some((w) => w.target.box === handle && w.target.port === i));
  const outputs = box.outputPorts.some((_, i) => !wires.some((w) => w.source.box === handle && w.source.port === i));
  return inputs || outputs;
}

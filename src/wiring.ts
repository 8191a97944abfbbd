import { WiringError } from "./errors.js";
import { deepEqual } from "./util.js";

/** Pseudo-handles for the diagram's own boundary. */
export const INPUT_ID = -2;
export const OUTPUT_ID = -1;

export type PortRef = { box: number; port: number };

export type Wire = { source: PortRef; target: PortRef };

export class Box<V, P> {
  constructor(
    public readonly value: V,
    public readonly inputPorts: P[],
    public readonly outputPorts: P[]
  ) {}
}

export type AbstractBox<V, P> = Box<V, P> | WiringDiagram<V, P>;

function sameRef(a: PortRef, b: PortRef): boolean {
  return a.box === b.box && a.port === b.port;
}

function sameWire(a: Wire, b: Wire): boolean {
  return sameRef(a.source, b.source) && sameRef(a.target, b.target);
}

function byHandleThenPort(a: PortRef, b: PortRef): number {
  return a.box - b.box || a.port - b.port;
}

export function formatWire(w: Wire): string {
  const end = (r: PortRef) =>
    r.box === INPUT_ID ? `in:${r.port}` : r.box === OUTPUT_ID ? `out:${r.port}` : `${r.box}:${r.port}`;
  return `(${end(w.source)} -> ${end(w.target)})`;
}

/**
 * A wiring diagram kept as an arena of boxes addressed by integer handle plus a
 * separate set of wires. Removing boxes only invalidates their handles; call
 * `compact()` once at the end of a pass to renumber the survivors.
 */
export class WiringDiagram<V, P> {
  private boxes = new Map<number, AbstractBox<V, P>>();
  private wireList: Wire[] = [];
  private nextHandle = 1;

  constructor(
    public readonly inputPorts: P[],
    public readonly outputPorts: P[],
    public readonly value: V | null = null
  ) {}

  boxIds(): number[] {
    return Array.from(this.boxes.keys()).sort((a, b) => a - b);
  }

  hasBox(handle: number): boolean {
    return this.boxes.has(handle);
  }

  box(handle: number): AbstractBox<V, P> {
    const b = this.boxes.get(handle);
    if (!b) throw new WiringError(`No box with handle ${handle}`);
    return b;
  }

  addBox(box: AbstractBox<V, P>): number {
    const handle = this.nextHandle;
    this.boxes.set(handle, box);
    this.nextHandle += 1;
    return handle;
  }

  /** Place a box under a caller-chosen handle, which must be free. */
  insertBox(handle: number, box: AbstractBox<V, P>): void {
    if (!Number.isInteger(handle) || handle < 1) throw new WiringError(`Invalid box handle ${handle}`);
    if (this.boxes.has(handle)) throw new WiringError(`Box handle ${handle} is already taken`);
    this.boxes.set(handle, box);
    this.nextHandle = Math.max(this.nextHandle, handle + 1);
  }

  wires(): readonly Wire[] {
    return this.wireList;
  }

  hasSource(ref: PortRef): boolean {
    if (!Number.isInteger(ref.port) || ref.port < 0) return false;
    if (ref.box === INPUT_ID) return ref.port < this.inputPorts.length;
    const b = this.boxes.get(ref.box);
    return b !== undefined && ref.port < b.outputPorts.length;
  }

  hasTarget(ref: PortRef): boolean {
    if (!Number.isInteger(ref.port) || ref.port < 0) return false;
    if (ref.box === OUTPUT_ID) return ref.port < this.outputPorts.length;
    const b = this.boxes.get(ref.box);
    return b !== undefined && ref.port < b.inputPorts.length;
  }

  addWire(wire: Wire): void {
    if (!this.hasSource(wire.source) || !this.hasTarget(wire.target)) {
      throw new WiringError(`Wire ${formatWire(wire)} does not connect existing ports`);
    }
    if (this.wireList.some((w) => sameWire(w, wire))) return;
    this.wireList.push({ source: { ...wire.source }, target: { ...wire.target } });
  }

  addWires(wires: Iterable<Wire>): void {
    for (const w of wires) this.addWire(w);
  }

  /** Remove boxes and every wire touching them. Handles are not reused until `compact()`. */
  removeBoxes(handles: Iterable<number>): void {
    const doomed = new Set(handles);
    for (const h of doomed) this.box(h);
    this.wireList = this.wireList.filter((w) => !doomed.has(w.source.box) && !doomed.has(w.target.box));
    for (const h of doomed) this.boxes.delete(h);
  }

  /**
   * Inline the nested diagram held by each given box. Wires that reached the
   * box's ports are joined with the nested diagram's boundary wires.
   */
  substitute(handles: number | number[]): void {
    for (const handle of Array.isArray(handles) ? handles : [handles]) {
      this.substituteOne(handle);
    }
  }

  private substituteOne(handle: number): void {
    const inner = this.box(handle);
    if (!(inner instanceof WiringDiagram)) {
      throw new WiringError(`Box ${handle} has no nested diagram to substitute`);
    }
    const renamed = new Map<number, number>();
    for (const id of inner.boxIds()) renamed.set(id, this.addBox(inner.box(id)));
    const outer = (ref: PortRef): PortRef => {
      const box = renamed.get(ref.box);
      if (box === undefined) throw new WiringError(`Nested wire references missing box ${ref.box}`);
      return { box, port: ref.port };
    };

    const added: Wire[] = [];
    for (const w of inner.wires()) {
      const sources =
        w.source.box === INPUT_ID
          ? this.wireList.filter((x) => sameRef(x.target, { box: handle, port: w.source.port })).map((x) => x.source)
          : [outer(w.source)];
      const targets =
        w.target.box === OUTPUT_ID
          ? this.wireList.filter((x) => sameRef(x.source, { box: handle, port: w.target.port })).map((x) => x.target)
          : [outer(w.target)];
      for (const source of sources) {
        for (const target of targets) added.push({ source, target });
      }
    }
    this.removeBoxes([handle]);
    this.addWires(added);
  }

  /**
   * Replace the given boxes by one box holding them as a nested diagram. The
   * new box gets one port per member port with a wire crossing the boundary.
   */
  encapsulate(handles: number[], value: V | null = null): number {
    const members = Array.from(new Set(handles)).sort((a, b) => a - b);
    for (const h of members) this.box(h);
    const inside = new Set(members);

    const crossingIn: PortRef[] = [];
    const crossingOut: PortRef[] = [];
    for (const w of this.wireList) {
      const s = inside.has(w.source.box);
      const t = inside.has(w.target.box);
      if (t && !s && !crossingIn.some((r) => sameRef(r, w.target))) crossingIn.push(w.target);
      if (s && !t && !crossingOut.some((r) => sameRef(r, w.source))) crossingOut.push(w.source);
    }
    crossingIn.sort(byHandleThenPort);
    crossingOut.sort(byHandleThenPort);

    const nested = new WiringDiagram<V, P>(
      crossingIn.map((r) => this.box(r.box).inputPorts[r.port]),
      crossingOut.map((r) => this.box(r.box).outputPorts[r.port]),
      value
    );
    const local = new Map<number, number>();
    for (const h of members) local.set(h, nested.addBox(this.box(h)));
    const localRef = (ref: PortRef): PortRef => ({ box: local.get(ref.box) ?? ref.box, port: ref.port });

    crossingIn.forEach((r, i) => nested.addWire({ source: { box: INPUT_ID, port: i }, target: localRef(r) }));
    crossingOut.forEach((r, i) => nested.addWire({ source: localRef(r), target: { box: OUTPUT_ID, port: i } }));

    const handle = this.addBox(nested);
    const rewired: Wire[] = [];
    for (const w of this.wireList) {
      const s = inside.has(w.source.box);
      const t = inside.has(w.target.box);
      if (s && t) {
        nested.addWire({ source: localRef(w.source), target: localRef(w.target) });
      } else if (t) {
        rewired.push({ source: w.source, target: { box: handle, port: crossingIn.findIndex((r) => sameRef(r, w.target)) } });
      } else if (s) {
        rewired.push({ source: { box: handle, port: crossingOut.findIndex((r) => sameRef(r, w.source)) }, target: w.target });
      }
    }
    this.removeBoxes(members);
    this.addWires(rewired);
    return handle;
  }

  /** Renumber surviving boxes to 1..k in ascending handle order. */
  compact(): void {
    const ids = this.boxIds();
    const renumber = new Map(ids.map((id, i) => [id, i + 1]));
    const move = (ref: PortRef): PortRef => ({ box: renumber.get(ref.box) ?? ref.box, port: ref.port });
    this.boxes = new Map(ids.map((id) => [renumber.get(id) ?? id, this.box(id)]));
    this.wireList = this.wireList.map((w) => ({ source: move(w.source), target: move(w.target) }));
    this.nextHandle = ids.length + 1;
  }

  /** Copy with every port (nested diagrams included) mapped through `f`. */
  mapPorts<Q>(f: (port: P) => Q): WiringDiagram<V, Q> {
    const out = new WiringDiagram<V, Q>(this.inputPorts.map(f), this.outputPorts.map(f), this.value);
    for (const id of this.boxIds()) {
      const b = this.box(id);
      out.insertBox(
        id,
        b instanceof WiringDiagram ? b.mapPorts(f) : new Box(b.value, b.inputPorts.map(f), b.outputPorts.map(f))
      );
    }
    out.wireList = this.wireList.map((w) => ({ source: { ...w.source }, target: { ...w.target } }));
    out.nextHandle = this.nextHandle;
    return out;
  }

  /** Structural equality: same boundary, same boxes under the same handles, same wire set. */
  equals(other: WiringDiagram<V, P>): boolean {
    if (!deepEqual(this.inputPorts, other.inputPorts) || !deepEqual(this.outputPorts, other.outputPorts)) return false;
    if (!deepEqual(this.value, other.value)) return false;
    const ids = this.boxIds();
    if (!deepEqual(ids, other.boxIds())) return false;
    for (const id of ids) {
      const a = this.box(id);
      const b = other.box(id);
      if (a instanceof WiringDiagram) {
        if (!(b instanceof WiringDiagram) || !a.equals(b)) return false;
      } else if (
        b instanceof WiringDiagram ||
        !deepEqual(a.value, b.value) ||
        !deepEqual(a.inputPorts, b.inputPorts) ||
        !deepEqual(a.outputPorts, b.outputPorts)
      ) {
        return false;
      }
    }
    return (
      this.wireList.length === other.wireList.length &&
      this.wireList.every((w) => other.wireList.some((x) => sameWire(w, x)))
    );
  }
}

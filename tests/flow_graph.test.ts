import { afterEach, describe, expect, it, vi } from "vitest";
import { basicOb, generator, munit, otimesOb } from "../src/doctrine.js";
import {
  AnnotationKindMismatchError,
  AnnotationNotFoundError,
  DanglingWireError,
  IndexOutOfRangeError,
} from "../src/errors.js";
import {
  boxAnnotation,
  expandBox,
  placeBoxes,
  rawNode,
  rawPort,
  toSemanticGraph,
  toSemanticPorts,
  typePorts,
  unboundPorts,
  type RawGraph,
  type RawNode,
  type RawPort,
} from "../src/flow_graph.js";
import { OntologyStore } from "../src/ontology.js";
import { Box, INPUT_ID, OUTPUT_ID, WiringDiagram } from "../src/wiring.js";
import { clustering, file, fixtureOntology, integer, table, wire } from "./helpers.js";

const IN = INPUT_ID;
const OUT = OUTPUT_ID;

const rawBox = (node: Partial<RawNode>, inputs: Partial<RawPort>[], outputs: Partial<RawPort>[]) =>
  new Box<RawNode, RawPort>(rawNode(node), inputs.map(rawPort), outputs.map(rawPort));

function expand(ontology: OntologyStore, box: Box<RawNode, RawPort>, indexOrigin: 0 | 1 = 0) {
  return expandBox(
    ontology,
    box,
    toSemanticPorts(ontology, box.inputPorts),
    toSemanticPorts(ontology, box.outputPorts),
    { indexOrigin }
  );
}

function asDiagram<V, P>(b: Box<V, P> | WiringDiagram<V, P>): WiringDiagram<V, P> {
  if (!(b instanceof WiringDiagram)) throw new Error("expected a nested diagram");
  return b;
}

/** read_csv(path) -> head() -> KMeans(n).fit(), with path and n on the boundary. */
function pipeline(): RawGraph {
  const raw: RawGraph = new WiringDiagram(
    [rawPort({ annotation: "python/builtins/file", id: "path" }), rawPort({ annotation: "python/builtins/int", value: 3 })],
    [rawPort()]
  );
  raw.addBox(
    rawBox(
      { annotation: "python/pandas/read-csv", metadata: { qual_name: "pandas.read_csv" } },
      [{ annotationIndex: 0 }],
      [{ annotation: "python/pandas/data-frame", annotationIndex: 0 }]
    )
  );
  raw.addBox(rawBox({ metadata: { qual_name: "pandas.DataFrame.head" } }, [{}], [{}]));
  raw.addBox(
    rawBox({ annotation: "python/sklearn/fit-k-means" }, [{ annotationIndex: 0 }, { annotationIndex: 1 }], [{ annotationIndex: 0 }])
  );
  raw.addWires([wire([IN, 0], [1, 0]), wire([1, 0], [2, 0]), wire([2, 0], [3, 0]), wire([IN, 1], [3, 1]), wire([3, 0], [OUT, 0])]);
  return raw;
}

describe("port typing", () => {
  it("types annotated ports by their object and leaves the rest untyped", () => {
    const ontology = fixtureOntology();
    const ports = [rawPort({ annotation: "python/builtins/file", id: "x" }), rawPort({ value: "a.csv" })];
    expect(typePorts(ontology, ports)).toEqual([file, undefined]);
    expect(toSemanticPorts(ontology, ports)).toEqual([{ ob: file, id: "x" }, { value: "a.csv" }]);
  });

  it("refuses a function annotation on a port", () => {
    const ports = [rawPort({ annotation: "python/pandas/read-csv" })];
    expect(() => typePorts(fixtureOntology(), ports)).toThrow(AnnotationKindMismatchError);
  });
});

describe("box expansion", () => {
  const foo = generator("foo", otimesOb(table, integer), clustering);
  const ontology = new OntologyStore([{ kind: "hom", name: "foo", definition: foo }]);

  it("classifies raw boxes by annotation kind", () => {
    expect(boxAnnotation(rawNode())).toEqual({ kind: "none" });
    expect(boxAnnotation(rawNode({ annotation: "x", annotationKind: "slot", annotationIndex: 1 }))).toEqual({
      kind: "slot",
      name: "x",
      index: 1,
    });
  });

  it("keeps unannotated boxes atomic with their typed ports", () => {
    const out = expand(ontology, rawBox({}, [{ id: "a" }], []));
    expect(out).toBeInstanceOf(Box);
    expect(out.value).toBeNull();
    expect(out.inputPorts).toEqual([{ id: "a" }]);
  });

  it("wires function arguments to the annotated positions only", () => {
    const raw = rawBox({ annotation: "foo" }, [{ annotationIndex: 0 }, { annotationIndex: 1 }, {}], [{ annotationIndex: 0 }]);
    const d = asDiagram(expand(ontology, raw));
    expect(d.inputPorts).toHaveLength(3);
    expect(d.boxIds()).toEqual([1]);
    expect(d.box(1).value).toEqual(foo);
    expect(d.wires()).toEqual([wire([IN, 0], [1, 0]), wire([IN, 1], [1, 1]), wire([1, 0], [OUT, 0])]);
  });

  it("honours one-based annotation indices", () => {
    const raw = rawBox({ annotation: "foo" }, [{ annotationIndex: 2 }, { annotationIndex: 1 }], [{ annotationIndex: 1 }]);
    const d = asDiagram(expand(ontology, raw, 1));
    expect(d.wires()).toEqual([wire([IN, 1], [1, 0]), wire([IN, 0], [1, 1]), wire([1, 0], [OUT, 0])]);
  });

  it("fails on an argument index the function does not have", () => {
    const raw = rawBox({ annotation: "foo" }, [{ annotationIndex: 2 }], []);
    expect(() => expand(ontology, raw)).toThrow(IndexOutOfRangeError);
  });

  it("reports an out-of-range index as written", () => {
    const raw = rawBox({ annotation: "foo" }, [{ annotationIndex: 3 }], []);
    expect(() => expand(ontology, raw, 1)).toThrow('input of "foo": index 3 outside 1..2');
  });

  it("expands a slot to that slot's single box", () => {
    const d = asDiagram(expand(fixtureOntology(), rawBox({ annotation: "python/pandas/data-frame", annotationKind: "slot", annotationIndex: 2 }, [{}], [{}])));
    expect(d.boxIds()).toEqual([1]);
    expect(d.box(1).value).toEqual(generator("table-index", table, basicOb("index")));
    expect(d.wires()).toEqual([wire([IN, 0], [1, 0]), wire([1, 0], [OUT, 0])]);
  });

  it("fails on a slot index past the last slot", () => {
    const raw = rawBox({ annotation: "python/pandas/data-frame", annotationKind: "slot", annotationIndex: 3 }, [], []);
    expect(() => expand(fixtureOntology(), raw)).toThrow(IndexOutOfRangeError);
  });

  it("fails on a slot box without an index", () => {
    const raw = rawBox({ annotation: "python/pandas/data-frame", annotationKind: "slot" }, [{}], [{}]);
    expect(() => expand(fixtureOntology(), raw)).toThrow(IndexOutOfRangeError);
  });

  it("fails on slot index zero when indices start at one", () => {
    const raw = rawBox({ annotation: "python/pandas/data-frame", annotationKind: "slot", annotationIndex: 0 }, [{}], [{}]);
    expect(() => expand(fixtureOntology(), raw, 1)).toThrow('slot of "python/pandas/data-frame": index 0 outside 1..3');
  });

  it("refuses a function annotation on construct and slot boxes", () => {
    const construct = rawBox({ annotation: "python/pandas/read-csv", annotationKind: "construct" }, [], [{}]);
    const slot = rawBox({ annotation: "python/pandas/read-csv", annotationKind: "slot", annotationIndex: 0 }, [{}], [{}]);
    expect(() => expand(fixtureOntology(), construct)).toThrow(AnnotationKindMismatchError);
    expect(() => expand(fixtureOntology(), slot)).toThrow(AnnotationKindMismatchError);
  });

  it("expands a construct box through the ontology's constructor", () => {
    const d = asDiagram(expand(fixtureOntology(), rawBox({ annotation: "python/pandas/data-frame", annotationKind: "construct" }, [], [{}])));
    expect(d.inputPorts).toHaveLength(3);
    expect(d.outputPorts).toEqual([{ ob: table }]);
    expect(d.box(1).value).toEqual({
      kind: "construct",
      ob: table,
      dom: otimesOb(basicOb("column-list"), basicOb("row-count"), basicOb("index")),
    });
  });

  it("refuses a type annotation on a function box", () => {
    const raw = rawBox({ annotation: "python/builtins/file" }, [], []);
    expect(() => expand(fixtureOntology(), raw)).toThrow(AnnotationKindMismatchError);
  });
});

describe("toSemanticGraph", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("places every expanded box under its raw handle before substitution", () => {
    const { diagram, pending } = placeBoxes(fixtureOntology(), pipeline());
    expect(diagram.boxIds()).toEqual([1, 2, 3]);
    expect(pending).toEqual([1, 3]);
    expect(diagram.box(2)).toBeInstanceOf(Box);
    expect(diagram.wires()).toEqual([]);
  });

  it("enriches a small pipeline end to end", () => {
    const sem = toSemanticGraph(fixtureOntology(), pipeline());
    expect(sem.inputPorts).toEqual([{ ob: file, id: "path" }, { ob: integer, value: 3 }]);
    expect(sem.outputPorts).toEqual([{}]);
    expect(sem.boxIds()).toEqual([1, 2, 3]);
    expect(sem.box(1).value).toBeNull();
    expect(sem.box(2).value).toEqual(generator("read-table", file, table));
    expect(sem.box(3).value).toEqual(generator("fit-k-means", otimesOb(table, integer), clustering));
    expect(sem.wires()).toEqual([
      wire([IN, 0], [2, 0]),
      wire([2, 0], [1, 0]),
      wire([1, 0], [3, 0]),
      wire([IN, 1], [3, 1]),
      wire([3, 0], [OUT, 0]),
    ]);
  });

  it("projects ports to bare objects without elements", () => {
    const sem = toSemanticGraph(fixtureOntology(), pipeline(), { elements: false });
    expect(sem.inputPorts).toEqual([file, integer]);
    expect(sem.box(3).inputPorts).toEqual([table, integer]);
    expect(sem.box(1).inputPorts).toEqual([undefined]);
  });

  it("aborts on an unknown annotation", () => {
    const raw = pipeline();
    raw.addBox(rawBox({ annotation: "python/numpy/unknown" }, [], []));
    expect(() => toSemanticGraph(fixtureOntology(), raw)).toThrow(AnnotationNotFoundError);
  });

  describe("wires left without a port", () => {
    function constructFile(): RawGraph {
      const ontology = fixtureOntology();
      expect(ontology.construct(file).inputPorts).toEqual([]);
      const raw: RawGraph = new WiringDiagram([rawPort()], [rawPort()]);
      raw.addBox(rawBox({ annotation: "python/builtins/file", annotationKind: "construct" }, [{}], [{}]));
      raw.addWires([wire([IN, 0], [1, 0]), wire([1, 0], [OUT, 0])]);
      return raw;
    }

    it("are an error by default", () => {
      expect(() => toSemanticGraph(fixtureOntology(), constructFile())).toThrow(DanglingWireError);
    });

    it("are dropped with a warning when asked", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const sem = toSemanticGraph(fixtureOntology(), constructFile(), { danglingWires: "drop" });
      expect(warn).toHaveBeenCalledWith("enrich: dropping wire (in:0 -> 1:0), its port is missing after expansion");
      expect(sem.box(1).value).toEqual({ kind: "construct", ob: file, dom: munit() });
      expect(sem.wires()).toEqual([wire([1, 0], [OUT, 0])]);
    });
  });

  describe("wires into arguments without an index", () => {
    function unindexedArgument(): RawGraph {
      const raw: RawGraph = new WiringDiagram([rawPort(), rawPort(), rawPort()], [rawPort()]);
      raw.addBox(
        rawBox(
          { annotation: "python/sklearn/fit-k-means" },
          [{ annotationIndex: 0 }, { annotationIndex: 1 }, { metadata: { keyword: "random_state" } }],
          [{ annotationIndex: 0 }]
        )
      );
      raw.addWires([wire([IN, 0], [1, 0]), wire([IN, 1], [1, 1]), wire([IN, 2], [1, 2]), wire([1, 0], [OUT, 0])]);
      return raw;
    }

    it("lists the unindexed ports of function boxes only", () => {
      const box = unindexedArgument().box(1);
      if (box instanceof WiringDiagram) throw new Error("expected an atomic box");
      expect(unboundPorts(box)).toEqual({ inputs: [2], outputs: [] });
      expect(unboundPorts(rawBox({}, [{}], [{}]))).toEqual({ inputs: [], outputs: [] });
    });

    it("are an error by default", () => {
      expect(() => toSemanticGraph(fixtureOntology(), unindexedArgument())).toThrow(DanglingWireError);
    });

    it("are dropped with a warning when asked", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const sem = toSemanticGraph(fixtureOntology(), unindexedArgument(), { danglingWires: "drop" });
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith("enrich: dropping wire (in:2 -> 1:2), its port has no annotation index");
      expect(sem.wires()).toEqual([wire([IN, 0], [1, 0]), wire([IN, 1], [1, 1]), wire([1, 0], [OUT, 0])]);
    });
  });

  it("enriches nested raw diagrams in place", () => {
    const inner: WiringDiagram<RawNode, RawPort> = new WiringDiagram([rawPort()], [rawPort()]);
    inner.addBox(rawBox({ annotation: "python/pandas/read-csv" }, [{ annotationIndex: 0 }], [{ annotationIndex: 0 }]));
    inner.addWires([wire([IN, 0], [1, 0]), wire([1, 0], [OUT, 0])]);
    const raw: RawGraph = new WiringDiagram([rawPort()], [rawPort()]);
    raw.addBox(inner);
    raw.addWires([wire([IN, 0], [1, 0]), wire([1, 0], [OUT, 0])]);

    const sem = toSemanticGraph(fixtureOntology(), raw);
    const nested = asDiagram(sem.box(1));
    expect(nested.box(1).value).toEqual(generator("read-table", file, table));
    expect(nested.inputPorts).toEqual([{}]);
  });
});

import { MalformedExpressionError, WiringError } from "./errors.js";
import { deepEqual, type JsonValue } from "./util.js";
import { Box, INPUT_ID, OUTPUT_ID, WiringDiagram } from "./wiring.js";

/** Object (type) of the ontology category. */
export type SemanticOb =
  | { kind: "basic"; name: string }
  | { kind: "otimes"; args: SemanticOb[] }
  | { kind: "munit" };

/** Morphism (function) of the ontology category. */
export type SemanticHom =
  | { kind: "generator"; name: string; dom: SemanticOb; codom: SemanticOb }
  | { kind: "construct"; ob: SemanticOb; dom: SemanticOb }
  | { kind: "compose"; args: SemanticHom[] }
  | { kind: "otimes"; args: SemanticHom[] }
  | { kind: "id"; ob: SemanticOb }
  | { kind: "mcopy"; ob: SemanticOb }
  | { kind: "delete"; ob: SemanticOb };

/** Element of an object: what a semantic port carries in elements mode. */
export type SemanticElem = {
  ob?: SemanticOb;
  id?: string;
  value?: JsonValue;
};

export type SemanticValue = SemanticHom | null;
export type SemanticGraph = WiringDiagram<SemanticValue, SemanticElem>;
export type SemanticTypeGraph = WiringDiagram<SemanticValue, SemanticOb | undefined>;

export const basicOb = (name: string): SemanticOb => ({ kind: "basic", name });
export const munit = (): SemanticOb => ({ kind: "munit" });

export function otimesOb(...args: SemanticOb[]): SemanticOb {
  return args.length === 0 ? munit() : args.length === 1 ? args[0] : { kind: "otimes", args };
}

export function generator(name: string, dom: SemanticOb, codom: SemanticOb): SemanticHom {
  return { kind: "generator", name, dom, codom };
}

/** One factor per port: products flatten, the unit has none. */
export function obFactors(ob: SemanticOb): SemanticOb[] {
  switch (ob.kind) {
    case "basic":
      return [ob];
    case "munit":
      return [];
    case "otimes":
      return ob.args.flatMap(obFactors);
  }
}

function endpoint(args: SemanticHom[], which: "first" | "last"): SemanticHom {
  const h = which === "first" ? args[0] : args[args.length - 1];
  if (!h) throw new MalformedExpressionError("compose needs at least one morphism");
  return h;
}

export function homDom(hom: SemanticHom): SemanticOb {
  switch (hom.kind) {
    case "generator":
    case "construct":
      return hom.dom;
    case "compose":
      return homDom(endpoint(hom.args, "first"));
    case "otimes":
      return otimesOb(...hom.args.map(homDom));
    case "id":
    case "mcopy":
    case "delete":
      return hom.ob;
  }
}

export function homCodom(hom: SemanticHom): SemanticOb {
  switch (hom.kind) {
    case "generator":
      return hom.codom;
    case "construct":
    case "id":
      return hom.ob;
    case "compose":
      return homCodom(endpoint(hom.args, "last"));
    case "otimes":
      return otimesOb(...hom.args.map(homCodom));
    case "mcopy":
      return otimesOb(hom.ob, hom.ob);
    case "delete":
      return munit();
  }
}

// JSON s-expressions

export function obToSexpr(ob: SemanticOb): JsonValue {
  switch (ob.kind) {
    case "basic":
      return ["Ob", ob.name];
    case "munit":
      return ["munit"];
    case "otimes":
      return ["otimes", ...ob.args.map(obToSexpr)];
  }
}

export function homToSexpr(hom: SemanticHom): JsonValue {
  switch (hom.kind) {
    case "generator":
      return ["Hom", hom.name, obToSexpr(hom.dom), obToSexpr(hom.codom)];
    case "construct":
      return ["construct", obToSexpr(hom.ob), obToSexpr(hom.dom)];
    case "compose":
    case "otimes":
      return [hom.kind, ...hom.args.map(homToSexpr)];
    case "id":
    case "mcopy":
    case "delete":
      return [hom.kind, obToSexpr(hom.ob)];
  }
}

function splitSexpr(sexpr: unknown, what: string): [string, unknown[]] {
  if (!Array.isArray(sexpr) || typeof sexpr[0] !== "string") {
    throw new MalformedExpressionError(`Expected ${what} s-expression, got ${JSON.stringify(sexpr)}`);
  }
  return [sexpr[0], sexpr.slice(1)];
}

export function parseObSexpr(sexpr: unknown): SemanticOb {
  const [head, args] = splitSexpr(sexpr, "object");
  if (head === "Ob" && args.length === 1 && typeof args[0] === "string") return basicOb(args[0]);
  if (head === "munit" && args.length === 0) return munit();
  if (head === "otimes") return { kind: "otimes", args: args.map(parseObSexpr) };
  throw new MalformedExpressionError(`Malformed object s-expression ${JSON.stringify(sexpr)}`);
}

export function parseHomSexpr(sexpr: unknown): SemanticHom {
  const [head, args] = splitSexpr(sexpr, "morphism");
  switch (head) {
    case "Hom":
      if (args.length === 3 && typeof args[0] === "string") {
        return generator(args[0], parseObSexpr(args[1]), parseObSexpr(args[2]));
      }
      break;
    case "construct":
      if (args.length === 2) return { kind: "construct", ob: parseObSexpr(args[0]), dom: parseObSexpr(args[1]) };
      break;
    case "compose":
    case "otimes":
      if (args.length > 0) return { kind: head, args: args.map(parseHomSexpr) };
      break;
    case "id":
    case "mcopy":
    case "delete":
      if (args.length === 1) return { kind: head, ob: parseObSexpr(args[0]) };
      break;
  }
  throw new MalformedExpressionError(`Malformed morphism s-expression ${JSON.stringify(sexpr)}`);
}

/** Parse an s-expression written as JSON text (GraphML data values). */
export function parseSexprText(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (e) {
    throw new MalformedExpressionError(`Invalid JSON s-expression: ${e instanceof Error ? e.message : String(e)}`);
  }
}

// Morphisms as wiring diagrams

const typed = (ob: SemanticOb): SemanticElem => ({ ob });

/**
 * Canonical wiring diagram of a morphism. Generators and constructors become
 * a single box; structural morphisms become bare wiring.
 */
export function homToDiagram(hom: SemanticHom): SemanticGraph {
  const inputs = obFactors(homDom(hom)).map(typed);
  const outputs = obFactors(homCodom(hom)).map(typed);
  const d = new WiringDiagram<SemanticValue, SemanticElem>(inputs, outputs);
  const n = inputs.length;

  switch (hom.kind) {
    case "generator":
    case "construct": {
      const v = d.addBox(new Box<SemanticValue, SemanticElem>(hom, inputs, outputs));
      inputs.forEach((_, i) => d.addWire({ source: { box: INPUT_ID, port: i }, target: { box: v, port: i } }));
      outputs.forEach((_, i) => d.addWire({ source: { box: v, port: i }, target: { box: OUTPUT_ID, port: i } }));
      return d;
    }
    case "id":
      inputs.forEach((_, i) => d.addWire({ source: { box: INPUT_ID, port: i }, target: { box: OUTPUT_ID, port: i } }));
      return d;
    case "mcopy":
      for (let i = 0; i < n; i += 1) {
        d.addWire({ source: { box: INPUT_ID, port: i }, target: { box: OUTPUT_ID, port: i } });
        d.addWire({ source: { box: INPUT_ID, port: i }, target: { box: OUTPUT_ID, port: n + i } });
      }
      return d;
    case "delete":
      return d;
    case "compose": {
      for (let k = 0; k + 1 < hom.args.length; k += 1) {
        const left = obFactors(homCodom(hom.args[k]));
        const right = obFactors(homDom(hom.args[k + 1]));
        if (!deepEqual(left, right)) {
          throw new WiringError(
            `Cannot compose: codomain ${JSON.stringify(left.map(obToSexpr))} does not match domain ${JSON.stringify(
              right.map(obToSexpr)
            )}`
          );
        }
      }
      const parts = hom.args.map(homToDiagram);
      const handles = parts.map((p) => d.addBox(p));
      inputs.forEach((_, i) => d.addWire({ source: { box: INPUT_ID, port: i }, target: { box: handles[0], port: i } }));
      for (let k = 0; k + 1 < parts.length; k += 1) {
        parts[k].outputPorts.forEach((_, j) =>
          d.addWire({ source: { box: handles[k], port: j }, target: { box: handles[k + 1], port: j } })
        );
      }
      const last = handles[handles.length - 1];
      outputs.forEach((_, j) => d.addWire({ source: { box: last, port: j }, target: { box: OUTPUT_ID, port: j } }));
      d.substitute(handles);
      d.compact();
      return d;
    }
    case "otimes": {
      let inOffset = 0;
      let outOffset = 0;
      const handles: number[] = [];
      for (const part of hom.args.map(homToDiagram)) {
        const v = d.addBox(part);
        handles.push(v);
        part.inputPorts.forEach((_, i) =>
          d.addWire({ source: { box: INPUT_ID, port: inOffset + i }, target: { box: v, port: i } })
        );
        part.outputPorts.forEach((_, j) =>
          d.addWire({ source: { box: v, port: j }, target: { box: OUTPUT_ID, port: outOffset + j } })
        );
        inOffset += part.inputPorts.length;
        outOffset += part.outputPorts.length;
      }
      d.substitute(handles);
      d.compact();
      return d;
    }
  }
}

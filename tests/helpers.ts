import { fileURLToPath } from "url";
import { basicOb, generator, type SemanticElem, type SemanticValue } from "../src/doctrine.js";
import { OntologyStore } from "../src/ontology.js";
import { Box, WiringDiagram, type Wire } from "../src/wiring.js";

export const file = basicOb("file");
export const integer = basicOb("integer");
export const table = basicOb("table");
export const clustering = basicOb("clustering");

export const fixtureOntology = (): OntologyStore =>
  OntologyStore.fromFile(fileURLToPath(new URL("./fixtures/ontology.yaml", import.meta.url)));

export const wire = (s: [number, number], t: [number, number]): Wire => ({
  source: { box: s[0], port: s[1] },
  target: { box: t[0], port: t[1] },
});

export type Semantic = WiringDiagram<SemanticValue, SemanticElem>;

export function semanticBox(name: string | null, inputs: number, outputs: number): Box<SemanticValue, SemanticElem> {
  const value = name === null ? null : generator(name, table, table);
  return new Box<SemanticValue, SemanticElem>(
    value,
    Array.from({ length: inputs }, () => ({})),
    Array.from({ length: outputs }, () => ({}))
  );
}

import { loadRules } from "./config.js";
import { toSemanticGraph } from "./flow_graph.js";
import { readRawGraphFile, writeSemanticGraph, writeSemanticTypeGraph } from "./graphml.js";
import { OntologyStore } from "./ontology.js";
import { writeText } from "./util.js";

function main() {
  const [graphmlPath, ontologyPath, outPath, rulesPath] = process.argv.slice(2);
  if (!graphmlPath || !ontologyPath || !outPath) {
    console.error("Usage: node dist/main.js <raw.graphml> <ontology.yaml> <out.graphml> [rules.yaml]");
    process.exit(1);
  }
  const raw = readRawGraphFile(graphmlPath);
  const ontology = OntologyStore.fromFile(ontologyPath);
  const rules = loadRules(rulesPath);

  let boxes: number;
  let wires: number;
  if (rules.elements) {
    const sem = toSemanticGraph(ontology, raw, { ...rules, elements: true });
    writeText(outPath, writeSemanticGraph(sem));
    [boxes, wires] = [sem.boxIds().length, sem.wires().length];
  } else {
    const sem = toSemanticGraph(ontology, raw, { ...rules, elements: false });
    writeText(outPath, writeSemanticTypeGraph(sem));
    [boxes, wires] = [sem.boxIds().length, sem.wires().length];
  }
  console.error(`enrich: annotations=${ontology.size} boxes=${boxes} wires=${wires}`);
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}

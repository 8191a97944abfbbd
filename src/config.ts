import yaml from "js-yaml";
import { defaultEnrichOptions, type EnrichOptions } from "./flow_graph.js";
import { isRecord, readText } from "./util.js";

type EnrichRules = {
  elements?: unknown;
  index_origin?: unknown;
  dangling_wires?: unknown;
};

function asIndexOrigin(v: unknown): 0 | 1 | undefined {
  if (v === 0 || v === "0") return 0;
  if (v === 1 || v === "1") return 1;
  return undefined;
}

function asDanglingPolicy(v: unknown): EnrichOptions["danglingWires"] | undefined {
  return v === "error" || v === "drop" ? v : undefined;
}

/** Enrichment options from a parsed rules document, falling back to the defaults. */
export function mergeRules(rules: unknown): EnrichOptions {
  const raw: EnrichRules = isRecord(rules) && isRecord(rules.enrich) ? rules.enrich : {};
  return {
    elements: typeof raw.elements === "boolean" ? raw.elements : defaultEnrichOptions.elements,
    indexOrigin: asIndexOrigin(raw.index_origin) ?? defaultEnrichOptions.indexOrigin,
    danglingWires: asDanglingPolicy(raw.dangling_wires) ?? defaultEnrichOptions.danglingWires,
  };
}

export function loadRules(path?: string): EnrichOptions {
  return mergeRules(path ? yaml.load(readText(path)) : undefined);
}

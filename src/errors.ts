/**
 * Error taxonomy for flow graph enrichment.
 * Every error aborts the enrichment call that raised it.
 */

export type ErrorDetails = Record<string, string | number | undefined>;

export abstract class FlowGraphError extends Error {
  constructor(message: string, public readonly code: string, public readonly details: ErrorDetails = {}) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class AnnotationNotFoundError extends FlowGraphError {
  constructor(name: string) {
    super(`No annotation named "${name}"`, "ANNOTATION_NOT_FOUND", { name });
  }
}

export class AnnotationKindMismatchError extends FlowGraphError {
  constructor(name: string, expected: "hom" | "ob", actual: "hom" | "ob") {
    super(`Annotation "${name}" is a ${actual} annotation, expected ${expected}`, "ANNOTATION_KIND_MISMATCH", {
      name,
      expected,
      actual,
    });
  }
}

/** `index` is reported as written, counted from `origin`. */
export class IndexOutOfRangeError extends FlowGraphError {
  constructor(what: string, index: number | undefined, length: number, origin: 0 | 1 = 0) {
    super(
      `${what}: index ${index ?? "(missing)"} outside ${origin}..${length - 1 + origin}`,
      "INDEX_OUT_OF_RANGE",
      { what, index, length, origin }
    );
  }
}

/** Raised when several type annotations define the same object with different slots. */
export class AmbiguousConstructionError extends FlowGraphError {
  constructor(ob: string, names: string[]) {
    super(`Object ${ob} is defined with different slots by ${names.join(", ")}`, "AMBIGUOUS_CONSTRUCTION", {
      ob,
      names: names.join(","),
    });
  }
}

/**
 * Raised when a serialized annotation kind is not one of
 * "function", "construct" or "slot".
 */
export class UnknownAnnotationKindError extends FlowGraphError {
  constructor(label: string) {
    super(`Unknown annotation kind "${label}"`, "UNKNOWN_ANNOTATION_KIND", { label });
  }
}

/**
 * Raised when a raw wire targets a port that the expanded box no longer has,
 * e.g. an argument with no matching slot.
 */
export class DanglingWireError extends FlowGraphError {
  constructor(description: string) {
    super(`Wire ${description} has no matching port after expansion`, "DANGLING_WIRE", { wire: description });
  }
}

export class WiringError extends FlowGraphError {
  constructor(message: string) {
    super(message, "INVALID_WIRING");
  }
}

/** Raised for an ontology expression that is not a well-formed JSON s-expression. */
export class MalformedExpressionError extends FlowGraphError {
  constructor(message: string) {
    super(message, "MALFORMED_EXPRESSION");
  }
}

export class GraphmlError extends FlowGraphError {
  constructor(message: string) {
    super(message, "MALFORMED_GRAPHML");
  }
}

/**
 * @module value
 * @description Closed model of everything the pretty-printer knows how to
 * lay out. Raw payloads (parsed JSON bodies, buffers, maps, class instances)
 * are classified once by {@link toValue}; the printer then dispatches on
 * `kind` exhaustively.
 */

export interface MappingValue {
  kind: "mapping";
  entries: ReadonlyArray<readonly [string, PrintableValue]>;
}

export interface SequenceValue {
  kind: "sequence";
  items: readonly PrintableValue[];
}

export interface BinaryValue {
  kind: "binary";
  bytes: Uint8Array;
}

export interface ScalarValue {
  kind: "scalar";
  text: string;
  /** Strings are quoted when they appear as mapping values */
  isString: boolean;
}

export type PrintableValue =
  | MappingValue
  | SequenceValue
  | BinaryValue
  | ScalarValue;

export const CIRCULAR_MARKER = "[Circular]";
export const TRUNCATED_MARKER = "[Truncated]";
export const UNREADABLE_MARKER = "[Unreadable]";

const DEFAULT_MAX_DEPTH = 32;

export function isBinary(raw: unknown): raw is Uint8Array | ArrayBuffer {
  return raw instanceof Uint8Array || raw instanceof ArrayBuffer;
}

type NumericArray =
  | Int8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

/** Typed arrays other than `Uint8Array`, which is binary. */
export function isNumericArray(raw: unknown): raw is NumericArray {
  return (
    ArrayBuffer.isView(raw) &&
    !(raw instanceof DataView) &&
    !(raw instanceof Uint8Array)
  );
}

/** Values that {@link toValue} turns into a sequence. */
export function isSequenceLike(
  raw: unknown
): raw is readonly unknown[] | ReadonlySet<unknown> | NumericArray {
  return Array.isArray(raw) || raw instanceof Set || isNumericArray(raw);
}

/** Values that {@link toValue} turns into a mapping. */
export function isMappingLike(raw: unknown): raw is object {
  return (
    typeof raw === "object" &&
    raw !== null &&
    !isSequenceLike(raw) &&
    !isBinary(raw) &&
    !(raw instanceof DataView) &&
    !(raw instanceof Date) &&
    !(raw instanceof Error)
  );
}

function scalar(text: string, isString = false): ScalarValue {
  return { kind: "scalar", text, isString };
}

/** Entries of a mapping-like value in its own iteration order. */
export function entriesOf(raw: object): Array<[string, unknown]> {
  if (raw instanceof Map) {
    return Array.from(raw.entries(), ([k, v]): [string, unknown] => [
      String(k),
      v,
    ]);
  }
  return Object.entries(raw);
}

/** Stands in for a property whose getter threw. */
const unreadable: unique symbol = Symbol("unreadable");

function numericItems(raw: NumericArray): unknown[] {
  const items: unknown[] = [];
  for (let i = 0; i < raw.length; i++) items.push(raw[i]);
  return items;
}

/**
 * Like {@link entriesOf}, but reads own properties one at a time so that a
 * throwing getter only costs its own entry.
 */
function readEntries(raw: object): Array<[string, unknown]> {
  if (raw instanceof Map) return entriesOf(raw);

  return Object.keys(raw).map((key): [string, unknown] => {
    try {
      const value: unknown = Reflect.get(raw, key);
      return [key, value];
    } catch {
      return [key, unreadable];
    }
  });
}

/**
 * Classifies an arbitrary value. Self-references become {@link CIRCULAR_MARKER},
 * anything nested deeper than `maxDepth` becomes {@link TRUNCATED_MARKER} and
 * properties whose getter throws become {@link UNREADABLE_MARKER}, so the
 * result is always a finite tree.
 */
export function toValue(
  raw: unknown,
  maxDepth = DEFAULT_MAX_DEPTH
): PrintableValue {
  const ancestors = new Set<object>();

  const visit = (node: unknown, depth: number): PrintableValue => {
    if (node === unreadable) return scalar(UNREADABLE_MARKER);
    if (typeof node === "string") return scalar(node, true);
    if (node instanceof Date) {
      return scalar(
        Number.isNaN(node.getTime()) ? String(node) : node.toISOString()
      );
    }
    if (node instanceof Error) return scalar(`${node.name}: ${node.message}`);
    if (node instanceof ArrayBuffer) {
      return { kind: "binary", bytes: new Uint8Array(node) };
    }
    if (node instanceof Uint8Array) return { kind: "binary", bytes: node };
    if (node instanceof DataView) {
      return {
        kind: "binary",
        bytes: new Uint8Array(node.buffer, node.byteOffset, node.byteLength),
      };
    }
    if (typeof node !== "object" || node === null) return scalar(String(node));

    if (ancestors.has(node)) return scalar(CIRCULAR_MARKER);
    if (depth >= maxDepth) return scalar(TRUNCATED_MARKER);

    ancestors.add(node);
    try {
      if (isSequenceLike(node)) {
        const items = isNumericArray(node) ? numericItems(node) : [...node];
        return {
          kind: "sequence",
          items: items.map((item) => visit(item, depth + 1)),
        };
      }
      return {
        kind: "mapping",
        entries: readEntries(node).map(
          ([key, value]): readonly [string, PrintableValue] => [
            key,
            visit(value, depth + 1),
          ]
        ),
      };
    } finally {
      ancestors.delete(node);
    }
  };

  return visit(raw, 0);
}

/**
 * Conventional single-line rendering: `{a: 1, b: x}`, `[1, 2]`, binary as a
 * decimal list, scalars as their text. Used by the flattenability checks
 * and for flattened output.
 */
export function render(value: PrintableValue): string {
  switch (value.kind) {
    case "mapping":
      return `{${value.entries
        .map(([key, child]) => `${key}: ${render(child)}`)
        .join(", ")}}`;
    case "sequence":
      return `[${value.items.map(render).join(", ")}]`;
    case "binary":
      return `[${Array.from(value.bytes).join(", ")}]`;
    case "scalar":
      return value.text;
    default:
      return assertNever(value);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled value variant: ${JSON.stringify(value)}`);
}

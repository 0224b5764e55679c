/**
 * @module printer
 * @description Recursive pretty-printer for semi-structured payloads.
 * Every operation is a lazy generator of display lines; nothing is buffered
 * beyond the current recursion frame. Lines carry the `║` margin and four
 * spaces of indentation per level.
 *
 * @example
 * ```typescript
 * const printer = new StructuredPrinter({ maxWidth: 60 });
 * printer.print({ id: 7, tags: ["a", "b"] }, console.log);
 * // ║    {
 * // ║         "id": 7,
 * // ║         "tags": [a, b]
 * // ║    }
 * ```
 */

import {
  FormatOptionsSchema,
  parseOrThrow,
  type FormatOptions,
} from "../schema/options";
import type { LineSink } from "../types";
import {
  assertNever,
  render,
  toValue,
  type BinaryValue,
  type MappingValue,
  type PrintableValue,
  type ScalarValue,
  type SequenceValue,
} from "./value";

export type Lines = Generator<string, void, undefined>;

/** One indentation level */
export const TAB_STEP = "    ";
export const MARGIN = "║";

export const DEFAULT_FORMAT_OPTIONS: Readonly<FormatOptions> = Object.freeze({
  maxWidth: 90,
  compact: true,
  initialIndentLevel: 1,
  chunkSize: 20,
  maxDepth: 32,
});

/** Sequences this long or longer are never flattened. */
const MAX_FLAT_SEQUENCE = 10;

export function indent(level: number): string {
  return TAB_STEP.repeat(level);
}

/**
 * Splits `text` into consecutive `width`-long pieces, the last one possibly
 * shorter. Purely length based; an empty string yields no pieces.
 */
export function chunkText(text: string, width: number): string[] {
  const out: string[] = [];
  for (let i = 0; i < text.length; i += width) {
    out.push(text.slice(i, i + width));
  }
  return out;
}

export class StructuredPrinter {
  readonly options: Readonly<FormatOptions>;

  /**
   * @throws {Error} when `maxWidth`, `chunkSize` or `maxDepth` is not a
   * positive integer, or `initialIndentLevel` is negative
   */
  constructor(options: Partial<FormatOptions> = {}) {
    this.options = Object.freeze(
      parseOrThrow(FormatOptionsSchema, {
        maxWidth: options.maxWidth ?? DEFAULT_FORMAT_OPTIONS.maxWidth,
        compact: options.compact ?? DEFAULT_FORMAT_OPTIONS.compact,
        initialIndentLevel:
          options.initialIndentLevel ??
          DEFAULT_FORMAT_OPTIONS.initialIndentLevel,
        chunkSize: options.chunkSize ?? DEFAULT_FORMAT_OPTIONS.chunkSize,
        maxDepth: options.maxDepth ?? DEFAULT_FORMAT_OPTIONS.maxDepth,
      })
    );
  }

  /** Classifies `raw` and lays it out. */
  format(raw: unknown): Lines {
    return this.printValue(toValue(raw, this.options.maxDepth));
  }

  /** Streams every line of `raw` to `emitLine`, in order. */
  print(raw: unknown, emitLine: LineSink): void {
    for (const line of this.format(raw)) {
      emitLine(line);
    }
  }

  *printValue(value: PrintableValue): Lines {
    const level = this.options.initialIndentLevel;
    switch (value.kind) {
      case "mapping":
        yield* this.printMapping(value, level);
        return;
      case "sequence":
        yield `${MARGIN}${indent(level)}[`;
        yield* this.printSequence(value, level);
        yield `${MARGIN}${indent(level)}]`;
        return;
      case "binary":
        yield `${MARGIN}${indent(level)}[`;
        yield* this.printBinaryBuffer(value, level);
        yield `${MARGIN}${indent(level)}]`;
        return;
      case "scalar":
        yield* this.printBlock(value.text);
        return;
      default:
        assertNever(value);
    }
  }

  /**
   * Prints a mapping whose entries sit one level below `indentLevel`. The
   * opening brace is printed here for the root mapping and for list
   * elements; a mapping nested under a key gets its `"key": {` line from the
   * parent. The closing brace carries a comma unless `isLast`.
   */
  *printMapping(
    mapping: MappingValue,
    indentLevel = this.options.initialIndentLevel,
    isListElement = false,
    isLast = true
  ): Lines {
    const isRoot = indentLevel === this.options.initialIndentLevel;
    const initialIndent = indent(indentLevel);
    const tabs = indentLevel + 1;
    const pad = `${MARGIN}${indent(tabs)} `;
    const { compact } = this.options;

    if (isRoot || isListElement) yield `${MARGIN}${initialIndent}{`;

    const count = mapping.entries.length;
    for (let index = 0; index < count; index++) {
      const [name, child] = mapping.entries[index];
      const last = index === count - 1;
      const sep = last ? "" : ",";
      const key = `"${name}"`;

      switch (child.kind) {
        case "mapping":
          if (compact && this.isFlattenableMapping(child)) {
            yield `${pad}${key}: ${render(child)}${sep}`;
          } else {
            yield `${pad}${key}: {`;
            yield* this.printMapping(child, tabs, false, last);
          }
          break;
        case "sequence":
        case "binary":
          if (compact && this.isFlattenableSequence(child)) {
            yield `${pad}${key}: ${render(child)}${sep}`;
          } else {
            yield `${pad}${key}: [`;
            if (child.kind === "binary") {
              yield* this.printBinaryBuffer(child, tabs);
            } else {
              yield* this.printSequence(child, tabs);
            }
            yield `${pad}]${sep}`;
          }
          break;
        case "scalar":
          yield* this.printScalarEntry(key, child, tabs, sep);
          break;
        default:
          assertNever(child);
      }
    }

    yield `${MARGIN}${initialIndent}}${isLast ? "" : ","}`;
  }

  *printSequence(
    sequence: SequenceValue,
    indentLevel = this.options.initialIndentLevel
  ): Lines {
    const count = sequence.items.length;
    for (let index = 0; index < count; index++) {
      const element = sequence.items[index];
      const last = index === count - 1;
      const sep = last ? "" : ",";

      if (element.kind === "mapping") {
        if (this.options.compact && this.isFlattenableMapping(element)) {
          yield `${MARGIN}${indent(indentLevel)}  ${render(element)}${sep}`;
        } else {
          yield* this.printMapping(element, indentLevel + 1, true, last);
        }
      } else {
        yield `${MARGIN}${indent(indentLevel + 2)} ${render(element)}${sep}`;
      }
    }
  }

  /** One line per `chunkSize` bytes, as comma-joined decimal values. */
  *printBinaryBuffer(
    buffer: BinaryValue,
    indentLevel = this.options.initialIndentLevel
  ): Lines {
    const { chunkSize } = this.options;
    for (let i = 0; i < buffer.bytes.length; i += chunkSize) {
      const chunk = Array.from(buffer.bytes.subarray(i, i + chunkSize));
      yield `${MARGIN}${indent(indentLevel)} ${chunk.join(", ")}`;
    }
  }

  *printBlock(text: string): Lines {
    for (const chunk of chunkText(text, this.options.maxWidth)) {
      yield `${MARGIN} ${chunk}`;
    }
  }

  /**
   * A mapping flattens when none of its direct values is a mapping, list or
   * buffer and its conventional rendering is shorter than `maxWidth`. The
   * indentation of the final line is not taken into account.
   */
  isFlattenableMapping(mapping: MappingValue): boolean {
    return (
      mapping.entries.every(([, child]) => child.kind === "scalar") &&
      render(mapping).length < this.options.maxWidth
    );
  }

  isFlattenableSequence(sequence: SequenceValue | BinaryValue): boolean {
    const length =
      sequence.kind === "binary"
        ? sequence.bytes.length
        : sequence.items.length;
    return (
      length < MAX_FLAT_SEQUENCE &&
      render(sequence).length < this.options.maxWidth
    );
  }

  private *printScalarEntry(
    key: string,
    value: ScalarValue,
    tabs: number,
    sep: string
  ): Lines {
    const pad = `${MARGIN}${indent(tabs)} `;
    const msg = (
      value.isString ? `"${value.text.replace(/[\r\n]+/g, " ")}"` : value.text
    ).replace(/\n/g, "");
    const lineWidth = Math.max(1, this.options.maxWidth - indent(tabs).length);

    if (key.length + 2 + msg.length <= lineWidth) {
      yield `${pad}${key}: ${msg}${sep}`;
      return;
    }

    const chunks = chunkText(msg, lineWidth);
    for (let i = 0; i < chunks.length; i++) {
      const label = i === 0 ? `${key}:` : "";
      const tail = i === chunks.length - 1 ? sep : "";
      yield `${pad}${label} ${chunks[i]}${tail}`;
    }
  }
}

/**
 * Lazily formats `raw` with the given options. The returned generator is
 * one-shot.
 */
export function formatValue(
  raw: unknown,
  options: Partial<FormatOptions> = {}
): Lines {
  return new StructuredPrinter(options).format(raw);
}

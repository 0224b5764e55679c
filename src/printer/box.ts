import { MARGIN, StructuredPrinter, type Lines } from "./printer";
import { render, toValue } from "./value";

/**
 * Box-drawing pieces of the transcript: headed boxes, horizontal rules and
 * key/value tables. Shares `maxWidth` with the structured printer it wraps.
 */
export class BoxWriter {
  constructor(private readonly printer: StructuredPrinter) {}

  get maxWidth(): number {
    return this.printer.options.maxWidth;
  }

  *boxed(header: string, text: string): Lines {
    yield `╔╣ ${header}`;
    yield `${MARGIN}  ${text}`;
    yield this.rule("╚");
  }

  rule(prefix = "", suffix = "╝"): string {
    return `${prefix}${"═".repeat(this.maxWidth)}${suffix}`;
  }

  *keyValue(key: string, value: unknown): Lines {
    const pre = `╟ ${key}: `;
    const msg = typeof value === "string" ? value : render(toValue(value));

    if (pre.length + msg.length > this.maxWidth) {
      yield pre;
      yield* this.printer.printBlock(msg);
    } else {
      yield `${pre}${msg}`;
    }
  }

  /** Prints nothing for an absent or empty table. */
  *table(
    entries: Iterable<readonly [string, unknown]> | undefined,
    header: string
  ): Lines {
    if (!entries) return;
    const rows = Array.from(entries);
    if (rows.length === 0) return;

    yield `╔ ${header} `;
    for (const [key, value] of rows) {
      yield* this.keyValue(key, value);
    }
    yield this.rule("╚");
  }
}

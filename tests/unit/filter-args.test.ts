import { describe, expect, it } from "vitest";
import { FilterArgs } from "../../src/filter-args";

describe("filter-args.ts", () => {
  it("should describe string payloads", () => {
    const args = new FilterArgs(false, "plain");

    expect(args.isResponse).toBe(false);
    expect(args.hasStringData).toBe(true);
    expect(args.hasJsonData).toBe(false);
  });

  it("should treat objects and arrays as JSON", () => {
    expect(new FilterArgs(true, { a: 1 }).hasMapData).toBe(true);
    expect(new FilterArgs(true, [1]).hasListData).toBe(true);
    expect(new FilterArgs(true, [1]).hasJsonData).toBe(true);
  });

  it("should not treat buffers as maps", () => {
    const args = new FilterArgs(true, Buffer.from([1]));

    expect(args.hasBinaryData).toBe(true);
    expect(args.hasMapData).toBe(false);
    expect(args.hasJsonData).toBe(false);
  });

  it("should treat sets and numeric typed arrays as lists", () => {
    const set = new FilterArgs(true, new Set([1]));
    const ints = new FilterArgs(true, new Int16Array([1]));

    expect(set.hasListData).toBe(true);
    expect(set.hasMapData).toBe(false);
    expect(ints.hasListData).toBe(true);
    expect(ints.hasBinaryData).toBe(false);
    expect(ints.hasMapData).toBe(false);
  });

  it("should report nothing for an absent payload", () => {
    const args = new FilterArgs(true, undefined);

    expect(args.hasStringData).toBe(false);
    expect(args.hasMapData).toBe(false);
    expect(args.hasListData).toBe(false);
    expect(args.hasBinaryData).toBe(false);
  });
});

import { describe, it, expect } from "vitest";

import { cloneValue } from "@/templates/index.js";

class Point {
  constructor(
    public x: number,
    public y: number
  ) {}

  norm(): number {
    return Math.abs(this.x) + Math.abs(this.y);
  }
}

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

describe("cloneValue", () => {
  it("returns primitives as-is", () => {
    expect(cloneValue(1)).toBe(1);
    expect(cloneValue("a")).toBe("a");
    expect(cloneValue(null)).toBe(null);
    expect(cloneValue(undefined)).toBe(undefined);
  });

  it("returns functions by reference", () => {
    const fn = (): number => 1;
    expect(cloneValue(fn)).toBe(fn);
  });

  it("copies nested objects and arrays", () => {
    const original = { list: [1, { deep: true }], meta: { tag: "x" } };
    const copy = cloneValue(original);

    original.list.push(2);
    original.meta.tag = "changed";

    expect(copy).toEqual({ list: [1, { deep: true }], meta: { tag: "x" } });
  });

  it("copies Maps and Sets", () => {
    const map = new Map([["k", [1]]]);
    const set = new Set([1]);
    const copy = cloneValue({ map, set });

    map.get("k")?.push(2);
    set.add(2);

    expect(copy).toEqual({ map: new Map([["k", [1]]]), set: new Set([1]) });
  });

  it("copies dates", () => {
    const date = new Date(1000);
    const copy = cloneValue(date);
    date.setTime(5000);

    expect(copy).toBeInstanceOf(Date);
    expect(copy).toEqual(new Date(1000));
  });

  it("copies URLs with their state", () => {
    const link = new URL("https://example.com/a");
    const copy = cloneValue(link);
    link.pathname = "/changed";

    expect(copy).toBeInstanceOf(URL);
    if (copy instanceof URL) {
      expect(copy.href).toBe("https://example.com/a");
    }
  });

  it("copies boxed primitives with their value", () => {
    const copies = [cloneValue(new String("s")), cloneValue(new Number(5)), cloneValue(new Boolean(false))];

    expect(copies[0]).toBeInstanceOf(String);
    expect(copies[1]).toBeInstanceOf(Number);
    expect(copies[2]).toBeInstanceOf(Boolean);
    expect(copies.map((copy) => String(copy))).toEqual(["s", "5", "false"]);
  });

  it("copies typed arrays", () => {
    const bytes = new Uint8Array([1, 2]);
    const copy = cloneValue(bytes);
    bytes[0] = 9;
    expect(copy).toEqual(new Uint8Array([1, 2]));
  });

  it("keeps the prototype of class instances", () => {
    const point = new Point(1, -2);
    const copy = cloneValue(point);
    point.x = 10;

    expect(copy).toBeInstanceOf(Point);
    expect(copy).toEqual(new Point(1, -2));
    if (copy instanceof Point) {
      expect(copy.norm()).toBe(3);
    }
  });

  it("preserves shared references", () => {
    const shared = { n: 1 };
    const copy = cloneValue({ a: shared, b: shared });

    expect(field(copy, "a")).toBe(field(copy, "b"));
    expect(field(copy, "a")).not.toBe(shared);
  });

  it("preserves circular references", () => {
    const loop: Record<string, unknown> = { name: "loop" };
    loop["self"] = loop;
    const copy = cloneValue(loop);

    expect(copy).not.toBe(loop);
    expect(field(copy, "self")).toBe(copy);
  });
});

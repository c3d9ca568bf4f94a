import { describe, it, expect } from "vitest";

import { dedent } from "@/templates/index.js";

describe("dedent", () => {
  it("removes indentation shared by every line", () => {
    expect(dedent("    a\n    b")).toBe("a\nb");
  });

  it("keeps indentation beyond the common margin", () => {
    expect(dedent("  a\n    b\n  c")).toBe("a\n  b\nc");
  });

  it("ignores blank lines when measuring the margin", () => {
    expect(dedent("    a\n\n    b")).toBe("a\n\nb");
    expect(dedent("    a\n  \n    b")).toBe("a\n\nb");
  });

  it("trims surrounding whitespace", () => {
    expect(dedent("\n\n  text  \n")).toBe("text");
  });

  it("removes only the characters the margins share", () => {
    expect(dedent("x\n \ta\n  b")).toBe("x\n \ta\n  b");
    expect(dedent(" \ta\n  b")).toBe("a\n b");
  });

  it("returns an empty string for blank input", () => {
    expect(dedent("   \n  ")).toBe("");
  });
});

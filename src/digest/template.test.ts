import { describe, it, expect } from "vitest";
import { interpolate, mapInBatches, truncate } from "./template.js";

describe("interpolate", () => {
  it("replaces every occurrence of each placeholder", () => {
    expect(interpolate("{{a}} and {{b}} and {{a}}", { a: "x", b: "y" })).toBe("x and y and x");
  });

  it("inserts values literally", () => {
    expect(interpolate("Body: {{body}}", { body: "costs $& or $1, $$" })).toBe(
      "Body: costs $& or $1, $$"
    );
  });

  it("does not expand placeholders that arrive inside values", () => {
    expect(interpolate("{{body}} / {{subject}}", { body: "{{subject}}", subject: "Hi" })).toBe(
      "{{subject}} / Hi"
    );
  });

  it("leaves unknown placeholders in place", () => {
    expect(interpolate("{{missing}}", {})).toBe("{{missing}}");
  });
});

describe("truncate", () => {
  it("keeps the first max characters", () => {
    expect(truncate("abcdef", 3)).toBe("abc");
    expect(truncate("abc", 3)).toBe("abc");
  });

  it("does not split a surrogate pair", () => {
    expect(truncate("ab\u{1F600}", 3)).toBe("ab");
    expect(truncate("ab\u{1F600}", 4)).toBe("ab\u{1F600}");
    expect(truncate("ab\u{1F600}c", 4)).toBe("ab\u{1F600}");
  });
});

describe("mapInBatches", () => {
  it("keeps input order and never exceeds the batch size in flight", async () => {
    let active = 0;
    let maxActive = 0;
    const out = await mapInBatches([5, 1, 4, 2, 3], 2, async (n, i) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, n));
      active -= 1;
      return `${i}:${n}`;
    });
    expect(out).toEqual(["0:5", "1:1", "2:4", "3:2", "4:3"]);
    expect(maxActive).toBe(2);
  });

  it("returns an empty list for no items", async () => {
    await expect(mapInBatches([], 3, async () => 1)).resolves.toEqual([]);
  });
});

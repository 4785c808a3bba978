import { describe, it, expect } from "vitest";
import { slugify } from "./slugify";
import { OrderedSet } from "./ordered-set";

describe("slugify", () => {
  it("lowercases and hyphenates", () => {
    expect(slugify("Introducing Power Automate")).toBe(
      "introducing-power-automate",
    );
  });

  it("collapses runs of non-alphanumerics into one hyphen", () => {
    expect(slugify("Knowledge check: C# & .NET")).toBe("knowledge-check-c-net");
  });

  it("trims leading and trailing hyphens", () => {
    expect(slugify("  --What's new?--  ")).toBe("what-s-new");
  });

  it("returns an empty string when nothing alphanumeric remains", () => {
    expect(slugify("!!!")).toBe("");
  });
});

describe("OrderedSet", () => {
  it("keeps first-seen order and drops duplicates and empty values", () => {
    const set = new OrderedSet(["b", "a", "", "b", null, "c", undefined, "a"]);
    expect(set.toArray()).toEqual(["b", "a", "c"]);
    expect(set.size).toBe(3);
  });

  it("reports membership", () => {
    const set = new OrderedSet().add("x");
    expect(set.has("x")).toBe(true);
    expect(set.has("y")).toBe(false);
  });
});

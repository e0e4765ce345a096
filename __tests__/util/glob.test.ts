import { describe, expect, it } from "vitest";
import {
  compileToolFilter,
  filterTools,
  globToRegExp,
  matchesAnyGlob,
  matchesGlob,
} from "../../src/util/glob.js";

describe("matchesGlob", () => {
  it("matches exact names only without wildcards", () => {
    expect(matchesGlob("add", "add")).toBe(true);
    expect(matchesGlob("add_numbers", "add")).toBe(false);
  });

  it("treats * as any run of characters", () => {
    expect(matchesGlob("weather_current", "weather_*")).toBe(true);
    expect(matchesGlob("weather_", "weather_*")).toBe(true);
    expect(matchesGlob("get_weather", "weather_*")).toBe(false);
    expect(matchesGlob("", "*")).toBe(true);
  });

  it("treats ? as exactly one character", () => {
    expect(matchesGlob("log2", "log?")).toBe(true);
    expect(matchesGlob("log", "log?")).toBe(false);
    expect(matchesGlob("log10", "log?")).toBe(false);
  });

  it("escapes regex metacharacters", () => {
    expect(globToRegExp("a.b").source).toBe("^a\\.b$");
    expect(matchesGlob("a_b", "a.b")).toBe(false);
    expect(matchesGlob("fn(x)", "fn(x)")).toBe(true);
  });
});

describe("matchesAnyGlob", () => {
  it("is true when one pattern matches", () => {
    expect(matchesAnyGlob("divide", ["add", "div*"])).toBe(true);
  });

  it("is false for no patterns", () => {
    expect(matchesAnyGlob("divide", [])).toBe(false);
  });
});

describe("compileToolFilter", () => {
  it("admits everything without config", () => {
    expect(compileToolFilter()("anything")).toBe(true);
  });

  it("lets blocked win over allowed", () => {
    const admits = compileToolFilter({ allowed: ["math_*"], blocked: ["math_divide"] });
    expect(admits("math_add")).toBe(true);
    expect(admits("math_divide")).toBe(false);
    expect(admits("weather")).toBe(false);
  });
});

describe("filterTools", () => {
  const tools = [
    { name: "add" },
    { name: "subtract" },
    { name: "get_weather" },
    { name: "delete_all" },
  ];

  it("returns the same array without config", () => {
    expect(filterTools(tools)).toBe(tools);
  });

  it("keeps only allowed names", () => {
    expect(filterTools(tools, { allowed: ["add", "sub*"] }).map(t => t.name))
      .toEqual(["add", "subtract"]);
  });

  it("drops blocked names and keeps order", () => {
    expect(filterTools(tools, { blocked: ["delete_*"] }).map(t => t.name))
      .toEqual(["add", "subtract", "get_weather"]);
  });

  it("returns nothing when allowed matches nothing", () => {
    expect(filterTools(tools, { allowed: ["missing_*"] })).toEqual([]);
  });
});

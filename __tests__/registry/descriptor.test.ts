import { describe, expect, it } from "vitest";
import { createToolDescriptor, parseParameters } from "../../src/registry/descriptor.js";

describe("parseParameters", () => {
  it("reads types, required flags, descriptions and enums", () => {
    expect(
      parseParameters({
        type: "object",
        properties: {
          a: { type: "number", description: "First operand" },
          unit: { type: "string", enum: ["celsius", "fahrenheit", 3, null] },
          count: { type: ["integer", "null"] },
          meta: {},
        },
        required: ["a", "unit"],
      }),
    ).toEqual({
      a: { type: "number", required: true, description: "First operand" },
      unit: { type: "string", required: true, enum: ["celsius", "fahrenheit", 3] },
      count: { type: "integer", required: false },
      meta: { type: "any", required: false },
    });
  });

  it("adds required names that have no declared property", () => {
    expect(parseParameters({ type: "object", required: ["city", 7] })).toEqual({
      city: { type: "any", required: true },
    });
  });

  it("tolerates schemas without properties", () => {
    expect(parseParameters({ type: "object" })).toEqual({});
    expect(parseParameters({ properties: "nonsense" })).toEqual({});
  });
});

describe("createToolDescriptor", () => {
  it("builds a frozen descriptor owned by the server", () => {
    const descriptor = createToolDescriptor("calc", {
      name: "add",
      description: "Add two numbers",
      inputSchema: {
        type: "object",
        properties: { a: { type: "number" }, b: { type: "number" } },
        required: ["a", "b"],
        additionalProperties: false,
      },
    });

    expect(descriptor.name).toBe("add");
    expect(descriptor.serverId).toBe("calc");
    expect(descriptor.description).toBe("Add two numbers");
    expect(descriptor.allowsExtraArguments).toBe(false);
    expect(Object.keys(descriptor.parameters)).toEqual(["a", "b"]);
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.parameters)).toBe(true);
  });

  it("defaults the description and allows extra arguments", () => {
    const descriptor = createToolDescriptor("weather", {
      name: "forecast",
      inputSchema: { type: "object" },
    });
    expect(descriptor.description).toBe("");
    expect(descriptor.allowsExtraArguments).toBe(true);
  });
});

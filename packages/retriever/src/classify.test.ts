import { describe, expect, it } from "vitest";
import { classifyQuery } from "./classify";

describe("classifyQuery", () => {
  it("finds the id in a question", () => {
    expect(classifyQuery("What is the premium for policy POL001?")).toBe("POL001");
  });

  it("is case-insensitive and returns the upper-case id", () => {
    expect(classifyQuery("renewal date of pol042 please")).toBe("POL042");
  });

  it("returns only the first id", () => {
    expect(classifyQuery("compare POL007 with POL003")).toBe("POL007");
  });

  it("needs three digits after POL", () => {
    expect(classifyQuery("policy POL12")).toBeNull();
  });

  it("reads the first three digits of a longer number", () => {
    expect(classifyQuery("policy POL0012")).toBe("POL001");
  });

  it("returns null for general questions and greetings", () => {
    expect(classifyQuery("Tell me about auto insurance")).toBeNull();
    expect(classifyQuery("hi")).toBeNull();
  });
});

import { describe, expect, test } from "vitest";
import { gcContent, mean } from "../../../src/operations/core/calculations";

describe("gcContent", () => {
  test("counts G and C over A/C/G/T/U", () => {
    expect(gcContent("AUCG")).toBe(50);
    expect(gcContent("ggcc")).toBe(100);
    expect(gcContent("ATTA")).toBe(0);
  });

  test("ignores other characters", () => {
    expect(gcContent("GCNN--")).toBe(100);
  });

  test("is zero without countable bases", () => {
    expect(gcContent("")).toBe(0);
    expect(gcContent("NNN")).toBe(0);
  });
});

describe("mean", () => {
  test("averages values", () => {
    expect(mean([2, 4, 9])).toBe(5);
  });

  test("is zero for an empty list", () => {
    expect(mean([])).toBe(0);
  });
});

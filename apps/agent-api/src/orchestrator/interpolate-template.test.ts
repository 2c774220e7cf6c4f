import { describe, expect, it } from "vitest";
import { collectTemplateTokens, interpolateTemplate } from "./interpolate-template.js";

describe("interpolateTemplate", () => {
  it("fills every occurrence of a slot", () => {
    expect(interpolateTemplate("You are a {{role}}. As a {{ role }}, answer.", { role: "critic" })).toBe(
      "You are a critic. As a critic, answer.",
    );
  });

  it("renders missing slots as empty strings", () => {
    expect(interpolateTemplate("Task: {{task}}|Input: {{input_text}}", { task: "sum" })).toBe(
      "Task: sum|Input: ",
    );
  });

  it("prefers supplied values over defaults", () => {
    expect(
      interpolateTemplate("{{a}}-{{b}}", { a: "given" }, { a: "fallback-a", b: "fallback-b" }),
    ).toBe("given-fallback-b");
  });

  it("ignores inherited object members for missing slots", () => {
    expect(interpolateTemplate("[{{constructor}}][{{toString}}][{{valueOf}}]", {})).toBe("[][][]");
    expect(interpolateTemplate("[{{constructor}}]", {}, {})).toBe("[]");
  });

  it("does not expand placeholders inside values", () => {
    expect(interpolateTemplate("{{a}} {{b}}", { a: "{{b}}", b: "x" })).toBe("{{b}} x");
  });
});

describe("collectTemplateTokens", () => {
  it("lists distinct slot names in order of first use", () => {
    expect(collectTemplateTokens("{{ genre }} {{style}} {{genre}}")).toEqual(["genre", "style"]);
  });
});

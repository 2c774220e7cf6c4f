import { describe, expect, it } from "vitest";
import { extractClearerLabel, extractComplexityLabel } from "./labels.js";

describe("extractClearerLabel", () => {
  it("finds prompt A", () => {
    expect(extractClearerLabel("I think Prompt A is clearer")).toBe("A");
  });

  it("prefers A whenever both prompts are named", () => {
    expect(extractClearerLabel("Prompt B wins, but Prompt A is also decent")).toBe("A");
  });

  it("finds prompt B when A is not named", () => {
    expect(extractClearerLabel("PROMPT B is clearer")).toBe("B");
  });

  it("reports Unclear otherwise", () => {
    expect(extractClearerLabel("no clear winner")).toBe("Unclear");
  });
});

describe("extractComplexityLabel", () => {
  it("uses keyword order to break ties", () => {
    expect(extractComplexityLabel("This is a simple yet complex task")).toBe("Simple");
  });

  it("title-cases the keyword found", () => {
    expect(extractComplexityLabel("The risk is HIGH")).toBe("High");
  });

  it("matches keywords inside longer words", () => {
    expect(extractComplexityLabel("Plan a follow-up")).toBe("Low");
  });

  it("defaults to Moderate", () => {
    expect(extractComplexityLabel("nothing relevant")).toBe("Moderate");
  });
});

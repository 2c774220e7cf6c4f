import { describe, expect, it } from "vitest";
import { extractRecommendations, extractSuggestions } from "./lines.js";

describe("extractSuggestions", () => {
  it("keeps matching lines in order, once each, trimmed", () => {
    const text = [
      "Intro line",
      "I suggest adding context.",
      "Nothing here",
      "  Consider a better example.  ",
      "I suggest adding context.",
    ].join("\n");

    expect(extractSuggestions(text)).toEqual([
      "I suggest adding context.",
      "Consider a better example.",
      "I suggest adding context.",
    ]);
  });

  it("matches keywords case-insensitively", () => {
    expect(extractSuggestions("IMPROVE the opening")).toEqual(["IMPROVE the opening"]);
  });

  it("returns an empty list when no line qualifies", () => {
    expect(extractSuggestions("Looks fine.\nShip it.")).toEqual([]);
  });
});

describe("extractRecommendations", () => {
  it("uses its own keyword set", () => {
    const text = "We recommend X\nConsider Y\nThis would improve Z";

    expect(extractRecommendations(text)).toEqual(["We recommend X", "This would improve Z"]);
  });
});

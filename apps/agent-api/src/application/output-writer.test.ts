import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { formatSessionOutput, outputFileName, writeSessionOutput } from "./output-writer.js";

describe("outputFileName", () => {
  it("lowercases the category and replaces spaces", () => {
    expect(outputFileName("Code Testing & Test Cases")).toBe(
      "software_house_output_code_testing_&_test_cases.txt",
    );
  });
});

describe("formatSessionOutput", () => {
  it("writes text results as they are", () => {
    expect(formatSessionOutput({ category: "Custom Task", prompt: "Help", result: "Sure" })).toBe(
      "Category: Custom Task\nPrompt: Help\nResponse: Sure\n",
    );
  });

  it("pretty-prints structured results", () => {
    const text = formatSessionOutput({
      category: "Custom Task",
      prompt: "Compare",
      result: { comparison: "c", clearerPrompt: "B", recommendations: [] },
    });

    expect(text).toBe(
      'Category: Custom Task\nPrompt: Compare\nResponse: {\n  "comparison": "c",\n  "clearerPrompt": "B",\n  "recommendations": []\n}\n',
    );
  });
});

describe("writeSessionOutput", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("creates the directory and overwrites earlier output for the category", async () => {
    dir = await mkdtemp(join(tmpdir(), "promptsmith-"));
    const outputDir = join(dir, "nested");

    await writeSessionOutput(outputDir, { category: "Custom Task", prompt: "one", result: "1" });
    const path = await writeSessionOutput(outputDir, {
      category: "Custom Task",
      prompt: "two",
      result: "2",
    });

    expect(path).toBe(join(outputDir, "software_house_output_custom_task.txt"));
    await expect(readFile(path, "utf8")).resolves.toBe(
      "Category: Custom Task\nPrompt: two\nResponse: 2\n",
    );
  });
});

import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { ExtractedResult } from "@promptsmith/contracts";

export type SessionResult = string | ExtractedResult;

export interface SessionOutput {
  category: string;
  prompt: string;
  result: SessionResult;
}

export function outputFileName(category: string): string {
  const slug = category.toLowerCase().replace(/ /g, "_");
  return `software_house_output_${slug}.txt`;
}

export function formatSessionOutput(output: SessionOutput): string {
  const response =
    typeof output.result === "string" ? output.result : JSON.stringify(output.result, null, 2);
  return `Category: ${output.category}\nPrompt: ${output.prompt}\nResponse: ${response}\n`;
}

/**
 * Writes the human-readable dump of one session and returns its path.
 * An existing file for the same category is overwritten.
 */
export async function writeSessionOutput(
  outputDir: string,
  output: SessionOutput,
): Promise<string> {
  const dir = resolve(outputDir);
  await mkdir(dir, { recursive: true });
  const path = join(dir, outputFileName(output.category));
  await writeFile(path, formatSessionOutput(output), "utf8");
  return path;
}

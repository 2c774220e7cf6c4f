import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parseArgs } from "node:util";
import { parseSlotArgs } from "./cli-args.js";
import { loadConfig } from "./config.js";
import { createDefaultCatalog } from "./domain/template-catalog.js";
import { createServices } from "./services.js";

export const USAGE = [
  "Usage:",
  "  promptsmith templates",
  "  promptsmith render <template> [slot=value ...]",
  "  promptsmith complete <template> [slot=value ...] [--out <file>]",
].join("\n");

export class CliUsageError extends Error {
  constructor() {
    super(USAGE);
    this.name = "CliUsageError";
  }
}

/**
 * Runs one CLI command and returns what it prints. Only `complete` reads the
 * model configuration.
 */
export async function runCli(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<string> {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      out: { type: "string" },
    },
  });

  const [command, templateName, ...rest] = positionals;
  const catalog = createDefaultCatalog();

  if (command === "templates") {
    return catalog
      .list()
      .map((template) => `${template.name}\t${template.description}`)
      .join("\n");
  }

  if (templateName === undefined || (command !== "render" && command !== "complete")) {
    throw new CliUsageError();
  }

  const prompt = catalog.render(templateName, parseSlotArgs(rest));
  if (command === "render") {
    return prompt;
  }

  const services = await createServices(loadConfig(env), { catalog });
  const response = await services.client.complete(prompt);
  if (values.out === undefined) {
    return response;
  }

  const outputPath = resolve(values.out);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, response, "utf8");
  return `Wrote response to ${outputPath}`;
}

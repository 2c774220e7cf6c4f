import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CliUsageError, runCli } from "./cli-commands.js";
import { ConfigError } from "./errors.js";
import { MockProvider } from "./infrastructure/providers/mock-provider.js";

describe("runCli", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("lists templates without any model configuration", async () => {
    const output = await runCli(["templates"], {});

    expect(output.split("\n")[0]).toBe("zero_shot\tPlain task and input with no examples.");
    expect(output.split("\n")).toHaveLength(20);
  });

  it("renders templates without any model configuration", async () => {
    await expect(runCli(["render", "zero_shot", "task=Translate"], {})).resolves.toBe(
      "Task: Translate\n\nInput: \n\nPlease provide a response:",
    );
  });

  it("needs a valid configuration to complete", async () => {
    await expect(runCli(["complete", "zero_shot", "task=Translate"], {})).rejects.toThrow(
      ConfigError,
    );
  });

  it("writes completions to --out", async () => {
    dir = await mkdtemp(join(tmpdir(), "promptsmith-cli-"));
    const outputPath = join(dir, "reply.txt");

    const output = await runCli(
      ["complete", "zero_shot", "task=Translate", "--out", outputPath],
      { LLM_PROVIDER: "mock", LOG_LEVEL: "silent" },
    );

    expect(output).toBe(`Wrote response to ${outputPath}`);
    await expect(readFile(outputPath, "utf8")).resolves.toBe(MockProvider.DEFAULT_REPLY);
  });

  it("rejects unknown commands and missing template names", async () => {
    await expect(runCli([], {})).rejects.toThrow(CliUsageError);
    await expect(runCli(["render"], {})).rejects.toThrow(CliUsageError);
    await expect(runCli(["publish", "zero_shot"], {})).rejects.toThrow(CliUsageError);
  });
});

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { createProgram, runGenerateCommand } from "../../server/cli/program.js";
import type { CliIo, CliOptions } from "../../server/cli/program.js";
import { renderCrewAI } from "../../server/renderers/crewai.js";
import { createConfiguration, createResearchDraft, RESEARCH_COMPLETION } from "../helpers/configurationFixtures.js";
import { createFakeCompletionClient } from "../helpers/fakeCompletionClient.js";
import type { FakeCompletionClient, ScriptedReply } from "../helpers/fakeCompletionClient.js";

const DEFAULT_OPTIONS: CliOptions = { framework: "crewai", process: "auto", format: "code" };

function createIo(replies: ScriptedReply[] | null): {
  io: CliIo;
  stdout: string[];
  stderr: string[];
  client: FakeCompletionClient;
} {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const client = createFakeCompletionClient(replies ?? []);
  const io: CliIo = {
    env: {},
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    ...(replies ? { resolveClient: () => client } : {})
  };
  return { io, stdout, stderr, client };
}

describe("CLI", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it("prints the generated code", async () => {
    const { io, stdout, stderr } = createIo([RESEARCH_COMPLETION]);

    const exitCode = await runGenerateCommand("Summarize recent papers", DEFAULT_OPTIONS, io);

    expect(exitCode).toBe(0);
    expect(stdout).toEqual([renderCrewAI(createConfiguration(createResearchDraft()))]);
    expect(stderr).toEqual([]);
  });

  it("writes the artifact to the output file", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "agentloom-cli-"));
    tempDirs.push(dir);
    const outputPath = path.join(dir, "workflow.py");
    const { io, stdout } = createIo([RESEARCH_COMPLETION]);

    const exitCode = await runGenerateCommand(
      "Summarize recent papers",
      { ...DEFAULT_OPTIONS, format: "both", output: outputPath },
      io
    );

    const written = await readFile(outputPath, "utf8");
    expect(exitCode).toBe(0);
    expect(stdout).toEqual([`Output written to ${outputPath}\n`]);
    expect(written.startsWith("# Configuration:\n# {\n")).toBe(true);
    expect(written.endsWith(renderCrewAI(createConfiguration(createResearchDraft())))).toBe(true);
  });

  it("lists validation issues and exits with 1", async () => {
    const completion = JSON.stringify({
      agents: [{ name: "researcher", role: "Research Specialist", goal: "Find sources" }],
      tasks: [{ name: "edit", description: "Edit the draft", expectedOutput: "Edited text", assignedAgent: "editor" }]
    });
    const { io, stdout, stderr } = createIo([completion, completion]);

    const exitCode = await runGenerateCommand("Edit my essay", DEFAULT_OPTIONS, io);

    expect(exitCode).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      'Error [validation_failed]: Configuration failed validation with 1 issue(s): tasks[0].assignedAgent: Task "edit" is assigned to agent "editor", which is not declared.\n',
      '  - tasks[0].assignedAgent (unresolved_reference): Task "edit" is assigned to agent "editor", which is not declared.\n'
    ]);
  });

  it("reports a provider without credentials", async () => {
    const { io, stderr } = createIo(null);

    const exitCode = await runGenerateCommand("Summarize recent papers", DEFAULT_OPTIONS, io);

    expect(exitCode).toBe(1);
    expect(stderr).toEqual(["Error [provider_error]: openai is not configured: an API key is required.\n"]);
  });

  it("reports an unknown provider", async () => {
    const { io, stderr } = createIo(null);

    await runGenerateCommand("Summarize recent papers", { ...DEFAULT_OPTIONS, provider: "mistral" }, io);

    expect(stderr).toEqual([
      'Error [provider_error]: Unknown provider "mistral". Expected one of openai, claude, watsonx, ollama.\n'
    ]);
  });

  it("logs pipeline progress and notes when verbose", async () => {
    const { io, stderr } = createIo([RESEARCH_COMPLETION]);

    await runGenerateCommand("Summarize recent papers", { ...DEFAULT_OPTIONS, verbose: true }, io);

    expect(stderr[0]).toBe("[generate] state=building\n");
    expect(stderr).toContain("[generate] state=done\n");
    expect(stderr[stderr.length - 1].startsWith("[note] Heuristic chose sequential")).toBe(true);
  });

  it("parses command line options into a generation request", async () => {
    const { io, stdout, client } = createIo([RESEARCH_COMPLETION]);
    const exitCodes: number[] = [];

    await createProgram(io, (code) => exitCodes.push(code)).parseAsync(
      [
        "Summarize recent papers",
        "--framework",
        "crewai-flow",
        "--process",
        "sequential",
        "--format",
        "json",
        "--temperature",
        "0.3",
        "--max-tokens",
        "900",
        "--workflow-step",
        "Gather sources",
        "Write summary"
      ],
      { from: "user" }
    );

    expect(exitCodes).toEqual([0]);
    expect(client.calls[0]).toMatchObject({ temperature: 0.3, maxTokens: 900 });
    expect(client.prompts[0]).toContain("1. Gather sources\n2. Write summary");
    expect(stdout[0]).toContain('"name": "gather_sources"');
  });

  it("rejects an unknown output format", async () => {
    const { io } = createIo([]);
    const program = createProgram(io, () => undefined)
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    await expect(program.parseAsync(["Summarize", "--format", "yaml"], { from: "user" })).rejects.toMatchObject({
      code: "commander.invalidArgument"
    });
  });
});

import { Command, InvalidArgumentError, Option } from "commander";
import { writeFile } from "node:fs/promises";
import { PipelineError, ValidationFailure } from "../generator/errors.js";
import { formatArtifact, generate } from "../generator/pipeline.js";
import { resolveCompletionClient } from "../providers.js";
import type { CompletionClient } from "../providers/types.js";
import { resolveRuntimeConfig } from "../runtime/config.js";
import type { OutputFormat, ProcessChoice } from "../types/contracts.js";
import { TARGET_FRAMEWORKS } from "../types/contracts.js";

export interface CliOptions {
  framework: string;
  provider?: string;
  process: ProcessChoice;
  format: OutputFormat;
  output?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  workflowStep?: string[];
  verbose?: boolean;
}

export interface CliIo {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Overrides provider lookup; used to run the CLI against a scripted client. */
  resolveClient?: (providerId: string) => CompletionClient;
}

function parseNumberOption(value: string): number {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Expected a number.");
  }
  return parsed;
}

function parseIntegerOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function reportFailure(error: unknown, io: CliIo): void {
  if (error instanceof PipelineError) {
    io.stderr(`Error [${error.code}]: ${error.message}\n`);
    if (error instanceof ValidationFailure) {
      for (const issue of error.issues) {
        io.stderr(`  - ${issue.path} (${issue.rule}): ${issue.message}\n`);
      }
    }
    return;
  }

  io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
}

/**
 * Runs one generation for the parsed command line and returns the process exit code.
 */
export async function runGenerateCommand(prompt: string, options: CliOptions, io: CliIo): Promise<number> {
  try {
    const config = resolveRuntimeConfig(io.env);
    const providerId = options.provider ?? config.generation.provider;
    const resolveClient = io.resolveClient ?? ((id: string) => resolveCompletionClient(id, config.providers));
    const log = options.verbose ? (message: string) => io.stderr(`${message}\n`) : undefined;

    const result = await generate(
      {
        prompt,
        framework: options.framework,
        provider: providerId,
        processType: options.process,
        outputFormat: options.format,
        model: options.model,
        temperature: options.temperature ?? config.generation.temperature,
        maxTokens: options.maxTokens ?? config.generation.maxTokens,
        workflowSteps: options.workflowStep
      },
      {
        resolveClient,
        maxAttempts: config.generation.maxAttempts,
        maxRateLimitRetries: config.generation.maxRateLimitRetries,
        completionTimeoutMs: config.generation.completionTimeoutMs,
        log: log ? (message) => log(`[generate] ${message}`) : undefined
      }
    );

    if (options.verbose) {
      for (const note of result.notes) {
        io.stderr(`[note] ${note}\n`);
      }
    }

    const artifact = formatArtifact(result);
    if (options.output) {
      await writeFile(options.output, artifact, "utf8");
      io.stdout(`Output written to ${options.output}\n`);
    } else {
      io.stdout(artifact.endsWith("\n") ? artifact : `${artifact}\n`);
    }
    return 0;
  } catch (error) {
    reportFailure(error, io);
    return 1;
  }
}

export function createProgram(io: CliIo, onExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name("agentloom")
    .description("Generate multi-agent workflow code from a plain-language description")
    .argument("<prompt>", "Plain-language description of the workflow you need")
    .option("-f, --framework <framework>", `Target framework (${TARGET_FRAMEWORKS.join(", ")})`, "crewai")
    .option("-p, --provider <provider>", "Completion provider (openai, claude, watsonx, ollama)")
    .addOption(
      new Option("--process <type>", "Execution topology").choices(["sequential", "hierarchical", "auto"]).default("auto")
    )
    .addOption(new Option("--format <format>", "Output format").choices(["code", "json", "both"]).default("code"))
    .option("-o, --output <file>", "Output file path (default: print to console)")
    .option("-m, --model <model>", "Model identifier for the provider")
    .option("--temperature <number>", "Sampling temperature", parseNumberOption)
    .option("--max-tokens <number>", "Completion token limit", parseIntegerOption)
    .option("--workflow-step <step...>", "Ordered workflow steps (crewai-flow)")
    .option("-v, --verbose", "Log pipeline progress to stderr")
    .action(async (prompt: string, options: CliOptions) => {
      onExitCode(await runGenerateCommand(prompt, options, io));
    });

  return program;
}

import { afterEach, describe, expect, it, vi } from "vitest";

import type { GenerationStateChange } from "../../server/generator/contracts.js";
import {
  NoJsonFoundError,
  ProviderError,
  RateLimitedError,
  UnsupportedFrameworkError
} from "../../server/generator/errors.js";
import { formatArtifact, generate } from "../../server/generator/pipeline.js";
import { resolveCompletionClient } from "../../server/providers.js";
import { renderCrewAI } from "../../server/renderers/crewai.js";
import { resolveProviderSettings } from "../../server/runtime/config.js";
import { createFakeCompletionClient } from "../helpers/fakeCompletionClient.js";
import { createConfiguration, createResearchDraft, RESEARCH_COMPLETION } from "../helpers/configurationFixtures.js";

const RESEARCH_REQUEST = {
  prompt: "Summarize recent papers on battery recycling",
  framework: "crewai",
  provider: "openai"
};

describe("Generation Pipeline", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("generates a sequential crew from a single completion", async () => {
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);

    const result = await generate(RESEARCH_REQUEST, { resolveClient: () => client, createRequestId: () => "req-1" });

    expect(result.requestId).toBe("req-1");
    expect(result.framework).toBe("crewai");
    expect(result.processType).toBe("sequential");
    expect(result.processDecision.source).toBe("heuristic");
    expect(result.attempts).toBe(1);
    expect(result.states).toEqual(["building", "awaiting_completion", "parsing", "selecting", "rendering", "done"]);
    expect(result.notes).toEqual([result.processDecision.rationale]);
    expect(result.code).toBe(renderCrewAI(createConfiguration(createResearchDraft())));
    expect(result.configuration).toBeUndefined();
    expect(client.prompts).toHaveLength(1);
    expect(client.prompts[0].endsWith("Request:\nSummarize recent papers on battery recycling")).toBe(true);
  });

  it("resolves the completion client for the requested provider", async () => {
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);
    const resolveClient = vi.fn(() => client);

    await generate({ ...RESEARCH_REQUEST, provider: "claude" }, { resolveClient });

    expect(resolveClient).toHaveBeenCalledTimes(1);
    expect(resolveClient).toHaveBeenCalledWith("claude");
  });

  it("fails while building when the provider is unknown", async () => {
    const changes: GenerationStateChange[] = [];

    await expect(
      generate(
        { ...RESEARCH_REQUEST, provider: "no-such-provider" },
        {
          resolveClient: (providerId) => resolveCompletionClient(providerId, resolveProviderSettings({})),
          onStateChange: (change) => changes.push(change)
        }
      )
    ).rejects.toMatchObject({
      name: "ProviderError",
      message: 'Unknown provider "no-such-provider". Expected one of openai, claude, watsonx, ollama.'
    });

    expect(changes).toEqual([
      { state: "building", attempt: 0 },
      { state: "failed", attempt: 0, detail: "provider_error" }
    ]);
  });

  it("passes completion options through to the client", async () => {
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);

    await generate(
      { ...RESEARCH_REQUEST, model: "gpt-4o", temperature: 0.2, maxTokens: 1200 },
      { resolveClient: () => client, completionTimeoutMs: 5000 }
    );

    expect(client.calls[0]).toMatchObject({ model: "gpt-4o", temperature: 0.2, maxTokens: 1200, timeoutMs: 5000 });
  });

  it("re-prompts with corrective guidance after an unusable completion", async () => {
    const client = createFakeCompletionClient(["I am not able to produce that.", RESEARCH_COMPLETION]);

    const result = await generate(RESEARCH_REQUEST, { resolveClient: () => client });

    expect(result.attempts).toBe(2);
    expect(result.states).toEqual([
      "building",
      "awaiting_completion",
      "parsing",
      "awaiting_completion",
      "parsing",
      "selecting",
      "rendering",
      "done"
    ]);
    expect(result.notes[0]).toBe("Attempt 1 was rejected (no_json_found) and re-prompted.");
    expect(client.prompts[1].startsWith(client.prompts[0])).toBe(true);
    expect(client.prompts[1].split("\n")).toContain("Previous output did not contain a JSON object.");
    expect(client.prompts[1].endsWith("Rejected previous output:\nI am not able to produce that.")).toBe(true);
  });

  it("fails with the last parse error once attempts run out", async () => {
    const client = createFakeCompletionClient(["no json here", "still no json"]);
    const changes: GenerationStateChange[] = [];

    await expect(
      generate(RESEARCH_REQUEST, { resolveClient: () => client, onStateChange: (change) => changes.push(change) })
    ).rejects.toBeInstanceOf(NoJsonFoundError);

    expect(client.prompts).toHaveLength(2);
    expect(changes[changes.length - 1]).toEqual({ state: "failed", attempt: 2, detail: "no_json_found" });
  });

  it("waits out a rate limit without consuming an attempt", async () => {
    const client = createFakeCompletionClient([
      new RateLimitedError({ providerId: "openai", retryAfterMs: 0 }),
      RESEARCH_COMPLETION
    ]);
    const changes: GenerationStateChange[] = [];

    const result = await generate(RESEARCH_REQUEST, {
      resolveClient: () => client,
      onStateChange: (change) => changes.push(change)
    });

    expect(result.attempts).toBe(1);
    expect(result.notes[0]).toBe("Waited 0ms after a rate limit response.");
    expect(changes.filter((change) => change.state === "awaiting_completion").map((change) => change.detail)).toEqual([
      "attempt 1/2",
      "attempt 1/2"
    ]);
  });

  it("backs off exponentially when the provider gives no Retry-After", async () => {
    vi.useFakeTimers();
    const client = createFakeCompletionClient([
      new RateLimitedError({ providerId: "openai", retryAfterMs: null }),
      RESEARCH_COMPLETION
    ]);

    const pending = generate(RESEARCH_REQUEST, { resolveClient: () => client, random: () => 0 });
    await vi.advanceTimersByTimeAsync(999);
    expect(client.prompts).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    const result = await pending;

    expect(client.prompts).toHaveLength(2);
    expect(result.notes[0]).toBe("Waited 1000ms after a rate limit response.");
  });

  it("gives up after the configured number of rate limit waits", async () => {
    const rateLimited = new RateLimitedError({ providerId: "openai", retryAfterMs: 0 });
    const client = createFakeCompletionClient([rateLimited, rateLimited]);

    await expect(
      generate(RESEARCH_REQUEST, { resolveClient: () => client, maxRateLimitRetries: 1 })
    ).rejects.toBe(rateLimited);
    expect(client.prompts).toHaveLength(2);
  });

  it("does not retry a terminal provider error", async () => {
    const failure = new ProviderError({ providerId: "openai", message: "OpenAI request failed (401): bad key", statusCode: 401 });
    const client = createFakeCompletionClient([failure]);

    await expect(generate(RESEARCH_REQUEST, { resolveClient: () => client })).rejects.toBe(failure);
    expect(client.prompts).toHaveLength(1);
  });

  it("honors an explicit process type without running the selector", async () => {
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);

    const result = await generate(
      { ...RESEARCH_REQUEST, processType: "hierarchical" },
      { resolveClient: () => client }
    );

    expect(result.states).not.toContain("selecting");
    expect(result.processDecision).toEqual({
      processType: "hierarchical",
      source: "explicit",
      rationale: "Process type hierarchical was requested explicitly."
    });
    expect(result.code?.split("\n")).toContain('MANAGER_AGENT = "researcher"');
    expect(client.prompts[0].split("\n")).toContain('Set "processType" to "hierarchical". This is fixed by the caller.');
  });

  it("re-prompts when a hierarchical crew has no subordinate", async () => {
    const soloCompletion = JSON.stringify({
      agents: [{ name: "solo", role: "Researcher", goal: "Find sources" }],
      tasks: [{ name: "t", description: "D", expectedOutput: "O", assignedAgent: "solo" }]
    });
    const client = createFakeCompletionClient([soloCompletion, RESEARCH_COMPLETION]);

    const result = await generate(
      { ...RESEARCH_REQUEST, processType: "hierarchical" },
      { resolveClient: () => client }
    );

    expect(result.attempts).toBe(2);
    expect(result.states).toEqual([
      "building",
      "awaiting_completion",
      "parsing",
      "awaiting_completion",
      "parsing",
      "rendering",
      "done"
    ]);
    expect(result.notes[0]).toBe("Attempt 1 was rejected (validation_failed) and re-prompted.");
    expect(client.prompts[1].split("\n")).toContain(
      '- agents: A hierarchical process needs at least one agent besides the manager "solo".'
    );
  });

  it("returns the configuration alone for the json format", async () => {
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);

    const result = await generate({ ...RESEARCH_REQUEST, outputFormat: "json" }, { resolveClient: () => client });

    expect(result.code).toBeUndefined();
    expect(result.configuration?.agents.map((agent) => agent.name)).toEqual(["researcher", "writer"]);
    expect(formatArtifact(result)).toBe(`${JSON.stringify(result.configuration, null, 2)}\n`);
  });

  it("prefixes the code with the configuration as comments for the both format", async () => {
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);

    const result = await generate({ ...RESEARCH_REQUEST, outputFormat: "both" }, { resolveClient: () => client });
    const artifact = formatArtifact(result);

    expect(artifact.startsWith('# Configuration:\n# {\n#   "targetFramework": "crewai",\n')).toBe(true);
    expect(artifact.endsWith(`\n# }\n\n# Generated code:\n${result.code}`)).toBe(true);
  });

  it("rejects an unknown framework before asking for a completion", async () => {
    const client = createFakeCompletionClient([]);

    await expect(
      generate({ ...RESEARCH_REQUEST, framework: "autogen" }, { resolveClient: () => client })
    ).rejects.toBeInstanceOf(UnsupportedFrameworkError);
    expect(client.prompts).toHaveLength(0);
  });

  it("normalizes the framework name", async () => {
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);

    const result = await generate({ ...RESEARCH_REQUEST, framework: " CrewAI " }, { resolveClient: () => client });

    expect(result.framework).toBe("crewai");
  });

  it("stops before the completion when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);

    await expect(
      generate(RESEARCH_REQUEST, { resolveClient: () => client, signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError", message: "Generation aborted." });
    expect(client.prompts).toHaveLength(0);
  });

  it("aligns flow tasks to the requested workflow steps", async () => {
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);

    const result = await generate(
      {
        ...RESEARCH_REQUEST,
        framework: "crewai-flow",
        outputFormat: "json",
        workflowSteps: ["1. Gather sources", "2. Write summary", "3. Review draft"]
      },
      { resolveClient: () => client }
    );

    expect(result.configuration?.tasks.map((task) => [task.name, task.assignedAgent, task.dependsOn])).toEqual([
      ["gather_sources", "researcher", []],
      ["write_summary", "writer", ["gather_sources"]],
      ["review_draft", "researcher", []]
    ]);
    expect(result.configuration?.tasks[2].description).toBe("Execute the 'Review draft' step");
    expect(result.notes).toContain("Aligned tasks to 3 workflow step(s).");
    expect(client.prompts[0]).toContain("1. Gather sources\n2. Write summary\n3. Review draft");
  });

  it("ignores workflow steps for frameworks other than the flow", async () => {
    const client = createFakeCompletionClient([RESEARCH_COMPLETION]);

    const result = await generate(
      { ...RESEARCH_REQUEST, workflowSteps: ["Gather sources"] },
      { resolveClient: () => client }
    );

    expect(client.prompts[0]).not.toContain("Workflow steps");
    expect(result.notes).not.toContain("Aligned tasks to 1 workflow step(s).");
  });
});

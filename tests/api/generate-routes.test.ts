import { describe, expect, it, vi } from "vitest";

import { ProviderError, RateLimitedError } from "../../server/generator/errors.js";
import { registerGenerateRoutes } from "../../server/http/routes/generate.js";
import type { GenerateRouteDependencies } from "../../server/http/routes/generate.js";
import type { CompletionClient } from "../../server/providers/types.js";
import { renderCrewAI } from "../../server/renderers/crewai.js";
import { createConfiguration, createResearchDraft, RESEARCH_COMPLETION } from "../helpers/configurationFixtures.js";
import { createFakeCompletionClient } from "../helpers/fakeCompletionClient.js";
import type { ScriptedReply } from "../helpers/fakeCompletionClient.js";
import { createRouteHarness, invokeRoute } from "../helpers/routeHarness.js";

const UNRESOLVED_AGENT_COMPLETION = JSON.stringify({
  agents: [{ name: "researcher", role: "Research Specialist", goal: "Find sources" }],
  tasks: [{ name: "edit", description: "Edit the draft", expectedOutput: "Edited text", assignedAgent: "editor" }]
});

function setup(resolveClient: (providerId: string) => CompletionClient) {
  const { app, route } = createRouteHarness();
  const deps: GenerateRouteDependencies = {
    defaults: {
      provider: "openai",
      temperature: 0.7,
      maxTokens: 4000,
      completionTimeoutMs: 120_000,
      maxAttempts: 2,
      maxRateLimitRetries: 0
    },
    resolveClient: vi.fn(resolveClient),
    log: vi.fn()
  };
  registerGenerateRoutes(app as never, deps);
  return { deps, handler: route("POST", "/api/generate") };
}

function withReplies(replies: ScriptedReply[]) {
  const client = createFakeCompletionClient(replies);
  return { client, ...setup(() => client) };
}

describe("Generate Routes", () => {
  it("returns the generated code and its artifact", async () => {
    const { client, deps, handler } = withReplies([RESEARCH_COMPLETION]);

    const response = await invokeRoute(handler, {
      method: "POST",
      path: "/api/generate",
      body: { prompt: "Summarize recent papers", framework: "crewai" }
    });

    const code = renderCrewAI(createConfiguration(createResearchDraft()));
    expect(response.statusCode).toBe(200);
    expect(response.body).toMatchObject({
      framework: "crewai",
      processType: "sequential",
      outputFormat: "code",
      attempts: 1,
      code,
      artifact: code
    });
    expect(deps.resolveClient).toHaveBeenCalledWith("openai");
    expect(client.calls[0]).toMatchObject({ temperature: 0.7, maxTokens: 4000, timeoutMs: 120_000 });
  });

  it("uses the requested provider and sampling options", async () => {
    const { client, deps, handler } = withReplies([RESEARCH_COMPLETION]);

    await invokeRoute(handler, {
      method: "POST",
      body: {
        prompt: "Summarize recent papers",
        framework: "crewai",
        provider: "claude",
        model: "claude-test",
        temperature: 0.1,
        maxTokens: 800
      }
    });

    expect(deps.resolveClient).toHaveBeenCalledWith("claude");
    expect(client.calls[0]).toMatchObject({ model: "claude-test", temperature: 0.1, maxTokens: 800 });
  });

  it("returns the configuration JSON as the artifact for the json format", async () => {
    const { handler } = withReplies([RESEARCH_COMPLETION]);

    const response = await invokeRoute(handler, {
      method: "POST",
      body: { prompt: "Summarize recent papers", framework: "crewai", outputFormat: "json" }
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).not.toHaveProperty("code");
    expect(response.body).toHaveProperty("configuration.agents.1.name", "writer");
    expect(response.body).toHaveProperty("artifact", expect.stringMatching(/^\{\n {2}"targetFramework": "crewai",/));
  });

  it("rejects an invalid body before calling a provider", async () => {
    const { client, handler } = withReplies([]);

    const response = await invokeRoute(handler, {
      method: "POST",
      body: { prompt: "   ", framework: "crewai", provider: "mistral" }
    });

    expect(response.statusCode).toBe(400);
    expect(response.body).toMatchObject({
      error: "Validation failed",
      details: [{ path: "prompt" }, { path: "provider" }]
    });
    expect(client.prompts).toHaveLength(0);
  });

  it("rejects an unsupported framework with 400", async () => {
    const { handler } = withReplies([]);

    const response = await invokeRoute(handler, {
      method: "POST",
      body: { prompt: "Summarize recent papers", framework: "autogen" }
    });

    expect(response.statusCode).toBe(400);
    expect(response.body).toEqual({
      error: 'Unsupported target framework "autogen".',
      code: "unsupported_framework",
      stage: "building"
    });
  });

  it("returns 422 with the issues when every attempt fails validation", async () => {
    const { handler } = withReplies([UNRESOLVED_AGENT_COMPLETION, UNRESOLVED_AGENT_COMPLETION]);

    const response = await invokeRoute(handler, {
      method: "POST",
      body: { prompt: "Edit my essay", framework: "crewai" }
    });

    expect(response.statusCode).toBe(422);
    expect(response.body).toMatchObject({
      code: "validation_failed",
      stage: "parsing",
      issues: [
        {
          path: "tasks[0].assignedAgent",
          rule: "unresolved_reference",
          message: 'Task "edit" is assigned to agent "editor", which is not declared.'
        }
      ]
    });
  });

  it("returns 422 when the model never answers with JSON", async () => {
    const { handler } = withReplies(["Sorry.", "Still sorry."]);

    const response = await invokeRoute(handler, {
      method: "POST",
      body: { prompt: "Edit my essay", framework: "react" }
    });

    expect(response.statusCode).toBe(422);
    expect(response.body).toMatchObject({ code: "no_json_found", stage: "parsing" });
  });

  it("returns 429 with Retry-After once rate limit retries are spent", async () => {
    const { handler } = withReplies([new RateLimitedError({ providerId: "openai", retryAfterMs: 12_500 })]);

    const response = await invokeRoute(handler, {
      method: "POST",
      body: { prompt: "Summarize recent papers", framework: "crewai" }
    });

    expect(response.statusCode).toBe(429);
    expect(response.getHeader("Retry-After")).toBe("13");
    expect(response.body).toEqual({
      error: "openai rate limit reached.",
      code: "rate_limited",
      stage: "awaiting_completion"
    });
  });

  it("returns 502 when the provider is not configured", async () => {
    const { handler } = setup((providerId) => {
      throw new ProviderError({ providerId, message: `${providerId} is not configured: an API key is required.` });
    });

    const response = await invokeRoute(handler, {
      method: "POST",
      body: { prompt: "Summarize recent papers", framework: "crewai", provider: "claude" }
    });

    expect(response.statusCode).toBe(502);
    expect(response.body).toEqual({
      error: "claude is not configured: an API key is required.",
      code: "provider_error",
      stage: "awaiting_completion",
      provider: "claude"
    });
  });

  it("answers an unexpected failure with 500", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { handler } = setup(() => {
      throw new Error("settings table missing");
    });

    const response = await invokeRoute(handler, {
      method: "POST",
      body: { prompt: "Summarize recent papers", framework: "crewai" }
    });

    expect(response.statusCode).toBe(500);
    expect(response.body).toEqual({ error: "settings table missing" });
    expect(consoleError).toHaveBeenCalledTimes(1);
  });
});

import { RateLimitedError, ProviderError } from "../../generator/errors.js";
import type { ProviderId } from "../../types/contracts.js";
import {
  extractAccessToken,
  extractClaudeText,
  extractOllamaText,
  extractOpenAIChatText,
  extractWatsonxText
} from "../normalizers.js";
import { parseRetryAfterMs } from "../retryPolicy.js";
import type { ProviderRequestInput } from "../types.js";

const WATSONX_API_VERSION = "2023-05-29";
const ANTHROPIC_VERSION = "2023-06-01";
const TOKEN_REFRESH_MARGIN_MS = 60_000;

const PROVIDER_LABELS: Record<ProviderId, string> = {
  openai: "OpenAI",
  claude: "Claude",
  watsonx: "watsonx",
  ollama: "Ollama"
};

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${path}`;
}

function resolveRequestId(headers: Headers): string | null {
  return headers.get("x-request-id") ?? headers.get("request-id") ?? headers.get("anthropic-request-id");
}

/**
 * POSTs and returns the decoded JSON body. Maps 429 to RateLimitedError and any
 * other non-2xx status to ProviderError. Network failures and aborts propagate
 * unchanged for the caller to classify.
 */
async function postJson(
  providerId: ProviderId,
  url: string,
  init: { headers: Record<string, string>; body: string; signal: AbortSignal },
  log?: (message: string) => void
): Promise<unknown> {
  const response = await fetch(url, {
    method: "POST",
    headers: init.headers,
    body: init.body,
    signal: init.signal
  });

  const requestId = resolveRequestId(response.headers);
  if (requestId) {
    log?.(`${PROVIDER_LABELS[providerId]} request id: ${requestId}`);
  }

  if (response.status === 429) {
    throw new RateLimitedError({
      providerId,
      retryAfterMs: parseRetryAfterMs(response.headers.get("retry-after"))
    });
  }

  if (!response.ok) {
    const errorBody = await response.text();
    throw new ProviderError({
      providerId,
      statusCode: response.status,
      message: `${PROVIDER_LABELS[providerId]} request failed (${response.status}): ${errorBody.slice(0, 320)}`
    });
  }

  return (await response.json()) as unknown;
}

function requireText(providerId: ProviderId, text: string): string {
  if (text.trim().length === 0) {
    throw new ProviderError({ providerId, message: `${PROVIDER_LABELS[providerId]} returned no text output.` });
  }
  return text;
}

export async function executeOpenAIChat(input: ProviderRequestInput): Promise<string> {
  const body = await postJson(
    "openai",
    joinUrl(input.settings.baseUrl, "/chat/completions"),
    {
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${input.settings.apiKey}`
      },
      body: JSON.stringify({
        model: input.model,
        messages: [{ role: "user", content: input.prompt }],
        temperature: input.temperature,
        max_tokens: input.maxTokens
      }),
      signal: input.signal
    },
    input.log
  );
  return requireText("openai", extractOpenAIChatText(body));
}

export async function executeClaudeMessages(input: ProviderRequestInput): Promise<string> {
  const body = await postJson(
    "claude",
    joinUrl(input.settings.baseUrl, "/messages"),
    {
      headers: {
        "Content-Type": "application/json",
        "x-api-key": input.settings.apiKey,
        "anthropic-version": ANTHROPIC_VERSION
      },
      body: JSON.stringify({
        model: input.model,
        max_tokens: input.maxTokens,
        temperature: Math.min(1, input.temperature),
        messages: [{ role: "user", content: input.prompt }]
      }),
      signal: input.signal
    },
    input.log
  );
  return requireText("claude", extractClaudeText(body));
}

export async function executeOllamaGenerate(input: ProviderRequestInput): Promise<string> {
  const body = await postJson(
    "ollama",
    joinUrl(input.settings.baseUrl, "/api/generate"),
    {
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: input.model,
        prompt: input.prompt,
        stream: false,
        options: { temperature: input.temperature, num_predict: input.maxTokens }
      }),
      signal: input.signal
    },
    input.log
  );
  return requireText("ollama", extractOllamaText(body));
}

interface CachedToken {
  token: string;
  expiresAt: number;
}

/**
 * watsonx needs a short-lived IAM bearer token exchanged from the API key. The
 * runner keeps the token until shortly before it expires.
 */
export function createWatsonxRunner(): (input: ProviderRequestInput) => Promise<string> {
  let cached: CachedToken | null = null;

  const resolveToken = async (input: ProviderRequestInput): Promise<string> => {
    if (cached && cached.expiresAt - TOKEN_REFRESH_MARGIN_MS > Date.now()) {
      return cached.token;
    }

    const iamUrl = input.settings.iamUrl ?? "https://iam.cloud.ibm.com/identity/token";
    const response = await fetch(iamUrl, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded", Accept: "application/json" },
      body: new URLSearchParams({
        grant_type: "urn:ibm:params:oauth:grant-type:apikey",
        apikey: input.settings.apiKey
      }).toString(),
      signal: input.signal
    });

    if (!response.ok) {
      throw new ProviderError({
        providerId: "watsonx",
        statusCode: response.status,
        message: `watsonx IAM token exchange failed (${response.status}).`
      });
    }

    const exchanged = extractAccessToken((await response.json()) as unknown);
    if (!exchanged) {
      throw new ProviderError({ providerId: "watsonx", message: "watsonx IAM response did not include an access token." });
    }

    cached = { token: exchanged.token, expiresAt: Date.now() + exchanged.expiresInMs };
    return exchanged.token;
  };

  return async (input) => {
    const token = await resolveToken(input);
    const body = await postJson(
      "watsonx",
      joinUrl(input.settings.baseUrl, `/ml/v1/text/generation?version=${WATSONX_API_VERSION}`),
      {
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          Authorization: `Bearer ${token}`
        },
        body: JSON.stringify({
          input: input.prompt,
          model_id: input.model,
          project_id: input.settings.projectId,
          parameters: {
            decoding_method: input.temperature > 0 ? "sample" : "greedy",
            temperature: input.temperature,
            max_new_tokens: input.maxTokens
          }
        }),
        signal: input.signal
      },
      input.log
    );
    return requireText("watsonx", extractWatsonxText(body));
  };
}

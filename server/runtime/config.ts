import { isProviderId } from "../types/contracts.js";
import type { ProviderId, ProviderSettings } from "../types/contracts.js";

export interface GenerationDefaults {
  provider: ProviderId;
  temperature: number;
  maxTokens: number;
  completionTimeoutMs: number;
  maxAttempts: number;
  maxRateLimitRetries: number;
}

export interface RuntimeConfig {
  port: number;
  apiAuthToken: string;
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  generation: GenerationDefaults;
  providers: Record<ProviderId, ProviderSettings>;
}

const defaultPort = 8790;
const defaultCorsOrigins = ["http://localhost:5173", "http://127.0.0.1:5173"];

const truthyEnvValues = new Set(["1", "true", "yes", "on"]);
const falsyEnvValues = new Set(["0", "false", "no", "off"]);

export const OPENAI_DEFAULT_URL = "https://api.openai.com/v1";
export const CLAUDE_DEFAULT_URL = "https://api.anthropic.com/v1";
export const WATSONX_DEFAULT_URL = "https://eu-de.ml.cloud.ibm.com";
export const WATSONX_IAM_URL = "https://iam.cloud.ibm.com/identity/token";
export const OLLAMA_DEFAULT_URL = "http://localhost:11434";

export function resolvePort(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1 || parsed > 65535) {
    return defaultPort;
  }
  return parsed;
}

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (truthyEnvValues.has(normalized)) {
    return true;
  }
  if (falsyEnvValues.has(normalized)) {
    return false;
  }

  return fallback;
}

export function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return Math.max(min, Math.min(max, parsed));
}

export function parseFloatEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseFloat(raw ?? "");
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return Math.max(min, Math.min(max, parsed));
}

export function resolveCorsOrigins(raw: string | undefined): {
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
} {
  const configured = (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const allowedCorsOrigins = configured.length > 0 ? configured : defaultCorsOrigins;

  return {
    allowedCorsOrigins,
    allowAnyCorsOrigin: allowedCorsOrigins.includes("*")
  };
}

export function normalizeOptionalUrl(raw: string | undefined, fallback: string): string {
  const trimmed = (raw ?? "").trim();
  if (trimmed.length === 0) {
    return fallback;
  }

  try {
    return new URL(trimmed).toString().replace(/\/+$/, "");
  } catch {
    return fallback;
  }
}

function readText(raw: string | undefined, fallback = ""): string {
  const trimmed = (raw ?? "").trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

export function resolveProviderSettings(env: NodeJS.ProcessEnv): Record<ProviderId, ProviderSettings> {
  return {
    openai: {
      id: "openai",
      apiKey: readText(env.OPENAI_API_KEY),
      baseUrl: normalizeOptionalUrl(env.OPENAI_BASE_URL, OPENAI_DEFAULT_URL),
      defaultModel: readText(env.OPENAI_MODEL, "gpt-4.1-mini")
    },
    claude: {
      id: "claude",
      apiKey: readText(env.ANTHROPIC_API_KEY),
      baseUrl: normalizeOptionalUrl(env.ANTHROPIC_BASE_URL, CLAUDE_DEFAULT_URL),
      defaultModel: readText(env.ANTHROPIC_MODEL, "claude-sonnet-4-6")
    },
    watsonx: {
      id: "watsonx",
      apiKey: readText(env.WATSONX_API_KEY),
      baseUrl: normalizeOptionalUrl(env.WATSONX_URL, WATSONX_DEFAULT_URL),
      defaultModel: readText(env.WATSONX_MODEL, "meta-llama/llama-3-3-70b-instruct"),
      projectId: readText(env.WATSONX_PROJECT_ID),
      iamUrl: normalizeOptionalUrl(env.WATSONX_IAM_URL, WATSONX_IAM_URL)
    },
    ollama: {
      id: "ollama",
      apiKey: "",
      baseUrl: normalizeOptionalUrl(env.OLLAMA_URL, OLLAMA_DEFAULT_URL),
      defaultModel: readText(env.OLLAMA_MODEL, "llama3.2:3b")
    }
  };
}

export function resolveRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const { allowedCorsOrigins, allowAnyCorsOrigin } = resolveCorsOrigins(env.CORS_ORIGINS);
  const requestedProvider = readText(env.AGENTLOOM_DEFAULT_PROVIDER, "openai").toLowerCase();
  if (!isProviderId(requestedProvider)) {
    throw new Error(`AGENTLOOM_DEFAULT_PROVIDER must be one of openai, claude, watsonx, ollama (got "${requestedProvider}").`);
  }

  return {
    port: resolvePort(env.PORT),
    apiAuthToken: readText(env.AGENTLOOM_API_TOKEN),
    allowedCorsOrigins,
    allowAnyCorsOrigin,
    generation: {
      provider: requestedProvider,
      temperature: parseFloatEnv(env.AGENTLOOM_TEMPERATURE, 0.7, 0, 2),
      maxTokens: parseIntEnv(env.AGENTLOOM_MAX_TOKENS, 4_000, 256, 32_000),
      completionTimeoutMs: parseIntEnv(env.AGENTLOOM_COMPLETION_TIMEOUT_MS, 120_000, 5_000, 600_000),
      maxAttempts: parseIntEnv(env.AGENTLOOM_MAX_ATTEMPTS, 2, 1, 5),
      maxRateLimitRetries: parseIntEnv(env.AGENTLOOM_MAX_RATE_LIMIT_RETRIES, 3, 0, 8)
    },
    providers: resolveProviderSettings(env)
  };
}

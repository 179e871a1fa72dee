import { isRecord } from "../generator/normalizers.js";

function collectTextBlocks(blocks: unknown): string[] {
  if (!Array.isArray(blocks)) {
    return [];
  }

  const segments: string[] = [];
  for (const block of blocks) {
    if (isRecord(block) && typeof block.text === "string") {
      segments.push(block.text);
    }
  }
  return segments;
}

export function extractOpenAIChatText(responseBody: unknown): string {
  if (!isRecord(responseBody) || !Array.isArray(responseBody.choices)) {
    return "";
  }

  const segments: string[] = [];
  for (const choice of responseBody.choices) {
    if (!isRecord(choice) || !isRecord(choice.message)) {
      continue;
    }
    const content = choice.message.content;
    if (typeof content === "string") {
      segments.push(content);
    } else {
      segments.push(...collectTextBlocks(content));
    }
    break;
  }

  return segments.join("\n");
}

export function extractClaudeText(responseBody: unknown): string {
  if (!isRecord(responseBody)) {
    return "";
  }
  return collectTextBlocks(responseBody.content).join("\n");
}

export function extractWatsonxText(responseBody: unknown): string {
  if (!isRecord(responseBody) || !Array.isArray(responseBody.results)) {
    return "";
  }

  return responseBody.results
    .map((result) => (isRecord(result) && typeof result.generated_text === "string" ? result.generated_text : ""))
    .join("");
}

export function extractOllamaText(responseBody: unknown): string {
  if (!isRecord(responseBody) || typeof responseBody.response !== "string") {
    return "";
  }
  return responseBody.response;
}

export function extractAccessToken(responseBody: unknown): { token: string; expiresInMs: number } | null {
  if (!isRecord(responseBody) || typeof responseBody.access_token !== "string") {
    return null;
  }

  const expiresIn = typeof responseBody.expires_in === "number" ? responseBody.expires_in : 3600;
  return { token: responseBody.access_token, expiresInMs: expiresIn * 1000 };
}

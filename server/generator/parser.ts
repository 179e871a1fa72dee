import type { ConfigurationDraft, TargetFramework } from "../types/contracts.js";
import { ValidationFailure } from "./errors.js";
import { decodeCompletionJson } from "./jsonCandidates.js";
import { normalizeConfigurationDraft } from "./normalizers.js";
import { configurationDraftSchema } from "./schemas.js";
import { issuesFromZod, validateConfigurationDraft } from "./validation.js";

/**
 * Turns a raw completion into a validated draft, or throws NoJsonFoundError,
 * MalformedJsonError or ValidationFailure.
 */
export function parseConfigurationDraft(completionText: string, targetFramework: TargetFramework): ConfigurationDraft {
  const decoded = decodeCompletionJson(completionText);
  const validated = configurationDraftSchema.safeParse(normalizeConfigurationDraft(decoded, targetFramework));
  if (!validated.success) {
    throw new ValidationFailure(issuesFromZod(validated.error.issues));
  }

  const draft: ConfigurationDraft = validated.data;
  const issues = validateConfigurationDraft(draft);
  if (issues.length > 0) {
    throw new ValidationFailure(issues);
  }

  return draft;
}

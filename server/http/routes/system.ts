import type { Express } from "express";
import { FRAMEWORK_LABELS } from "../../generator/prompts/exemplars.js";
import { describeMissingProviderSettings } from "../../providers.js";
import { GRAPH_FRAMEWORKS, PROVIDER_IDS, TARGET_FRAMEWORKS, TASK_FRAMEWORKS } from "../../types/contracts.js";
import type { ProviderId, ProviderSettings, TargetFramework } from "../../types/contracts.js";

export interface SystemRouteDependencies {
  providers: Record<ProviderId, ProviderSettings>;
  defaultProvider: ProviderId;
  getVersion?: () => string;
}

function describeCollections(framework: TargetFramework): string[] {
  if (GRAPH_FRAMEWORKS.has(framework)) {
    return ["agents", "tools", "nodes", "edges"];
  }
  if (TASK_FRAMEWORKS.has(framework)) {
    return ["agents", "tools", "tasks"];
  }
  return ["agents", "tools", "examples"];
}

export function registerSystemRoutes(app: Express, deps: SystemRouteDependencies): void {
  app.get("/api/health", (_request, response) => {
    const version = deps.getVersion?.();
    response.json({
      ok: true,
      now: new Date().toISOString(),
      ...(typeof version === "string" && version.trim().length > 0 ? { version: version.trim() } : {})
    });
  });

  app.get("/api/frameworks", (_request, response) => {
    response.json({
      frameworks: TARGET_FRAMEWORKS.map((id) => ({
        id,
        label: FRAMEWORK_LABELS[id],
        collections: describeCollections(id),
        processTypes: ["sequential", "hierarchical", "auto"]
      })),
      providers: PROVIDER_IDS.map((id) => {
        const settings = deps.providers[id];
        return {
          id,
          isDefault: id === deps.defaultProvider,
          configured: describeMissingProviderSettings(settings) === null,
          defaultModel: settings.defaultModel
        };
      }),
      outputFormats: ["code", "json", "both"]
    });
  });
}

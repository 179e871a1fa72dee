import { UnsupportedFrameworkError } from "../generator/errors.js";
import { isTargetFramework } from "../types/contracts.js";
import type { Configuration, TargetFramework } from "../types/contracts.js";
import { renderCrewAI } from "./crewai.js";
import { renderCrewAIFlow } from "./crewaiFlow.js";
import { renderLangGraph } from "./langgraph.js";
import { renderReact } from "./react.js";
import { renderReactLcel } from "./reactLcel.js";

export type FrameworkRenderer = (configuration: Configuration) => string;

const RENDERERS: Readonly<Record<TargetFramework, FrameworkRenderer>> = {
  crewai: renderCrewAI,
  "crewai-flow": renderCrewAIFlow,
  langgraph: renderLangGraph,
  react: renderReact,
  "react-lcel": renderReactLcel
};

export function resolveRenderer(framework: string): FrameworkRenderer {
  if (!isTargetFramework(framework)) {
    throw new UnsupportedFrameworkError(framework, "rendering");
  }
  return RENDERERS[framework];
}

export function renderConfiguration(configuration: Configuration): string {
  return resolveRenderer(configuration.targetFramework)(configuration);
}

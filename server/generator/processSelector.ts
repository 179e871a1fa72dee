import { GRAPH_FRAMEWORKS } from "../types/contracts.js";
import type {
  Configuration,
  ConfigurationDraft,
  ProcessChoice,
  ProcessDecision,
  TaskSpec
} from "../types/contracts.js";
import { ValidationFailure } from "./errors.js";
import { hasDelegationLanguage, readsAsManager } from "./intents.js";
import { validateHierarchy } from "./validation.js";

type DecisionSource = (input: {
  draft: ConfigurationDraft;
  explicitChoice: ProcessChoice | undefined;
  requestText: string;
}) => ProcessDecision | null;

function hasLinearDependencies(tasks: readonly TaskSpec[]): boolean {
  const dependents = new Map<string, number>();
  for (const task of tasks) {
    if (task.dependsOn.length > 1) {
      return false;
    }
    for (const dependency of task.dependsOn) {
      const count = (dependents.get(dependency) ?? 0) + 1;
      if (count > 1) {
        return false;
      }
      dependents.set(dependency, count);
    }
  }
  return true;
}

const fromExplicitChoice: DecisionSource = ({ explicitChoice }) => {
  if (explicitChoice === undefined || explicitChoice === "auto") {
    return null;
  }
  return {
    processType: explicitChoice,
    source: "explicit",
    rationale: `Process type ${explicitChoice} was requested explicitly.`
  };
};

const fromModelRecommendation: DecisionSource = ({ draft }) => {
  if (draft.processType === undefined) {
    return null;
  }
  return {
    processType: draft.processType,
    source: "model",
    rationale: draft.processRationale ?? `The model recommended a ${draft.processType} process.`
  };
};

const fromHeuristic: DecisionSource = ({ draft, requestText }) => {
  const hierarchicalSignals: string[] = [];
  const sequentialSignals: string[] = [];

  const distinctRoles = new Set(draft.agents.map((agent) => agent.role.trim().toLowerCase()));
  if (distinctRoles.size >= 4) {
    hierarchicalSignals.push(`${distinctRoles.size} distinct agent roles`);
  }

  if (
    draft.tasks.some((task) => hasDelegationLanguage(task.description)) ||
    hasDelegationLanguage(requestText)
  ) {
    hierarchicalSignals.push("delegation language in the request or task descriptions");
  }

  const manager = draft.agents.find(readsAsManager);
  if (manager) {
    hierarchicalSignals.push(`manager-like agent "${manager.name}"`);
  }

  if (draft.agents.length <= 3) {
    sequentialSignals.push(`${draft.agents.length} agent(s)`);
  }

  if (hasLinearDependencies(draft.tasks)) {
    sequentialSignals.push("linear task dependencies");
  }

  const processType = hierarchicalSignals.length > sequentialSignals.length ? "hierarchical" : "sequential";
  const describe = (signals: string[]): string => (signals.length > 0 ? signals.join("; ") : "none");
  return {
    processType,
    source: "heuristic",
    rationale: `Heuristic chose ${processType}: hierarchical ${hierarchicalSignals.length} (${describe(
      hierarchicalSignals
    )}) vs sequential ${sequentialSignals.length} (${describe(sequentialSignals)}).`
  };
};

const DECISION_CHAIN: readonly DecisionSource[] = [fromExplicitChoice, fromModelRecommendation, fromHeuristic];

export function selectProcessType(
  draft: ConfigurationDraft,
  explicitChoice?: ProcessChoice,
  requestText = ""
): ProcessDecision {
  for (const source of DECISION_CHAIN) {
    const decision = source({ draft, explicitChoice, requestText });
    if (decision) {
      return decision;
    }
  }

  return { processType: "sequential", source: "heuristic", rationale: "No decision source applied." };
}

/**
 * Picks the agent that manages a hierarchical crew. Graphs prefer the agent of
 * an entry node. Returns undefined only for a draft without agents.
 */
export function designateManager(draft: ConfigurationDraft): string | undefined {
  if (draft.managerAgent && draft.agents.some((agent) => agent.name === draft.managerAgent)) {
    return draft.managerAgent;
  }

  const entryAgent = GRAPH_FRAMEWORKS.has(draft.targetFramework)
    ? draft.nodes.find((node) => node.isEntryPoint)?.agent
    : undefined;
  if (entryAgent && draft.agents.some((agent) => agent.name === entryAgent)) {
    return entryAgent;
  }

  return (
    draft.agents.find(readsAsManager)?.name ??
    draft.agents.find((agent) => agent.allowDelegation)?.name ??
    draft.agents[0]?.name
  );
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}

/**
 * The manager only delegates: its tasks go to the first subordinate agent.
 */
function delegateManagerTasks(draft: ConfigurationDraft, managerAgent: string): TaskSpec[] {
  const delegate = draft.agents.find((agent) => agent.name !== managerAgent)?.name ?? managerAgent;
  return draft.tasks.map((task) => (task.assignedAgent === managerAgent ? { ...task, assignedAgent: delegate } : task));
}

/**
 * Builds the frozen configuration for the chosen process. Throws a
 * ValidationFailure when a hierarchical process has nothing to manage.
 */
export function finalizeConfiguration(draft: ConfigurationDraft, decision: ProcessDecision): Configuration {
  const managerAgent = decision.processType === "hierarchical" ? designateManager(draft) : undefined;
  if (decision.processType === "hierarchical") {
    const issues = validateHierarchy(draft, managerAgent);
    if (issues.length > 0) {
      throw new ValidationFailure(issues);
    }
  }

  const tasks = managerAgent ? delegateManagerTasks(draft, managerAgent) : draft.tasks;
  const configuration: Configuration = {
    targetFramework: draft.targetFramework,
    processType: decision.processType,
    ...(managerAgent ? { managerAgent } : {}),
    agents: draft.agents.map((agent) => ({ ...agent, tools: [...agent.tools] })),
    tools: draft.tools.map((tool) => ({ ...tool, parameters: { ...tool.parameters } })),
    tasks: tasks.map((task) => ({ ...task, dependsOn: [...task.dependsOn], tools: [...task.tools] })),
    nodes: draft.nodes.map((node) => ({ ...node })),
    edges: draft.edges.map((edge) => ({ ...edge })),
    examples: draft.examples.map((example) => ({ ...example }))
  };
  return deepFreeze(configuration);
}

import type { ConfigurationDraft, TaskSpec } from "../types/contracts.js";
import { normalizeIdentifier } from "./normalizers.js";

/**
 * Trims labels, drops blank lines and strips list numbering such as "1." or "2)".
 */
export function cleanWorkflowSteps(steps: readonly string[]): string[] {
  return steps
    .map((step) => step.trim().replace(/^\d+[.)]\s*/, "").trim())
    .filter((step) => step.length > 0);
}

function uniqueTaskName(label: string, index: number, taken: Set<string>): string {
  const base = normalizeIdentifier(label) || `step_${index + 1}`;
  let name = base;
  let suffix = 2;
  while (taken.has(name)) {
    name = `${base}_${suffix}`;
    suffix += 1;
  }
  taken.add(name);
  return name;
}

/**
 * Makes the draft carry exactly one task per workflow step, in step order.
 * Missing tasks go to the first agent, extra tasks are dropped, and every task
 * takes its name and description from its step label.
 */
export function alignTasksToWorkflowSteps(draft: ConfigurationDraft, workflowSteps: readonly string[]): ConfigurationDraft {
  const steps = cleanWorkflowSteps(workflowSteps);
  if (steps.length === 0) {
    return draft;
  }

  const firstAgent = draft.agents[0]?.name ?? "";
  const kept = draft.tasks.slice(0, steps.length);
  const taken = new Set<string>();
  const renamed = new Map<string, string>();

  const aligned: TaskSpec[] = steps.map((step, index) => {
    const name = uniqueTaskName(step, index, taken);
    const existing = kept[index];
    if (existing) {
      renamed.set(existing.name, name);
      return { ...existing, name, description: `Execute the '${step}' step` };
    }

    return {
      name,
      description: `Execute the '${step}' step`,
      expectedOutput: `Results from ${step}`,
      assignedAgent: firstAgent,
      dependsOn: [],
      tools: []
    };
  });

  return {
    ...draft,
    tasks: aligned.map((task) => ({
      ...task,
      dependsOn: task.dependsOn.flatMap((dependency) => {
        const target = renamed.get(dependency);
        return target === undefined ? [] : [target];
      })
    }))
  };
}

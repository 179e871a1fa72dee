import type { AgentSpec, Configuration, TaskSpec } from "../types/contracts.js";
import { orderTasksByDependencies } from "../generator/validation.js";
import { agentVar, indent, pyBool, pyComment, pyList, pyString, taskVar, toolVar } from "./python.js";

export function isManager(configuration: Configuration, agent: Readonly<AgentSpec>): boolean {
  return configuration.processType === "hierarchical" && configuration.managerAgent === agent.name;
}

export function workerAgents(configuration: Configuration): Array<Readonly<AgentSpec>> {
  return configuration.agents.filter((agent) => !isManager(configuration, agent));
}

export function orderedTasks(configuration: Configuration): Array<Readonly<TaskSpec>> {
  return orderTasksByDependencies(configuration.tasks);
}

export function renderAgentDeclarations(configuration: Configuration): string[] {
  return configuration.agents.map((agent) => {
    const manager = isManager(configuration, agent);
    return [
      pyComment(manager ? `Manager agent: ${agent.name}` : `Agent: ${agent.name}`),
      `${agentVar(agent.name)} = Agent(`,
      ...indent([
        `role=${pyString(agent.role)},`,
        `goal=${pyString(agent.goal)},`,
        `backstory=${pyString(agent.backstory ?? "")},`,
        `tools=${pyList(agent.tools.map(toolVar))},`,
        ...(agent.llmHint ? [`llm=${pyString(agent.llmHint)},`] : []),
        `allow_delegation=${pyBool(manager || agent.allowDelegation)},`,
        `verbose=${pyBool(agent.verbose)},`
      ]),
      ")"
    ].join("\n");
  });
}

export function renderTaskDeclarations(configuration: Configuration): string[] {
  return orderedTasks(configuration).map((task) =>
    [
      pyComment(`Task: ${task.name}`),
      `${taskVar(task.name)} = Task(`,
      ...indent([
        `description=${pyString(task.description)},`,
        `expected_output=${pyString(task.expectedOutput)},`,
        `agent=${agentVar(task.assignedAgent)},`,
        ...(task.tools.length > 0 ? [`tools=${pyList(task.tools.map(toolVar))},`] : []),
        ...(task.dependsOn.length > 0 ? [`context=${pyList(task.dependsOn.map(taskVar))},`] : [])
      ]),
      ")"
    ].join("\n")
  );
}

/**
 * Keyword arguments that select the crew's process, plus the manager when hierarchical.
 */
export function renderProcessArguments(configuration: Configuration): string[] {
  if (configuration.processType === "hierarchical" && configuration.managerAgent) {
    return ["process=Process.hierarchical,", `manager_agent=${agentVar(configuration.managerAgent)},`];
  }
  return ["process=Process.sequential,"];
}

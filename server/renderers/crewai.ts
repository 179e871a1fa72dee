import type { Configuration } from "../types/contracts.js";
import {
  orderedTasks,
  renderAgentDeclarations,
  renderProcessArguments,
  renderTaskDeclarations,
  workerAgents
} from "./crewaiCommon.js";
import { agentVar, indent, joinSections, pyList, renderHeader, renderToolFunctions, taskVar } from "./python.js";

export function renderCrewAI(configuration: Configuration): string {
  const crew = [
    "crew = Crew(",
    ...indent([
      `agents=${pyList(workerAgents(configuration).map((agent) => agentVar(agent.name)))},`,
      `tasks=${pyList(orderedTasks(configuration).map((task) => taskVar(task.name)))},`,
      ...renderProcessArguments(configuration),
      "verbose=True,"
    ]),
    ")"
  ];

  const runWorkflow = [
    "def run_workflow(query: str):",
    ...indent(['"""Run the crew on a query."""', 'return crew.kickoff(inputs={"query": query})'])
  ];

  const main = ['if __name__ == "__main__":', ...indent(['print(run_workflow("Your query here"))'])];

  return joinSections([
    renderHeader(configuration, "CrewAI workflow"),
    ["from crewai import Agent, Crew, Process, Task", "from crewai.tools import tool"],
    ...renderToolFunctions(configuration.tools),
    ...renderAgentDeclarations(configuration),
    ...renderTaskDeclarations(configuration),
    crew,
    runWorkflow,
    main
  ]);
}

import type { Configuration, TaskSpec } from "../types/contracts.js";
import { orderedTasks, renderAgentDeclarations, renderProcessArguments, renderTaskDeclarations } from "./crewaiCommon.js";
import { indent, joinSections, pyDocstring, pyString, renderHeader, renderToolFunctions, taskVar } from "./python.js";

const START_STEP = "initial_input";

const executeStep = (name: string): string => `execute_${name}`;
const skipStep = (name: string): string => `skip_${name}`;
const routeStep = (name: string): string => `route_${name}`;
const predicate = (name: string): string => `should_run_${name}`;

type TaskLookup = ReadonlyMap<string, Readonly<TaskSpec>>;

/**
 * The event that marks a task as settled. A conditional task settles either
 * by running or by being skipped.
 */
function settledTrigger(task: Readonly<TaskSpec>): string {
  return task.condition
    ? `or_(${pyString(executeStep(task.name))}, ${pyString(skipStep(task.name))})`
    : pyString(executeStep(task.name));
}

function listenTarget(triggers: readonly string[]): string {
  if (triggers.length === 1) {
    return triggers[0];
  }
  return `and_(${triggers.join(", ")})`;
}

/**
 * What a task's step waits for: its dependencies, or the previous step in
 * dependency order when it has none.
 */
function taskTriggers(
  task: Readonly<TaskSpec>,
  previous: Readonly<TaskSpec> | undefined,
  lookup: TaskLookup
): string[] {
  if (task.dependsOn.length > 0) {
    return task.dependsOn.map((dependency) => {
      const upstream = lookup.get(dependency);
      return upstream ? settledTrigger(upstream) : pyString(executeStep(dependency));
    });
  }
  return [previous ? settledTrigger(previous) : pyString(START_STEP)];
}

function renderRunTask(configuration: Configuration): string[] {
  return [
    "def run_task(task: Task, inputs: Dict[str, Any]) -> str:",
    ...indent([
      '"""Run a single task with a one-task crew."""',
      "crew = Crew(",
      ...indent(["agents=[task.agent],", "tasks=[task],", ...renderProcessArguments(configuration), "verbose=True,"]),
      ")",
      "return str(crew.kickoff(inputs=inputs))"
    ])
  ];
}

function renderTaskStep(
  task: Readonly<TaskSpec>,
  previous: Readonly<TaskSpec> | undefined,
  lookup: TaskLookup
): string[] {
  const triggers = listenTarget(taskTriggers(task, previous, lookup));
  const body = [
    pyDocstring(`Run the ${task.name} task.`),
    `self.state.current_step = ${pyString(task.name)}`,
    `result = run_task(${taskVar(task.name)}, {"query": self.state.query, "previous_results": dict(self.state.results)})`,
    `self.state.results[${pyString(task.name)}] = result`,
    "return result"
  ];

  if (!task.condition) {
    return [`@listen(${triggers})`, `def ${executeStep(task.name)}(self):`, ...indent(body)];
  }

  return [
    `def ${predicate(task.name)}(self) -> bool:`,
    ...indent([pyDocstring(`Condition: ${task.condition}`), "return True"]),
    "",
    `@router(${triggers})`,
    `def ${routeStep(task.name)}(self):`,
    ...indent([
      `return ${pyString(`run_${task.name}`)} if self.${predicate(task.name)}() else ${pyString(skipStep(task.name))}`
    ]),
    "",
    `@listen(${pyString(`run_${task.name}`)})`,
    `def ${executeStep(task.name)}(self):`,
    ...indent(body)
  ];
}

/**
 * Steps nothing else listens to; the aggregation step waits on all of them.
 */
function terminalTriggers(tasks: ReadonlyArray<Readonly<TaskSpec>>): string[] {
  const awaited = new Set<string>();
  tasks.forEach((task, index) => {
    if (task.dependsOn.length > 0) {
      task.dependsOn.forEach((dependency) => awaited.add(dependency));
    } else if (index > 0) {
      awaited.add(tasks[index - 1].name);
    }
  });

  return tasks.filter((task) => !awaited.has(task.name)).map(settledTrigger);
}

function renderFlowClass(configuration: Configuration): string[] {
  const tasks = orderedTasks(configuration);
  const lookup: TaskLookup = new Map(tasks.map((task) => [task.name, task]));
  const firstStep = tasks[0]?.name ?? "completed";

  const steps: string[][] = [
    [
      "@start()",
      `def ${START_STEP}(self):`,
      ...indent([
        '"""Record the incoming query."""',
        `self.state.current_step = ${pyString(firstStep)}`,
        "return self.state.query"
      ])
    ],
    ...tasks.map((task, index) => renderTaskStep(task, index > 0 ? tasks[index - 1] : undefined, lookup)),
    [
      `@listen(${listenTarget(terminalTriggers(tasks))})`,
      "def aggregate_results(self):",
      ...indent([
        '"""Combine every task result into one report."""',
        'self.state.current_step = "completed"',
        'sections = [f"=== {name} ===\\n{result}" for name, result in self.state.results.items()]',
        'return "\\n\\n".join(sections)'
      ])
    ]
  ];

  return [
    "class WorkflowFlow(Flow[WorkflowState]):",
    ...indent(steps.flatMap((step, index) => (index === 0 ? step : ["", ...step])))
  ];
}

export function renderCrewAIFlow(configuration: Configuration): string {
  const state = [
    "class WorkflowState(BaseModel):",
    ...indent([
      'query: str = Field(default="")',
      "results: Dict[str, str] = Field(default_factory=dict)",
      'current_step: str = Field(default="")'
    ])
  ];

  const helpers = [
    "def run_workflow(query: str):",
    ...indent(['"""Run the flow on a query."""', "flow = WorkflowFlow()", 'return flow.kickoff(inputs={"query": query})']),
    "",
    "",
    'def plot_flow(filename: str = "workflow_flow") -> None:',
    ...indent(['"""Save an HTML visualization of the flow."""', "WorkflowFlow().plot(filename)"])
  ];

  const main = ['if __name__ == "__main__":', ...indent(['print(run_workflow("Your query here"))'])];

  return joinSections([
    renderHeader(configuration, "CrewAI Flow workflow"),
    [
      "from typing import Any, Dict",
      "",
      "from crewai import Agent, Crew, Process, Task",
      "from crewai.flow.flow import Flow, and_, listen, or_, router, start",
      "from crewai.tools import tool",
      "from pydantic import BaseModel, Field"
    ],
    ...renderToolFunctions(configuration.tools),
    ...renderAgentDeclarations(configuration),
    ...renderTaskDeclarations(configuration),
    renderRunTask(configuration),
    state,
    renderFlowClass(configuration),
    helpers,
    main
  ]);
}

import type { AgentSpec, Configuration, GraphEdge } from "../types/contracts.js";
import {
  DEFAULT_MODEL_HINT,
  agentVar,
  indent,
  joinSections,
  pyComment,
  pyDocstring,
  pyList,
  pyString,
  renderHeader,
  renderToolFunctions,
  toolVar
} from "./python.js";

const routeFunction = (source: string): string => `route_from_${source}`;

function renderAgentRunner(agent: Readonly<AgentSpec>): string {
  const model = `ChatOpenAI(model=${pyString(agent.llmHint ?? DEFAULT_MODEL_HINT)})`;
  const boundModel = agent.tools.length > 0 ? `${model}.bind_tools(${pyList(agent.tools.map(toolVar))})` : model;
  return [
    `def ${agentVar(agent.name)}(state: AgentState) -> dict:`,
    ...indent([
      pyDocstring(`${agent.role}: ${agent.goal}`),
      `model = ${boundModel}`,
      'response = model.invoke(state["messages"])',
      'return {"messages": [response]}'
    ])
  ].join("\n");
}

function conditionalGroups(edges: Configuration["edges"]): Map<string, Array<Readonly<GraphEdge>>> {
  const groups = new Map<string, Array<Readonly<GraphEdge>>>();
  for (const edge of edges) {
    if (!edge.condition) {
      continue;
    }
    const group = groups.get(edge.source) ?? [];
    group.push(edge);
    groups.set(edge.source, group);
  }
  return groups;
}

function renderRouter(source: string, edges: ReadonlyArray<Readonly<GraphEdge>>): string {
  const fallback = edges[0].condition ?? edges[0].target;
  return [
    `def ${routeFunction(source)}(state: AgentState) -> str:`,
    ...indent([
      pyDocstring(`Pick the branch to take after ${source}.`),
      `return state.get("next") or ${pyString(fallback)}`
    ])
  ].join("\n");
}

function renderGraph(configuration: Configuration, groups: Map<string, Array<Readonly<GraphEdge>>>): string[] {
  const lines: string[] = ["workflow = StateGraph(AgentState)", ""];

  for (const node of configuration.nodes) {
    lines.push(`workflow.add_node(${pyString(node.name)}, ${agentVar(node.agent)})`);
  }

  lines.push("");
  for (const node of configuration.nodes.filter((entry) => entry.isEntryPoint)) {
    lines.push(`workflow.add_edge(START, ${pyString(node.name)})`);
  }

  // Edges keep declaration order; a conditional group sits where its first edge was declared.
  const emittedGroups = new Set<string>();
  for (const edge of configuration.edges) {
    if (!edge.condition) {
      lines.push(`workflow.add_edge(${pyString(edge.source)}, ${pyString(edge.target)})`);
      continue;
    }

    const branches = groups.get(edge.source);
    if (!branches || emittedGroups.has(edge.source)) {
      continue;
    }
    emittedGroups.add(edge.source);
    lines.push(
      "workflow.add_conditional_edges(",
      ...indent([
        `${pyString(edge.source)},`,
        `${routeFunction(edge.source)},`,
        "{",
        ...indent(
          branches.map((branch) => `${pyString(branch.condition ?? branch.target)}: ${pyString(branch.target)},`)
        ),
        "},"
      ]),
      ")"
    );
  }

  for (const node of configuration.nodes.filter((entry) => entry.isTerminal)) {
    lines.push(`workflow.add_edge(${pyString(node.name)}, END)`);
  }

  lines.push("", "app = workflow.compile()");
  return lines;
}

export function renderLangGraph(configuration: Configuration): string {
  const groups = conditionalGroups(configuration.edges);
  const supervision =
    configuration.processType === "hierarchical" && configuration.managerAgent
      ? [pyComment(`Hierarchical process: ${configuration.managerAgent} supervises the other agents' nodes.`)]
      : [];

  const state = [
    "class AgentState(TypedDict):",
    ...indent(["messages: Annotated[List[BaseMessage], operator.add]", "next: str"])
  ];

  const runAgent = [
    "def run_agent(query: str) -> List[BaseMessage]:",
    ...indent([
      '"""Run the graph on a query and return the message history."""',
      'result = app.invoke({"messages": [HumanMessage(content=query)], "next": ""})',
      'return result["messages"]'
    ])
  ];

  const main = [
    'if __name__ == "__main__":',
    ...indent(['for message in run_agent("Your query here"):', ...indent(['print(f"{message.type}: {message.content}")'])])
  ];

  return joinSections([
    [...renderHeader(configuration, "LangGraph workflow"), ...supervision],
    [
      "import operator",
      "from typing import Annotated, List, TypedDict",
      "",
      "from langchain_core.messages import BaseMessage, HumanMessage",
      "from langchain_core.tools import tool",
      "from langchain_openai import ChatOpenAI",
      "from langgraph.graph import END, START, StateGraph"
    ],
    state,
    ...renderToolFunctions(configuration.tools),
    ...configuration.agents.map(renderAgentRunner),
    ...[...groups].map(([source, edges]) => renderRouter(source, edges)),
    renderGraph(configuration, groups),
    runAgent,
    main
  ]);
}

import { describe, expect, it } from "vitest";

import { UnsupportedFrameworkError } from "../../server/generator/errors.js";
import { renderConfiguration, resolveRenderer } from "../../server/renderers/index.js";
import { renderLangGraph } from "../../server/renderers/langgraph.js";
import type { ConfigurationDraft } from "../../server/types/contracts.js";
import { createAgent, createConfiguration, createDraft, createTool } from "../helpers/configurationFixtures.js";

function createGraphDraft(partial: Partial<ConfigurationDraft> = {}): ConfigurationDraft {
  return createDraft({
    targetFramework: "langgraph",
    agents: [
      createAgent({ name: "planner", role: "Planner", goal: "Plan the work", tools: ["web_search"] }),
      createAgent({ name: "worker", role: "Worker", goal: "Do the work", llmHint: "gpt-4o" })
    ],
    tools: [createTool()],
    nodes: [
      { name: "plan", agent: "planner", isEntryPoint: true, isTerminal: false },
      { name: "work", agent: "worker", isEntryPoint: false, isTerminal: false },
      { name: "review", agent: "planner", isEntryPoint: false, isTerminal: true },
      { name: "publish", agent: "worker", isEntryPoint: false, isTerminal: true }
    ],
    edges: [
      { source: "plan", target: "work" },
      { source: "work", target: "review", condition: "needs review" },
      { source: "work", target: "publish", condition: "ready" }
    ],
    ...partial
  });
}

describe("LangGraph Renderer", () => {
  it("renders one runner per agent with bound tools", () => {
    const code = renderLangGraph(createConfiguration(createGraphDraft()));

    expect(code).toContain(
      [
        "def agent_planner(state: AgentState) -> dict:",
        '    """Planner: Plan the work"""',
        '    model = ChatOpenAI(model="gpt-4.1-mini").bind_tools([tool_web_search])',
        '    response = model.invoke(state["messages"])',
        '    return {"messages": [response]}'
      ].join("\n")
    );
    expect(code.split("\n")).toContain('    model = ChatOpenAI(model="gpt-4o")');
  });

  it("wires entry, plain, conditional and terminal edges", () => {
    const code = renderLangGraph(createConfiguration(createGraphDraft()));

    expect(code).toContain(
      [
        "workflow = StateGraph(AgentState)",
        "",
        'workflow.add_node("plan", agent_planner)',
        'workflow.add_node("work", agent_worker)',
        'workflow.add_node("review", agent_planner)',
        'workflow.add_node("publish", agent_worker)',
        "",
        'workflow.add_edge(START, "plan")',
        'workflow.add_edge("plan", "work")',
        "workflow.add_conditional_edges(",
        '    "work",',
        "    route_from_work,",
        "    {",
        '        "needs review": "review",',
        '        "ready": "publish",',
        "    },",
        ")",
        'workflow.add_edge("review", END)',
        'workflow.add_edge("publish", END)',
        "",
        "app = workflow.compile()"
      ].join("\n")
    );
  });

  it("keeps the declaration order of plain and conditional edges", () => {
    const draft = createGraphDraft({
      edges: [
        { source: "work", target: "review", condition: "needs review" },
        { source: "plan", target: "work" },
        { source: "work", target: "publish", condition: "ready" }
      ]
    });

    const code = renderLangGraph(createConfiguration(draft));

    expect(code).toContain(
      [
        'workflow.add_edge(START, "plan")',
        "workflow.add_conditional_edges(",
        '    "work",',
        "    route_from_work,",
        "    {",
        '        "needs review": "review",',
        '        "ready": "publish",',
        "    },",
        ")",
        'workflow.add_edge("plan", "work")',
        'workflow.add_edge("review", END)'
      ].join("\n")
    );
  });

  it("renders a router that falls back to the first branch", () => {
    const code = renderLangGraph(createConfiguration(createGraphDraft()));

    expect(code).toContain(
      [
        "def route_from_work(state: AgentState) -> str:",
        '    """Pick the branch to take after work."""',
        '    return state.get("next") or "needs review"'
      ].join("\n")
    );
  });

  it("names the supervising agent of a hierarchical graph", () => {
    const code = renderLangGraph(createConfiguration(createGraphDraft({ managerAgent: "planner" }), "hierarchical"));

    expect(code.startsWith(
      [
        "# LangGraph workflow generated from a natural-language workflow description.",
        'PROCESS_TYPE = "hierarchical"',
        'MANAGER_AGENT = "planner"',
        "# Hierarchical process: planner supervises the other agents' nodes."
      ].join("\n")
    )).toBe(true);
  });

  it("omits the manager for a sequential graph", () => {
    const lines = renderLangGraph(createConfiguration(createGraphDraft({ managerAgent: "planner" }))).split("\n");

    expect(lines.some((line) => line.startsWith("MANAGER_AGENT"))).toBe(false);
    expect(lines).toContain('PROCESS_TYPE = "sequential"');
  });
});

describe("Renderer Registry", () => {
  it("dispatches on the configuration's framework", () => {
    const configuration = createConfiguration(createGraphDraft());

    expect(renderConfiguration(configuration)).toBe(renderLangGraph(configuration));
  });

  it("rejects an unknown framework at the rendering stage", () => {
    try {
      resolveRenderer("autogen");
      expect.unreachable("resolveRenderer should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedFrameworkError);
      if (error instanceof UnsupportedFrameworkError) {
        expect(error.stage).toBe("rendering");
        expect(error.message).toBe('Unsupported target framework "autogen".');
      }
    }
  });
});

import { finalizeConfiguration } from "../../server/generator/processSelector.js";
import type {
  AgentSpec,
  Configuration,
  ConfigurationDraft,
  ProcessType,
  TaskSpec,
  ToolSpec
} from "../../server/types/contracts.js";

export function createAgent(partial: Partial<AgentSpec> = {}): AgentSpec {
  return {
    name: "researcher",
    role: "Research Specialist",
    goal: "Find accurate sources",
    tools: [],
    allowDelegation: false,
    verbose: true,
    ...partial
  };
}

export function createTool(partial: Partial<ToolSpec> = {}): ToolSpec {
  return {
    name: "web_search",
    description: "Search the web",
    parameters: { query: "Search terms" },
    ...partial
  };
}

export function createTask(partial: Partial<TaskSpec> = {}): TaskSpec {
  return {
    name: "research_topic",
    description: "Collect sources about the topic",
    expectedOutput: "A list of sources",
    assignedAgent: "researcher",
    dependsOn: [],
    tools: [],
    ...partial
  };
}

export function createDraft(partial: Partial<ConfigurationDraft> = {}): ConfigurationDraft {
  return {
    targetFramework: "crewai",
    agents: [],
    tools: [],
    tasks: [],
    nodes: [],
    edges: [],
    examples: [],
    ...partial
  };
}

/** Two agents, one tool, two chained tasks. */
export function createResearchDraft(partial: Partial<ConfigurationDraft> = {}): ConfigurationDraft {
  return createDraft({
    agents: [
      createAgent({ backstory: "Former librarian.", tools: ["web_search"] }),
      createAgent({ name: "writer", role: "Technical Writer", goal: "Write clear summaries" })
    ],
    tools: [createTool()],
    tasks: [
      createTask(),
      createTask({
        name: "write_summary",
        description: "Summarize the findings",
        expectedOutput: "A short summary",
        assignedAgent: "writer",
        dependsOn: ["research_topic"]
      })
    ],
    ...partial
  });
}

/** The completion a model would send back for the research draft. */
export const RESEARCH_COMPLETION = JSON.stringify(
  {
    agents: [
      {
        name: "researcher",
        role: "Research Specialist",
        goal: "Find accurate sources",
        backstory: "Former librarian.",
        tools: ["web_search"]
      },
      { name: "writer", role: "Technical Writer", goal: "Write clear summaries", tools: [] }
    ],
    tools: [{ name: "web_search", description: "Search the web", parameters: { query: "Search terms" } }],
    tasks: [
      {
        name: "research_topic",
        description: "Collect sources about the topic",
        expectedOutput: "A list of sources",
        assignedAgent: "researcher"
      },
      {
        name: "write_summary",
        description: "Summarize the findings",
        expectedOutput: "A short summary",
        assignedAgent: "writer",
        dependsOn: ["research_topic"]
      }
    ]
  },
  null,
  2
);

export function createConfiguration(draft: ConfigurationDraft, processType: ProcessType = "sequential"): Configuration {
  return finalizeConfiguration(draft, { processType, source: "explicit", rationale: "" });
}

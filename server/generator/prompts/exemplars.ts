import type { TargetFramework } from "../../types/contracts.js";

const crewExemplar = {
  processType: "sequential",
  processRationale: "Research feeds writing in a straight line, so no manager is needed.",
  agents: [
    {
      name: "research_specialist",
      role: "Research Specialist",
      goal: "Conduct thorough research and gather information",
      backstory: "Expert researcher with years of experience in data gathering and analysis",
      tools: ["search_tool"],
      llmHint: "gpt-4.1-mini",
      allowDelegation: false,
      verbose: true
    },
    {
      name: "content_writer",
      role: "Content Writer",
      goal: "Create clear and comprehensive written content",
      backstory: "Professional writer skilled in creating engaging and informative content",
      tools: ["grammar_checker"],
      allowDelegation: false,
      verbose: true
    }
  ],
  tools: [
    { name: "search_tool", description: "Searches the web for a query", parameters: { query: "Search terms" } },
    { name: "grammar_checker", description: "Checks grammar and style of a draft", parameters: { text: "Draft text" } }
  ],
  tasks: [
    {
      name: "research_task",
      description: "Gather information and conduct research on the given topic",
      expectedOutput: "Comprehensive research findings and data",
      assignedAgent: "research_specialist",
      dependsOn: [],
      tools: ["search_tool"]
    },
    {
      name: "writing_task",
      description: "Create written content based on research findings",
      expectedOutput: "Well-written content document",
      assignedAgent: "content_writer",
      dependsOn: ["research_task"],
      tools: []
    }
  ]
};

const graphExemplar = {
  processType: "sequential",
  processRationale: "Each node hands its result to the next one.",
  agents: [
    {
      name: "triage_assistant",
      role: "Triage Assistant",
      goal: "Classify incoming questions",
      tools: ["basic_tool"],
      llmHint: "gpt-4.1-mini"
    },
    {
      name: "answer_writer",
      role: "Answer Writer",
      goal: "Write the final answer",
      tools: []
    }
  ],
  tools: [{ name: "basic_tool", description: "A basic utility tool", parameters: { input: "User input to process" } }],
  nodes: [
    { name: "classify_input", description: "Classify the user input", agent: "triage_assistant", isEntryPoint: true, isTerminal: false },
    { name: "write_answer", description: "Write the answer", agent: "answer_writer", isEntryPoint: false, isTerminal: true }
  ],
  edges: [{ source: "classify_input", target: "write_answer", condition: "input classified" }]
};

const reasoningExemplar = {
  processType: "sequential",
  processRationale: "A single reasoning agent works through the loop on its own.",
  agents: [
    {
      name: "default_assistant",
      role: "General Assistant",
      goal: "Help with basic tasks",
      tools: ["search_tool"],
      llmHint: "gpt-4.1-mini"
    }
  ],
  tools: [
    {
      name: "search_tool",
      description: "Searches for relevant information",
      parameters: { query: "Search terms" }
    }
  ],
  examples: [
    {
      query: "Help me find information",
      thought: "I need to search for relevant information",
      action: "search_tool",
      observation: "Found relevant results",
      finalAnswer: "Here is the information you requested"
    }
  ]
};

export const FRAMEWORK_EXEMPLARS: Record<TargetFramework, object> = {
  crewai: crewExemplar,
  "crewai-flow": crewExemplar,
  langgraph: graphExemplar,
  react: reasoningExemplar,
  "react-lcel": reasoningExemplar
};

export const FRAMEWORK_LABELS: Record<TargetFramework, string> = {
  crewai: "CrewAI",
  "crewai-flow": "CrewAI Flow",
  langgraph: "LangGraph",
  react: "ReAct (classic AgentExecutor)",
  "react-lcel": "ReAct (LCEL chain)"
};

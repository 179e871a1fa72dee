import type { AgentSpec, Configuration, ReasoningExample } from "../types/contracts.js";
import {
  DEFAULT_MODEL_HINT,
  indent,
  joinSections,
  pyList,
  pyString,
  pyTripleQuotedBody,
  renderHeader,
  renderToolFunctions,
  toolVar
} from "./python.js";

/**
 * The agent that drives the loop: the manager when hierarchical, else the first agent.
 */
export function primaryAgent(configuration: Configuration): Readonly<AgentSpec> {
  const manager = configuration.agents.find((agent) => agent.name === configuration.managerAgent);
  return manager ?? configuration.agents[0];
}

function escapeTemplateText(value: string): string {
  return value.replace(/\{/g, "{{").replace(/\}/g, "}}");
}

function renderExample(example: Readonly<ReasoningExample>): string[] {
  return [
    `Question: ${example.query}`,
    `Thought: ${example.thought}`,
    `Action: ${example.action}`,
    `Observation: ${example.observation}`,
    "Thought: I now know the final answer",
    `Final Answer: ${example.finalAnswer}`
  ].map(escapeTemplateText);
}

export function buildReactTemplate(configuration: Configuration): string {
  const agent = primaryAgent(configuration);
  const specialists = configuration.agents.filter((entry) => entry.name !== agent.name);

  const lines = [
    escapeTemplateText(`You are ${agent.role}. Your goal is ${agent.goal}.`),
    ...(agent.backstory ? [escapeTemplateText(agent.backstory)] : []),
    ...(specialists.length > 0
      ? ["", "Specialists you can draw on:", ...specialists.map((entry) => escapeTemplateText(`- ${entry.role}: ${entry.goal}`))]
      : []),
    "",
    "Answer the following questions as best you can. You have access to the following tools:",
    "",
    "{tools}",
    "",
    "Use the following format:",
    "",
    "Question: the input question you must answer",
    "Thought: you should always think about what to do",
    "Action: the action to take, should be one of [{tool_names}]",
    "Action Input: the input to the action",
    "Observation: the result of the action",
    "... (this Thought/Action/Action Input/Observation can repeat N times)",
    "Thought: I now know the final answer",
    "Final Answer: the final answer to the original input question",
    ...(configuration.examples.length > 0
      ? ["", "Examples:", ...configuration.examples.flatMap((example) => ["", ...renderExample(example)])]
      : []),
    "",
    "Begin!",
    "",
    "Question: {input}",
    "Thought:{agent_scratchpad}"
  ];

  return `REACT_TEMPLATE = """${pyTripleQuotedBody(lines.join("\n"))}"""`;
}

export function renderToolList(configuration: Configuration): string {
  return `tools = ${pyList(configuration.tools.map((tool) => toolVar(tool.name)))}`;
}

export function renderModel(configuration: Configuration): string {
  return `llm = ChatOpenAI(model=${pyString(primaryAgent(configuration).llmHint ?? DEFAULT_MODEL_HINT)}, temperature=0)`;
}

export function renderReact(configuration: Configuration): string {
  const executor = [
    "react_prompt = PromptTemplate.from_template(REACT_TEMPLATE)",
    renderModel(configuration),
    "agent = create_react_agent(llm, tools, react_prompt)",
    "agent_executor = AgentExecutor(agent=agent, tools=tools, verbose=True, handle_parsing_errors=True)"
  ];

  const runAgent = [
    "def run_agent(query: str) -> str:",
    ...indent([
      '"""Run the ReAct agent on a query."""',
      'response = agent_executor.invoke({"input": query})',
      'return response.get("output", "No response generated")'
    ])
  ];

  const main = ['if __name__ == "__main__":', ...indent(['print(run_agent("Your query here"))'])];

  return joinSections([
    renderHeader(configuration, "ReAct agent"),
    [
      "from langchain.agents import AgentExecutor, create_react_agent",
      "from langchain_core.prompts import PromptTemplate",
      "from langchain_core.tools import tool",
      "from langchain_openai import ChatOpenAI"
    ],
    ...renderToolFunctions(configuration.tools),
    renderToolList(configuration),
    buildReactTemplate(configuration),
    executor,
    runAgent,
    main
  ]);
}

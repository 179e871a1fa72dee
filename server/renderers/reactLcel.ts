import type { Configuration } from "../types/contracts.js";
import { indent, joinSections, renderHeader, renderToolFunctions } from "./python.js";
import { buildReactTemplate, renderModel, renderToolList } from "./react.js";

export function renderReactLcel(configuration: Configuration): string {
  const shapeInput = [
    "def shape_input(payload: Dict[str, Any]) -> Dict[str, Any]:",
    ...indent([
      '"""Add tool descriptions and the scratchpad to the chain input."""',
      "return {",
      ...indent([
        '"input": payload["input"],',
        '"agent_scratchpad": payload.get("agent_scratchpad", ""),',
        '"tools": "\\n".join(f"{entry.name}: {entry.description}" for entry in tools),',
        '"tool_names": ", ".join(entry.name for entry in tools),'
      ]),
      "}"
    ])
  ];

  const chain = [
    "react_prompt = PromptTemplate.from_template(REACT_TEMPLATE)",
    renderModel(configuration),
    "",
    "chain = (",
    ...indent([
      "RunnableLambda(shape_input)",
      "| react_prompt",
      '| llm.bind(stop=["\\nObservation:"])',
      "| StrOutputParser()"
    ]),
    ")"
  ];

  const patterns = [
    'ACTION_PATTERN = re.compile(r"Action:\\s*(.+?)\\s*\\nAction Input:\\s*(.*)", re.DOTALL)',
    'FINAL_ANSWER_PATTERN = re.compile(r"Final Answer:\\s*(.*)", re.DOTALL)'
  ];

  const runAgent = [
    "def run_agent(query: str, max_steps: int = 6) -> str:",
    ...indent([
      '"""Run the chain in a bounded Thought/Action/Observation loop."""',
      'scratchpad = ""',
      "for _ in range(max_steps):",
      ...indent([
        'output = chain.invoke({"input": query, "agent_scratchpad": scratchpad})',
        "final = FINAL_ANSWER_PATTERN.search(output)",
        "if final:",
        ...indent(["return final.group(1).strip()"]),
        "action = ACTION_PATTERN.search(output)",
        "if not action:",
        ...indent(["return output.strip()"]),
        "tool_name = action.group(1).strip()",
        "tool_input = action.group(2).strip().strip('\"')",
        "selected = TOOLS_BY_NAME.get(tool_name)",
        'observation = selected.invoke(tool_input) if selected else f"Unknown tool: {tool_name}"',
        'scratchpad += f"{output}\\nObservation: {observation}\\nThought:"'
      ]),
      'return "Stopped after reaching the step limit."'
    ])
  ];

  const main = ['if __name__ == "__main__":', ...indent(['print(run_agent("Your query here"))'])];

  return joinSections([
    renderHeader(configuration, "ReAct agent (LCEL)"),
    [
      "import re",
      "from typing import Any, Dict",
      "",
      "from langchain_core.output_parsers import StrOutputParser",
      "from langchain_core.prompts import PromptTemplate",
      "from langchain_core.runnables import RunnableLambda",
      "from langchain_core.tools import tool",
      "from langchain_openai import ChatOpenAI"
    ],
    ...renderToolFunctions(configuration.tools),
    [renderToolList(configuration), "TOOLS_BY_NAME = {entry.name: entry for entry in tools}"],
    buildReactTemplate(configuration),
    shapeInput,
    chain,
    patterns,
    runAgent,
    main
  ]);
}

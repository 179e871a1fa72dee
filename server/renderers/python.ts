import type { Configuration, ToolSpec } from "../types/contracts.js";

export const INDENT = "    ";
export const DEFAULT_MODEL_HINT = "gpt-4.1-mini";

const PYTHON_KEYWORDS = new Set([
  "false", "none", "true", "and", "as", "assert", "async", "await", "break", "class", "continue", "def", "del",
  "elif", "else", "except", "finally", "for", "from", "global", "if", "import", "in", "is", "lambda",
  "nonlocal", "not", "or", "pass", "raise", "return", "try", "while", "with", "yield"
]);

/**
 * Python string literal. JSON escapes are a subset of Python's.
 */
export function pyString(value: string): string {
  return JSON.stringify(value);
}

export function pyBool(value: boolean): string {
  return value ? "True" : "False";
}

export function pyList(items: readonly string[]): string {
  return `[${items.join(", ")}]`;
}

export function pyIdentifier(name: string): string {
  return PYTHON_KEYWORDS.has(name) ? `${name}_` : name;
}

export function pyDocstring(text: string): string {
  const singleLine = text.replace(/\s+/g, " ").trim();
  return `"""${singleLine.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"""`;
}

/**
 * Body of a triple-quoted literal; the text keeps its line breaks.
 */
export function pyTripleQuotedBody(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/"""/g, '\\"\\"\\"');
}

export function pyComment(text: string): string {
  return `# ${text.replace(/\s+/g, " ").trim()}`;
}

export function indent(lines: readonly string[], depth = 1): string[] {
  const prefix = INDENT.repeat(depth);
  return lines.map((line) => (line.length > 0 ? `${prefix}${line}` : line));
}

export function joinSections(sections: ReadonlyArray<string | readonly string[]>): string {
  return `${sections
    .map((section) => (typeof section === "string" ? section : section.join("\n")))
    .filter((section) => section.length > 0)
    .join("\n\n\n")}\n`;
}

export const agentVar = (name: string): string => `agent_${name}`;
export const taskVar = (name: string): string => `task_${name}`;
export const toolVar = (name: string): string => `tool_${name}`;

export function renderHeader(configuration: Configuration, title: string): string[] {
  return [
    pyComment(`${title} generated from a natural-language workflow description.`),
    `PROCESS_TYPE = ${pyString(configuration.processType)}`,
    ...(configuration.managerAgent ? [`MANAGER_AGENT = ${pyString(configuration.managerAgent)}`] : [])
  ];
}

function toolParameters(tool: Readonly<ToolSpec>): Array<{ name: string; key: string }> {
  return Object.keys(tool.parameters).map((key) => ({ name: pyIdentifier(key), key }));
}

/**
 * `@tool` stubs for every declared tool. The decorator import differs between
 * CrewAI and LangChain; the function shape does not.
 */
export function renderToolFunctions(tools: Configuration["tools"]): string[] {
  return tools.map((tool) => {
    const parameters = toolParameters(tool);
    const signature = parameters.map((parameter) => `${parameter.name}: str`).join(", ");
    const inputs = parameters.map((parameter) => `${pyString(parameter.key)}: ${parameter.name}`).join(", ");
    const description = tool.description.length > 0 ? tool.description : `Run the ${tool.name} tool.`;
    return [
      `@tool(${pyString(tool.name)})`,
      `def ${toolVar(tool.name)}(${signature}) -> str:`,
      ...indent([
        pyDocstring(description),
        `inputs = {${inputs}}`,
        `return f"${tool.name} received {inputs}"`
      ])
    ].join("\n");
  });
}

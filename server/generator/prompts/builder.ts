import type { ProcessChoice, TargetFramework, ValidationIssue } from "../../types/contracts.js";
import { MalformedJsonError, NoJsonFoundError, ValidationFailure } from "../errors.js";
import { clip } from "../normalizers.js";
import { cleanWorkflowSteps } from "../workflowSteps.js";
import { FRAMEWORK_EXEMPLARS, FRAMEWORK_LABELS } from "./exemplars.js";

export interface GenerationPromptRequest {
  requestText: string;
  targetFramework: TargetFramework;
  processHint?: ProcessChoice;
  workflowSteps?: readonly string[];
}

const AGENT_SCHEMA_LINES = [
  '  "agents": [',
  '    { "name": "agent_name", "role": "specialized role", "goal": "clear goal", "backstory": "professional backstory", "tools": ["tool_name"], "llmHint": "optional model id", "allowDelegation": false, "verbose": true }',
  "  ],",
  '  "tools": [',
  '    { "name": "tool_name", "description": "what the tool does", "parameters": { "param_name": "parameter description" } }',
  "  ],"
];

const SCHEMA_LINES: Record<"tasks" | "graph" | "reasoning", string[]> = {
  tasks: [
    '  "tasks": [',
    '    { "name": "task_name", "description": "detailed task description", "expectedOutput": "specific expected output", "assignedAgent": "agent_name", "dependsOn": ["earlier_task_name"], "tools": ["tool_name"], "condition": "optional condition for running this task" }',
    "  ]"
  ],
  graph: [
    '  "nodes": [',
    '    { "name": "node_name", "description": "what happens in this node", "agent": "agent_name", "isEntryPoint": true, "isTerminal": false }',
    "  ],",
    '  "edges": [',
    '    { "source": "node_name", "target": "other_node_name", "condition": "optional routing condition" }',
    "  ]"
  ],
  reasoning: [
    '  "examples": [',
    '    { "query": "example user query", "thought": "reasoning", "action": "tool_name", "observation": "tool result", "finalAnswer": "answer" }',
    "  ]"
  ]
};

function schemaKind(framework: TargetFramework): keyof typeof SCHEMA_LINES {
  if (framework === "langgraph") {
    return "graph";
  }
  if (framework === "react" || framework === "react-lcel") {
    return "reasoning";
  }
  return "tasks";
}

function frameworkRules(framework: TargetFramework): string[] {
  switch (schemaKind(framework)) {
    case "tasks":
      return [
        "- Declare at least one agent and at least one task.",
        '- Every task must name its agent in "assignedAgent", using an exact agent name.',
        '- "dependsOn" lists names of other tasks that must finish first. Never create circular dependencies.',
        "- Assign each task to the agent whose role best matches it."
      ];
    case "graph":
      return [
        "- Declare at least one agent and at least one node; every node names its agent.",
        "- Every edge endpoint must be a declared node name. Do not create cycles.",
        "- Mark the first node with isEntryPoint=true and the final node(s) with isTerminal=true.",
        "- Every node must be reachable from the entry point."
      ];
    case "reasoning":
      return [
        "- Declare at least one agent.",
        "- Give every tool a parameters map naming its inputs.",
        "- Provide one or two examples that walk through Thought, Action, Observation and Final Answer."
      ];
  }
}

function processLines(processHint: ProcessChoice | undefined): string[] {
  const definitions = [
    "Process types:",
    "- sequential: tasks run one after another in order.",
    "- hierarchical: a manager agent coordinates the work and delegates to specialized agents."
  ];

  if (processHint === undefined || processHint === "auto") {
    return [
      ...definitions,
      `Choose "processType" ("sequential" or "hierarchical") and explain the choice in one line in "processRationale".`
    ];
  }

  return [...definitions, `Set "processType" to "${processHint}". This is fixed by the caller.`];
}

/**
 * Builds the single prompt sent to the completion client for a generation request.
 */
export function buildGenerationPrompt(request: GenerationPromptRequest): string {
  const framework = request.targetFramework;
  const steps = cleanWorkflowSteps(request.workflowSteps ?? []);
  const stepLines =
    steps.length > 0
      ? [
          "",
          "Workflow steps (create exactly one task per step, in this order):",
          ...steps.map((step, index) => `${index + 1}. ${step}`)
        ]
      : [];

  return [
    `You design multi-agent workflows for ${FRAMEWORK_LABELS[framework]}.`,
    "Based on the request below, propose the agents, their tools and the work they do.",
    "",
    "Return STRICT JSON only: exactly one JSON object and nothing else.",
    "No markdown fences. No prose before or after the JSON object. No comments.",
    "",
    "JSON schema:",
    "{",
    '  "processType": "sequential or hierarchical",',
    '  "processRationale": "one line",',
    '  "managerAgent": "agent_name (hierarchical only, optional)",',
    ...AGENT_SCHEMA_LINES,
    ...SCHEMA_LINES[schemaKind(framework)],
    "}",
    "",
    "Rules:",
    "- Names are lower_snake_case identifiers and unique within their list.",
    '- Every tool an agent or task uses must be declared in "tools".',
    ...frameworkRules(framework),
    "",
    ...processLines(request.processHint),
    ...stepLines,
    "",
    "Example response:",
    JSON.stringify(FRAMEWORK_EXEMPLARS[framework], null, 2),
    "",
    "Request:",
    request.requestText.trim()
  ].join("\n");
}

function describeIssue(issue: ValidationIssue): string {
  return `- ${issue.path}: ${issue.message}`;
}

function describeFailure(failure: Error): string[] {
  if (failure instanceof ValidationFailure) {
    return [
      "Previous output decoded but failed validation. Fix every problem below:",
      ...failure.issues.map(describeIssue)
    ];
  }
  if (failure instanceof MalformedJsonError) {
    return ["Previous output was invalid JSON.", `Decoder error: ${failure.message}`];
  }
  if (failure instanceof NoJsonFoundError) {
    return ["Previous output did not contain a JSON object."];
  }
  return [`Previous output was rejected: ${failure.message}`];
}

/**
 * Re-prompt after a parse or validation failure: the original prompt, the
 * diagnostics, and a clipped copy of the rejected completion.
 */
export function buildCorrectivePrompt(basePrompt: string, failure: Error, previousCompletion: string): string {
  return [
    basePrompt,
    "",
    ...describeFailure(failure),
    "",
    "Regenerate the FULL response now.",
    "Return one JSON object only. No markdown. No comments.",
    "",
    "Rejected previous output:",
    clip(previousCompletion, 12000)
  ].join("\n");
}

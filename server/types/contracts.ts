export const TARGET_FRAMEWORKS = ["crewai", "crewai-flow", "langgraph", "react", "react-lcel"] as const;
export const PROVIDER_IDS = ["openai", "claude", "watsonx", "ollama"] as const;

export type TargetFramework = (typeof TARGET_FRAMEWORKS)[number];
export type ProcessType = "sequential" | "hierarchical";
export type ProcessChoice = ProcessType | "auto";
export type OutputFormat = "code" | "json" | "both";
export type ProviderId = (typeof PROVIDER_IDS)[number];
export type ProcessDecisionSource = "explicit" | "model" | "heuristic";

export const GRAPH_FRAMEWORKS: ReadonlySet<TargetFramework> = new Set<TargetFramework>(["langgraph"]);
export const TASK_FRAMEWORKS: ReadonlySet<TargetFramework> = new Set<TargetFramework>(["crewai", "crewai-flow"]);

export interface AgentSpec {
  name: string;
  role: string;
  goal: string;
  backstory?: string;
  tools: string[];
  llmHint?: string;
  allowDelegation: boolean;
  verbose: boolean;
}

export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, string>;
}

export interface TaskSpec {
  name: string;
  description: string;
  expectedOutput: string;
  assignedAgent: string;
  dependsOn: string[];
  tools: string[];
  condition?: string;
}

export interface GraphNode {
  name: string;
  agent: string;
  description?: string;
  isEntryPoint: boolean;
  isTerminal: boolean;
}

export interface GraphEdge {
  source: string;
  target: string;
  condition?: string;
}

export interface ReasoningExample {
  query: string;
  thought: string;
  action: string;
  observation: string;
  finalAnswer: string;
}

/**
 * Validated configuration before the execution topology is settled.
 * `processType` and `processRationale` carry the model's recommendation, if any.
 */
export interface ConfigurationDraft {
  targetFramework: TargetFramework;
  processType?: ProcessType;
  processRationale?: string;
  managerAgent?: string;
  agents: AgentSpec[];
  tools: ToolSpec[];
  tasks: TaskSpec[];
  nodes: GraphNode[];
  edges: GraphEdge[];
  examples: ReasoningExample[];
}

export interface Configuration {
  readonly targetFramework: TargetFramework;
  readonly processType: ProcessType;
  readonly managerAgent?: string;
  readonly agents: readonly Readonly<AgentSpec>[];
  readonly tools: readonly Readonly<ToolSpec>[];
  readonly tasks: readonly Readonly<TaskSpec>[];
  readonly nodes: readonly Readonly<GraphNode>[];
  readonly edges: readonly Readonly<GraphEdge>[];
  readonly examples: readonly Readonly<ReasoningExample>[];
}

export interface ProcessDecision {
  processType: ProcessType;
  source: ProcessDecisionSource;
  rationale: string;
}

export type ValidationRule =
  | "schema"
  | "framework_shape"
  | "duplicate_name"
  | "unresolved_reference"
  | "dependency_cycle"
  | "missing_entry_point"
  | "missing_terminal"
  | "unreachable_node"
  | "duplicate_condition"
  | "hierarchy";

export interface ValidationIssue {
  path: string;
  rule: ValidationRule;
  message: string;
}

export interface ProviderSettings {
  id: ProviderId;
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  projectId?: string;
  iamUrl?: string;
}

export function isTargetFramework(value: unknown): value is TargetFramework {
  return TARGET_FRAMEWORKS.some((framework) => framework === value);
}

export function isProviderId(value: unknown): value is ProviderId {
  return PROVIDER_IDS.some((providerId) => providerId === value);
}

import type { ProcessType, TargetFramework } from "../types/contracts.js";

const DEFAULT_TOOL_PARAMETERS: Readonly<Record<string, string>> = { query: "Input for the tool" };
const GRAPH_START_MARKERS = new Set(["START", "__START__"]);
const GRAPH_END_MARKERS = new Set(["END", "__END__"]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function clip(value: string, maxLength: number): string {
  const trimmed = value.trim();
  if (trimmed.length <= maxLength) {
    return trimmed;
  }
  return `${trimmed.slice(0, maxLength)}\n...[truncated]`;
}

/**
 * Canonical form shared by every name and every reference to a name.
 */
export function normalizeIdentifier(value: string): string {
  const collapsed = value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, "_")
    .replace(/_{2,}/g, "_")
    .replace(/^_+|_+$/g, "");
  return /^[0-9]/.test(collapsed) ? `_${collapsed}` : collapsed;
}

function firstDefined(record: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined) {
      return record[key];
    }
  }
  return undefined;
}

function normalizeName(value: unknown): unknown {
  if (typeof value === "string") {
    return normalizeIdentifier(value);
  }
  if (isRecord(value) && typeof value.name === "string") {
    return normalizeIdentifier(value.name);
  }
  return value;
}

function normalizeOptionalName(value: unknown): unknown {
  if (value === null || (typeof value === "string" && value.trim().length === 0)) {
    return undefined;
  }
  return normalizeName(value);
}

function normalizeText(value: unknown): unknown {
  return typeof value === "string" ? value.trim() : value;
}

function normalizeOptionalText(value: unknown): unknown {
  if (typeof value !== "string") {
    return value === null ? undefined : value;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeNameList(value: unknown): unknown {
  if (value === undefined || value === null) {
    return [];
  }
  if (typeof value === "string") {
    return value.trim().length > 0 ? [normalizeIdentifier(value)] : [];
  }
  if (!Array.isArray(value)) {
    return value;
  }
  const names = value.map((entry) => normalizeName(entry));
  return names.filter((name, index) => typeof name !== "string" || names.indexOf(name) === index);
}

function normalizeFlag(value: unknown): unknown {
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (lowered === "true" || lowered === "yes") return true;
    if (lowered === "false" || lowered === "no") return false;
  }
  return value;
}

export function normalizeProcessType(value: unknown): ProcessType | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim().toLowerCase().replace(/^process\./, "");
  if (normalized === "sequential") return "sequential";
  if (normalized === "hierarchical") return "hierarchical";
  return undefined;
}

function normalizeAgent(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  return {
    name: normalizeName(raw.name),
    role: normalizeText(raw.role),
    goal: normalizeText(raw.goal),
    backstory: normalizeOptionalText(raw.backstory),
    tools: normalizeNameList(raw.tools),
    llmHint: normalizeOptionalText(firstDefined(raw, ["llmHint", "llm_hint", "llm", "model"])),
    allowDelegation: normalizeFlag(firstDefined(raw, ["allowDelegation", "allow_delegation"])),
    verbose: normalizeFlag(raw.verbose)
  };
}

function normalizeToolParameters(value: unknown): unknown {
  if (value === undefined || value === null) {
    return { ...DEFAULT_TOOL_PARAMETERS };
  }
  if (!isRecord(value)) {
    return value;
  }

  const entries = Object.entries(value)
    .map(([key, description]): [string, unknown] => [
      normalizeIdentifier(key),
      isRecord(description) ? normalizeText(description.description) : normalizeText(description)
    ])
    .filter(([key]) => key.length > 0);

  return entries.length > 0 ? Object.fromEntries(entries) : { ...DEFAULT_TOOL_PARAMETERS };
}

function normalizeTool(raw: unknown): unknown {
  if (typeof raw === "string") {
    return { name: normalizeIdentifier(raw), description: "", parameters: { ...DEFAULT_TOOL_PARAMETERS } };
  }
  if (!isRecord(raw)) {
    return raw;
  }

  return {
    name: normalizeName(raw.name),
    description: raw.description === undefined || raw.description === null ? "" : normalizeText(raw.description),
    parameters: normalizeToolParameters(raw.parameters)
  };
}

function normalizeTask(raw: unknown, index: number): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const name = raw.name === undefined || raw.name === null ? `task_${index + 1}` : raw.name;
  return {
    name: normalizeName(name),
    description: normalizeText(raw.description),
    expectedOutput: normalizeText(firstDefined(raw, ["expectedOutput", "expected_output"])),
    assignedAgent: normalizeName(firstDefined(raw, ["assignedAgent", "assigned_agent", "agent"])),
    dependsOn: normalizeNameList(firstDefined(raw, ["dependsOn", "depends_on", "context"])),
    tools: normalizeNameList(raw.tools),
    condition: normalizeOptionalText(raw.condition)
  };
}

function normalizeExample(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  return {
    query: normalizeText(raw.query),
    thought: normalizeText(raw.thought),
    action: normalizeText(raw.action),
    observation: normalizeText(raw.observation),
    finalAnswer: normalizeText(firstDefined(raw, ["finalAnswer", "final_answer"]))
  };
}

function isGraphMarker(value: unknown, markers: ReadonlySet<string>): boolean {
  return typeof value === "string" && markers.has(value.trim().toUpperCase());
}

/**
 * Folds START/END pseudo-edges into node flags, then fills in the default entry
 * point and terminal nodes when the model marked none.
 */
function normalizeGraph(rawNodes: unknown, rawEdges: unknown): { nodes: unknown; edges: unknown } {
  const entryNames = new Set<string>();
  const terminalNames = new Set<string>();

  let edges: unknown = rawEdges ?? [];
  if (Array.isArray(rawEdges)) {
    const kept: unknown[] = [];
    for (const edge of rawEdges) {
      if (!isRecord(edge)) {
        kept.push(edge);
        continue;
      }

      const source = firstDefined(edge, ["source", "from"]);
      const target = firstDefined(edge, ["target", "to"]);
      if (isGraphMarker(target, GRAPH_END_MARKERS) && typeof source === "string") {
        terminalNames.add(normalizeIdentifier(source));
        continue;
      }
      if (isGraphMarker(source, GRAPH_START_MARKERS) && typeof target === "string") {
        entryNames.add(normalizeIdentifier(target));
        continue;
      }

      kept.push({
        source: normalizeName(source),
        target: normalizeName(target),
        condition: normalizeOptionalText(edge.condition)
      });
    }
    edges = kept;
  }

  if (!Array.isArray(rawNodes)) {
    return { nodes: rawNodes ?? [], edges };
  }

  const nodes = rawNodes.map((node) => {
    if (!isRecord(node)) {
      return node;
    }

    const name = normalizeName(node.name);
    const explicitEntry = normalizeFlag(firstDefined(node, ["isEntryPoint", "is_entry_point", "entryPoint", "entry_point"]));
    const explicitTerminal = normalizeFlag(firstDefined(node, ["isTerminal", "is_terminal", "terminal"]));
    return {
      name,
      agent: normalizeName(node.agent ?? node.name),
      description: normalizeOptionalText(node.description),
      isEntryPoint: explicitEntry === true || (typeof name === "string" && entryNames.has(name)),
      isTerminal: explicitTerminal === true || (typeof name === "string" && terminalNames.has(name))
    };
  });

  const records = nodes.filter(isRecord);
  if (records.length > 0 && !records.some((node) => node.isEntryPoint === true)) {
    records[0].isEntryPoint = true;
  }

  if (!records.some((node) => node.isTerminal === true)) {
    const sources = new Set<unknown>(Array.isArray(edges) ? edges.filter(isRecord).map((edge) => edge.source) : []);
    for (const node of records) {
      if (!sources.has(node.name)) {
        node.isTerminal = true;
      }
    }
  }

  return { nodes, edges };
}

function mapList(value: unknown, mapper: (entry: unknown, index: number) => unknown): unknown {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value.map(mapper) : value;
}

/**
 * Rewrites a decoded completion into the configuration draft's field names and
 * canonical identifiers. Shape errors are left for schema validation to report.
 */
export function normalizeConfigurationDraft(raw: unknown, targetFramework: TargetFramework): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const wrapped = raw.agents === undefined ? firstDefined(raw, ["configuration", "config", "workflow"]) : undefined;
  const source = isRecord(wrapped) ? wrapped : raw;

  const usesTasks = targetFramework !== "langgraph";
  const usesGraph = targetFramework === "langgraph";
  const graph = usesGraph ? normalizeGraph(source.nodes, source.edges) : { nodes: [], edges: [] };

  return {
    targetFramework,
    processType: normalizeProcessType(firstDefined(source, ["processType", "process_type", "process"])),
    processRationale: normalizeOptionalText(firstDefined(source, ["processRationale", "process_rationale", "rationale"])),
    managerAgent: normalizeOptionalName(firstDefined(source, ["managerAgent", "manager_agent", "manager"])),
    agents: mapList(source.agents, normalizeAgent),
    tools: mapList(source.tools, normalizeTool),
    tasks: usesTasks ? mapList(source.tasks, normalizeTask) : [],
    nodes: graph.nodes,
    edges: graph.edges,
    examples: mapList(source.examples, normalizeExample)
  };
}

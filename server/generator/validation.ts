import type { ZodIssue } from "zod";
import { GRAPH_FRAMEWORKS, TASK_FRAMEWORKS } from "../types/contracts.js";
import type {
  ConfigurationDraft,
  GraphEdge,
  GraphNode,
  TargetFramework,
  TaskSpec,
  ValidationIssue
} from "../types/contracts.js";

interface FrameworkShape {
  agents: boolean;
  tasks: boolean;
  nodes: boolean;
}

const FRAMEWORK_SHAPES: Record<TargetFramework, FrameworkShape> = {
  crewai: { agents: true, tasks: true, nodes: false },
  "crewai-flow": { agents: true, tasks: true, nodes: false },
  langgraph: { agents: true, tasks: false, nodes: true },
  react: { agents: true, tasks: false, nodes: false },
  "react-lcel": { agents: true, tasks: false, nodes: false }
};

export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let formatted = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      formatted += `[${segment}]`;
    } else {
      formatted += formatted.length === 0 ? segment : `.${segment}`;
    }
  }
  return formatted.length > 0 ? formatted : "(root)";
}

export function issuesFromZod(issues: ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    path: formatIssuePath(issue.path),
    rule: "schema",
    message: issue.message
  }));
}

function checkFrameworkShape(draft: ConfigurationDraft, issues: ValidationIssue[]): void {
  const shape = FRAMEWORK_SHAPES[draft.targetFramework];
  const required: Array<[keyof FrameworkShape, number]> = [
    ["agents", draft.agents.length],
    ["tasks", draft.tasks.length],
    ["nodes", draft.nodes.length]
  ];

  for (const [collection, size] of required) {
    if (shape[collection] && size === 0) {
      issues.push({
        path: collection,
        rule: "framework_shape",
        message: `${draft.targetFramework} configurations need at least one entry in "${collection}".`
      });
    }
  }
}

function checkDuplicates(collection: string, names: string[], issues: ValidationIssue[]): void {
  const seen = new Set<string>();
  names.forEach((name, index) => {
    if (seen.has(name)) {
      issues.push({
        path: `${collection}[${index}].name`,
        rule: "duplicate_name",
        message: `Name "${name}" is declared more than once in ${collection}.`
      });
    }
    seen.add(name);
  });
}

function checkReference(
  known: ReadonlySet<string>,
  value: string,
  path: string,
  message: string,
  issues: ValidationIssue[]
): void {
  if (!known.has(value)) {
    issues.push({ path, rule: "unresolved_reference", message });
  }
}

/**
 * Depth-first search over `adjacency`; returns every cycle found, each as the
 * list of names along it with the first name repeated at the end.
 */
export function findCycles(names: string[], adjacency: ReadonlyMap<string, readonly string[]>): string[][] {
  const state = new Map<string, "visiting" | "done">();
  const trail: string[] = [];
  const cycles: string[][] = [];

  const visit = (name: string): void => {
    state.set(name, "visiting");
    trail.push(name);

    for (const next of adjacency.get(name) ?? []) {
      const nextState = state.get(next);
      if (nextState === "visiting") {
        cycles.push([...trail.slice(trail.indexOf(next)), next]);
      } else if (nextState === undefined && adjacency.has(next)) {
        visit(next);
      }
    }

    trail.pop();
    state.set(name, "done");
  };

  for (const name of names) {
    if (!state.has(name)) {
      visit(name);
    }
  }

  return cycles;
}

function taskDependencyMap(tasks: readonly TaskSpec[]): Map<string, string[]> {
  const known = new Set(tasks.map((task) => task.name));
  return new Map(tasks.map((task) => [task.name, task.dependsOn.filter((dependency) => known.has(dependency))]));
}

function edgeMap(nodes: readonly GraphNode[], edges: readonly GraphEdge[]): Map<string, string[]> {
  const adjacency = new Map<string, string[]>(nodes.map((node) => [node.name, []]));
  for (const edge of edges) {
    const targets = adjacency.get(edge.source);
    if (targets && adjacency.has(edge.target)) {
      targets.push(edge.target);
    }
  }
  return adjacency;
}

function reachableFrom(starts: readonly string[], adjacency: ReadonlyMap<string, readonly string[]>): Set<string> {
  const reached = new Set<string>();
  const queue = [...starts];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || reached.has(current)) {
      continue;
    }
    reached.add(current);
    queue.push(...(adjacency.get(current) ?? []));
  }
  return reached;
}

function checkGraph(draft: ConfigurationDraft, issues: ValidationIssue[]): void {
  if (draft.nodes.length === 0) {
    return;
  }

  const entries = draft.nodes.filter((node) => node.isEntryPoint);
  if (entries.length === 0) {
    issues.push({
      path: "nodes",
      rule: "missing_entry_point",
      message: "No node is marked as the graph entry point."
    });
    return;
  }

  const reached = reachableFrom(
    entries.map((node) => node.name),
    edgeMap(draft.nodes, draft.edges)
  );

  if (!draft.nodes.some((node) => node.isTerminal && reached.has(node.name))) {
    issues.push({
      path: "nodes",
      rule: "missing_terminal",
      message: "No terminal node is reachable from the entry point."
    });
  }

  draft.nodes.forEach((node, index) => {
    if (!reached.has(node.name)) {
      issues.push({
        path: `nodes[${index}]`,
        rule: "unreachable_node",
        message: `Node "${node.name}" cannot be reached from any entry point.`
      });
    }
  });
}

/**
 * Conditional edges leaving one node are keyed by their condition text, so
 * each condition may appear once per source.
 */
function checkDuplicateConditions(edges: readonly GraphEdge[], issues: ValidationIssue[]): void {
  const seen = new Map<string, Set<string>>();
  edges.forEach((edge, index) => {
    if (!edge.condition) {
      return;
    }
    const conditions = seen.get(edge.source) ?? new Set<string>();
    if (conditions.has(edge.condition)) {
      issues.push({
        path: `edges[${index}].condition`,
        rule: "duplicate_condition",
        message: `Node "${edge.source}" has more than one edge with condition "${edge.condition}".`
      });
    }
    conditions.add(edge.condition);
    seen.set(edge.source, conditions);
  });
}

/**
 * Referential and structural checks over a draft whose shape already passed
 * schema validation. Returns every violation found; an empty list means the
 * draft is consistent.
 */
export function validateConfigurationDraft(draft: ConfigurationDraft): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  checkFrameworkShape(draft, issues);

  checkDuplicates("agents", draft.agents.map((agent) => agent.name), issues);
  checkDuplicates("tools", draft.tools.map((tool) => tool.name), issues);
  checkDuplicates("tasks", draft.tasks.map((task) => task.name), issues);
  checkDuplicates("nodes", draft.nodes.map((node) => node.name), issues);

  const agentNames = new Set(draft.agents.map((agent) => agent.name));
  const toolNames = new Set(draft.tools.map((tool) => tool.name));
  const taskNames = new Set(draft.tasks.map((task) => task.name));
  const nodeNames = new Set(draft.nodes.map((node) => node.name));

  draft.agents.forEach((agent, agentIndex) => {
    agent.tools.forEach((tool, toolIndex) => {
      checkReference(
        toolNames,
        tool,
        `agents[${agentIndex}].tools[${toolIndex}]`,
        `Agent "${agent.name}" uses tool "${tool}", which is not declared.`,
        issues
      );
    });
  });

  draft.tasks.forEach((task, taskIndex) => {
    checkReference(
      agentNames,
      task.assignedAgent,
      `tasks[${taskIndex}].assignedAgent`,
      `Task "${task.name}" is assigned to agent "${task.assignedAgent}", which is not declared.`,
      issues
    );
    task.dependsOn.forEach((dependency, dependencyIndex) => {
      checkReference(
        taskNames,
        dependency,
        `tasks[${taskIndex}].dependsOn[${dependencyIndex}]`,
        `Task "${task.name}" depends on task "${dependency}", which is not declared.`,
        issues
      );
    });
    task.tools.forEach((tool, toolIndex) => {
      checkReference(
        toolNames,
        tool,
        `tasks[${taskIndex}].tools[${toolIndex}]`,
        `Task "${task.name}" uses tool "${tool}", which is not declared.`,
        issues
      );
    });
  });

  draft.nodes.forEach((node, nodeIndex) => {
    checkReference(
      agentNames,
      node.agent,
      `nodes[${nodeIndex}].agent`,
      `Node "${node.name}" runs agent "${node.agent}", which is not declared.`,
      issues
    );
  });

  draft.edges.forEach((edge, edgeIndex) => {
    const label = `Edge "${edge.source}" -> "${edge.target}"`;
    checkReference(
      nodeNames,
      edge.source,
      `edges[${edgeIndex}].source`,
      `${label} starts at node "${edge.source}", which is not declared.`,
      issues
    );
    checkReference(
      nodeNames,
      edge.target,
      `edges[${edgeIndex}].target`,
      `${label} ends at node "${edge.target}", which is not declared.`,
      issues
    );
  });

  if (draft.managerAgent !== undefined) {
    checkReference(
      agentNames,
      draft.managerAgent,
      "managerAgent",
      `Manager agent "${draft.managerAgent}" is not declared.`,
      issues
    );
  }

  checkDuplicateConditions(draft.edges, issues);

  const taskIndexByName = new Map(draft.tasks.map((task, index) => [task.name, index]));
  for (const cycle of findCycles(draft.tasks.map((task) => task.name), taskDependencyMap(draft.tasks))) {
    issues.push({
      path: `tasks[${taskIndexByName.get(cycle[0]) ?? 0}].dependsOn`,
      rule: "dependency_cycle",
      message: `Task dependencies form a cycle: ${cycle.join(" -> ")}.`
    });
  }

  const nodeIndexByName = new Map(draft.nodes.map((node, index) => [node.name, index]));
  for (const cycle of findCycles(draft.nodes.map((node) => node.name), edgeMap(draft.nodes, draft.edges))) {
    issues.push({
      path: `nodes[${nodeIndexByName.get(cycle[0]) ?? 0}]`,
      rule: "dependency_cycle",
      message: `Graph edges form a cycle: ${cycle.join(" -> ")}.`
    });
  }

  checkGraph(draft, issues);
  return issues;
}

/**
 * Checks that a hierarchical process has something to manage. Crews need at
 * least one subordinate agent; graphs need the manager to run a node from
 * which every other node can be reached.
 */
export function validateHierarchy(draft: ConfigurationDraft, managerAgent: string | undefined): ValidationIssue[] {
  if (managerAgent === undefined) {
    return [{ path: "agents", rule: "hierarchy", message: "A hierarchical process needs a manager agent." }];
  }

  if (TASK_FRAMEWORKS.has(draft.targetFramework) && !draft.agents.some((agent) => agent.name !== managerAgent)) {
    return [
      {
        path: "agents",
        rule: "hierarchy",
        message: `A hierarchical process needs at least one agent besides the manager "${managerAgent}".`
      }
    ];
  }

  if (!GRAPH_FRAMEWORKS.has(draft.targetFramework)) {
    return [];
  }

  const managed = draft.nodes.filter((node) => node.agent === managerAgent).map((node) => node.name);
  if (managed.length === 0) {
    return [
      {
        path: "managerAgent",
        rule: "hierarchy",
        message: `Manager agent "${managerAgent}" does not run any node.`
      }
    ];
  }

  const reached = reachableFrom(managed, edgeMap(draft.nodes, draft.edges));
  const issues: ValidationIssue[] = [];
  draft.nodes.forEach((node, index) => {
    if (!reached.has(node.name)) {
      issues.push({
        path: `nodes[${index}]`,
        rule: "hierarchy",
        message: `Node "${node.name}" cannot be reached from a node run by the manager "${managerAgent}".`
      });
    }
  });
  return issues;
}

/**
 * Kahn's algorithm over `dependsOn`, always releasing the earliest declared
 * ready task so the order is stable. Expects an acyclic, fully resolved list.
 */
export function orderTasksByDependencies<T extends Pick<TaskSpec, "name" | "dependsOn">>(tasks: readonly T[]): T[] {
  const remaining = new Map(tasks.map((task) => [task.name, new Set(task.dependsOn)]));
  const ordered: T[] = [];

  while (ordered.length < tasks.length) {
    const next = tasks.find((task) => remaining.get(task.name)?.size === 0);
    if (!next) {
      throw new Error("Task dependencies contain a cycle or an unresolved reference.");
    }

    ordered.push(next);
    remaining.delete(next.name);
    for (const dependencies of remaining.values()) {
      dependencies.delete(next.name);
    }
  }

  return ordered;
}

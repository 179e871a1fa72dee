import { z } from "zod";
import { TARGET_FRAMEWORKS } from "../types/contracts.js";

const identifierSchema = z
  .string()
  .min(1)
  .max(80)
  .regex(/^[a-z_][a-z0-9_]*$/, "Expected an identifier-safe name (lower-case letters, digits and underscores).");

const requiredText = z.string().min(1).max(4000);

export const agentSpecSchema = z.object({
  name: identifierSchema,
  role: requiredText,
  goal: requiredText,
  backstory: z.string().max(8000).optional(),
  tools: z.array(identifierSchema).max(40).default([]),
  llmHint: z.string().max(200).optional(),
  allowDelegation: z.boolean().default(false),
  verbose: z.boolean().default(true)
});

export const toolSpecSchema = z.object({
  name: identifierSchema,
  description: z.string().max(4000).default(""),
  parameters: z.record(z.string().max(1000)).default({})
});

export const taskSpecSchema = z.object({
  name: identifierSchema,
  description: requiredText,
  expectedOutput: requiredText,
  assignedAgent: identifierSchema,
  dependsOn: z.array(identifierSchema).max(40).default([]),
  tools: z.array(identifierSchema).max(40).default([]),
  condition: z.string().max(1000).optional()
});

export const graphNodeSchema = z.object({
  name: identifierSchema,
  agent: identifierSchema,
  description: z.string().max(4000).optional(),
  isEntryPoint: z.boolean().default(false),
  isTerminal: z.boolean().default(false)
});

export const graphEdgeSchema = z.object({
  source: identifierSchema,
  target: identifierSchema,
  condition: z.string().max(1000).optional()
});

export const reasoningExampleSchema = z.object({
  query: requiredText,
  thought: requiredText,
  action: requiredText,
  observation: requiredText,
  finalAnswer: requiredText
});

const targetFrameworkSchema = z.enum(TARGET_FRAMEWORKS);

export const configurationDraftSchema = z.object({
  targetFramework: targetFrameworkSchema,
  processType: z.enum(["sequential", "hierarchical"]).optional(),
  processRationale: z.string().max(2000).optional(),
  managerAgent: identifierSchema.optional(),
  agents: z.array(agentSpecSchema).max(40).default([]),
  tools: z.array(toolSpecSchema).max(80).default([]),
  tasks: z.array(taskSpecSchema).max(80).default([]),
  nodes: z.array(graphNodeSchema).max(80).default([]),
  edges: z.array(graphEdgeSchema).max(200).default([]),
  examples: z.array(reasoningExampleSchema).max(20).default([])
});

import * as z from "zod/v4";

import type { FlowNode } from "../core/model.js";

const NameList = z.array(z.string());

export const ModuleCountSchema = z.object({
  module: z.string(),
  count: z.number(),
});

export const PackageCountSchema = z.object({
  name: z.string(),
  count: z.number(),
});

export const MetricsSchema = z.object({
  totalModules: z.number(),
  totalInternalDeps: z.number(),
  totalExternalDeps: z.number(),
  circularDependencies: z.number(),
  highFanOut: z.array(ModuleCountSchema),
  highFanIn: z.array(ModuleCountSchema),
  topExternalPackages: z.array(PackageCountSchema),
});

export const PatternsSchema = z.object({
  authenticationFunctions: NameList,
  dataProcessingFunctions: NameList,
});

export const FunctionNodeSchema = z.object({
  name: z.string(),
  file: z.string(),
  params: NameList,
  returns: z.string().nullable(),
  line: z.number(),
  decorators: NameList,
});

export const AnalysisDocumentSchema = z.object({
  root: z.string(),
  moduleDependencies: z.record(z.string(), NameList),
  externalDependencies: z.record(z.string(), z.number()),
  packageStructure: z.record(z.string(), NameList),
  circularDependencies: z.array(NameList),
  cyclicGroups: z.array(NameList),
  metrics: MetricsSchema,
  layers: z.record(z.string(), NameList),
  functions: z.record(z.string(), FunctionNodeSchema),
  callGraph: z.record(z.string(), NameList),
  duplicateFunctions: NameList,
  summary: z.object({
    filesScanned: z.number(),
    filesParsed: z.number(),
    filesFailed: z.number(),
    totalFunctions: z.number(),
    totalCalls: z.number(),
  }),
  patterns: PatternsSchema,
  failures: z.array(z.object({ file: z.string(), reason: z.string() })),
});

export const FlowNodeSchema: z.ZodType<FlowNode> = z.lazy(() =>
  z.object({
    function: z.string(),
    calls: z.array(FlowNodeSchema),
  })
);

export const FlowDocumentSchema = z.object({
  root: z.string(),
  start: z.string(),
  maxDepth: z.number(),
  flow: FlowNodeSchema,
  patterns: PatternsSchema,
});

export const PatternKindSchema = z.enum(["auth", "data", "all"]);

export const DiagramKindSchema = z.enum([
  "package",
  "module",
  "circular",
  "external",
  "architecture",
  "flow",
  "call_graph",
]);

export type DiagramKind = z.infer<typeof DiagramKindSchema>;

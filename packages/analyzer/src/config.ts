/**
 * Analyzer configuration: defaults, structmap.config.json, environment, overrides.
 */

import path from "node:path";

import * as z from "zod/v4";

import { type Result, Ok, Err, ConfigurationError, tryCatch } from "@structmap/core";

import type { FileSystem } from "./core/ports/FileSystem.js";

export const CONFIG_FILENAME = "structmap.config.json";

export const DEFAULT_EXCLUDE_DIRS: readonly string[] = [
  "node_modules",
  "venv",
  ".venv",
  ".git",
  "__pycache__",
  "dist",
  "build",
  "coverage",
  ".pytest_cache",
  ".next",
];

const DEFAULT_AUTH_KEYWORDS = ["auth", "login", "token", "verify", "authenticate", "session"];
const DEFAULT_DATA_KEYWORDS = ["process", "transform", "parse", "validate", "sanitize", "format"];

const count = z.number().int().nonnegative();

const LimitsSchema = z.object({
  fanIn: count.default(10),
  fanOut: count.default(10),
  external: count.default(15),
});

const TraceSchema = z.object({
  maxDepth: count.default(5),
});

const KeywordsSchema = z.object({
  authentication: z.array(z.string().min(1)).default(DEFAULT_AUTH_KEYWORDS),
  dataProcessing: z.array(z.string().min(1)).default(DEFAULT_DATA_KEYWORDS),
});

// zod/v4 does not parse a default value, so nested defaults are spelled out
export const AnalyzerConfigSchema = z.object({
  excludeDirs: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDE_DIRS]),
  skipTestFiles: z.boolean().default(false),
  classification: z.enum(["pre-index", "discovery-order"]).default("pre-index"),
  limits: LimitsSchema.default({ fanIn: 10, fanOut: 10, external: 15 }),
  trace: TraceSchema.default({ maxDepth: 5 }),
  keywords: KeywordsSchema.default({
    authentication: DEFAULT_AUTH_KEYWORDS,
    dataProcessing: DEFAULT_DATA_KEYWORDS,
  }),
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;
export type AnalyzerConfigInput = z.input<typeof AnalyzerConfigSchema>;

export interface LoadConfigOptions {
  fs: FileSystem;
  env?: Record<string, string | undefined>;
  /** Explicit config file; a missing file is an error */
  configPath?: string;
  overrides?: AnalyzerConfigInput;
}

export function defaultConfig(): AnalyzerConfig {
  return AnalyzerConfigSchema.parse({});
}

function validate(input: unknown, source: string): Result<AnalyzerConfig, ConfigurationError> {
  const result = AnalyzerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    return Err(new ConfigurationError(`Invalid config in ${source}`, issues));
  }
  return Ok(result.data);
}

function merge(base: AnalyzerConfig, patch: AnalyzerConfigInput): AnalyzerConfigInput {
  return {
    ...base,
    ...patch,
    limits: { ...base.limits, ...patch.limits },
    trace: { ...base.trace, ...patch.trace },
    keywords: { ...base.keywords, ...patch.keywords },
  };
}

function readConfigFile(
  rootPath: string,
  options: LoadConfigOptions
): Result<{ source: string; raw: unknown } | null, ConfigurationError> {
  const explicit = options.configPath !== undefined;
  const file = options.configPath ?? path.join(rootPath, CONFIG_FILENAME);

  if (!options.fs.exists(file)) {
    return explicit ? Err(new ConfigurationError(`Config file not found: ${file}`)) : Ok(null);
  }

  const content = options.fs.read(file);
  if (!content.ok) {
    return Err(new ConfigurationError(`Could not read ${file}: ${content.error.message}`));
  }

  const parsed = tryCatch((): unknown => JSON.parse(content.value));
  if (!parsed.ok) {
    return Err(new ConfigurationError(`Failed to parse ${file}: ${parsed.error.message}`));
  }

  return Ok({ source: file, raw: parsed.value });
}

function fromEnv(
  config: AnalyzerConfig,
  env: Record<string, string | undefined>
): Result<AnalyzerConfigInput, ConfigurationError> {
  const patch: AnalyzerConfigInput = {};

  const exclude = env.STRUCTMAP_EXCLUDE?.split(",")
    .map((dir) => dir.trim())
    .filter((dir) => dir.length > 0);
  if (exclude && exclude.length > 0) {
    patch.excludeDirs = [...config.excludeDirs, ...exclude];
  }

  const depth = env.STRUCTMAP_TRACE_DEPTH?.trim();
  if (depth) {
    patch.trace = { maxDepth: Number(depth) };
  }

  const classification = env.STRUCTMAP_CLASSIFICATION?.trim();
  if (classification === "pre-index" || classification === "discovery-order") {
    patch.classification = classification;
  } else if (classification) {
    return Err(
      new ConfigurationError("Invalid config in environment", [
        `STRUCTMAP_CLASSIFICATION: expected "pre-index" or "discovery-order", got "${classification}"`,
      ])
    );
  }

  return Ok(patch);
}

/**
 * Resolve the configuration for an analysis of `rootPath`.
 * Later sources win: defaults, config file, environment, overrides.
 */
export function loadConfig(
  rootPath: string,
  options: LoadConfigOptions
): Result<AnalyzerConfig, ConfigurationError> {
  const file = readConfigFile(rootPath, options);
  if (!file.ok) return file;

  const fromFile = file.value ? validate(file.value.raw, file.value.source) : Ok(defaultConfig());
  if (!fromFile.ok) return fromFile;

  const envPatch = fromEnv(fromFile.value, options.env ?? {});
  if (!envPatch.ok) return envPatch;

  const withEnv = validate(merge(fromFile.value, envPatch.value), "environment");
  if (!withEnv.ok) return withEnv;

  return options.overrides ? validate(merge(withEnv.value, options.overrides), "overrides") : withEnv;
}

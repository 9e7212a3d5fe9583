/**
 * Analysis workspace - loads configuration per root and keeps the latest session.
 */

import { type Logger, Ok, type Result, silentLogger } from "@structmap/core";

import { type AnalyzerConfigInput, loadConfig } from "./config.js";
import type { FileSystem } from "./core/ports/FileSystem.js";
import {
  type AnalysisSession,
  type DependencyAnalyzer,
  resolveAnalysisRoot,
} from "./core/services/DependencyAnalyzer.js";

export interface AnalysisWorkspaceOptions {
  analyzer: DependencyAnalyzer;
  fs: FileSystem;
  /** Root analysed when none is given */
  defaultRoot: string;
  env?: Record<string, string | undefined>;
  configPath?: string;
  overrides?: AnalyzerConfigInput;
  logger?: Logger;
}

export class AnalysisWorkspace {
  private session: AnalysisSession | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: AnalysisWorkspaceOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  current(): AnalysisSession | null {
    return this.session;
  }

  /**
   * Analyse `rootPath` (default: the workspace root). A successful session
   * replaces the stored one; a failed analysis leaves it untouched.
   */
  async analyze(rootPath: string = this.options.defaultRoot): Promise<Result<AnalysisSession, Error>> {
    const root = resolveAnalysisRoot(rootPath, this.options.fs);
    if (!root.ok) return root;

    const config = loadConfig(root.value, {
      fs: this.options.fs,
      env: this.options.env,
      configPath: this.options.configPath,
      overrides: this.options.overrides,
    });
    if (!config.ok) {
      this.logger.error("Invalid configuration", config.error);
      return config;
    }

    const result = await this.options.analyzer.analyze(root.value, config.value);
    if (result.ok) {
      this.session = result.value;
    }
    return result;
  }

  /**
   * The stored session, analysing the workspace root first if there is none.
   */
  async ensureSession(): Promise<Result<AnalysisSession, Error>> {
    if (this.session) {
      return Ok(this.session);
    }
    return this.analyze();
  }
}

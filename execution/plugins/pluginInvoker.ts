import crypto from "node:crypto";
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import type BetterSqlite3 from "better-sqlite3";
import { logger } from "../../config/logger.js";
import { getPluginInstallDir, getPluginRunDir } from "../../config/paths.js";
import type { PluginDefinition } from "../../projects/manifest.schema.js";
import type { ProjectContext } from "../../projects/manifestLoader.js";
import { finishPipelineRun, startPipelineRun } from "../../state/pipelineRuns.js";
import { RunCancelledError } from "../runner/errors.js";
import { createInvocation } from "../runner/invocation.js";
import type { Invocation } from "../runner/invocation.js";
import { collateEnv, collectEnvLayers } from "./envVars.js";
import { resolvePlugin } from "./pluginSettings.js";
import type { ResolvedPlugin } from "./pluginSettings.js";

const CONFIG_FILENAME = "config.json";

export interface PluginInvokerOptions {
  readonly terminalEnv?: NodeJS.ProcessEnv;
}

export interface PreparedRun {
  readonly runId: string;
  readonly session: BetterSqlite3.Database;
  readonly configPath: string;
}

export interface PrepareOptions {
  readonly dryRun?: boolean;
}

export class PluginInvoker {
  readonly resolved: ResolvedPlugin;
  private cachedEnv: Readonly<Record<string, string>> | null = null;

  constructor(
    private readonly project: ProjectContext,
    plugin: PluginDefinition,
    private readonly options: PluginInvokerOptions = {},
  ) {
    this.resolved = resolvePlugin(project, plugin);
  }

  get plugin(): PluginDefinition {
    return this.resolved.definition;
  }

  get runDir(): string {
    return getPluginRunDir(this.project.rootDir, this.plugin.name);
  }

  /** Prefers the plugin's isolated install; falls back to PATH lookup. */
  resolveExecutable(): string {
    const executable = this.plugin.executable ?? this.plugin.name;
    if (path.isAbsolute(executable)) {
      return executable;
    }

    const installed = path.join(
      getPluginInstallDir(this.project.rootDir, this.plugin.type, this.plugin.name),
      "bin",
      executable,
    );
    return fs.existsSync(installed) ? installed : executable;
  }

  env(): Readonly<Record<string, string>> {
    if (!this.cachedEnv) {
      const layers = collectEnvLayers(this.project, this.resolved, {
        terminalEnv: this.options.terminalEnv,
        executable: this.resolveExecutable(),
      });
      this.cachedEnv = collateEnv(layers);
    }
    return this.cachedEnv;
  }

  invocation(args: readonly string[]): Invocation {
    return createInvocation({
      command: this.resolveExecutable(),
      args,
      env: this.env(),
      cwd: this.project.rootDir,
    });
  }

  /**
   * Materialises the plugin's run directory and config file and records a
   * pipeline run in the session for the duration of `fn`. The config file is
   * removed and the run closed on every exit path.
   */
  async prepared<T>(
    session: BetterSqlite3.Database,
    fn: (run: PreparedRun) => Promise<T>,
    options: PrepareOptions = {},
  ): Promise<T> {
    const runId = crypto.randomUUID();
    const configPath = path.join(this.runDir, CONFIG_FILENAME);

    startPipelineRun(session, {
      id: runId,
      pluginType: this.plugin.type,
      pluginName: this.plugin.name,
      environment: this.project.activeEnvironment?.name,
      dryRun: options.dryRun,
    });

    try {
      await fsp.mkdir(this.runDir, { recursive: true });
      await fsp.writeFile(configPath, JSON.stringify(this.publicConfig(), null, 2), "utf-8");
      logger.debug({ runId, plugin: this.plugin.name, configPath }, "Plugin prepared");

      const result = await fn({ runId, session, configPath });
      finishPipelineRun(session, runId, "success");
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      finishPipelineRun(session, runId, error instanceof RunCancelledError ? "cancelled" : "failed", message);
      throw error;
    } finally {
      await fsp.rm(configPath, { force: true });
      logger.debug({ runId, plugin: this.plugin.name }, "Plugin cleaned up");
    }
  }

  private publicConfig(): Record<string, unknown> {
    const config: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this.resolved.config)) {
      if (!key.startsWith("_")) {
        config[key] = value;
      }
    }
    return config;
  }
}

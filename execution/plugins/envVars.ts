import fs from "node:fs";
import path from "node:path";
import { parse as parseDotenv } from "dotenv";
import { PLUGIN_KINDS } from "../../projects/manifest.schema.js";
import type { ProjectContext } from "../../projects/manifestLoader.js";
import type { ResolvedPlugin } from "./pluginSettings.js";

type EnvMap = Readonly<Record<string, string>>;

/**
 * Environment layers for a plugin invocation, lowest precedence first.
 * Values in the manifest layers may reference variables from the layers
 * below them as `$NAME` or `${NAME}`.
 */
export interface EnvLayers {
  readonly terminal: EnvMap;
  readonly projectStatic: EnvMap;
  readonly dotenv: EnvMap;
  readonly project: EnvMap;
  readonly environment: EnvMap;
  readonly plugin: EnvMap;
  readonly pluginSettings: EnvMap;
  readonly pluginInfo: EnvMap;
}

const LAYER_ORDER: readonly (keyof EnvLayers)[] = [
  "terminal",
  "projectStatic",
  "dotenv",
  "project",
  "environment",
  "plugin",
  "pluginSettings",
  "pluginInfo",
];

const EXPANDED_LAYERS: ReadonlySet<keyof EnvLayers> = new Set(["project", "environment", "plugin"]);

const DOTENV_FILENAME = ".env";
const ENV_REFERENCE_REGEX = /\$\{(\w+)\}|\$(\w+)/g;

export interface CollectEnvOptions {
  readonly terminalEnv?: NodeJS.ProcessEnv;
  readonly executable?: string;
}

export function getTerminalEnvVars(source: NodeJS.ProcessEnv = process.env): EnvMap {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

export function getProjectStaticEnvVars(project: ProjectContext): EnvMap {
  const env: Record<string, string> = { PIPEWRIGHT_PROJECT_ROOT: project.rootDir };
  if (project.activeEnvironment) {
    env.PIPEWRIGHT_ENVIRONMENT = project.activeEnvironment.name;
  }
  return env;
}

export function getDotenvEnvVars(project: ProjectContext): EnvMap {
  const dotenvPath = path.join(project.rootDir, DOTENV_FILENAME);
  if (!fs.existsSync(dotenvPath)) {
    return {};
  }
  return parseDotenv(fs.readFileSync(dotenvPath, "utf-8"));
}

export function getPluginSettingsEnvVars(resolved: ResolvedPlugin): EnvMap {
  const env: Record<string, string> = {};

  for (const [key, value] of Object.entries(resolved.config)) {
    if (key.startsWith("_") || value === undefined || value === null) continue;
    env[toEnvName(`${resolved.definition.name}_${key}`)] = stringifySetting(value);
  }

  return env;
}

export function getPluginInfoEnvVars(resolved: ResolvedPlugin, executable?: string): EnvMap {
  const plugin = resolved.definition;
  const prefix = `PIPEWRIGHT_${PLUGIN_KINDS[plugin.type].toUpperCase()}`;

  return {
    [`${prefix}_NAME`]: plugin.name,
    [`${prefix}_NAMESPACE`]: plugin.namespace,
    [`${prefix}_EXECUTABLE`]: executable ?? plugin.executable ?? plugin.name,
  };
}

export function collectEnvLayers(
  project: ProjectContext,
  resolved: ResolvedPlugin,
  options: CollectEnvOptions = {},
): EnvLayers {
  return {
    terminal: getTerminalEnvVars(options.terminalEnv),
    projectStatic: getProjectStaticEnvVars(project),
    dotenv: getDotenvEnvVars(project),
    project: project.manifest.env,
    environment: project.activeEnvironment?.env ?? {},
    plugin: resolved.env,
    pluginSettings: getPluginSettingsEnvVars(resolved),
    pluginInfo: getPluginInfoEnvVars(resolved, options.executable),
  };
}

export function collateEnv(layers: EnvLayers): Record<string, string> {
  const env: Record<string, string> = {};

  for (const name of LAYER_ORDER) {
    const expand = EXPANDED_LAYERS.has(name);
    for (const [key, value] of Object.entries(layers[name])) {
      env[key] = expand ? expandEnvReferences(value, env) : value;
    }
  }

  return env;
}

export function expandEnvReferences(value: string, env: EnvMap): string {
  return value.replaceAll(ENV_REFERENCE_REGEX, (_match, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? "";
    return env[name] ?? "";
  });
}

export function toEnvName(raw: string): string {
  return raw.toUpperCase().replaceAll(/[^A-Z0-9]+/g, "_");
}

function stringifySetting(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

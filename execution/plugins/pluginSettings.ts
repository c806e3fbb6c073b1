import type { ProjectContext } from "../../projects/manifestLoader.js";
import type { PluginDefinition } from "../../projects/manifest.schema.js";

export interface ResolvedPlugin {
  readonly definition: PluginDefinition;
  readonly config: Readonly<Record<string, unknown>>;
  readonly env: Readonly<Record<string, string>>;
  readonly select: readonly string[];
}

/**
 * Overlays the active environment's plugin entry on the plugin definition.
 * Config and env merge key by key; select is replaced as a whole.
 */
export function resolvePlugin(project: ProjectContext, plugin: PluginDefinition): ResolvedPlugin {
  const override = project.activeEnvironment?.plugins.find(
    (entry) => entry.type === plugin.type && entry.name === plugin.name,
  );

  return {
    definition: plugin,
    config: { ...plugin.config, ...override?.config },
    env: { ...plugin.env, ...override?.env },
    select: override?.select ?? plugin.select,
  };
}

export function getSetting(resolved: ResolvedPlugin, name: string): unknown {
  return resolved.config[name];
}

export function getStringSetting(resolved: ResolvedPlugin, name: string): string | undefined {
  const value = getSetting(resolved, name);
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

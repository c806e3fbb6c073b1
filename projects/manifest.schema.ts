export type PluginType = "extractors" | "loaders" | "transformers" | "transforms" | "files";

export interface PluginDefinition {
  readonly type: PluginType;
  readonly name: string;
  readonly namespace: string;
  readonly executable?: string;
  readonly pipUrl?: string;
  readonly config: Readonly<Record<string, unknown>>;
  readonly env: Readonly<Record<string, string>>;
  readonly select: readonly string[];
  readonly vars: Readonly<Record<string, unknown>>;
  readonly packageName?: string;
}

export interface EnvironmentPluginOverride {
  readonly type: PluginType;
  readonly name: string;
  readonly config: Readonly<Record<string, unknown>>;
  readonly env: Readonly<Record<string, string>>;
  readonly select?: readonly string[];
}

export interface EnvironmentDefinition {
  readonly name: string;
  readonly env: Readonly<Record<string, string>>;
  readonly plugins: readonly EnvironmentPluginOverride[];
}

export interface ProjectManifest {
  readonly version: number;
  readonly defaultEnvironment?: string;
  readonly env: Readonly<Record<string, string>>;
  readonly plugins: readonly PluginDefinition[];
  readonly environments: readonly EnvironmentDefinition[];
}

export const PLUGIN_TYPES: readonly PluginType[] = [
  "extractors",
  "loaders",
  "transformers",
  "transforms",
  "files",
];

/** Singular form used in messages and PIPEWRIGHT_<KIND>_* variables. */
export const PLUGIN_KINDS: Readonly<Record<PluginType, string>> = {
  extractors: "extractor",
  loaders: "loader",
  transformers: "transformer",
  transforms: "transform",
  files: "file",
};

const PLUGIN_NAME_REGEX = /^[A-Za-z0-9][\w.-]*$/;
const ENV_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SUPPORTED_VERSION = 1;

export function validateManifest(raw: unknown): ProjectManifest {
  if (!isRecord(raw)) {
    throw new ManifestValidationError("Manifest must be a non-null object");
  }

  const version = validateVersion(raw["version"]);
  const defaultEnvironment = validateOptionalString(
    raw["default_environment"] ?? raw["defaultEnvironment"],
    "default_environment",
  );
  const env = validateEnvMap(raw["env"], "env");
  const plugins = validatePlugins(raw["plugins"]);
  const environments = validateEnvironments(raw["environments"]);

  if (defaultEnvironment && !environments.some((e) => e.name === defaultEnvironment)) {
    throw new ManifestValidationError(
      `default_environment "${defaultEnvironment}" is not declared under environments`,
    );
  }

  return { version, defaultEnvironment, env, plugins, environments };
}

function validateVersion(value: unknown): number {
  if (value === undefined || value === null) {
    return SUPPORTED_VERSION;
  }
  if (value !== SUPPORTED_VERSION) {
    throw new ManifestValidationError(
      `version must be ${SUPPORTED_VERSION}. Got: ${String(value)}`,
    );
  }
  return SUPPORTED_VERSION;
}

function validatePlugins(value: unknown): readonly PluginDefinition[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!isRecord(value)) {
    throw new ManifestValidationError("plugins must be an object keyed by plugin type");
  }

  const plugins: PluginDefinition[] = [];

  for (const [key, entries] of Object.entries(value)) {
    const type = validatePluginType(key);
    if (entries === null || entries === undefined) continue;
    if (!Array.isArray(entries)) {
      throw new ManifestValidationError(`plugins.${type} must be a list`);
    }

    for (const [index, entry] of entries.entries()) {
      const plugin = validatePlugin(type, entry, `plugins.${type}[${index}]`);
      if (plugins.some((p) => p.type === type && p.name === plugin.name)) {
        throw new ManifestValidationError(`Duplicate ${PLUGIN_KINDS[type]} "${plugin.name}"`);
      }
      plugins.push(plugin);
    }
  }

  return plugins;
}

function validatePlugin(type: PluginType, value: unknown, field: string): PluginDefinition {
  if (!isRecord(value)) {
    throw new ManifestValidationError(`${field} must be an object with a name`);
  }

  const name = validatePluginName(value["name"], `${field}.name`);
  const namespace =
    validateOptionalString(value["namespace"], `${field}.namespace`) ?? defaultNamespace(name);

  return {
    type,
    name,
    namespace,
    executable: validateOptionalString(value["executable"], `${field}.executable`),
    pipUrl: validateOptionalString(value["pip_url"] ?? value["pipUrl"], `${field}.pip_url`),
    config: validateConfig(value["config"], `${field}.config`),
    env: validateEnvMap(value["env"], `${field}.env`),
    select: validateSelect(value["select"], `${field}.select`) ?? [],
    vars: validateConfig(value["vars"], `${field}.vars`),
    packageName: validateOptionalString(
      value["package_name"] ?? value["packageName"],
      `${field}.package_name`,
    ),
  };
}

function validateEnvironments(value: unknown): readonly EnvironmentDefinition[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ManifestValidationError("environments must be a list");
  }

  const environments: EnvironmentDefinition[] = [];

  for (const [index, entry] of value.entries()) {
    const field = `environments[${index}]`;
    if (!isRecord(entry)) {
      throw new ManifestValidationError(`${field} must be an object with a name`);
    }

    const name = validatePluginName(entry["name"], `${field}.name`);
    if (environments.some((e) => e.name === name)) {
      throw new ManifestValidationError(`Duplicate environment "${name}"`);
    }

    environments.push({
      name,
      env: validateEnvMap(entry["env"], `${field}.env`),
      plugins: validateEnvironmentPlugins(entry["config"], `${field}.config`),
    });
  }

  return environments;
}

function validateEnvironmentPlugins(value: unknown, field: string): readonly EnvironmentPluginOverride[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!isRecord(value)) {
    throw new ManifestValidationError(`${field} must be an object`);
  }

  const pluginsByType = value["plugins"];
  if (pluginsByType === undefined || pluginsByType === null) {
    return [];
  }
  if (!isRecord(pluginsByType)) {
    throw new ManifestValidationError(`${field}.plugins must be an object keyed by plugin type`);
  }

  const overrides: EnvironmentPluginOverride[] = [];

  for (const [key, entries] of Object.entries(pluginsByType)) {
    const type = validatePluginType(key);
    if (entries === null || entries === undefined) continue;
    if (!Array.isArray(entries)) {
      throw new ManifestValidationError(`${field}.plugins.${type} must be a list`);
    }

    for (const [index, entry] of entries.entries()) {
      const entryField = `${field}.plugins.${type}[${index}]`;
      if (!isRecord(entry)) {
        throw new ManifestValidationError(`${entryField} must be an object with a name`);
      }
      overrides.push({
        type,
        name: validatePluginName(entry["name"], `${entryField}.name`),
        config: validateConfig(entry["config"], `${entryField}.config`),
        env: validateEnvMap(entry["env"], `${entryField}.env`),
        select: validateSelect(entry["select"], `${entryField}.select`),
      });
    }
  }

  return overrides;
}

function validatePluginType(value: string): PluginType {
  const type = PLUGIN_TYPES.find((candidate) => candidate === value);
  if (!type) {
    throw new ManifestValidationError(
      `Unknown plugin type "${value}". Must be one of: ${PLUGIN_TYPES.join(", ")}`,
    );
  }
  return type;
}

function validatePluginName(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ManifestValidationError(`${field} must be a non-empty string`);
  }

  const name = value.trim();
  if (!PLUGIN_NAME_REGEX.test(name)) {
    throw new ManifestValidationError(
      `${field} must start with a letter or digit and contain only letters, digits, ".", "_" or "-". Got: "${name}"`,
    );
  }
  return name;
}

function validateOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ManifestValidationError(`${field} must be a non-empty string when provided`);
  }
  return value.trim();
}

function validateConfig(value: unknown, field: string): Readonly<Record<string, unknown>> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ManifestValidationError(`${field} must be an object`);
  }
  return value;
}

function validateEnvMap(value: unknown, field: string): Readonly<Record<string, string>> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ManifestValidationError(`${field} must be an object of NAME: value pairs`);
  }

  const env: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!ENV_NAME_REGEX.test(key)) {
      throw new ManifestValidationError(`${field}.${key} is not a valid environment variable name`);
    }
    if (typeof entry === "string") {
      env[key] = entry;
    } else if (typeof entry === "number" || typeof entry === "boolean") {
      env[key] = String(entry);
    } else {
      throw new ManifestValidationError(`${field}.${key} must be a string, number or boolean`);
    }
  }
  return env;
}

function validateSelect(value: unknown, field: string): readonly string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((pattern) => typeof pattern === "string")) {
    throw new ManifestValidationError(`${field} must be a list of patterns`);
  }
  return value.filter((pattern): pattern is string => typeof pattern === "string");
}

export function defaultNamespace(pluginName: string): string {
  return pluginName.replaceAll("-", "_");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function findPlugin(
  manifest: ProjectManifest,
  type: PluginType,
  name: string,
): PluginDefinition {
  const plugin = manifest.plugins.find((p) => p.type === type && p.name === name);
  if (!plugin) {
    throw new PluginNotFoundError(type, name);
  }
  return plugin;
}

export function findTransformer(manifest: ProjectManifest, name?: string): PluginDefinition {
  if (name) {
    return findPlugin(manifest, "transformers", name);
  }
  const transformer = manifest.plugins.find((p) => p.type === "transformers");
  if (!transformer) {
    throw new PluginNotFoundError("transformers", "*");
  }
  return transformer;
}

export function findEnvironment(manifest: ProjectManifest, name: string): EnvironmentDefinition {
  const environment = manifest.environments.find((e) => e.name === name);
  if (!environment) {
    throw new ManifestValidationError(`Environment "${name}" is not declared in the manifest`);
  }
  return environment;
}

export class ManifestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestValidationError";
  }
}

export class PluginNotFoundError extends Error {
  constructor(
    readonly pluginType: PluginType,
    readonly pluginName: string,
  ) {
    super(
      pluginName === "*"
        ? `No ${PLUGIN_KINDS[pluginType]} is declared in the manifest`
        : `${capitalize(PLUGIN_KINDS[pluginType])} "${pluginName}" is not declared in the manifest`,
    );
    this.name = "PluginNotFoundError";
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

import { isMap, isSeq, YAMLMap, YAMLSeq } from "yaml";
import type { Document } from "yaml";
import { logger } from "../config/logger.js";
import { resolvePlugin } from "../execution/plugins/pluginSettings.js";
import { findPlugin, ManifestValidationError, PluginNotFoundError } from "../projects/manifest.schema.js";
import type { PluginType } from "../projects/manifest.schema.js";
import {
  loadManifestDocument,
  saveManifestDocument,
  type ProjectContext,
} from "../projects/manifestLoader.js";

const EXTRACTORS: PluginType = "extractors";

export interface SelectUpdate {
  readonly entities: string;
  readonly attributes: string;
  readonly exclude?: boolean;
  readonly remove?: boolean;
}

export interface SelectUpdateResult {
  readonly pattern: string;
  readonly patterns: readonly string[];
  readonly changed: boolean;
  /** Environment whose plugin entry was edited, if any. */
  readonly environment?: string;
}

export function buildSelectPattern(entities: string, attributes: string, exclude = false): string {
  return `${exclude ? "!" : ""}${entities}.${attributes}`;
}

export function currentSelect(project: ProjectContext, extractorName: string): readonly string[] {
  const extractor = findPlugin(project.manifest, EXTRACTORS, extractorName);
  return resolvePlugin(project, extractor).select;
}

/**
 * Adds or removes one select pattern. Edits the active environment's entry
 * for the extractor when an environment is active, otherwise the extractor
 * itself. The manifest is rewritten in place with comments preserved.
 *
 * The edit starts from the effective list: an environment entry without its
 * own `select` receives the inherited base patterns plus the change, not the
 * change alone.
 */
export function updateSelect(
  project: ProjectContext,
  extractorName: string,
  update: SelectUpdate,
): SelectUpdateResult {
  const current = currentSelect(project, extractorName);
  const pattern = buildSelectPattern(update.entities, update.attributes, update.exclude);
  const environment = project.activeEnvironment?.name;

  let patterns: readonly string[];
  if (update.remove) {
    if (!current.includes(pattern)) {
      throw new SelectPatternNotFoundError(extractorName, pattern);
    }
    patterns = current.filter((existing) => existing !== pattern);
  } else if (current.includes(pattern)) {
    logger.info({ extractor: extractorName, pattern }, "Select pattern already present");
    return { pattern, patterns: current, changed: false, environment };
  } else {
    patterns = [...current, pattern];
  }

  const doc = loadManifestDocument(project.manifestPath);
  const entry = environment
    ? ensureEnvironmentPluginEntry(doc, environment, extractorName)
    : findPluginEntry(doc, extractorName);

  entry.set("select", doc.createNode([...patterns]));
  saveManifestDocument(project.manifestPath, doc);

  logger.info(
    { extractor: extractorName, pattern, removed: update.remove ?? false, environment: environment ?? null },
    "Select patterns updated",
  );

  return { pattern, patterns, changed: true, environment };
}

function rootMap(doc: Document): YAMLMap {
  if (!isMap(doc.contents)) {
    throw new ManifestValidationError("Manifest root must be a mapping");
  }
  return doc.contents;
}

function findPluginEntry(doc: Document, extractorName: string): YAMLMap {
  const plugins = rootMap(doc).get("plugins");
  const extractors = isMap(plugins) ? plugins.get(EXTRACTORS) : undefined;
  const entry = findNamedEntry(extractors, extractorName);
  if (!entry) {
    throw new PluginNotFoundError(EXTRACTORS, extractorName);
  }
  return entry;
}

function ensureEnvironmentPluginEntry(doc: Document, environment: string, extractorName: string): YAMLMap {
  const environmentEntry = findNamedEntry(rootMap(doc).get("environments"), environment);
  if (!environmentEntry) {
    throw new ManifestValidationError(`Environment "${environment}" is not declared in the manifest`);
  }

  const config = ensureMap(environmentEntry, "config");
  const plugins = ensureMap(config, "plugins");
  const extractors = ensureSeq(plugins, EXTRACTORS);

  const existing = findNamedEntry(extractors, extractorName);
  if (existing) {
    return existing;
  }

  const created = new YAMLMap();
  created.set("name", extractorName);
  extractors.add(created);
  return created;
}

function findNamedEntry(node: unknown, name: string): YAMLMap | undefined {
  if (!isSeq(node)) return undefined;
  return node.items.find(
    (item): item is YAMLMap => isMap(item) && item.get("name") === name,
  );
}

function ensureMap(parent: YAMLMap, key: string): YAMLMap {
  const existing = parent.get(key);
  if (isMap(existing)) return existing;
  const created = new YAMLMap();
  parent.set(key, created);
  return created;
}

function ensureSeq(parent: YAMLMap, key: string): YAMLSeq {
  const existing = parent.get(key);
  if (isSeq(existing)) return existing;
  const created = new YAMLSeq();
  parent.set(key, created);
  return created;
}

export class SelectPatternNotFoundError extends Error {
  constructor(
    readonly extractorName: string,
    readonly pattern: string,
  ) {
    super(`Select pattern "${pattern}" is not set for extractor "${extractorName}"`);
    this.name = "SelectPatternNotFoundError";
  }
}

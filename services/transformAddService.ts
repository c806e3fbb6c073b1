import fs from "node:fs";
import path from "node:path";
import { isMap, parse as parseYaml, parseDocument, stringify as stringifyYaml, YAMLMap } from "yaml";
import type { Document } from "yaml";
import { logger } from "../config/logger.js";
import { getStringSetting, resolvePlugin } from "../execution/plugins/pluginSettings.js";
import { findTransformer, isRecord } from "../projects/manifest.schema.js";
import type { PluginDefinition } from "../projects/manifest.schema.js";
import type { ProjectContext } from "../projects/manifestLoader.js";

const PACKAGES_FILENAME = "packages.yml";
const DBT_PROJECT_FILENAME = "dbt_project.yml";
const DEFAULT_PROJECT_DIR = "transform";

export interface PackageRef {
  readonly git: string;
  readonly revision?: string;
}

/**
 * Registers dbt transform packages with the transformer's dbt project:
 * `packages.yml` gets the git reference and `dbt_project.yml` the model
 * entry and package vars.
 */
export class TransformAddService {
  readonly projectDir: string;
  readonly packagesFile: string;
  readonly dbtProjectFile: string;

  constructor(project: ProjectContext, transformerName?: string) {
    const transformer = resolvePlugin(project, findTransformer(project.manifest, transformerName));
    const projectDir = getStringSetting(transformer, "project_dir") ?? DEFAULT_PROJECT_DIR;

    this.projectDir = path.resolve(project.rootDir, projectDir);
    this.packagesFile = path.join(this.projectDir, PACKAGES_FILENAME);
    this.dbtProjectFile = path.join(this.projectDir, DBT_PROJECT_FILENAME);
  }

  /** Returns false when an identical git reference is already listed. */
  addToPackages(transform: PluginDefinition): boolean {
    if (!transform.pipUrl) {
      throw new TransformAddError(`Missing pip_url for transform plugin '${transform.name}'`);
    }

    const ref = parsePackageRef(transform.pipUrl);
    const packages = this.readPackages();

    const alreadyListed = packages.some(
      (entry) => entry["git"] === ref.git && entry["revision"] === ref.revision,
    );
    if (alreadyListed) {
      logger.info({ transform: transform.name, git: ref.git }, "Package already listed, skipping");
      return false;
    }

    const entry: Record<string, string> = { git: ref.git };
    if (ref.revision) {
      entry.revision = ref.revision;
    }

    fs.mkdirSync(this.projectDir, { recursive: true });
    fs.writeFileSync(this.packagesFile, stringifyYaml({ packages: [...packages, entry] }), "utf-8");

    logger.info({ transform: transform.name, git: ref.git, revision: ref.revision ?? null }, "Package added");
    return true;
  }

  /**
   * Adds the package under `models`. Package vars go under the model entry
   * for `config-version: 1` projects and under top-level `vars` otherwise.
   */
  updateDbtProject(transform: PluginDefinition): void {
    const doc = this.readDbtProject();
    const packageName = transform.packageName ?? transform.namespace;
    const modelDef = new YAMLMap();

    if (Object.keys(transform.vars).length > 0) {
      const configVersion: unknown = doc.get("config-version") ?? 1;
      if (configVersion === 1) {
        modelDef.set("vars", doc.createNode(transform.vars));
      } else {
        ensureRootMap(doc, "vars").set(packageName, doc.createNode(transform.vars));
      }
    }

    ensureRootMap(doc, "models").set(packageName, modelDef);
    fs.writeFileSync(this.dbtProjectFile, doc.toString(), "utf-8");

    logger.info({ transform: transform.name, packageName }, "dbt project updated");
  }

  private readPackages(): readonly Record<string, unknown>[] {
    if (!fs.existsSync(this.packagesFile)) {
      return [];
    }

    const parsed: unknown = parseYaml(fs.readFileSync(this.packagesFile, "utf-8"));
    if (parsed === null || parsed === undefined) {
      return [];
    }
    if (!isRecord(parsed)) {
      throw new TransformAddError(`${this.packagesFile} must contain a "packages" list`);
    }

    const packages = parsed["packages"];
    if (packages === undefined || packages === null) {
      return [];
    }
    if (!Array.isArray(packages)) {
      throw new TransformAddError(`${this.packagesFile} must contain a "packages" list`);
    }

    return packages.filter(isRecord);
  }

  private readDbtProject(): Document {
    if (!fs.existsSync(this.dbtProjectFile)) {
      throw new TransformAddError(`dbt project file not found at ${this.dbtProjectFile}`);
    }

    const doc = parseDocument(fs.readFileSync(this.dbtProjectFile, "utf-8"));
    if (doc.errors.length > 0 || !isMap(doc.contents)) {
      throw new TransformAddError(`${this.dbtProjectFile} must be a YAML mapping`);
    }
    return doc;
  }
}

/** `repo@revision` splits only when the URL contains exactly one "@". */
export function parsePackageRef(pipUrl: string): PackageRef {
  const parts = pipUrl.split("@");
  if (parts.length === 2) {
    return { git: parts[0], revision: parts[1] };
  }
  return { git: pipUrl };
}

function ensureRootMap(doc: Document, key: string): YAMLMap {
  const existing = doc.get(key);
  if (isMap(existing)) return existing;
  const created = new YAMLMap();
  doc.set(key, created);
  return created;
}

export class TransformAddError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransformAddError";
  }
}

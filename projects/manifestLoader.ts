import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml, parseDocument } from "yaml";
import type { Document } from "yaml";
import { logger } from "../config/logger.js";
import {
  validateManifest,
  findEnvironment,
  ManifestValidationError,
  type EnvironmentDefinition,
  type ProjectManifest,
} from "./manifest.schema.js";

export const MANIFEST_FILENAME = "pipewright.yml";

export interface ProjectContext {
  readonly rootDir: string;
  readonly manifestPath: string;
  readonly manifest: ProjectManifest;
  readonly activeEnvironment?: EnvironmentDefinition;
}

export interface LoadProjectOptions {
  readonly environment?: string;
}

export function getManifestPath(rootDir: string): string {
  return path.resolve(rootDir, MANIFEST_FILENAME);
}

export function loadManifest(manifestPath: string): ProjectManifest {
  if (!fs.existsSync(manifestPath)) {
    throw new ManifestValidationError(`Manifest not found at ${manifestPath}`);
  }

  const raw = fs.readFileSync(manifestPath, "utf-8");
  const parsed: unknown = parseYaml(raw);

  return validateManifest(parsed);
}

export function loadProject(rootDir: string, options: LoadProjectOptions = {}): ProjectContext {
  const manifestPath = getManifestPath(rootDir);
  const manifest = loadManifest(manifestPath);

  const environmentName = options.environment ?? manifest.defaultEnvironment;
  const activeEnvironment = environmentName ? findEnvironment(manifest, environmentName) : undefined;

  logger.debug(
    { rootDir, plugins: manifest.plugins.length, environment: activeEnvironment?.name ?? null },
    "Project loaded",
  );

  return { rootDir: path.resolve(rootDir), manifestPath, manifest, activeEnvironment };
}

/** Loads the manifest as an editable YAML document that keeps comments and key order. */
export function loadManifestDocument(manifestPath: string): Document {
  if (!fs.existsSync(manifestPath)) {
    throw new ManifestValidationError(`Manifest not found at ${manifestPath}`);
  }

  const doc = parseDocument(fs.readFileSync(manifestPath, "utf-8"));
  if (doc.errors.length > 0) {
    throw new ManifestValidationError(
      `Manifest at ${manifestPath} is not valid YAML: ${doc.errors[0].message}`,
    );
  }
  return doc;
}

export function saveManifestDocument(manifestPath: string, doc: Document): void {
  validateManifest(doc.toJS());
  fs.writeFileSync(manifestPath, doc.toString(), "utf-8");
  logger.debug({ manifestPath }, "Manifest saved");
}

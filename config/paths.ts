import fs from "node:fs";
import path from "node:path";
import { logger } from "./logger.js";

const SYSTEM_DIR_NAME = ".pipewright";
const DATABASE_FILENAME = "pipewright.db";

let _resolvedRoot: string | null = null;

function resolveProjectRoot(): string {
  if (!_resolvedRoot) {
    _resolvedRoot = path.resolve(process.env.PIPEWRIGHT_PROJECT_ROOT ?? process.cwd());
    logger.debug({ projectRoot: _resolvedRoot }, "Project root resolved");
  }
  return _resolvedRoot;
}

export function getProjectRoot(): string {
  return resolveProjectRoot();
}

export function getSystemDir(projectRoot: string): string {
  return path.join(projectRoot, SYSTEM_DIR_NAME);
}

export function getPluginInstallDir(projectRoot: string, pluginType: string, pluginName: string): string {
  return path.join(getSystemDir(projectRoot), pluginType, pluginName, "venv");
}

export function getPluginRunDir(projectRoot: string, pluginName: string): string {
  return path.join(getSystemDir(projectRoot), "run", pluginName);
}

export function getDatabasePath(projectRoot: string): string {
  return path.join(getSystemDir(projectRoot), DATABASE_FILENAME);
}

export function ensureSystemDirectories(projectRoot: string): void {
  const dirs = [getSystemDir(projectRoot), path.join(getSystemDir(projectRoot), "run")];

  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info({ dir }, "Created pipewright directory");
    }
  }
}

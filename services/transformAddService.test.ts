import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { findPlugin } from "../projects/manifest.schema.js";
import { loadProject } from "../projects/manifestLoader.js";
import type { ProjectContext } from "../projects/manifestLoader.js";
import { parsePackageRef, TransformAddError, TransformAddService } from "./transformAddService.js";

const MANIFEST = `version: 1
plugins:
  transformers:
    - name: dbt
      config:
        project_dir: transform
  transforms:
    - name: tap-gitlab-models
      namespace: tap_gitlab
      pip_url: https://example.com/gitlab-models.git@v1.0
      vars:
        schema: raw
    - name: plain-models
      pip_url: https://example.com/plain-models.git
      package_name: plain
    - name: unpublished-models
`;

describe("parsePackageRef", () => {
  it("should split the revision after a single @", () => {
    assert.deepEqual(parsePackageRef("https://example.com/models.git@v1.0"), {
      git: "https://example.com/models.git",
      revision: "v1.0",
    });
  });

  it("should keep URLs without exactly one @ whole", () => {
    assert.deepEqual(parsePackageRef("https://example.com/models.git"), { git: "https://example.com/models.git" });
    assert.deepEqual(parsePackageRef("git@host:a.git@v1"), { git: "git@host:a.git@v1" });
  });
});

describe("TransformAddService", () => {
  let rootDir: string;
  let project: ProjectContext;
  let transformDir: string;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-transform-add-"));
    fs.writeFileSync(path.join(rootDir, "pipewright.yml"), MANIFEST, "utf-8");
    transformDir = path.join(rootDir, "transform");
    fs.mkdirSync(transformDir);
    project = loadProject(rootDir);
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  function readYaml(filename: string): unknown {
    return parseYaml(fs.readFileSync(path.join(transformDir, filename), "utf-8"));
  }

  it("should resolve its files from the transformer's project_dir", () => {
    const service = new TransformAddService(project);

    assert.equal(service.projectDir, path.join(project.rootDir, "transform"));
    assert.equal(service.packagesFile, path.join(project.rootDir, "transform", "packages.yml"));
    assert.equal(service.dbtProjectFile, path.join(project.rootDir, "transform", "dbt_project.yml"));
  });

  it("should add a git package once", () => {
    const service = new TransformAddService(project);
    const transform = findPlugin(project.manifest, "transforms", "tap-gitlab-models");

    assert.equal(service.addToPackages(transform), true);
    assert.equal(service.addToPackages(transform), false);
    assert.deepEqual(readYaml("packages.yml"), {
      packages: [{ git: "https://example.com/gitlab-models.git", revision: "v1.0" }],
    });
  });

  it("should keep packages already listed", () => {
    fs.writeFileSync(
      path.join(transformDir, "packages.yml"),
      "packages:\n  - package: dbt-labs/dbt_utils\n    version: 1.1.1\n",
      "utf-8",
    );
    const service = new TransformAddService(project);

    service.addToPackages(findPlugin(project.manifest, "transforms", "plain-models"));

    assert.deepEqual(readYaml("packages.yml"), {
      packages: [
        { package: "dbt-labs/dbt_utils", version: "1.1.1" },
        { git: "https://example.com/plain-models.git" },
      ],
    });
  });

  it("should reject a transform without pip_url", () => {
    const service = new TransformAddService(project);

    assert.throws(
      () => service.addToPackages(findPlugin(project.manifest, "transforms", "unpublished-models")),
      (error: unknown) => {
        assert.ok(error instanceof TransformAddError);
        assert.equal(error.message, "Missing pip_url for transform plugin 'unpublished-models'");
        return true;
      },
    );
  });

  it("should put vars under the model entry for config-version 1 projects", () => {
    fs.writeFileSync(path.join(transformDir, "dbt_project.yml"), "name: analytics\nversion: '1.0'\n", "utf-8");
    const service = new TransformAddService(project);

    service.updateDbtProject(findPlugin(project.manifest, "transforms", "tap-gitlab-models"));

    assert.deepEqual(readYaml("dbt_project.yml"), {
      name: "analytics",
      version: "1.0",
      models: { tap_gitlab: { vars: { schema: "raw" } } },
    });
  });

  it("should put vars under top-level vars for later config versions", () => {
    fs.writeFileSync(
      path.join(transformDir, "dbt_project.yml"),
      "name: analytics\nconfig-version: 2\n# model defaults\nmodels:\n  analytics:\n    materialized: view\n",
      "utf-8",
    );
    const service = new TransformAddService(project);

    service.updateDbtProject(findPlugin(project.manifest, "transforms", "tap-gitlab-models"));

    assert.deepEqual(readYaml("dbt_project.yml"), {
      name: "analytics",
      "config-version": 2,
      models: { analytics: { materialized: "view" }, tap_gitlab: {} },
      vars: { tap_gitlab: { schema: "raw" } },
    });
    assert.ok(fs.readFileSync(path.join(transformDir, "dbt_project.yml"), "utf-8").includes("# model defaults"));
  });

  it("should name the model entry after package_name when set", () => {
    fs.writeFileSync(path.join(transformDir, "dbt_project.yml"), "name: analytics\n", "utf-8");
    const service = new TransformAddService(project);

    service.updateDbtProject(findPlugin(project.manifest, "transforms", "plain-models"));

    assert.deepEqual(readYaml("dbt_project.yml"), { name: "analytics", models: { plain: {} } });
  });

  it("should fail when the dbt project file is missing", () => {
    const service = new TransformAddService(project);

    assert.throws(
      () => service.updateDbtProject(findPlugin(project.manifest, "transforms", "plain-models")),
      TransformAddError,
    );
  });
});

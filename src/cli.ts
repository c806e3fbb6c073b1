import { once } from "node:events";
import fs from "node:fs";
import { finished } from "node:stream/promises";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { logger } from "../config/logger.js";
import { ensureSystemDirectories, getDatabasePath, getProjectRoot } from "../config/paths.js";
import { loadRunnerConfig } from "../config/runner.js";
import { describeFailure } from "../execution/runner/failureReport.js";
import { createLoggerSink, createTeeSink, createWritableSink } from "../execution/runner/streamSink.js";
import type { StreamSink } from "../execution/runner/streamSink.js";
import { runTransformer } from "../execution/runner/transformerRunner.js";
import { findPlugin, findTransformer } from "../projects/manifest.schema.js";
import { loadProject } from "../projects/manifestLoader.js";
import { currentSelect, updateSelect } from "../services/selectService.js";
import { TransformAddService } from "../services/transformAddService.js";
import { openDatabase } from "../state/db.js";
import { getRecentRuns } from "../state/pipelineRuns.js";

export interface CliIo {
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
}

interface TransformOptions {
  readonly dryRun?: boolean;
  readonly models?: string;
  readonly transformer?: string;
  readonly environment?: string;
  readonly logFile?: string;
}

interface SelectOptions {
  readonly exclude?: boolean;
  readonly rm?: boolean;
  readonly list?: boolean;
  readonly environment?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/** Resolves once the file is open; a path that cannot be opened rejects. */
async function openLogFile(filePath: string): Promise<fs.WriteStream> {
  const stream = fs.createWriteStream(filePath, { flags: "a" });
  await once(stream, "open");
  stream.on("error", (error) => {
    logger.warn({ logFile: filePath, error: error.message }, "Log file write failed");
  });
  return stream;
}

async function closeLogFile(stream: fs.WriteStream): Promise<void> {
  stream.end();
  await finished(stream);
}

export function buildProgram(io: CliIo, signal?: AbortSignal): Command {
  const runnerConfig = loadRunnerConfig();
  const program = new Command();

  program
    .name("pipewright")
    .description("Run and configure data pipeline plugins declared in pipewright.yml")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  program
    .command("transform")
    .description("Run the transformer: clean, deps, then run (or compile with --dry-run)")
    .option("--dry-run", "Compile models instead of running them")
    .option("-m, --models <selector>", "Model selector passed to the run stage")
    .option("-t, --transformer <name>", "Transformer to use when several are declared")
    .option("-e, --environment <name>", "Environment to activate")
    .option("--log-file <path>", "Also append captured output to this file")
    .action(async (options: TransformOptions) => {
      const project = loadProject(getProjectRoot(), {
        environment: options.environment ?? runnerConfig.environment,
      });
      ensureSystemDirectories(project.rootDir);

      const logFile = options.logFile ? await openLogFile(options.logFile) : null;
      try {
        const transformer = findTransformer(project.manifest, options.transformer);
        const loggerSink = createLoggerSink({ plugin: transformer.name });
        const sink: StreamSink = logFile ? createTeeSink(loggerSink, createWritableSink(logFile)) : loggerSink;

        const db = openDatabase(getDatabasePath(project.rootDir));
        try {
          const result = await runTransformer({
            project,
            session: db,
            transformerName: transformer.name,
            dryRun: options.dryRun,
            models: options.models,
            sink,
            signal,
            runnerConfig,
          });
          io.stdout.write(`Transformation completed (run ${result.runId})\n`);
        } finally {
          db.close();
        }
      } finally {
        if (logFile) await closeLogFile(logFile);
      }
    });

  program
    .command("select")
    .description("Show or edit the select patterns of an extractor")
    .argument("<extractor>", "Extractor name")
    .argument("[entities]", "Entity pattern, e.g. commits")
    .argument("[attributes]", "Attribute pattern, e.g. id or *")
    .option("--exclude", "Add the pattern as an exclusion (!entities.attributes)")
    .option("--rm", "Remove the pattern instead of adding it")
    .option("--list", "List the current select patterns")
    .option("-e, --environment <name>", "Environment to edit")
    .action((extractor: string, entities: string | undefined, attributes: string | undefined, options: SelectOptions) => {
      const project = loadProject(getProjectRoot(), {
        environment: options.environment ?? runnerConfig.environment,
      });

      if (options.list || entities === undefined) {
        findPlugin(project.manifest, "extractors", extractor);
        for (const pattern of currentSelect(project, extractor)) {
          io.stdout.write(`${pattern}\n`);
        }
        return;
      }

      const result = updateSelect(project, extractor, {
        entities,
        attributes: attributes ?? "*",
        exclude: options.exclude,
        remove: options.rm,
      });
      const verb = options.rm ? "Removed" : result.changed ? "Added" : "Already present:";
      io.stdout.write(`${verb} ${result.pattern}\n`);
    });

  program
    .command("transform-add")
    .description("Register a dbt transform package with the transformer's project")
    .argument("<name>", "Transform plugin name")
    .option("-t, --transformer <name>", "Transformer whose dbt project receives the package")
    .action((name: string, options: { readonly transformer?: string }) => {
      const project = loadProject(getProjectRoot());
      const transform = findPlugin(project.manifest, "transforms", name);
      const service = new TransformAddService(project, options.transformer);

      const added = service.addToPackages(transform);
      service.updateDbtProject(transform);
      io.stdout.write(
        added
          ? `Added ${name} to ${service.packagesFile}\n`
          : `${name} already listed in ${service.packagesFile}\n`,
      );
    });

  program
    .command("runs")
    .description("List recent pipeline runs")
    .option("-n, --limit <count>", "Number of runs to show", parsePositiveInt, 20)
    .action((options: { readonly limit: number }) => {
      const db = openDatabase(getDatabasePath(getProjectRoot()));
      try {
        for (const run of getRecentRuns(db, options.limit)) {
          const finished = run.finished_at ?? "-";
          io.stdout.write(
            `${run.id}  ${run.plugin_type}/${run.plugin_name}  ${run.status}  ${run.started_at}  ${finished}\n`,
          );
        }
      } finally {
        db.close();
      }
    });

  return program;
}

/** Parses argv and runs the command; resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo, signal?: AbortSignal): Promise<number> {
  const program = buildProgram(io, signal);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const report = describeFailure(error);
    logger.error({ exitCode: report.exitCode }, report.message);
    io.stderr.write(`${report.message}\n`);
    return report.exitCode;
  }
}

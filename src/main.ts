#!/usr/bin/env node
import { logger } from "../config/logger.js";
import { runCli } from "./cli.js";

const controller = new AbortController();

process.once("SIGINT", () => {
  logger.warn("Interrupt received, stopping the running stage");
  controller.abort();
});

const exitCode = await runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr }, controller.signal);
process.exitCode = exitCode;

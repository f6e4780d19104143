#!/usr/bin/env node
/**
 * pyreview command line.
 *
 *   pyreview <path> [-o report.json] [--config file] [--max-files n]
 *
 * Always exits 0 once a scan completes, however many issues it found.
 * Exit 2 means the invocation itself was wrong (bad path, bad config,
 * bad flag); exit 1 an unexpected failure.
 */

import * as fs from "fs";
import * as path from "path";
import { Command, CommanderError, InvalidArgumentError } from "commander";

import { env } from "./env";
import { ConfigError } from "./errors";
import { isLogThreshold, logger, LogThreshold, setLogLevel } from "./logger";
import { getRuleDescriptors } from "./analysis/engine/registry";
import { scanPath } from "./analysis/orchestration";
import { loadConfig, loadConfigFile } from "./config/loader";
import { writeReport } from "./report/json";

export const VERSION = "0.1.0";

export const DEFAULT_REPORT_PATH = "report.json";

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processOutput: CliOutput = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

interface ReviewOptions {
  output?: string;
  config?: string;
  maxFiles?: number;
  logLevel?: LogThreshold;
  listRules?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseLogLevel(value: string): LogThreshold {
  const level = value.toLowerCase();
  if (!isLogThreshold(level)) {
    throw new InvalidArgumentError("Must be one of debug, info, warn, error, silent.");
  }
  return level;
}

function printRules(out: CliOutput): void {
  for (const rule of getRuleDescriptors()) {
    out.stdout(`${rule.ruleId.padEnd(10)} ${rule.severity.padEnd(7)} ${rule.category.padEnd(16)} ${rule.summary}`);
  }
}

/**
 * Scan `target`, write the JSON report and print the summary.
 *
 * @throws ConfigError when the path or config is unusable
 */
export function runReview(target: string, options: ReviewOptions, out: CliOutput): void {
  if (!fs.existsSync(target)) {
    throw new ConfigError(`Path not found: ${target}`);
  }

  const scanRoot = fs.statSync(target).isDirectory() ? target : path.dirname(target);
  const config = options.config ? loadConfigFile(options.config) : loadConfig(scanRoot);

  const outputPath = options.output ?? config.output ?? env.OUTPUT ?? DEFAULT_REPORT_PATH;
  const maxFiles = options.maxFiles ?? config.maxFiles ?? env.MAX_FILES;

  const result = scanPath(target, { config, maxFiles });

  logger.info("Scan finished", {
    filesAnalyzed: result.filesAnalyzed,
    filesSkipped: result.filesSkipped,
    filesUnparsed: result.filesUnparsed,
    truncated: result.truncated,
  });

  writeReport(outputPath, result.diagnostics);

  out.stdout(`✔ Analysis complete. Report saved to ${outputPath}`);
  out.stdout(`✔ Issues found: ${result.diagnostics.length}`);
}

/**
 * Run the CLI with a full argv (node, script, ...args) and return the exit code.
 */
export async function runCli(argv: string[], out: CliOutput = processOutput): Promise<number> {
  const program = new Command();

  program
    .name("pyreview")
    .description("Codebase Quality Reviewer: rule-based checks for Python sources")
    .version(VERSION)
    .argument("[path]", "File or folder to analyze")
    .option("-o, --output <file>", `Report destination (default: "${DEFAULT_REPORT_PATH}")`)
    .option("-c, --config <file>", "Config file (default: .pyreview.yml in the scanned folder)")
    .option("--max-files <n>", "Stop after analyzing this many files", parsePositiveInt)
    .option("--log-level <level>", "debug, info, warn, error or silent", parseLogLevel)
    .option("--list-rules", "Print the registered rules and exit")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out.stdout(text.replace(/\n$/, "")),
      writeErr: (text) => out.stderr(text.replace(/\n$/, "")),
    })
    .action((target: string | undefined, options: ReviewOptions) => {
      if (options.logLevel) {
        setLogLevel(options.logLevel);
      }
      if (options.listRules) {
        printRules(out);
        return;
      }
      if (!target) {
        throw new ConfigError("Missing required argument 'path'");
      }
      runReview(target, options, out);
    });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and --version also arrive here, with exit code 0
      return error.exitCode === 0 ? 0 : 2;
    }
    if (error instanceof ConfigError) {
      out.stderr(`Error: ${error.message}`);
      return 2;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error("Review failed", { error: message });
    out.stderr(`Error: ${message}`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error("Unhandled CLI failure", { error: String(error) });
      process.exitCode = 1;
    });
}

#!/usr/bin/env node
/**
 * Pipeline CLI
 *
 * Crawl sites and turn them into QA datasets from the command line.
 *
 * Usage:
 *   npm run pipeline -- run <url> [url...]    Run the full pipeline
 *   npm run pipeline -- status <run-id>       Show a run's status
 *   npm run pipeline -- list                  List all runs
 */

import {
  buildRunRequest,
  getPipelineSettings,
  getRunsRoot,
  loadConfig,
  type RunRequestOverrides,
} from "../config";
import { ConfigurationError } from "../pipeline/core/errors";
import {
  createPipelineDeps,
  executeRun,
  getRunStatus,
  listRuns,
  watchRun,
} from "../pipeline/runner";
import { createRunQueue } from "../queue";
import { formatRunStatus, RunProgress } from "./progress";

const USAGE = `Usage: npm run pipeline -- <command> [args] [options]

Commands:
  run <url> [url...]     Crawl each URL and build its QA dataset
  status <run-id>        Show the status of a run
  list                   List all runs

Options:
  --max-pages <n>        Pages to crawl per site (default: config crawl.max_pages)
  --delay <s>            Seconds between requests (default: config crawl.delay_seconds)
  --max-block <n>        Maximum block size in characters
  --min-block <n>        Minimum block size in characters
  --watch                Keep polling status until the run finishes
  --config <path>        Config file (default: ./config.yaml)`;

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    return 0;
  }

  const flags = parseFlags(args.slice(1));
  const positional = flags.positional;
  const config = loadConfig(flags.configPath);
  const runsRoot = getRunsRoot(config);

  switch (command) {
    case "run": {
      if (positional.length === 0) {
        console.error("Usage: npm run pipeline -- run <url> [url...]");
        return 1;
      }

      const requests = positional.map((url) =>
        buildRunRequest(config, { ...flags.overrides, source_url: url })
      );
      const settings = getPipelineSettings(config);
      const deps = createPipelineDeps();

      if (requests.length === 1) {
        const record = await executeRun({
          runsRoot,
          request: requests[0],
          settings,
          deps,
          progress: new RunProgress(),
        });
        for (const warning of record.warnings) console.warn(`  warning: ${warning}`);
        console.log(`\nRun directory: ${runsRoot}/${record.run_id}`);
        return record.state === "COMPLETE" ? 0 : 1;
      }

      const queue = createRunQueue({
        runsRoot,
        settings,
        deps,
        concurrency: config.queue.concurrency,
      });
      queue.subscribe((job) => {
        if (job.status === "completed" || job.status === "failed") {
          const detail = job.error ? `: ${job.error}` : "";
          console.log(`${job.status.padEnd(9)} ${job.runId ?? "-"}  ${job.sourceUrl}${detail}`);
        }
      });

      console.log(
        `Queued ${requests.length} runs (concurrency ${config.queue.concurrency})\n`
      );
      const jobs = await Promise.all(requests.map((r) => queue.waitFor(queue.submit(r))));
      const failed = jobs.filter((j) => j.status === "failed").length;
      console.log(`\n${jobs.length - failed} completed, ${failed} failed`);
      return failed === 0 ? 0 : 1;
    }

    case "status": {
      const [runId] = positional;
      if (!runId) {
        console.error("Usage: npm run pipeline -- status <run-id> [--watch]");
        return 1;
      }

      if (!flags.watch) {
        const status = getRunStatus(runsRoot, runId);
        if (!status) {
          console.error(`Run not found: ${runId}`);
          return 1;
        }
        console.log(formatRunStatus(status));
        return 0;
      }

      return new Promise<number>((resolve, reject) => {
        let last: string | undefined;
        watchRun(runsRoot, runId).subscribe({
          next(status) {
            console.log(formatRunStatus(status) + "\n");
            last = status.state;
          },
          error: reject,
          complete() {
            resolve(last === "COMPLETE" ? 0 : 1);
          },
        });
      });
    }

    case "list": {
      const runs = listRuns(runsRoot);
      if (runs.length === 0) {
        console.log("No runs found.");
        return 0;
      }
      for (const run of runs) {
        console.log(`${run.run_id}  ${run.state.padEnd(10)}  ${run.source_url}`);
      }
      return 0;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      return 1;
  }
}

interface ParsedFlags {
  positional: string[];
  overrides: Omit<RunRequestOverrides, "source_url">;
  watch: boolean;
  configPath?: string;
}

function parseFlags(args: string[]): ParsedFlags {
  const positional: string[] = [];
  const overrides: Omit<RunRequestOverrides, "source_url"> = {};
  let watch = false;
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === "--max-pages" && next) {
      overrides.max_pages = parseNumber(arg, args[++i]);
    } else if (arg === "--delay" && next) {
      overrides.delay_seconds = parseNumber(arg, args[++i]);
    } else if (arg === "--max-block" && next) {
      overrides.max_block_chars = parseNumber(arg, args[++i]);
    } else if (arg === "--min-block" && next) {
      overrides.min_block_chars = parseNumber(arg, args[++i]);
    } else if (arg === "--config" && next) {
      configPath = args[++i];
    } else if (arg === "--watch") {
      watch = true;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { positional, overrides, watch, configPath };
}

function parseNumber(flag: string, value: string): number {
  const n = Number(value);
  if (Number.isNaN(n)) throw new ConfigurationError([`${flag}: expected a number, got "${value}"`]);
  return n;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (err instanceof ConfigurationError) {
      console.error(err.issues.map((issue) => `  ${issue}`).join("\n"));
    } else {
      console.error("\nPipeline failed:", err instanceof Error ? err.message : String(err));
    }
    process.exit(1);
  }
);

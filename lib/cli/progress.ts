/**
 * Dynamic CLI Progress Display
 *
 * Shows run progress with an animated spinner and a progress bar for the
 * current stage. Driven by the runner's progress events.
 */

import type { RunStatus } from "../pipeline/runner/status";
import { formatStageName, type Progress, type ProgressEvent } from "../pipeline/runner/types";
import { STAGE_NAMES } from "../pipeline/core/schemas";

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const HIDE_CURSOR = `${ESC}[?25l`;
const SHOW_CURSOR = `${ESC}[?25h`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;
const YELLOW = `${ESC}[33m`;
const RED = `${ESC}[31m`;
const CYAN = `${ESC}[36m`;
const BOLD = `${ESC}[1m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const BAR_WIDTH = 30;

export interface RunProgressOptions {
  stream?: NodeJS.WriteStream;
}

/**
 * Single-run progress display: one finished line per stage, and a live
 * spinner line for the stage in progress.
 */
export class RunProgress implements Progress {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private stream: NodeJS.WriteStream;
  private label = "";
  private detail = "";
  private current = 0;
  private total = 0;
  private stageStart = Date.now();

  constructor(options: RunProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr;
  }

  emit(event: ProgressEvent): void {
    switch (event.type) {
      case "run-start":
        this.stream.write(`${BOLD}${event.runId}${RESET}  ${DIM}${event.sourceUrl}${RESET}\n\n`);
        this.start();
        break;
      case "stage-start":
        this.label = formatStageName(event.stage);
        this.detail = "";
        this.current = 0;
        this.total = 0;
        this.stageStart = Date.now();
        this.render();
        break;
      case "stage-progress":
        this.detail = event.message;
        this.current = event.current ?? 0;
        this.total = event.total ?? 0;
        break;
      case "stage-complete":
        this.finishLine(
          `${GREEN}✔${RESET} ${this.label}  ${event.records} records  ${DIM}${formatDuration(event.durationMs)}${RESET}`
        );
        break;
      case "stage-error":
        this.finishLine(`${RED}✗${RESET} ${this.label}  ${event.error}`);
        break;
      case "run-complete":
        this.stop();
        this.stream.write(
          `\n${GREEN}✔${RESET} ${BOLD}Completed${RESET} ${event.stats.artifacts.qa} QA pairs from ${event.stats.artifacts.sliced} blocks\n`
        );
        if (event.stats.generation_failures > 0) {
          this.stream.write(
            `${YELLOW}⚠${RESET} ${event.stats.generation_failures} generation batches failed\n`
          );
        }
        break;
      case "run-failed":
        this.stop();
        this.stream.write(
          `\n${RED}✗${RESET} ${BOLD}Failed${RESET} during ${formatStageName(event.stage)}: ${event.error}\n`
        );
        break;
    }
  }

  private start(): void {
    this.stream.write(HIDE_CURSOR);
    this.timer = setInterval(() => {
      this.frame++;
      this.render();
    }, 80);
  }

  private stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.stream.write(`\r${CLEAR_LINE}${SHOW_CURSOR}`);
  }

  private finishLine(line: string): void {
    this.stream.write(`\r${CLEAR_LINE}${line}\n`);
    this.label = "";
  }

  private render(): void {
    if (!this.label) return;
    const spinner = SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length];
    const elapsed = formatDuration(Date.now() - this.stageStart);
    let bar = "";
    if (this.total > 0) {
      const filled = Math.min(BAR_WIDTH, Math.round((this.current / this.total) * BAR_WIDTH));
      bar = `  ${GREEN}${"█".repeat(filled)}${RESET}${DIM}${"░".repeat(BAR_WIDTH - filled)}${RESET}  ${this.current}/${this.total}`;
    }
    const detail = this.detail ? `  ${DIM}${this.detail}${RESET}` : "";
    this.stream.write(
      `\r${CLEAR_LINE}${BOLD}${CYAN}${spinner}${RESET} ${this.label}${bar}${detail}  ${DIM}${elapsed}${RESET}`
    );
  }
}

/**
 * Multi-line status block for `status` and `status --watch`.
 */
export function formatRunStatus(status: RunStatus): string {
  const stateColor =
    status.state === "COMPLETE" ? GREEN : status.state === "FAILED" ? RED : YELLOW;
  const lines = [
    `${BOLD}${status.run_id}${RESET}  ${stateColor}${status.state}${RESET}  ${DIM}${formatDuration(status.elapsed_ms)}${RESET}`,
  ];

  for (const name of STAGE_NAMES) {
    const stage = status.stages[name];
    const mark =
      stage.status === "succeeded"
        ? `${GREEN}✔${RESET}`
        : stage.status === "failed"
          ? `${RED}✗${RESET}`
          : status.current_stage === name
            ? `${YELLOW}…${RESET}`
            : `${DIM}·${RESET}`;
    const duration = stage.duration_ms !== undefined ? `  ${DIM}${formatDuration(stage.duration_ms)}${RESET}` : "";
    lines.push(`  ${mark} ${name}${duration}`);
  }

  if (status.failure) {
    lines.push(`  ${RED}${status.failure.kind}${RESET}: ${status.failure.error}`);
  }
  if (status.stats) {
    const { artifacts } = status.stats;
    lines.push(
      `  ${DIM}pages ${artifacts.raw} → docs ${artifacts.clean} → blocks ${artifacts.sliced} → qa ${artifacts.qa}${RESET}`
    );
  }
  return lines.join("\n");
}

// ============================================================================
// Helpers
// ============================================================================

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) return `${minutes}m ${secs}s`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours}h ${mins}m`;
}

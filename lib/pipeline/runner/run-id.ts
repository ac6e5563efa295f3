import { randomBytes } from "node:crypto";

const RUN_ID = /^run_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}_[0-9a-f]{6}$/;

export function randomSuffix(): string {
  return randomBytes(3).toString("hex");
}

/**
 * run_<YYYY-MM-DD_HH-MM-SS>_<6 hex chars>, local time.
 */
export function createRunId(now: Date = new Date(), suffix: string = randomSuffix()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return `run_${date}_${time}_${suffix}`;
}

export function isRunId(value: string): boolean {
  return RUN_ID.test(value);
}

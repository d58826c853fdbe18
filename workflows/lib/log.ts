import type { PlannedStep, RunHooks, StepReport } from "../local/runner.ts";
import { bold, dim, error, go, ok, warn } from "./color.ts";

const PREFIX = "guides:";

export function info(message: string): void {
  console.log(`${PREFIX} ${message}`);
}

export function warning(message: string): void {
  console.warn(`${PREFIX} ${warn(message)}`);
}

export function failure(message: string): void {
  console.error(`${PREFIX} ${error(message)}`);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const secs = ms / 1000;
  if (secs < 60) {
    return `${secs.toFixed(1)}s`;
  }
  const mins = Math.floor(secs / 60);
  return `${mins}m${Math.round(secs - mins * 60)}s`;
}

export function stepStartLine(step: PlannedStep): string {
  return `${PREFIX} ${go("start")} ${bold(step.name)} ${dim(`[${step.kind}]`)}`;
}

export function stepEndLine(report: StepReport): string {
  const took = dim(`(${formatDuration(report.durationMs)})`);
  switch (report.status) {
    case "success":
      return `${PREFIX} ${ok("done")} ${report.name} ${took}`;
    case "skipped":
      return `${PREFIX} ${dim("skip")} ${report.name}`;
    case "failure": {
      const code = report.exitCode === undefined
        ? ""
        : ` exit ${report.exitCode}`;
      const line = `${PREFIX} ${error(`fail${code}`)} ${report.name} ${took}`;
      return report.continued ? `${line} ${dim("continued")}` : line;
    }
  }
}

/**
 * Console hooks for the local runner: one line per step start and end,
 * with step output passed through as it arrives.
 */
export function consoleHooks(): RunHooks {
  return {
    onStepStart: (step) => console.log(stepStartLine(step)),
    onStepEnd: (report) => console.log(stepEndLine(report)),
    onOutput: (chunk) => process.stdout.write(chunk),
    onWarning: (message) => warning(message),
  };
}

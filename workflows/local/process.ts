import { spawn } from "node:child_process";
import { createWriteStream } from "node:fs";
import { constants } from "node:os";

export interface ShellRequest {
  command: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Also write the combined output here. */
  logFile?: string;
  onOutput?: (chunk: string) => void;
  /** Terminate the script after this long. */
  timeoutMs?: number;
}

export interface ShellResult {
  exitCode: number;
  output: string;
  timedOut?: boolean;
}

export type ShellExecutor = (request: ShellRequest) => Promise<ShellResult>;

/** How the hosted runner invokes `run` scripts under bash. */
export const BASH_ARGS = ["--noprofile", "--norc", "-eo", "pipefail", "-c"];

function signalStatus(signal: NodeJS.Signals | null): number {
  return signal ? 128 + constants.signals[signal] : 1;
}

/**
 * Run a script with bash, collecting stdout and stderr as one stream.
 * Resolves with the exit status; rejects only if bash cannot be started.
 * A script still running after `timeoutMs` gets SIGTERM and is reported
 * as `timedOut`.
 */
export const bashExecutor: ShellExecutor = (request) =>
  new Promise<ShellResult>((resolveP, rejectP) => {
    const child = spawn("bash", [...BASH_ARGS, request.command], {
      cwd: request.cwd,
      env: request.env,
      windowsHide: true,
    });
    const log = request.logFile
      ? createWriteStream(request.logFile, { encoding: "utf8" })
      : undefined;

    let output = "";
    let timedOut = false;
    const timer = request.timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, request.timeoutMs);
    const collect = (d: Buffer) => {
      const text = d.toString("utf8");
      output += text;
      log?.write(text);
      request.onOutput?.(text);
    };
    child.stdout.on("data", collect);
    child.stderr.on("data", collect);

    child.on("error", (e) => {
      clearTimeout(timer);
      log?.end();
      rejectP(e);
    });
    child.on("close", (code, signal) => {
      clearTimeout(timer);
      const result = { exitCode: code ?? signalStatus(signal), output, timedOut };
      if (log) {
        log.end(() => resolveP(result));
      } else {
        resolveP(result);
      }
    });
  });

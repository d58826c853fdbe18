import { access } from "node:fs/promises";
import { delimiter, join, resolve } from "node:path";

import type { PackageCache } from "./cache.ts";
import { ProvisionError } from "./errors.ts";
import type { ShellExecutor } from "./process.ts";

export interface ActionContext {
  /** Display name of the step, for errors. */
  step: string;
  /** The step's `with` values, already interpolated. */
  inputs: Record<string, string>;
  workspace: string;
  /** Scratch directory for this run; removed when the run ends. */
  runDir: string;
  /** Job environment; changes are seen by later steps. */
  env: Record<string, string>;
  cache: PackageCache;
  /** Interpreter to use instead of `python<version>`. */
  python?: string;
  exec: ShellExecutor;
  /** Register work to do after every step has succeeded. */
  onSuccess(hook: () => Promise<void>): void;
  /** Report a problem that does not fail the step. */
  warn(message: string): void;
}

export interface ActionResult {
  outputs?: Record<string, string>;
}

export type ActionHandler = (ctx: ActionContext) => Promise<ActionResult>;
export type ActionRegistry = Record<string, ActionHandler>;

/** `actions/cache@v3` → `actions/cache` */
export function actionName(uses: string): string {
  const at = uses.indexOf("@");
  return at < 0 ? uses : uses.slice(0, at);
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function shellQuote(arg: string): string {
  return `'${arg.replaceAll("'", `'\\''`)}'`;
}

/**
 * The working tree is the checkout; all we can do is make sure it is there.
 */
export const checkoutAction: ActionHandler = async (ctx) => {
  try {
    await access(ctx.workspace);
  } catch {
    throw new ProvisionError(ctx.step, `workspace ${ctx.workspace} not found`);
  }
  return {};
};

export const PYTHON_VERSION_PROBE =
  `-c 'import sys; print("%d.%d" % sys.version_info[:2])'`;

/**
 * Check the interpreter matches the requested version and make a fresh
 * virtual environment from it, first on the job's PATH.
 */
export const setupPythonAction: ActionHandler = async (ctx) => {
  const version = ctx.inputs["python-version"];
  if (!version) {
    throw new ProvisionError(ctx.step, "python-version is required");
  }
  const python = ctx.python ?? `python${version}`;

  const probe = await ctx.exec({
    command: `${python} ${PYTHON_VERSION_PROBE}`,
    cwd: ctx.workspace,
    env: ctx.env,
  });
  if (probe.exitCode != 0) {
    throw new ProvisionError(ctx.step, `cannot run ${python}`);
  }
  const found = probe.output.trim();
  if (found != version) {
    throw new ProvisionError(
      ctx.step,
      `${python} is Python ${found}, not ${version}`,
    );
  }

  const venv = join(ctx.runDir, "venv");
  const made = await ctx.exec({
    command: `${python} -m venv ${shellQuote(venv)}`,
    cwd: ctx.workspace,
    env: ctx.env,
  });
  if (made.exitCode != 0) {
    throw new ProvisionError(ctx.step, `cannot create environment ${venv}`);
  }

  const bin = join(venv, "bin");
  ctx.env.PATH = ctx.env.PATH ? `${bin}${delimiter}${ctx.env.PATH}` : bin;
  ctx.env.VIRTUAL_ENV = venv;
  ctx.env.pythonLocation = venv;
  return {
    outputs: {
      "python-version": found,
      "python-path": join(bin, "python"),
    },
  };
};

/**
 * Restore the entry for `key` into `path`; on a miss, save `path` under
 * the key once the job has succeeded.  A restore error counts as a miss
 * and a save error as a warning.
 */
export const cacheAction: ActionHandler = async (ctx) => {
  const key = ctx.inputs.key?.trim();
  const rawPath = ctx.inputs.path?.trim();
  if (!key) {
    throw new ProvisionError(ctx.step, "cache key is empty");
  }
  if (!rawPath) {
    throw new ProvisionError(ctx.step, "cache path is empty");
  }
  const path = resolve(ctx.workspace, rawPath);

  let hit = false;
  try {
    hit = await ctx.cache.restore(key, path);
  } catch (e) {
    ctx.warn(`cache restore failed for ${key}: ${errorMessage(e)}`);
  }
  if (!hit) {
    ctx.onSuccess(async () => {
      try {
        await ctx.cache.save(key, path);
      } catch (e) {
        ctx.warn(`cache save failed for ${key}: ${errorMessage(e)}`);
      }
    });
  }
  return { outputs: { "cache-hit": String(hit), "cache-key": key } };
};

export const LOCAL_ACTIONS: ActionRegistry = {
  "actions/checkout": checkoutAction,
  "actions/setup-python": setupPythonAction,
  "actions/cache": cacheAction,
};

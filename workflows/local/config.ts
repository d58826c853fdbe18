import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const DEFAULT_JOB = "guides";

export interface RunFlags {
  job?: string;
  workspace?: string;
  cacheDir?: string;
  logDir?: string;
  python?: string;
  platform?: string;
}

export interface RunConfig {
  job: string;
  workspace: string;
  cacheDir: string;
  logDir?: string;
  python?: string;
  platform?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value?.trim() ? value.trim() : undefined;
}

export function defaultCacheDir(
  env: NodeJS.ProcessEnv,
  home: string = homedir(),
): string {
  const base = nonEmpty(env.XDG_CACHE_HOME) ?? join(home, ".cache");
  return join(base, "guide-workflows");
}

/**
 * Resolve run settings: command-line flag, then `GUIDES_*` environment
 * variable, then default.  Paths are made absolute against `cwd`.
 */
export function resolveRunConfig(
  flags: RunFlags,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RunConfig {
  const workspace = nonEmpty(flags.workspace) ??
    nonEmpty(env.GUIDES_WORKSPACE) ?? cwd;
  const cacheDir = nonEmpty(flags.cacheDir) ??
    nonEmpty(env.GUIDES_CACHE_DIR) ?? defaultCacheDir(env);
  const logDir = nonEmpty(flags.logDir) ?? nonEmpty(env.GUIDES_LOG_DIR);

  return {
    job: nonEmpty(flags.job) ?? DEFAULT_JOB,
    workspace: resolve(cwd, workspace),
    cacheDir: resolve(cwd, cacheDir),
    logDir: logDir ? resolve(cwd, logDir) : undefined,
    python: nonEmpty(flags.python) ?? nonEmpty(env.GUIDES_PYTHON),
    platform: nonEmpty(flags.platform) ?? nonEmpty(env.GUIDES_PLATFORM),
  };
}

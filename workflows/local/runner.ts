/**
 * Local execution of a workflow job.  Steps run one at a time, in order;
 * the first failure stops the job unless the step has `continue-on-error`,
 * and nothing is retried.
 * @module
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";

import {
  acceptsManualDispatch,
  type ScalarValue,
  type Workflow,
  type WorkflowJob,
  type WorkflowStep,
} from "../lib/github.ts";
import { scriptLines } from "../lib/script.ts";
import { actionName, type ActionRegistry, LOCAL_ACTIONS } from "./actions.ts";
import { PackageCache } from "./cache.ts";
import {
  ExpressionError,
  type FailureKind,
  GuideRunError,
  ProvisionError,
  StepFailedError,
  StepTimeoutError,
  WorkflowError,
} from "./errors.ts";
import {
  type ExpressionContext,
  interpolate,
  shouldRun,
  type StepState,
} from "./expressions.ts";
import { hashFiles } from "./hash-files.ts";
import { readOutputs } from "./outputs.ts";
import { bashExecutor, type ShellExecutor } from "./process.ts";

export type StepStatus = "success" | "failure" | "skipped";

export interface PlannedStep {
  index: number;
  id?: string;
  name: string;
  kind: FailureKind;
  uses?: string;
  run?: string;
  continueOnError?: boolean;
  timeoutMinutes?: number;
}

export interface StepReport extends PlannedStep {
  status: StepStatus;
  /** The step failed but `continue-on-error` kept the job going. */
  continued?: boolean;
  exitCode?: number;
  durationMs: number;
  outputs: Record<string, string>;
  logFile?: string;
}

export interface JobReport {
  job: string;
  status: "success" | "failure";
  steps: StepReport[];
  failure?: GuideRunError;
  warnings: string[];
}

export interface RunHooks {
  onStepStart?: (step: PlannedStep) => void;
  onStepEnd?: (report: StepReport) => void;
  onOutput?: (chunk: string) => void;
  onWarning?: (message: string) => void;
}

export interface RunOptions {
  workflow: Workflow;
  job: string;
  workspace: string;
  cacheDir: string;
  /** Value of `runner.os`; defaults to the job's `runs-on` label. */
  platform?: string;
  python?: string;
  logDir?: string;
  /** Base environment for steps; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  inputs?: Record<string, string>;
  exec?: ShellExecutor;
  actions?: ActionRegistry;
  hooks?: RunHooks;
}

const PIP_INSTALL = /\bpip\s+install\b/;
const MINUTE = 60_000;

export function classifyStep(step: WorkflowStep): FailureKind {
  if (step.uses) {
    return "provision";
  } else if (step.run && PIP_INSTALL.test(step.run)) {
    return "install";
  } else {
    return "guides";
  }
}

export function stepName(step: WorkflowStep): string {
  if (step.name) {
    return step.name;
  } else if (step.uses) {
    return `Run ${step.uses}`;
  } else {
    return `Run ${scriptLines(step.run ?? "")[0] ?? ""}`;
  }
}

export function getJob(workflow: Workflow, id: string): WorkflowJob {
  const job = workflow.jobs[id];
  if (!job) {
    const known = Object.keys(workflow.jobs).join(", ");
    throw new WorkflowError(`no job ${id} in ${workflow.name} (have ${known})`);
  }
  return job;
}

/**
 * List the steps a job would run, in order, without running anything.
 * Everything the runner would reject is rejected here.
 */
export function planJob(workflow: Workflow, id: string): PlannedStep[] {
  const job = getJob(workflow, id);
  if (job.needs?.length) {
    throw new WorkflowError(
      `job ${id} needs ${job.needs.join(", ")}; only single jobs run locally`,
    );
  }
  if (!shouldRun(job.if, false)) {
    throw new WorkflowError(`job ${id} would not run (if: ${job.if})`);
  }

  return job.steps.map((step, index) => {
    if (!step.uses && !step.run) {
      throw new WorkflowError(`step ${index + 1} has neither uses nor run`);
    }
    if (step.uses && step.run) {
      throw new WorkflowError(`step ${index + 1} has both uses and run`);
    }
    if (step.shell && step.shell != "bash") {
      throw new WorkflowError(`step ${index + 1}: unsupported shell ${step.shell}`);
    }
    if (step.uses && step["timeout-minutes"] !== undefined) {
      throw new WorkflowError(
        `step ${index + 1}: timeout-minutes is only enforced on run steps`,
      );
    }
    // unsupported conditions throw
    shouldRun(step.if, false);
    return {
      index,
      id: step.id,
      name: stepName(step),
      kind: classifyStep(step),
      uses: step.uses,
      run: step.run,
      continueOnError: step["continue-on-error"] ?? false,
      timeoutMinutes: step["timeout-minutes"],
    };
  });
}

export function logFileName(step: PlannedStep): string {
  const slug = step.name.toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return `${String(step.index + 1).padStart(2, "0")}-${slug || "step"}.log`;
}

function stringEnv(
  ...sources: (NodeJS.ProcessEnv | Record<string, ScalarValue> | undefined)[]
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const src of sources) {
    for (const [k, v] of Object.entries(src ?? {})) {
      if (v !== undefined) out[k] = String(v);
    }
  }
  return out;
}

async function interpolateAll(
  values: Record<string, ScalarValue> | undefined,
  ctx: ExpressionContext,
): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(values ?? {})) {
    out[k] = await interpolate(String(v), ctx);
  }
  return out;
}

/** Expression and workflow errors are bugs in the workflow, not failures. */
function asRunError(e: unknown, step: PlannedStep): GuideRunError {
  if (e instanceof GuideRunError) {
    return e;
  } else if (e instanceof WorkflowError || e instanceof ExpressionError) {
    throw e;
  } else {
    const msg = e instanceof Error ? e.message : String(e);
    return new GuideRunError(step.kind, step.name, msg);
  }
}

interface JobState {
  options: RunOptions;
  job: WorkflowJob;
  runDir: string;
  env: Record<string, string>;
  ctx: ExpressionContext;
  cache: PackageCache;
  actions: ActionRegistry;
  exec: ShellExecutor;
  successHooks: (() => Promise<void>)[];
  warnings: string[];
  /** When the job's `timeout-minutes` runs out. */
  deadline?: number;
}

function warn(state: JobState, message: string): void {
  state.warnings.push(message);
  state.options.hooks?.onWarning?.(message);
}

function jobTimeout(planned: PlannedStep, state: JobState): StepTimeoutError {
  const minutes = state.job["timeout-minutes"];
  return new StepTimeoutError(
    planned.kind,
    planned.name,
    `job ${state.options.job} exceeded its ${minutes}-minute limit`,
  );
}

/** Time left for a run step: its own limit or the job's, whichever is less. */
function stepTimeoutMs(
  planned: PlannedStep,
  state: JobState,
): number | undefined {
  const limits: number[] = [];
  if (planned.timeoutMinutes !== undefined) {
    limits.push(planned.timeoutMinutes * MINUTE);
  }
  if (state.deadline !== undefined) {
    limits.push(Math.max(state.deadline - Date.now(), 0));
  }
  return limits.length ? Math.min(...limits) : undefined;
}

async function executeStep(
  planned: PlannedStep,
  state: JobState,
  logFile: string | undefined,
): Promise<Record<string, string>> {
  const step = state.job.steps[planned.index];
  const { options, ctx } = state;
  if (state.deadline !== undefined && Date.now() >= state.deadline) {
    throw jobTimeout(planned, state);
  }

  if (step.uses) {
    const handler = state.actions[actionName(step.uses)];
    if (!handler) {
      throw new ProvisionError(planned.name, `no local handler for ${step.uses}`);
    }
    const result = await handler({
      step: planned.name,
      inputs: await interpolateAll(step.with, ctx),
      workspace: options.workspace,
      runDir: state.runDir,
      env: state.env,
      cache: state.cache,
      python: options.python,
      exec: state.exec,
      onSuccess: (hook) => {
        state.successHooks.push(hook);
      },
      warn: (message) => warn(state, message),
    });
    if (state.deadline !== undefined && Date.now() > state.deadline) {
      throw jobTimeout(planned, state);
    }
    return result.outputs ?? {};
  }

  const outputFile = join(state.runDir, `output-${planned.index}`);
  await writeFile(outputFile, "");
  const command = await interpolate(step.run ?? "", ctx);
  const stepEnv = await interpolateAll(step.env, ctx);
  const result = await state.exec({
    command,
    cwd: resolve(options.workspace, step["working-directory"] ?? "."),
    env: { ...state.env, ...stepEnv, GITHUB_OUTPUT: outputFile },
    logFile,
    onOutput: options.hooks?.onOutput,
    timeoutMs: stepTimeoutMs(planned, state),
  });
  if (result.timedOut) {
    throw new StepTimeoutError(
      planned.kind,
      planned.name,
      `step "${planned.name}" timed out`,
    );
  }
  if (result.exitCode != 0) {
    throw new StepFailedError(planned.kind, planned.name, result.exitCode);
  }
  return await readOutputs(outputFile);
}

/**
 * Run one job of a workflow.  Running locally counts as a manual dispatch,
 * so the workflow has to accept one.
 */
export async function runJob(options: RunOptions): Promise<JobReport> {
  const { workflow, hooks } = options;
  if (!acceptsManualDispatch(workflow)) {
    throw new WorkflowError(`${workflow.name} cannot be dispatched manually`);
  }
  const job = getJob(workflow, options.job);
  const plan = planJob(workflow, options.job);
  const platform = options.platform ?? job["runs-on"];
  const workspace = resolve(options.workspace);

  const jobMinutes = job["timeout-minutes"];
  const deadline = jobMinutes === undefined
    ? undefined
    : Date.now() + jobMinutes * MINUTE;

  const runDir = await mkdtemp(join(tmpdir(), "guides-run-"));
  const env = stringEnv(options.env ?? process.env, workflow.env, job.env, {
    CI: "true",
    GITHUB_WORKSPACE: workspace,
    RUNNER_OS: platform,
    RUNNER_TEMP: runDir,
  });
  const steps: Record<string, StepState> = {};
  const state: JobState = {
    options: { ...options, workspace },
    job,
    runDir,
    env,
    ctx: {
      runner: { os: platform, temp: runDir, name: "local" },
      github: {
        event_name: "workflow_dispatch",
        job: options.job,
        workflow: workflow.name,
        workspace,
      },
      env,
      inputs: options.inputs ?? {},
      steps,
      hashFiles: (patterns) => hashFiles(workspace, patterns),
    },
    cache: new PackageCache(options.cacheDir),
    actions: options.actions ?? LOCAL_ACTIONS,
    exec: options.exec ?? bashExecutor,
    successHooks: [],
    warnings: [],
    deadline,
  };

  const reports: StepReport[] = [];
  let failure: GuideRunError | undefined;
  try {
    if (options.logDir) {
      await mkdir(options.logDir, { recursive: true });
    }

    for (const planned of plan) {
      const step = job.steps[planned.index];
      if (!shouldRun(step.if, failure !== undefined)) {
        const skipped: StepReport = {
          ...planned,
          status: "skipped",
          durationMs: 0,
          outputs: {},
        };
        if (planned.id) steps[planned.id] = { outputs: {}, conclusion: "skipped" };
        reports.push(skipped);
        hooks?.onStepEnd?.(skipped);
        continue;
      }

      hooks?.onStepStart?.(planned);
      const logFile = options.logDir && planned.run
        ? join(options.logDir, logFileName(planned))
        : undefined;
      const started = Date.now();
      const report: StepReport = {
        ...planned,
        status: "success",
        durationMs: 0,
        outputs: {},
        logFile,
      };
      try {
        report.outputs = await executeStep(planned, state, logFile);
      } catch (e) {
        const err = asRunError(e, planned);
        report.status = "failure";
        if (err instanceof StepFailedError) report.exitCode = err.exitCode;
        if (planned.continueOnError) {
          report.continued = true;
          warn(state, `${err.message} (continuing)`);
        } else {
          failure ??= err;
        }
      }
      report.durationMs = Date.now() - started;
      if (planned.id) {
        steps[planned.id] = {
          outputs: report.outputs,
          conclusion: report.continued ? "success" : report.status,
        };
      }
      reports.push(report);
      hooks?.onStepEnd?.(report);
    }

    if (!failure) {
      for (const hook of state.successHooks) {
        await hook();
      }
    }
  } finally {
    await rm(runDir, { recursive: true, force: true });
  }

  return {
    job: options.job,
    status: failure ? "failure" : "success",
    steps: reports,
    failure,
    warnings: state.warnings,
  };
}

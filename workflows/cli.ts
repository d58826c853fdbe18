import { resolve } from "node:path";

import { Command } from "commander";

import { WORKFLOWS, findWorkflow } from "./index.ts";
import { bold, dim } from "./lib/color.ts";
import { consoleHooks, failure, info } from "./lib/log.ts";
import type { WorkflowModule } from "./lib/render.ts";
import { writeWorkflows } from "./lib/render.ts";
import { DEFAULT_JOB, resolveRunConfig, type RunFlags } from "./local/config.ts";
import type { ActionRegistry } from "./local/actions.ts";
import type { ShellExecutor } from "./local/process.ts";
import { planJob, runJob } from "./local/runner.ts";

const DEFAULT_WORKFLOW = "integration_tests";

function selectWorkflow(name: string): WorkflowModule {
  const mod = findWorkflow(name);
  if (!mod) {
    const known = WORKFLOWS.map((w) => w.name).join(", ");
    throw new Error(`unknown workflow ${name} (have ${known})`);
  }
  return mod;
}

/** What `run` executes with; bash and the local actions unless replaced. */
export interface ProgramDeps {
  exec?: ShellExecutor;
  actions?: ActionRegistry;
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();
  program
    .name("guides")
    .description("Render and run the guide integration workflows.");

  program
    .command("render")
    .description("write the workflows as GitHub Actions YAML")
    .option("-o, --out <dir>", "output directory", ".github/workflows")
    .option("--check", "report stale files instead of writing them")
    .action(async (opts: { out: string; check?: boolean }) => {
      const result = await writeWorkflows(resolve(opts.out), WORKFLOWS, {
        check: opts.check,
      });
      for (const path of result.written) {
        info(`wrote ${path}`);
      }
      if (result.stale.length) {
        for (const path of result.stale) {
          failure(`out of date: ${path}`);
        }
        process.exitCode = 1;
      } else if (opts.check) {
        info("workflows are up to date");
      }
    });

  program
    .command("plan")
    .description("list the steps of a job in execution order")
    .option("-w, --workflow <name>", "workflow to plan", DEFAULT_WORKFLOW)
    .option("-j, --job <id>", "job to plan", DEFAULT_JOB)
    .action((opts: { workflow: string; job: string }) => {
      const { workflow } = selectWorkflow(opts.workflow);
      for (const step of planJob(workflow, opts.job)) {
        const num = String(step.index + 1).padStart(2, " ");
        console.log(`${num}. ${bold(step.name)} ${dim(`[${step.kind}]`)}`);
      }
    });

  program
    .command("run")
    .description("run a job locally, stopping at the first failure")
    .option("-w, --workflow <name>", "workflow to run", DEFAULT_WORKFLOW)
    .option("-j, --job <id>", "job to run")
    .option("--workspace <dir>", "checkout to run in")
    .option("--cache-dir <dir>", "package cache store")
    .option("--log-dir <dir>", "write each step's output here")
    .option("--python <exe>", "interpreter to build the environment from")
    .option("--platform <id>", "value of runner.os")
    .action(async (opts: RunFlags & { workflow: string }) => {
      const { workflow } = selectWorkflow(opts.workflow);
      const config = resolveRunConfig(opts);
      info(`running ${workflow.name} / ${config.job} in ${config.workspace}`);
      const report = await runJob({
        ...config,
        workflow,
        exec: deps.exec,
        actions: deps.actions,
        hooks: consoleHooks(),
      });
      if (report.failure) {
        const { kind, step, message } = report.failure;
        failure(`${kind} failure in "${step}": ${message}`);
        process.exitCode = 1;
      } else {
        info(`${config.job} succeeded`);
      }
    });

  return program;
}

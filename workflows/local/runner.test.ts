import { createHash } from "node:crypto";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { workflow } from "../integration-tests.ts";
import type { Workflow, WorkflowJob, WorkflowStep } from "../lib/github.ts";
import { PackageCache } from "./cache.ts";
import {
  ProvisionError,
  StepFailedError,
  StepTimeoutError,
  WorkflowError,
} from "./errors.ts";
import type { ShellExecutor, ShellRequest } from "./process.ts";
import { logFileName, planJob, type RunOptions, runJob } from "./runner.ts";

const MANIFEST = "from setuptools import setup\nsetup(name='project')\n";

/**
 * Stand-in for bash: answers the interpreter probe, publishes the pip
 * cache dir and fails or times out whichever command the test asks it to.
 */
class FakeShell {
  readonly requests: ShellRequest[] = [];
  pythonVersion = "3.10";
  failures: Record<string, number> = {};
  timeouts: string[] = [];
  fillsCache = true;

  constructor(readonly pipDir: string) {}

  get commands(): string[] {
    return this.requests.map((r) => r.command);
  }

  exec: ShellExecutor = async (request) => {
    this.requests.push(request);
    const cmd = request.command;
    for (const [fragment, code] of Object.entries(this.failures)) {
      if (cmd.includes(fragment)) {
        return { exitCode: code, output: `failed: ${fragment}\n` };
      }
    }
    if (this.timeouts.some((fragment) => cmd.includes(fragment))) {
      return { exitCode: 143, output: "", timedOut: true };
    }
    if (cmd.includes("import sys")) {
      return { exitCode: 0, output: `${this.pythonVersion}\n` };
    }
    if (cmd.includes("pip cache dir")) {
      const outputFile = request.env.GITHUB_OUTPUT;
      if (outputFile) await writeFile(outputFile, `dir=${this.pipDir}\n`);
    }
    if (cmd.includes("pip install -e") && this.fillsCache) {
      // pip fills its cache while installing
      await mkdir(this.pipDir, { recursive: true });
      await writeFile(join(this.pipDir, "keras.whl"), "wheel");
    }
    return { exitCode: 0, output: "" };
  };
}

function manifestHash(): string {
  const digest = createHash("sha256").update(MANIFEST).digest();
  return createHash("sha256").update(digest).digest("hex");
}

describe("runJob", () => {
  let dir: string;
  let workspace: string;
  let shell: FakeShell;

  function options(extra: Partial<RunOptions> = {}): RunOptions {
    return {
      workflow,
      job: "guides",
      workspace,
      cacheDir: join(dir, "cache"),
      env: { PATH: "/usr/bin" },
      exec: shell.exec,
      ...extra,
    };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "runner-"));
    workspace = join(dir, "repo");
    await mkdir(workspace);
    await writeFile(join(workspace, "setup.py"), MANIFEST);
    shell = new FakeShell(join(dir, "pip"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs every step in order and succeeds", async () => {
    const report = await runJob(options());

    expect(report.status).toBe("success");
    expect(report.failure).toBeUndefined();
    expect(report.steps.map((s) => s.status)).toEqual(
      Array(8).fill("success"),
    );
    expect(shell.commands.slice(2)).toEqual([
      'python -m pip install --upgrade pip setuptools\necho "dir=$(pip cache dir)" >> $GITHUB_OUTPUT\n',
      'pip install -e ".[tensorflow-cpu,tests]" --progress-bar off --upgrade\n',
      "pip install jax[cpu] --progress-bar off --upgrade\n",
      "pip install tensorflow==2.16.0rc0\n",
      "bash shell/run_guides.sh\n",
    ]);
  });

  it("builds a fresh environment from the pinned interpreter", async () => {
    await runJob(options());

    expect(shell.commands[0]).toMatch(/^python3\.10 -c /);
    expect(shell.commands[1]).toMatch(/^python3\.10 -m venv '.*\/venv'$/);
    const guideEnv = shell.requests[6].env;
    expect(guideEnv.VIRTUAL_ENV).toMatch(/\/venv$/);
    expect(guideEnv.PATH).toBe(`${guideEnv.VIRTUAL_ENV}/bin:/usr/bin`);
  });

  it("uses the interpreter it is given", async () => {
    await runJob(options({ python: "/opt/py310/bin/python" }));
    expect(shell.commands[0]).toMatch(/^\/opt\/py310\/bin\/python -c /);
  });

  it("never runs the guides after a failed install", async () => {
    shell.failures = { "pip install jax": 1 };
    const report = await runJob(options());

    expect(report.status).toBe("failure");
    expect(report.failure).toBeInstanceOf(StepFailedError);
    expect(report.failure?.kind).toBe("install");
    expect(report.failure?.step).toBe("📦 Install jax");
    expect(report.steps.map((s) => s.status)).toEqual([
      "success",
      "success",
      "success",
      "success",
      "success",
      "failure",
      "skipped",
      "skipped",
    ]);
    expect(report.steps[5].exitCode).toBe(1);
    expect(shell.commands).not.toContain("bash shell/run_guides.sh\n");
    expect(shell.commands).not.toContain("pip install tensorflow==2.16.0rc0\n");
  });

  it("fails the run when the installer upgrade fails", async () => {
    shell.failures = { "pip install --upgrade pip": 2 };
    const report = await runJob(options());

    expect(report.failure?.kind).toBe("install");
    expect(report.steps[2].exitCode).toBe(2);
    expect(report.steps.slice(3).every((s) => s.status == "skipped")).toBe(true);
  });

  it("fails on the wrong interpreter before installing anything", async () => {
    shell.pythonVersion = "3.12";
    const report = await runJob(options());

    expect(report.failure).toBeInstanceOf(ProvisionError);
    expect(report.failure?.message).toBe("python3.10 is Python 3.12, not 3.10");
    expect(shell.commands).toHaveLength(1);
  });

  it("succeeds exactly when the guide script exits 0", async () => {
    shell.failures = { "run_guides.sh": 3 };
    const failed = await runJob(options());
    expect(failed.status).toBe("failure");
    expect(failed.failure?.kind).toBe("guides");
    expect(failed.steps[7].exitCode).toBe(3);

    shell.failures = {};
    const passed = await runJob(options());
    expect(passed.status).toBe("success");
  });

  it("reuses the cache entry keyed on OS and manifest hash", async () => {
    const key = `ubuntu-latest-pip-${manifestHash()}`;

    const first = await runJob(options());
    expect(first.steps[3].outputs).toEqual({
      "cache-hit": "false",
      "cache-key": key,
    });
    expect(await new PackageCache(join(dir, "cache")).has(key)).toBe(true);

    const second = await runJob(options());
    expect(second.steps[3].outputs).toEqual({
      "cache-hit": "true",
      "cache-key": key,
    });
  });

  it("takes runner.os from the platform option", async () => {
    const report = await runJob(options({ platform: "macos-latest" }));
    expect(report.steps[3].outputs["cache-key"]).toBe(
      `macos-latest-pip-${manifestHash()}`,
    );
  });

  it("saves nothing to the cache when the job fails", async () => {
    shell.failures = { "run_guides.sh": 1 };
    await runJob(options());
    const key = `ubuntu-latest-pip-${manifestHash()}`;
    expect(await new PackageCache(join(dir, "cache")).has(key)).toBe(false);
  });

  it("warns and still succeeds when the cache cannot be saved", async () => {
    await writeFile(join(dir, "blocker"), "");
    const warnings: string[] = [];
    const report = await runJob(options({
      cacheDir: join(dir, "blocker", "cache"),
      hooks: { onWarning: (message) => warnings.push(message) },
    }));

    expect(report.status).toBe("success");
    expect(report.failure).toBeUndefined();
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatch(
      new RegExp(`^cache save failed for ubuntu-latest-pip-${manifestHash()}: `),
    );
    expect(warnings).toEqual(report.warnings);
  });

  it("treats a failed restore as a miss and keeps going", async () => {
    await runJob(options());
    // the restore target is now a plain file, so copying into it fails
    await rm(join(dir, "pip"), { recursive: true, force: true });
    await writeFile(join(dir, "pip"), "");
    shell.fillsCache = false;

    const report = await runJob(options());
    expect(report.status).toBe("success");
    expect(report.steps[3].status).toBe("success");
    expect(report.steps[3].outputs["cache-hit"]).toBe("false");
    expect(report.steps[7].status).toBe("success");
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatch(
      new RegExp(`^cache restore failed for ubuntu-latest-pip-${manifestHash()}: `),
    );
  });

  it("publishes step outputs to later steps", async () => {
    const report = await runJob(options());
    expect(report.steps[2].outputs).toEqual({ dir: join(dir, "pip") });
  });

  it("removes the run directory afterwards", async () => {
    await runJob(options());
    const runDir = shell.requests[2].env.RUNNER_TEMP;
    expect(runDir).toBeDefined();
    expect(existsSync(runDir ?? "")).toBe(false);
  });

  it("names a log file for each run step", async () => {
    const logDir = join(dir, "logs");
    const report = await runJob(options({ logDir }));
    expect(report.steps[7].logFile).toBe(join(logDir, "08-run-the-guides.log"));
    expect(shell.requests[6].logFile).toBe(join(logDir, "08-run-the-guides.log"));
    expect(report.steps[1].logFile).toBeUndefined();
  });

  it("refuses a workflow that cannot be dispatched manually", async () => {
    const pushed: Workflow = { ...workflow, on: { push: {} } };
    await expect(runJob(options({ workflow: pushed }))).rejects.toThrow(
      WorkflowError,
    );
    expect(shell.requests).toHaveLength(0);
  });

  it("refuses an unknown job", async () => {
    await expect(runJob(options({ job: "docs" }))).rejects.toThrow(
      "no job docs in Integration tests using keras.io guides (have guides)",
    );
  });

  it("fails a step whose action has no local handler", async () => {
    const custom: Workflow = {
      ...workflow,
      jobs: {
        guides: {
          "runs-on": "ubuntu-latest",
          steps: [{ name: "Upload", uses: "actions/upload-artifact@v4" }],
        },
      },
    };
    const report = await runJob(options({ workflow: custom }));
    expect(report.failure?.kind).toBe("provision");
    expect(report.failure?.message).toBe(
      "no local handler for actions/upload-artifact@v4",
    );
  });

  it("runs always() steps after a failure", async () => {
    const custom: Workflow = {
      ...workflow,
      jobs: {
        guides: {
          "runs-on": "ubuntu-latest",
          steps: [
            { name: "Guides", run: "bash shell/run_guides.sh" },
            { name: "Next", run: "echo next" },
            { name: "Collect", if: "${{ always() }}", run: "echo collect" },
          ],
        },
      },
    };
    shell.failures = { "run_guides.sh": 1 };
    const report = await runJob(options({ workflow: custom }));
    expect(report.steps.map((s) => s.status)).toEqual([
      "failure",
      "skipped",
      "success",
    ]);
    expect(report.status).toBe("failure");
  });

  function single(
    job: Omit<Partial<WorkflowJob>, "steps">,
    steps: WorkflowStep[],
  ): Workflow {
    return {
      ...workflow,
      jobs: { guides: { "runs-on": "ubuntu-latest", ...job, steps } },
    };
  }

  it("keeps going past a continue-on-error step", async () => {
    const custom = single({}, [
      { id: "lint", name: "Lint", run: "echo lint", "continue-on-error": true },
      { name: "Guides", if: "${{ success() }}", run: "bash shell/run_guides.sh" },
    ]);
    shell.failures = { "echo lint": 4 };
    const report = await runJob(options({ workflow: custom }));

    expect(report.status).toBe("success");
    expect(report.failure).toBeUndefined();
    expect(report.steps[0]).toMatchObject({
      status: "failure",
      continued: true,
      exitCode: 4,
    });
    expect(report.steps[1].status).toBe("success");
    expect(report.warnings).toEqual([
      'step "Lint" exited with status 4 (continuing)',
    ]);
  });

  it("gives a run step the lesser of its own and the job's time", async () => {
    const custom = single({ "timeout-minutes": 30 }, [
      { name: "Quick", run: "echo quick", "timeout-minutes": 2 },
      { name: "Guides", run: "bash shell/run_guides.sh" },
    ]);
    await runJob(options({ workflow: custom }));

    expect(shell.requests[0].timeoutMs).toBe(120_000);
    const jobLeft = shell.requests[1].timeoutMs ?? 0;
    expect(jobLeft).toBeGreaterThan(29 * 60_000);
    expect(jobLeft).toBeLessThanOrEqual(30 * 60_000);
  });

  it("sets no time limit when none is configured", async () => {
    await runJob(options());
    expect(shell.requests.every((r) => r.timeoutMs === undefined)).toBe(true);
  });

  it("fails a step that runs out of time", async () => {
    const custom = single({}, [
      { name: "Guides", run: "bash shell/run_guides.sh", "timeout-minutes": 1 },
      { name: "After", run: "echo after" },
    ]);
    shell.timeouts = ["run_guides.sh"];
    const report = await runJob(options({ workflow: custom }));

    expect(report.status).toBe("failure");
    expect(report.failure).toBeInstanceOf(StepTimeoutError);
    expect(report.failure?.kind).toBe("guides");
    expect(report.failure?.message).toBe('step "Guides" timed out');
    expect(report.steps[1].status).toBe("skipped");
  });

  it("fails once the job's time is used up", async () => {
    const custom = single({ "timeout-minutes": 0 }, [
      { name: "Guides", run: "bash shell/run_guides.sh" },
    ]);
    const report = await runJob(options({ workflow: custom }));

    expect(report.failure).toBeInstanceOf(StepTimeoutError);
    expect(report.failure?.message).toBe(
      "job guides exceeded its 0-minute limit",
    );
    expect(shell.requests).toHaveLength(0);
  });

  it("refuses a job that needs other jobs", async () => {
    const custom = single({ needs: ["build"] }, [{ run: "echo hi" }]);
    await expect(runJob(options({ workflow: custom }))).rejects.toThrow(
      "job guides needs build; only single jobs run locally",
    );
    expect(shell.requests).toHaveLength(0);
  });

  it("refuses a job whose condition is false", async () => {
    const custom = single({ if: "${{ failure() }}" }, [{ run: "echo hi" }]);
    await expect(runJob(options({ workflow: custom }))).rejects.toThrow(
      "job guides would not run (if: ${{ failure() }})",
    );
  });

  it("rejects an unsupported step condition before running anything", async () => {
    const custom = single({}, [
      { name: "Guides", run: "bash shell/run_guides.sh" },
      { name: "Main only", if: "github.ref == 'refs/heads/main'", run: "echo" },
    ]);
    await expect(runJob(options({ workflow: custom }))).rejects.toThrow(
      WorkflowError,
    );
    expect(shell.requests).toHaveLength(0);
  });
});

describe("planJob", () => {
  it("lists step names in order", () => {
    expect(planJob(workflow, "guides").map((s) => s.name)).toEqual([
      "🛒 Checkout",
      "🐍 Set up Python 3.10",
      "🔧 Upgrade pip and find its cache",
      "🗃️ Cache pip packages",
      "📦 Install project with test extras",
      "📦 Install jax",
      "📦 Install tensorflow 2.16.0rc0",
      "📕 Run the guides",
    ]);
  });

  it("rejects steps with neither uses nor run", () => {
    const broken: Workflow = {
      ...workflow,
      jobs: { guides: { "runs-on": "ubuntu-latest", steps: [{ name: "x" }] } },
    };
    expect(() => planJob(broken, "guides")).toThrow(
      "step 1 has neither uses nor run",
    );
  });

  it("rejects a time limit on an action step", () => {
    const broken: Workflow = {
      ...workflow,
      jobs: {
        guides: {
          "runs-on": "ubuntu-latest",
          steps: [{ uses: "actions/checkout@v4", "timeout-minutes": 5 }],
        },
      },
    };
    expect(() => planJob(broken, "guides")).toThrow(
      "step 1: timeout-minutes is only enforced on run steps",
    );
  });

  it("carries continue-on-error and time limits into the plan", () => {
    const custom: Workflow = {
      ...workflow,
      jobs: {
        guides: {
          "runs-on": "ubuntu-latest",
          steps: [{
            name: "Guides",
            run: "bash shell/run_guides.sh",
            "continue-on-error": true,
            "timeout-minutes": 10,
          }],
        },
      },
    };
    expect(planJob(custom, "guides")[0]).toMatchObject({
      continueOnError: true,
      timeoutMinutes: 10,
    });
  });
});

describe("logFileName", () => {
  it("numbers and slugs the step", () => {
    expect(logFileName({ index: 4, name: "📦 Install jax", kind: "install" }))
      .toBe("05-install-jax.log");
  });
});

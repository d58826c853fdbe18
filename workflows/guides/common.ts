import type { WorkflowJob, WorkflowStep } from "../lib/github.ts";
import { checkoutStep } from "../lib/checkout.ts";
import { script } from "../lib/script.ts";
import { guidePlatform, type GuideJobSpec } from "./spec.ts";
import { pythonSetup } from "./python.ts";
import { installSteps } from "./install.ts";

export function guideJob(options: GuideJobSpec): WorkflowJob {
  if (!options.script) {
    throw new Error(`guide job ${options.key} has no script`);
  }

  return {
    name: options.name,
    "runs-on": guidePlatform(options),
    "timeout-minutes": options.timeout,
    steps: [
      checkoutStep(),
      ...pythonSetup(options),
      ...installSteps(options),
      runGuidesStep(options),
    ],
  };
}

export function runGuidesStep(options: GuideJobSpec): WorkflowStep {
  return {
    name: "📕 Run the guides",
    id: "run-guides",
    run: script(`bash ${options.script}`),
  };
}

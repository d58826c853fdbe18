import type { WorkflowStep } from "../lib/github.ts";
import { script } from "../lib/script.ts";
import {
  type GuideJobSpec,
  projectRequirement,
  type Requirement,
  requirementString,
} from "./spec.ts";

export interface PipInstallOpts {
  editable?: boolean;
  quiet?: boolean;
  upgrade?: boolean;
}

export function pipInstallCommand(
  target: string,
  options: PipInstallOpts = {},
): string {
  let cmd = "pip install";
  if (options.editable) {
    cmd += " -e";
  }
  cmd += ` ${target}`;
  if (options.quiet) {
    cmd += " --progress-bar off";
  }
  if (options.upgrade) {
    cmd += " --upgrade";
  }
  return cmd;
}

export function backendInstallStep(req: Requirement): WorkflowStep {
  const label = req.pin ? `${req.package} ${req.pin}` : req.package;
  return {
    name: `📦 Install ${label}`,
    run: script(pipInstallCommand(requirementString(req), req)),
  };
}

/**
 * One step per install group: the project first, then every backend in
 * the order the job lists them.
 */
export function installSteps(spec: GuideJobSpec): WorkflowStep[] {
  const project = spec.project;
  return [
    {
      name: "📦 Install project with test extras",
      id: "install-deps",
      run: script(pipInstallCommand(projectRequirement(project), {
        editable: project.editable ?? true,
        quiet: project.quiet,
        upgrade: project.upgrade,
      })),
    },
    ...spec.backends.map(backendInstallStep),
  ];
}

import { GUIDE_PLATFORM } from "../lib/defs.ts";

/**
 * A package requirement for pip.
 */
export interface Requirement {
  package: string;
  extras?: string[];
  /** Exact version to install (`==`). */
  pin?: string;
  upgrade?: boolean;
  /** Turn off pip's progress bar. */
  quiet?: boolean;
}

export interface ProjectInstall {
  extras: string[];
  editable?: boolean;
  upgrade?: boolean;
  quiet?: boolean;
}

export interface GuideJobSpec {
  key: string;
  name: string;
  runs_on?: string;
  python: string;
  /** Dependency manifest hashed into the pip cache key. */
  manifest: string;
  project: ProjectInstall;
  /** Alternate backends, installed in order after the project. */
  backends: Requirement[];
  script: string;
  timeout?: number;
}

export function guidePlatform(spec: GuideJobSpec): string {
  return spec.runs_on ?? GUIDE_PLATFORM;
}

/**
 * Format a requirement the way pip takes it on the command line.
 */
export function requirementString(req: Requirement): string {
  let out = req.package;
  if (req.extras?.length) {
    out += `[${req.extras.join(",")}]`;
  }
  if (req.pin) {
    out += `==${req.pin}`;
  }
  return out;
}

/**
 * The project itself, installed from the checkout.  Quoted so the shell
 * leaves the brackets alone.
 */
export function projectRequirement(project: ProjectInstall): string {
  if (project.extras.length) {
    return `".[${project.extras.join(",")}]"`;
  } else {
    return ".";
  }
}

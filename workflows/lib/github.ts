/**
 * Types for the subset of the GitHub Actions workflow schema our workflow
 * modules produce.  Field names follow the YAML keys exactly.
 * @module
 */

export type ScalarValue = string | number | boolean;

export interface WorkflowStep {
  id?: string;
  name?: string;
  if?: string;
  uses?: string;
  run?: string;
  shell?: string;
  with?: Record<string, ScalarValue>;
  env?: Record<string, ScalarValue>;
  "working-directory"?: string;
  "continue-on-error"?: boolean;
  "timeout-minutes"?: number;
}

export interface WorkflowJob {
  name?: string;
  "runs-on": string;
  needs?: string[];
  if?: string;
  environment?: string;
  "timeout-minutes"?: number;
  env?: Record<string, ScalarValue>;
  steps: WorkflowStep[];
}

export interface WorkflowDispatchInput {
  description?: string;
  required?: boolean;
  default?: ScalarValue;
  type?: "string" | "boolean" | "choice" | "number" | "environment";
  options?: string[];
}

export interface WorkflowTriggers {
  workflow_dispatch?: { inputs?: Record<string, WorkflowDispatchInput> };
  push?: { branches?: string[]; tags?: string[]; paths?: string[] };
  pull_request?: { branches?: string[]; paths?: string[] };
  schedule?: { cron: string }[];
  release?: { types?: string[] };
}

export type PermissionLevel = "read" | "write" | "none";

export interface Workflow {
  name: string;
  on: WorkflowTriggers;
  permissions?: Record<string, PermissionLevel>;
  concurrency?: { group: string; "cancel-in-progress"?: boolean };
  env?: Record<string, ScalarValue>;
  jobs: Record<string, WorkflowJob>;
}

/**
 * Check whether a workflow can only be started by a human through manual
 * dispatch.
 */
export function isManualDispatchOnly(workflow: Workflow): boolean {
  const triggers = Object.entries(workflow.on)
    .filter(([_, value]) => value !== undefined)
    .map(([key]) => key);
  return triggers.length == 1 && triggers[0] == "workflow_dispatch";
}

export function acceptsManualDispatch(workflow: Workflow): boolean {
  return workflow.on.workflow_dispatch !== undefined;
}

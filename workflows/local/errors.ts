/**
 * Failure taxonomy for local runs.  A failure stops the runner unless the
 * step allows it to continue; nothing is retried.
 * @module
 */

/**
 * - `provision`: an action step (checkout, interpreter, cache) failed.
 * - `install`: a `pip install` step exited non-zero.
 * - `guides`: any other run step, i.e. the guide script, exited non-zero.
 */
export type FailureKind = "provision" | "install" | "guides";

export class GuideRunError extends Error {
  readonly kind: FailureKind;
  readonly step: string;

  constructor(kind: FailureKind, step: string, message: string) {
    super(message);
    this.name = "GuideRunError";
    this.kind = kind;
    this.step = step;
  }
}

export class StepFailedError extends GuideRunError {
  readonly exitCode: number;

  constructor(kind: FailureKind, step: string, exitCode: number) {
    super(kind, step, `step "${step}" exited with status ${exitCode}`);
    this.name = "StepFailedError";
    this.exitCode = exitCode;
  }
}

export class ProvisionError extends GuideRunError {
  constructor(step: string, message: string) {
    super("provision", step, message);
    this.name = "ProvisionError";
  }
}

/** The workflow cannot be run as written. */
export class WorkflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WorkflowError";
  }
}

export class ExpressionError extends Error {
  readonly expression: string;

  constructor(expression: string, message: string) {
    super(`${message}: \${{ ${expression} }}`);
    this.name = "ExpressionError";
    this.expression = expression;
  }
}

export class StepTimeoutError extends GuideRunError {
  constructor(kind: FailureKind, step: string, message: string) {
    super(kind, step, message);
    this.name = "StepTimeoutError";
  }
}

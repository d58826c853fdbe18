/**
 * Evaluation of the `${{ ... }}` expressions our workflows use: context
 * paths, string literals and `hashFiles()`.  Anything else is an error.
 * @module
 */

import { ExpressionError, WorkflowError } from "./errors.ts";

export interface StepState {
  outputs: Record<string, string>;
  conclusion: "success" | "failure" | "skipped";
}

export interface ExpressionContext {
  runner: Record<string, string>;
  github: Record<string, string>;
  env: Record<string, string>;
  inputs: Record<string, string>;
  steps: Record<string, StepState>;
  hashFiles(patterns: string[]): Promise<string>;
}

const EXPRESSION = /\$\{\{(.*?)\}\}/g;
const LITERAL = /^'((?:[^']|'')*)'$/;
const PATH = /^[A-Za-z_][\w-]*(\.[A-Za-z_][\w-]*)*$/;
const CALL = /^([A-Za-z_]\w*)\((.*)\)$/;
const ARG_LIST = /^\s*'(?:[^']|'')*'\s*(,\s*'(?:[^']|'')*'\s*)*$/;
const ARG = /'((?:[^']|'')*)'/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value == "object" && value != null;
}

function unquote(body: string): string {
  return body.replaceAll("''", "'");
}

/**
 * Substitute every expression in a template string.
 */
export async function interpolate(
  template: string,
  ctx: ExpressionContext,
): Promise<string> {
  let out = "";
  let last = 0;
  for (const m of template.matchAll(EXPRESSION)) {
    const start = m.index ?? 0;
    out += template.slice(last, start);
    out += await evaluate(m[1].trim(), ctx);
    last = start + m[0].length;
  }
  return out + template.slice(last);
}

export async function evaluate(
  expr: string,
  ctx: ExpressionContext,
): Promise<string> {
  const literal = expr.match(LITERAL);
  if (literal) {
    return unquote(literal[1]);
  }

  const call = expr.match(CALL);
  if (call) {
    const [, fn, args] = call;
    if (fn != "hashFiles") {
      throw new ExpressionError(expr, `unsupported function ${fn}`);
    }
    if (!ARG_LIST.test(args)) {
      throw new ExpressionError(expr, "hashFiles takes string literals");
    }
    const patterns = [...args.matchAll(ARG)].map((a) => unquote(a[1]));
    return await ctx.hashFiles(patterns);
  }

  if (PATH.test(expr)) {
    return lookup(expr, ctx);
  }

  throw new ExpressionError(expr, "unsupported expression");
}

function lookup(path: string, ctx: ExpressionContext): string {
  const [root, ...rest] = path.split(".");
  const contexts: Record<string, unknown> = {
    runner: ctx.runner,
    github: ctx.github,
    env: ctx.env,
    inputs: ctx.inputs,
    steps: ctx.steps,
  };
  if (!(root in contexts)) {
    throw new ExpressionError(path, `unknown context ${root}`);
  }

  let value: unknown = contexts[root];
  for (const key of rest) {
    if (isRecord(value) && key in value) {
      value = value[key];
    } else {
      return "";
    }
  }

  if (typeof value == "string") {
    return value;
  } else if (typeof value == "number" || typeof value == "boolean") {
    return String(value);
  } else {
    return "";
  }
}

/**
 * Decide whether a step runs, given its `if` condition and whether an
 * earlier step has failed.  Only the status functions are understood.
 */
export function shouldRun(
  condition: string | undefined,
  failed: boolean,
): boolean {
  const cond = (condition ?? "").trim()
    .replace(/^\$\{\{(.*)\}\}$/s, "$1")
    .trim();
  switch (cond) {
    case "":
    case "success()":
      return !failed;
    case "failure()":
      return failed;
    case "always()":
    case "!cancelled()":
      return true;
    case "cancelled()":
      return false;
    default:
      throw new WorkflowError(`unsupported step condition: ${condition}`);
  }
}

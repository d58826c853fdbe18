/**
 * Meaning-based color helpers.  NO_COLOR, FORCE_COLOR=0 or a non-TTY
 * stdout give unstyled strings.
 * @module
 */

import chalk from "chalk";

export function isPlain(): boolean {
  return (
    process.env.NO_COLOR === "1" ||
    process.env.FORCE_COLOR === "0" ||
    !process.stdout.isTTY
  );
}

export function ok(s: string): string {
  return isPlain() ? s : chalk.green(s);
}
export function go(s: string): string {
  return isPlain() ? s : chalk.blue(s);
}
export function warn(s: string): string {
  return isPlain() ? s : chalk.hex("#FFA500")(s);
} // orange
export function error(s: string): string {
  return isPlain() ? s : chalk.red(s);
}
export function dim(s: string): string {
  return isPlain() ? s : chalk.dim(s);
}
export function bold(s: string): string {
  return isPlain() ? s : chalk.bold(s);
}

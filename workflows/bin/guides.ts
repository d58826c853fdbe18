import { buildProgram } from "../cli.ts";
import { failure } from "../lib/log.ts";

try {
  await buildProgram().parseAsync(process.argv);
} catch (e) {
  failure(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
}

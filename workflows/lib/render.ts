import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { stringify } from "yaml";

import type { Workflow } from "./github.ts";

export interface WorkflowModule {
  /** Output file name, without `.yml`. */
  name: string;
  /** Module the workflow is defined in, relative to the repository root. */
  source: string;
  workflow: Workflow;
}

export function renderWorkflow(mod: WorkflowModule): string {
  const header = `# Generated from ${mod.source}; edit that file instead.\n`;
  return header + stringify(mod.workflow, {
    lineWidth: 0,
    blockQuote: "literal",
    aliasDuplicateObjects: false,
  });
}

export interface WriteResult {
  written: string[];
  stale: string[];
}

async function readIfPresent(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code == "ENOENT") {
      return undefined;
    }
    throw e;
  }
}

/**
 * Write each workflow to `<dir>/<name>.yml`.  In check mode nothing is
 * written; files that are missing or differ are reported as stale.
 */
export async function writeWorkflows(
  dir: string,
  modules: WorkflowModule[],
  options: { check?: boolean } = {},
): Promise<WriteResult> {
  const result: WriteResult = { written: [], stale: [] };
  if (!options.check) {
    await mkdir(dir, { recursive: true });
  }

  for (const mod of modules) {
    const path = join(dir, `${mod.name}.yml`);
    const text = renderWorkflow(mod);
    const current = await readIfPresent(path);
    if (current == text) continue;

    if (options.check) {
      result.stale.push(path);
    } else {
      await writeFile(path, text, "utf8");
      result.written.push(path);
    }
  }
  return result;
}

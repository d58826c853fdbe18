import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";

import { glob } from "glob";

/**
 * Hash the files matching a set of glob patterns, the way the `hashFiles`
 * expression function does: SHA-256 of each file, then SHA-256 over the
 * concatenated per-file digests.  Only files inside `workspace` count.
 * Returns `''` when nothing matches.
 */
export async function hashFiles(
  workspace: string,
  patterns: string[],
): Promise<string> {
  if (!patterns.length) return "";

  const matches = await glob(patterns, {
    cwd: workspace,
    nodir: true,
    dot: true,
  });
  const inside = new Set<string>();
  for (const match of matches) {
    const file = resolve(workspace, match);
    const rel = relative(workspace, file);
    if (rel && !rel.startsWith("..") && !isAbsolute(rel)) inside.add(file);
  }
  if (!inside.size) return "";

  const combined = createHash("sha256");
  for (const file of [...inside].sort()) {
    const data = await readFile(file);
    combined.update(createHash("sha256").update(data).digest());
  }
  return combined.digest("hex");
}

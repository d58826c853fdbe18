import { access, cp, mkdir, rename, rm } from "node:fs/promises";
import { join } from "node:path";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Directory-backed stand-in for the hosted package cache.  Each key owns one
 * directory under the root; entries are written once and never replaced.
 */
export class PackageCache {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  entryPath(key: string): string {
    return join(this.root, encodeURIComponent(key));
  }

  async has(key: string): Promise<boolean> {
    return await exists(this.entryPath(key));
  }

  /**
   * Copy a stored entry into `path`.
   * @returns whether the key was found.
   */
  async restore(key: string, path: string): Promise<boolean> {
    const entry = this.entryPath(key);
    if (!(await exists(entry))) {
      return false;
    }
    await mkdir(path, { recursive: true });
    await cp(entry, path, { recursive: true, force: true });
    return true;
  }

  /**
   * Store `path` under `key`.  Does nothing if the key already exists or
   * the path was never created.
   * @returns whether a new entry was written.
   */
  async save(key: string, path: string): Promise<boolean> {
    const entry = this.entryPath(key);
    if ((await exists(entry)) || !(await exists(path))) {
      return false;
    }
    await mkdir(this.root, { recursive: true });
    // stage beside the entry, then publish with a rename
    const staging = `${entry}.tmp-${process.pid}`;
    await rm(staging, { recursive: true, force: true });
    await cp(path, staging, { recursive: true });
    await rename(staging, entry);
    return true;
  }
}

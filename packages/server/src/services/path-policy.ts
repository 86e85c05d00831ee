import fsp from "node:fs/promises";
import path from "node:path";

async function canonicalize(p: string): Promise<string | null> {
  try {
    return await fsp.realpath(path.resolve(p));
  } catch {
    return null;
  }
}

/** True when `candidate` equals `root` or sits somewhere below it. */
export function isWithin(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  if (rel === "") return true;
  if (path.isAbsolute(rel)) return false;
  return rel !== ".." && !rel.startsWith(`..${path.sep}`);
}

/**
 * Filesystem allowlist for job paths. Paths and roots are both resolved to
 * their canonical form (symlinks followed), so a path that only textually
 * starts with a root is not accepted. A path that does not exist cannot be
 * canonicalized and is rejected. With no roots configured every path is
 * allowed.
 */
export class PathPolicy {
  constructor(private allowedRoots: readonly string[] | null) {}

  async isAllowed(candidate: string): Promise<boolean> {
    if (!this.allowedRoots) return true;

    const canonical = await canonicalize(candidate);
    if (!canonical) return false;

    for (const root of this.allowedRoots) {
      const canonicalRoot = await canonicalize(root);
      if (canonicalRoot && isWithin(canonicalRoot, canonical)) return true;
    }
    return false;
  }
}

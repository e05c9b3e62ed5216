import { createRequire } from "node:module";

/**
 * Return the first non-empty `version` found among `candidates`, which are
 * package.json paths relative to `importMetaUrl`. The compiled bin and the
 * TypeScript source sit at different depths, hence more than one candidate.
 */
export function resolvePackageVersion(importMetaUrl: string, candidates: string[]): string {
  const req = createRequire(importMetaUrl);
  for (const candidate of candidates) {
    let pkg: unknown;
    try {
      pkg = req(candidate);
    } catch {
      // Not at this depth; try the next one.
      continue;
    }
    if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
      const { version } = pkg;
      if (typeof version === "string" && version.length > 0) return version;
    }
  }
  return "unknown";
}

import path from "path";
import type { CheckSettings } from "../config/settings";

export interface FixturePaths {
  bundle: string;
  snapshot: string;
}

export function fixtureSampleDir(sourceId: string): string {
  return path.posix.join("fixtures", sourceId, "sample");
}

/**
 * Repository-relative locations of a source's fixture files. Violation
 * messages quote these, so they stay `/`-separated on every platform.
 */
export function fixturePaths(sourceId: string): FixturePaths {
  const sampleDir = fixtureSampleDir(sourceId);
  return {
    bundle: path.posix.join(sampleDir, "bundle.json"),
    snapshot: path.posix.join(sampleDir, "snapshot.json")
  };
}

export function resolveInRoot(settings: CheckSettings, relativePath: string): string {
  return path.resolve(settings.rootDir, ...relativePath.split("/"));
}

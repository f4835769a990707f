import type { CheckSettings } from "../config/settings";
import { fixturePaths, resolveInRoot } from "../io/paths";
import { errorMessage, pathExists, readText } from "../utils/fs";

export const MIN_EVIDENCE_COVERAGE_PERCENT = 90;

type JsonObject = Record<string, unknown>;

type JsonReadResult = { ok: true; value: unknown } | { ok: false; violation: string };

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasKey(payload: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(payload, key);
}

/** Empty strings, zero, false, null and empty arrays/objects count as unset. */
function isPresentValue(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isJsonObject(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

async function readJsonFile(absolutePath: string, displayPath: string): Promise<JsonReadResult> {
  let content: string;
  try {
    content = await readText(absolutePath);
  } catch (error) {
    return { ok: false, violation: `unreadable file ${displayPath}: ${errorMessage(error)}` };
  }
  try {
    return { ok: true, value: JSON.parse(content) };
  } catch (error) {
    return { ok: false, violation: `invalid JSON in ${displayPath}: ${errorMessage(error)}` };
  }
}

function checkBundleFields(sourceId: string, payload: JsonObject, bundle: string): string[] {
  const violations: string[] = [];

  if (payload.source_id !== sourceId) {
    violations.push(`bundle source_id mismatch in ${bundle}`);
  }
  if (!isPresentValue(payload.extractor_version)) {
    violations.push(`missing extractor_version in ${bundle}`);
  }
  if (!hasKey(payload, "crawlability")) {
    violations.push(`missing crawlability in ${bundle}`);
  }
  if (!hasKey(payload, "raw_artifact")) {
    violations.push(`missing raw_artifact block in ${bundle}`);
  }

  const records = payload.parsed_records;
  if (!Array.isArray(records)) {
    violations.push(`parsed_records must be a list in ${bundle}`);
  } else if (records.length === 0) {
    violations.push(`parsed_records must contain at least one record in ${bundle}`);
  }

  const coverage = payload.evidence_coverage_percent;
  if (typeof coverage !== "number" || !Number.isFinite(coverage)) {
    violations.push(`missing or invalid evidence_coverage_percent in ${bundle}`);
  } else if (coverage < MIN_EVIDENCE_COVERAGE_PERCENT) {
    violations.push(
      `evidence_coverage_percent < ${MIN_EVIDENCE_COVERAGE_PERCENT} in ${bundle} (got ${coverage})`
    );
  }

  return violations;
}

function checkSnapshotPayload(payload: unknown, snapshot: string): string | null {
  if (!Array.isArray(payload)) {
    return `snapshot must be a JSON array in ${snapshot}`;
  }
  if (payload.length === 0) {
    return `snapshot must contain at least one parsed record in ${snapshot}`;
  }
  return null;
}

/**
 * Validates the fixture bundle and snapshot of one source. Missing or
 * malformed files are reported as violations; nothing here throws for them.
 */
export async function checkFixtureBundle(
  sourceId: string,
  settings: CheckSettings
): Promise<string[]> {
  const { bundle, snapshot } = fixturePaths(sourceId);
  const bundleFile = resolveInRoot(settings, bundle);
  const snapshotFile = resolveInRoot(settings, snapshot);
  const violations: string[] = [];

  if (!(await pathExists(bundleFile))) {
    violations.push(`missing fixture bundle: ${bundle}`);
    return violations;
  }
  const snapshotExists = await pathExists(snapshotFile);
  if (!snapshotExists) {
    violations.push(`missing snapshot file: ${snapshot}`);
  }

  const bundleResult = await readJsonFile(bundleFile, bundle);
  if (!bundleResult.ok) {
    violations.push(bundleResult.violation);
    return violations;
  }
  if (!isJsonObject(bundleResult.value)) {
    violations.push(`bundle must be a JSON object in ${bundle}`);
    return violations;
  }
  violations.push(...checkBundleFields(sourceId, bundleResult.value, bundle));

  if (snapshotExists) {
    const snapshotResult = await readJsonFile(snapshotFile, snapshot);
    const violation = snapshotResult.ok
      ? checkSnapshotPayload(snapshotResult.value, snapshot)
      : snapshotResult.violation;
    if (violation) violations.push(violation);
  }

  return violations;
}

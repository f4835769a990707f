import path from "path";
import type { CheckSettings } from "../config/settings";
import { loadSources } from "../config/manifest";
import { sourceIdOf } from "../config/sourceManifest";
import { checkFixtureBundle } from "../contract/fixtureBundle";
import { hasTestReference } from "../contract/testReference";
import type { ManifestParser } from "../manifest/parser";
import { renderReport } from "../report/render";
import type { ContractReport } from "../types/contractReport";
import { readTextIfExists, writeJson } from "../utils/fs";
import { defaultLogger, type Logger } from "../utils/logger";

export interface CheckOptions {
  settings: CheckSettings;
  reportPath?: string;
  logger?: Logger;
  parser?: ManifestParser;
}

export async function buildContractReport(
  settings: CheckSettings,
  parser?: ManifestParser
): Promise<ContractReport> {
  const loaded = await loadSources(settings, parser);
  const adapterSourceText = await readTextIfExists(settings.adapterSourcePath);
  const violations: string[] = [];

  for (const descriptor of loaded.sources) {
    const sourceId = sourceIdOf(descriptor);
    if (!sourceId) {
      violations.push("sources.yaml entry missing source_id");
      continue;
    }
    violations.push(...(await checkFixtureBundle(sourceId, settings)));
    if (!(await hasTestReference(sourceId, adapterSourceText, settings))) {
      violations.push(`missing parse test reference for source_id=${sourceId}`);
    }
  }

  return {
    passed: violations.length === 0,
    sources_checked: loaded.sources.length,
    manifest_parser: loaded.parser,
    violations
  };
}

/** Runs one full pass and returns the process exit code: 0 when clean, 1 otherwise. */
export async function runCheck(options: CheckOptions): Promise<number> {
  const logger = options.logger ?? defaultLogger;
  const report = await buildContractReport(options.settings, options.parser);

  renderReport(report, logger);
  if (options.reportPath) {
    const reportFile = path.resolve(options.settings.rootDir, options.reportPath);
    await writeJson(reportFile, report);
    logger.log(`Wrote report to ${reportFile}`);
  }

  return report.passed ? 0 : 1;
}

import type { ContractReport } from "../types/contractReport";
import type { Logger } from "../utils/logger";

export const FAILURE_HEADER = "Adapter contract checks failed:";

export function successLine(sourcesChecked: number): string {
  return `Adapter contract checks passed for ${sourcesChecked} sources`;
}

export function failureLines(violations: string[]): string[] {
  return [FAILURE_HEADER, ...violations.map((violation) => `- ${violation}`)];
}

export function renderReport(report: ContractReport, logger: Logger): void {
  if (report.passed) {
    logger.log(successLine(report.sources_checked));
    return;
  }
  for (const line of failureLines(report.violations)) {
    logger.error(line);
  }
}

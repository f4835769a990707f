export interface ContractReport {
  passed: boolean;
  sources_checked: number;
  manifest_parser: "yaml" | "line";
  violations: string[];
}

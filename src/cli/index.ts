#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runCheck } from "../commands/check";
import { resolveSettings } from "../config/settings";
import { defaultLogger } from "../utils/logger";
import { reportFatalError, resolveEnvPath } from "./exitCode";

interface CliOptions {
  root?: string;
  manifest?: string;
  adapterSource?: string;
  testsDir?: string;
  testExt?: string;
  parser?: string;
  report?: string;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("adapter-contract-check")
  .description("Check fixture bundles, snapshots and test references for every source in sources.yaml")
  .version(pkg.version)
  .option(
    "--env-file <path>",
    "Path to .env file (overrides ADAPTER_CHECK_ENV_FILE/DOTENV_CONFIG_PATH)",
    envPath
  )
  .option("--root <dir>", "Repository root the other paths are relative to")
  .option("--manifest <path>", "Source manifest (default sources.yaml)")
  .option("--adapter-source <path>", "Adapter implementation file")
  .option("--tests-dir <dir>", "Directory holding adapter test files")
  .option("--test-ext <ext>", "File extension of adapter test files")
  .option("--parser <kind>", "Manifest parser: auto, yaml or line")
  .option("--report <path>", "Also write the result as JSON to this path")
  .action(async (opts: CliOptions) => {
    const settings = resolveSettings({
      rootDir: opts.root,
      manifestPath: opts.manifest,
      adapterSourcePath: opts.adapterSource,
      adapterTestsDir: opts.testsDir,
      testFileExtension: opts.testExt,
      manifestParser: opts.parser
    });
    process.exitCode = await runCheck({ settings, reportPath: opts.report });
  });

program.parseAsync().catch((error) => {
  process.exitCode = reportFatalError(error, defaultLogger);
});

import { ManifestError, SettingsError } from "../errors";
import { errorMessage } from "../utils/fs";
import type { Logger } from "../utils/logger";

/** Exit code for a run that cannot start: unusable manifest, settings, or an unexpected error. */
export const FATAL_EXIT_CODE = 2;

export function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

export function resolveEnvPath(
  argv: string[],
  fallback: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return env.ADAPTER_CHECK_ENV_FILE ?? env.DOTENV_CONFIG_PATH ?? fallback;
}

export function fatalErrorMessage(error: unknown): string {
  if (error instanceof ManifestError || error instanceof SettingsError) {
    return `ERROR: ${error.message}`;
  }
  return errorMessage(error);
}

/** Prints the error on the error stream and returns the exit code the process should end with. */
export function reportFatalError(error: unknown, logger: Logger): number {
  logger.error(fatalErrorMessage(error));
  return FATAL_EXIT_CODE;
}

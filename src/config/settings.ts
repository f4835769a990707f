import path from "path";
import { z } from "zod";
import { SettingsError } from "../errors";

export const ManifestParserKindSchema = z.enum(["auto", "yaml", "line"]);
export type ManifestParserKind = z.infer<typeof ManifestParserKindSchema>;

const CheckSettingsSchema = z.object({
  rootDir: z.string().min(1),
  manifestPath: z.string().min(1).default("sources.yaml"),
  adapterSourcePath: z.string().min(1).default("crates/rhof-adapters/src/lib.rs"),
  adapterTestsDir: z.string().min(1).default("crates/rhof-adapters/tests"),
  testFileExtension: z.string().min(1).default(".rs"),
  manifestParser: ManifestParserKindSchema.default("auto")
});

export type CheckSettingsInput = z.input<typeof CheckSettingsSchema>;

/** Settings with every path resolved to an absolute path. */
export type CheckSettings = z.output<typeof CheckSettingsSchema>;

export type SettingsOverrides = Partial<Omit<CheckSettingsInput, "manifestParser">> & {
  manifestParser?: string;
};

const ENV_KEYS: Record<keyof CheckSettingsInput, string> = {
  rootDir: "ADAPTER_CHECK_ROOT",
  manifestPath: "ADAPTER_CHECK_MANIFEST",
  adapterSourcePath: "ADAPTER_CHECK_ADAPTER_SOURCE",
  adapterTestsDir: "ADAPTER_CHECK_TESTS_DIR",
  testFileExtension: "ADAPTER_CHECK_TEST_EXTENSION",
  manifestParser: "ADAPTER_CHECK_MANIFEST_PARSER"
};

function pick(
  key: keyof CheckSettingsInput,
  overrides: SettingsOverrides,
  env: NodeJS.ProcessEnv
): string | undefined {
  const override = overrides[key];
  if (override !== undefined && override !== "") return override;
  const fromEnv = env[ENV_KEYS[key]];
  return fromEnv === "" ? undefined : fromEnv;
}

export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): CheckSettings {
  const parsed = CheckSettingsSchema.safeParse({
    rootDir: pick("rootDir", overrides, env) ?? process.cwd(),
    manifestPath: pick("manifestPath", overrides, env),
    adapterSourcePath: pick("adapterSourcePath", overrides, env),
    adapterTestsDir: pick("adapterTestsDir", overrides, env),
    testFileExtension: pick("testFileExtension", overrides, env),
    manifestParser: pick("manifestParser", overrides, env)
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new SettingsError(`Invalid settings: ${issues}`);
  }

  const settings = parsed.data;
  const rootDir = path.resolve(settings.rootDir);
  return {
    ...settings,
    rootDir,
    manifestPath: path.resolve(rootDir, settings.manifestPath),
    adapterSourcePath: path.resolve(rootDir, settings.adapterSourcePath),
    adapterTestsDir: path.resolve(rootDir, settings.adapterTestsDir)
  };
}

import type { ManifestParserKind } from "../config/settings";
import { SettingsError } from "../errors";
import type { SourceDescriptor } from "../config/sourceManifest";
import { createLineManifestParser } from "./lineParser";
import { createYamlManifestParser, type YamlModule } from "./yamlParser";

export interface ManifestParser {
  readonly kind: "yaml" | "line";
  parse(text: string): SourceDescriptor[];
}

function isModuleNotFound(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "MODULE_NOT_FOUND" || error.code === "ERR_MODULE_NOT_FOUND";
}

export async function loadYamlModule(): Promise<YamlModule | null> {
  try {
    return await import("yaml");
  } catch (error) {
    if (isModuleNotFound(error)) return null;
    throw error;
  }
}

export async function resolveManifestParser(
  kind: ManifestParserKind,
  loadYaml: () => Promise<YamlModule | null> = loadYamlModule
): Promise<ManifestParser> {
  if (kind === "line") return createLineManifestParser();

  const yaml = await loadYaml();
  if (yaml) return createYamlManifestParser(yaml);
  if (kind === "yaml") {
    throw new SettingsError("Manifest parser 'yaml' requested but the yaml package is not installed");
  }
  return createLineManifestParser();
}

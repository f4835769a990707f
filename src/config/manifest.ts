import type { CheckSettings } from "./settings";
import type { SourceDescriptor } from "./sourceManifest";
import { ManifestError } from "../errors";
import { resolveManifestParser, type ManifestParser } from "../manifest/parser";
import { errorMessage, readText } from "../utils/fs";

export interface LoadedSources {
  parser: ManifestParser["kind"];
  sources: SourceDescriptor[];
}

export async function loadSources(
  settings: CheckSettings,
  parser?: ManifestParser
): Promise<LoadedSources> {
  let text: string;
  try {
    text = await readText(settings.manifestPath);
  } catch (error) {
    throw new ManifestError(`Unable to read ${settings.manifestPath}: ${errorMessage(error)}`);
  }

  const active = parser ?? (await resolveManifestParser(settings.manifestParser));
  return { parser: active.kind, sources: active.parse(text) };
}

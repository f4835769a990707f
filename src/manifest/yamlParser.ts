import { ManifestError } from "../errors";
import { errorMessage } from "../utils/fs";
import {
  MANIFEST_SHAPE_ERROR,
  SourceManifestSchema,
  toSourceDescriptor
} from "../config/sourceManifest";
import type { ManifestParser } from "./parser";

export type YamlModule = Pick<typeof import("yaml"), "parse">;

/**
 * Scalars stay strings and a repeated key keeps its last value, matching the
 * line parser on flat manifests.
 */
export function createYamlManifestParser(yaml: YamlModule): ManifestParser {
  return {
    kind: "yaml",
    parse(text) {
      let data: unknown;
      try {
        data = yaml.parse(text, { schema: "failsafe", uniqueKeys: false });
      } catch (error) {
        throw new ManifestError(`sources.yaml is not valid YAML: ${errorMessage(error)}`);
      }
      const manifest = SourceManifestSchema.safeParse(data);
      if (!manifest.success) {
        throw new ManifestError(MANIFEST_SHAPE_ERROR);
      }
      return manifest.data.sources.map(toSourceDescriptor);
    }
  };
}

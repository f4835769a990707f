import { ManifestError } from "../errors";
import { MANIFEST_SHAPE_ERROR, type SourceDescriptor } from "../config/sourceManifest";
import type { ManifestParser } from "./parser";

const SOURCE_START = "- source_id:";

function splitField(line: string): [string, string] {
  const index = line.indexOf(":");
  return [line.slice(0, index).trim(), line.slice(index + 1).trim()];
}

/**
 * Reads the flat subset of sources.yaml used in practice: a `sources:` key
 * followed by `- source_id: <id>` items whose remaining lines are
 * `key: value` scalars. Nesting, quoting and escapes are not understood.
 */
export function parseSourcesLines(text: string): SourceDescriptor[] {
  const lines = text.split(/\r?\n/);
  if (!lines.some((line) => line.trim() === "sources:")) {
    throw new ManifestError(MANIFEST_SHAPE_ERROR);
  }

  const sources: SourceDescriptor[] = [];
  let current: Record<string, string> | null = null;

  for (const raw of lines) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    if (line.startsWith(SOURCE_START)) {
      if (current) sources.push(current);
      current = { source_id: line.slice(SOURCE_START.length).trim() };
    } else if (current && line.includes(":") && !line.startsWith("- ")) {
      const [key, value] = splitField(line);
      current[key] = value;
    }
  }
  if (current) sources.push(current);

  return sources;
}

export function createLineManifestParser(): ManifestParser {
  return { kind: "line", parse: parseSourcesLines };
}

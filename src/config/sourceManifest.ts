import { z } from "zod";

export const MANIFEST_SHAPE_ERROR = "sources.yaml must contain top-level 'sources:' list";

const SourceEntrySchema = z.record(z.unknown());

export const SourceManifestSchema = z.object({
  sources: z.array(z.unknown())
});

export type SourceDescriptor = Readonly<z.infer<typeof SourceEntrySchema>>;

/** Entries that are not mappings carry no fields, so they surface as a missing source_id. */
export function toSourceDescriptor(entry: unknown): SourceDescriptor {
  const parsed = SourceEntrySchema.safeParse(entry);
  return parsed.success ? { ...parsed.data } : {};
}

export function sourceIdOf(descriptor: SourceDescriptor): string | null {
  const value = descriptor.source_id;
  return typeof value === "string" && value.length > 0 ? value : null;
}

import type { CheckSettings } from "../config/settings";
import { listFiles, readText } from "../utils/fs";

export async function listAdapterTestFiles(settings: CheckSettings): Promise<string[]> {
  return listFiles(settings.adapterTestsDir, (name) => name.endsWith(settings.testFileExtension));
}

/**
 * Plain substring search for the identifier in the adapter source, then in
 * each adapter test file. A hit inside a comment or a longer identifier
 * (`demo` in `demo2`) counts.
 */
export async function hasTestReference(
  sourceId: string,
  adapterSourceText: string,
  settings: CheckSettings
): Promise<boolean> {
  if (adapterSourceText.includes(sourceId)) return true;

  for (const filePath of await listAdapterTestFiles(settings)) {
    const text = await readText(filePath);
    if (text.includes(sourceId)) return true;
  }
  return false;
}

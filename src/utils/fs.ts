import { promises as fs } from "fs";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

export async function readTextIfExists(filePath: string): Promise<string> {
  if (!(await pathExists(filePath))) return "";
  return readText(filePath);
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

async function isFileTarget(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch {
    return false;
  }
}

export async function listFiles(
  dirPath: string,
  predicate: (fileName: string) => boolean
): Promise<string[]> {
  if (!(await pathExists(dirPath))) return [];
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (!predicate(entry.name)) continue;
    if (entry.isFile()) {
      files.push(entry.name);
    } else if (entry.isSymbolicLink() && (await isFileTarget(path.join(dirPath, entry.name)))) {
      files.push(entry.name);
    }
  }
  return files.sort().map((name) => path.join(dirPath, name));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

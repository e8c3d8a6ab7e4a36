import { readFile, writeFile, rename, mkdir, rm } from "fs/promises";
import { dirname, basename, join } from "path";

/**
 * Check for a Node "no such file" error
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Write a file atomically: temp file in the same directory, then rename.
 * Readers observe either the old content or the new, never a partial write.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tempPath = join(
    dir,
    `.${basename(filePath)}-${Date.now()}-${Math.random().toString(36).slice(2)}.tmp`
  );

  try {
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Read and parse a JSON file. Returns undefined when the file does not exist;
 * any other read or parse failure is thrown.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
  return JSON.parse(content) as unknown;
}

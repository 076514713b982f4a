import { existsSync, statSync } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { join, relative, sep } from "node:path";

export type JsonResult = { ok: true; data: unknown } | { ok: false; error: string };

export function isDirectory(path: string): boolean {
  if (!existsSync(path)) return false;
  return statSync(path).isDirectory();
}

export async function readJson(path: string): Promise<JsonResult> {
  const raw = await readFile(path, "utf-8");
  try {
    const data: unknown = JSON.parse(raw);
    return { ok: true, data };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { ok: false, error: `Invalid JSON: ${error.message}` };
    }
    throw error;
  }
}

/**
 * List files below `dir` as POSIX paths relative to `base`, skipping dotfiles.
 */
export async function listFiles(dir: string, base: string = dir): Promise<string[]> {
  if (!isDirectory(dir)) return [];

  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(full, base)));
    } else if (entry.isFile()) {
      files.push(toPosix(relative(base, full)));
    }
  }

  return files.sort();
}

export function toPosix(path: string): string {
  return path.split(sep).join("/");
}

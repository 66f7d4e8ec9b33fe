import { appendFile, cp, mkdir, readFile, readdir, realpath, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { errorMessage, FicpackError } from "./errors.js";

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    const s = await stat(path);
    return s.isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    const s = await stat(path);
    return s.isFile();
  } catch {
    return false;
  }
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function readTextFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err: unknown) {
    throw new FicpackError(`Failed to read file: ${path}. ${errorMessage(err)}`, "Io");
  }
}

export async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readTextFile(path);
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err: unknown) {
    throw new FicpackError(`Invalid JSON: ${path}. ${errorMessage(err)}`, "InvalidProjectFile");
  }
}

export async function writeTextFile(path: string, contents: string): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await writeFile(path, contents, "utf8");
  } catch (err: unknown) {
    throw new FicpackError(`Failed to write file: ${path}. ${errorMessage(err)}`, "Io");
  }
}

// Fails when the file is already there.
export async function createTextFile(path: string, contents: string): Promise<void> {
  try {
    await writeFile(path, contents, { encoding: "utf8", flag: "wx" });
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") throw new FicpackError(`Path already exists: ${path}`, "AlreadyExists", 2);
    throw new FicpackError(`Failed to create file: ${path}. ${errorMessage(err)}`, "Io");
  }
}

export async function appendTextFile(path: string, contents: string): Promise<void> {
  try {
    await appendFile(path, contents, "utf8");
  } catch (err: unknown) {
    throw new FicpackError(`Failed to append to file: ${path}. ${errorMessage(err)}`, "Io");
  }
}

export async function writeJsonFile(path: string, payload: unknown): Promise<void> {
  await writeTextFile(path, `${JSON.stringify(payload, null, 2)}\n`);
}

export async function listDirectory(path: string): Promise<string[]> {
  try {
    return (await readdir(path)).sort();
  } catch (err: unknown) {
    throw new FicpackError(`Failed to list directory: ${path}. ${errorMessage(err)}`, "Io");
  }
}

export async function movePath(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err: unknown) {
    throw new FicpackError(`Failed to move ${from} to ${to}. ${errorMessage(err)}`, "Io");
  }
}

export async function removePath(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (err: unknown) {
    throw new FicpackError(`Failed to remove path: ${path}. ${errorMessage(err)}`, "Io");
  }
}

/** Non-blank lines of a list file, without `#` comment lines; a missing file is empty. */
export async function readLineList(path: string): Promise<string[]> {
  if (!(await pathExists(path))) return [];
  const text = await readTextFile(path);
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/** Appends lines, first terminating a last line that lacks its newline. */
export async function appendLines(path: string, lines: readonly string[]): Promise<void> {
  if (lines.length === 0) return;
  const existing = (await pathExists(path)) ? await readTextFile(path) : "";
  const prefix = existing.length > 0 && !existing.endsWith("\n") ? "\n" : "";
  await appendTextFile(path, `${prefix}${lines.join("\n")}\n`);
}

export async function copyPath(from: string, to: string): Promise<void> {
  try {
    await ensureDir(dirname(to));
    await cp(from, to, { recursive: true });
  } catch (err: unknown) {
    throw new FicpackError(`Failed to copy ${from} to ${to}. ${errorMessage(err)}`, "Io");
  }
}

/** Absolute path with every symlink resolved. */
export async function canonicalPath(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (err: unknown) {
    throw new FicpackError(`Failed to resolve path: ${path}. ${errorMessage(err)}`, "Io");
  }
}

import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import { initProject, type Project } from "../project.js";

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `ficpack-${prefix}-`));
}

export async function makeProject(baseDir: string, name = "root"): Promise<Project> {
  return initProject(join(baseDir, name));
}

export async function writeJson(absPath: string, payload: unknown): Promise<void> {
  await mkdir(dirname(absPath), { recursive: true });
  await writeFile(absPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}

/** Lays out a downloaded story the way the retrieval tool does. */
export async function writeStory(project: Project, source: string, id: string, raw: Record<string, unknown> | null): Promise<string> {
  const dir = join(project.rootDir, "fanfics", source, id);
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, "story.html"), `<html><body>${source}/${id}</body></html>\n`, "utf8");
  if (raw !== null) await writeJson(join(dir, "metadata.json"), raw);
  return dir;
}

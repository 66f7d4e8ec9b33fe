import { FicpackError } from "./errors.js";
import { pathExists, readJsonFile, writeJsonFile } from "./fs-utils.js";
import { projectPath, UPDATE_MARKS_FILE, type Project } from "./project.js";
import { sameTarget, tryResolveReference, type Target } from "./target.js";
import { isStringArray } from "./type-guards.js";

async function readMarks(project: Project): Promise<string[]> {
  const path = projectPath(project, UPDATE_MARKS_FILE);
  if (!(await pathExists(path))) return [];
  const raw = await readJsonFile(path);
  if (!isStringArray(raw)) throw new FicpackError(`${path} must be a JSON array of references.`, "InvalidProjectFile", 2);
  return raw;
}

function sameReference(reference: string, target: Target): boolean {
  const resolved = tryResolveReference(reference);
  return resolved !== null && sameTarget(resolved, target);
}

/**
 * Adds or removes the update mark of a target. Marks compare by identity, so a
 * story marked through one URL is cleared through any other. Returns whether
 * the set changed.
 */
export async function markForUpdate(project: Project, target: Target, required: boolean): Promise<boolean> {
  const marks = await readMarks(project);
  const present = marks.some((reference) => sameReference(reference, target));
  if (required === present) return false;
  const next = required ? [...marks, target.url] : marks.filter((reference) => !sameReference(reference, target));
  await writeJsonFile(projectPath(project, UPDATE_MARKS_FILE), next);
  return true;
}

export async function listMarkedForUpdate(project: Project): Promise<Target[]> {
  const path = projectPath(project, UPDATE_MARKS_FILE);
  const out: Target[] = [];
  for (const reference of await readMarks(project)) {
    const target = tryResolveReference(reference);
    if (target === null) throw new FicpackError(`${path}: invalid target reference '${reference}'.`, "InvalidProjectFile", 2);
    if (!out.some((it) => sameTarget(it, target))) out.push(target);
  }
  return out;
}

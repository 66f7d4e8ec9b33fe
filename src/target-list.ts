import { appendLines, readLineList, readTextFile } from "./fs-utils.js";
import { hasTargetLocally } from "./artifacts.js";
import { FicpackError } from "./errors.js";
import { projectPath, TARGET_LIST_FILE, type Project } from "./project.js";
import {
  compareTargets,
  findReferencesInText,
  resolveReference,
  sameTarget,
  targetKey,
  tryResolveReference,
  type Target,
  type TargetIdentity
} from "./target.js";

export type AddTargetResult = {
  status: "added" | "already-present";
  target: Target;
};

export type BulkAddResult = {
  added: Target[];
  alreadyPresent: number;
  rejected: string[];
  comparisons: number;
};

function targetListPath(project: Project): string {
  return projectPath(project, TARGET_LIST_FILE);
}

/**
 * Targets in list order. The file is append-only and may repeat a story under
 * different URLs; only the first mention of each identity is kept.
 */
export async function listTargets(project: Project, opts: { excludeDownloaded?: boolean } = {}): Promise<Target[]> {
  const path = targetListPath(project);
  const seen = new Set<string>();
  const targets: Target[] = [];
  for (const line of await readLineList(path)) {
    const target = tryResolveReference(line);
    if (target === null) {
      throw new FicpackError(`${path}: invalid target reference '${line}'.`, "InvalidProjectFile", 2);
    }
    const key = targetKey(target);
    if (seen.has(key)) continue;
    seen.add(key);
    targets.push(target);
  }

  if (!opts.excludeDownloaded) return targets;
  const missing: Target[] = [];
  for (const target of targets) {
    if (!(await hasTargetLocally(project, target))) missing.push(target);
  }
  return missing;
}

export async function hasTarget(project: Project, target: TargetIdentity): Promise<boolean> {
  const targets = await listTargets(project);
  return targets.some((it) => sameTarget(it, target));
}

export async function addTarget(project: Project, reference: string): Promise<AddTargetResult> {
  const target = resolveReference(reference);
  if (await hasTarget(project, target)) return { status: "already-present", target };
  await appendLines(targetListPath(project), [target.url]);
  return { status: "added", target };
}

/**
 * Two-pointer merge over both lists sorted by identity: returns the candidates
 * missing from `existing` (each once) after at most n+m comparisons.
 */
export function mergeNewTargets(existing: readonly Target[], candidates: readonly Target[]): { added: Target[]; comparisons: number } {
  const have = [...existing].sort(compareTargets);
  const want = [...candidates].sort(compareTargets);
  const added: Target[] = [];
  let comparisons = 0;
  let i = 0;
  let j = 0;

  while (j < want.length) {
    const candidate = want[j];
    if (candidate === undefined) break;
    const current = have[i];
    if (current !== undefined) {
      comparisons += 1;
      const order = compareTargets(current, candidate);
      if (order < 0) {
        i += 1;
        continue;
      }
      if (order === 0) {
        j += 1;
        continue;
      }
    }
    const last = added[added.length - 1];
    if (last === undefined || !sameTarget(last, candidate)) added.push(candidate);
    j += 1;
  }

  return { added, comparisons };
}

export async function addTargetsFromBulkSource(project: Project, references: readonly string[]): Promise<BulkAddResult> {
  const candidates: Target[] = [];
  const rejected: string[] = [];
  for (const reference of references) {
    const target = tryResolveReference(reference);
    if (target === null) rejected.push(reference);
    else candidates.push(target);
  }

  const existing = await listTargets(project);
  const { added, comparisons } = mergeNewTargets(existing, candidates);
  await appendLines(targetListPath(project), added.map((target) => target.url));
  return { added, alreadyPresent: candidates.length - added.length, rejected, comparisons };
}

/** Adds every recognised story URL found in a text file (a saved page, an export). */
export async function addTargetsFromFile(project: Project, filePath: string): Promise<BulkAddResult> {
  const text = await readTextFile(filePath);
  return addTargetsFromBulkSource(project, findReferencesInText(text));
}

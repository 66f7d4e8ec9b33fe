import { isAbsolute, resolve } from "node:path";

import { FicpackError } from "./errors.js";
import { appendLines, canonicalPath, readLineList } from "./fs-utils.js";
import { openProject, projectPath, SUBPROJECT_LIST_FILE, type Project } from "./project.js";

export async function readSubprojectPaths(project: Project): Promise<string[]> {
  return readLineList(projectPath(project, SUBPROJECT_LIST_FILE));
}

async function openSubproject(parent: Project, relPath: string): Promise<Project> {
  try {
    return await openProject(resolve(parent.rootDir, relPath));
  } catch (err: unknown) {
    if (err instanceof FicpackError && err.code === "NotAProject") {
      throw new FicpackError(`Subproject '${relPath}' of ${parent.rootDir} is not a valid project.`, "NotAProject", 2);
    }
    throw err;
  }
}

/** Registers `path` (relative to the project) as a subproject. Returns false if already listed. */
export async function addSubproject(project: Project, path: string): Promise<boolean> {
  if (isAbsolute(path)) throw new FicpackError(`Subproject path must be relative to ${project.rootDir}: ${path}`, "Usage", 2);
  const child = await openSubproject(project, path);
  if ((await canonicalPath(child.rootDir)) === (await canonicalPath(project.rootDir))) {
    throw new FicpackError(`A project cannot be its own subproject: ${project.rootDir}`, "CyclicSubproject", 2);
  }
  const existing = await readSubprojectPaths(project);
  if (existing.some((it) => resolve(project.rootDir, it) === child.rootDir)) return false;
  await appendLines(projectPath(project, SUBPROJECT_LIST_FILE), [path]);
  return true;
}

// Cycles are checked on real paths so a symlinked directory cannot hide one.
async function walk(project: Project, projectReal: string, ancestors: string[], out: Project[]): Promise<void> {
  for (const relPath of await readSubprojectPaths(project)) {
    const child = await openSubproject(project, relPath);
    const childReal = await canonicalPath(child.rootDir);
    if (childReal === projectReal || ancestors.includes(childReal)) {
      const chain = [...ancestors, projectReal, childReal].join(" -> ");
      throw new FicpackError(`Cyclic subproject reference: ${chain}`, "CyclicSubproject", 2);
    }
    out.push(child);
    await walk(child, childReal, [...ancestors, projectReal], out);
  }
}

/**
 * All subprojects below `project`, pre-order depth-first in listed order. A
 * project reachable along two paths appears once per path; a path that leads
 * back into its own ancestry fails with CyclicSubproject.
 */
export async function getSubprojects(project: Project): Promise<Project[]> {
  const out: Project[] = [];
  await walk(project, await canonicalPath(project.rootDir), [], out);
  return out;
}

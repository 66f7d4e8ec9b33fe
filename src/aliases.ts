import { FicpackError } from "./errors.js";
import { pathExists, readJsonFile, writeJsonFile } from "./fs-utils.js";
import { ALIAS_FILE, projectPath, type Project } from "./project.js";
import { isPlainObject } from "./type-guards.js";

/** alias category -> canonical category; one hop, chains are not followed. */
export type CategoryAliasTable = ReadonlyMap<string, string>;

function parseAliasTable(raw: unknown, path: string): Map<string, string> {
  if (!isPlainObject(raw)) throw new FicpackError(`${path} must be a JSON object.`, "InvalidProjectFile", 2);
  const table = new Map<string, string>();
  for (const [from, to] of Object.entries(raw)) {
    if (typeof to !== "string") throw new FicpackError(`${path}: alias '${from}' must map to a string.`, "InvalidProjectFile", 2);
    table.set(from, to);
  }
  return table;
}

export async function loadAliasTable(project: Project): Promise<CategoryAliasTable> {
  const path = projectPath(project, ALIAS_FILE);
  if (!(await pathExists(path))) return new Map();
  return parseAliasTable(await readJsonFile(path), path);
}

/** Overwrites any mapping for `from` and rewrites aliases.json right away. */
export async function addCategoryAlias(project: Project, from: string, to: string): Promise<CategoryAliasTable> {
  if (from.trim().length === 0 || to.trim().length === 0) {
    throw new FicpackError("Category alias names must not be empty.", "Usage", 2);
  }
  const table = new Map(await loadAliasTable(project));
  table.set(from, to);
  await writeJsonFile(projectPath(project, ALIAS_FILE), Object.fromEntries(table));
  return table;
}

export function resolveCategory(table: CategoryAliasTable, category: string): string {
  return table.get(category) ?? category;
}

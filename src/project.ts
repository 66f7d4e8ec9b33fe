import { mkdir } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

import { errorMessage, FicpackError } from "./errors.js";
import { createTextFile, isDirectory, isFile, listDirectory, pathExists, readJsonFile, writeJsonFile } from "./fs-utils.js";
import { silentReporter, type Reporter } from "./reporter.js";
import { isPlainObject } from "./type-guards.js";

// PROJECT DIRECTORY
//   project.json          marker + options ({ "version": ..., "<category>": { "<key>": value } })
//   target_urls.txt       one reference per line, '#' comments
//   subprojects.txt       one relative project path per line, '#' comments
//   aliases.json          { "<alias category>": "<canonical category>" }
//   update_marks.json     [ "<reference>", ... ]
//   fanfics/<source>/<id>/{story.html, metadata.json, images/}

export const PROJECT_MARKER = "project.json";
export const TARGET_LIST_FILE = "target_urls.txt";
export const SUBPROJECT_LIST_FILE = "subprojects.txt";
export const ALIAS_FILE = "aliases.json";
export const UPDATE_MARKS_FILE = "update_marks.json";
export const ARTIFACT_DIR = "fanfics";
export const PROJECT_VERSION = "0.3";

const TARGET_LIST_DEFAULT_CONTENT = `# Add the stories you want to archive to this file.
# Each line holds exactly one story URL (or a fanfiction.net id).
# Lines starting with '#' are ignored.
`;

const SUBPROJECT_LIST_DEFAULT_CONTENT = `# Projects whose stories are merged into this one, one relative path per line.
# Lines starting with '#' are ignored.
`;

export type Project = {
  readonly rootDir: string;
};

export type OptionValue = string | number | boolean | null | OptionValue[] | { [key: string]: OptionValue };

type ProjectFile = Record<string, unknown> & { version: string };

export function projectPath(project: Project, ...segments: string[]): string {
  return join(project.rootDir, ...segments);
}

export async function isValidProject(path: string): Promise<boolean> {
  if (!(await isDirectory(path))) return false;
  return isFile(join(path, PROJECT_MARKER));
}

function parseProjectFile(raw: unknown, path: string): ProjectFile {
  if (!isPlainObject(raw)) throw new FicpackError(`${path} must be a JSON object.`, "NotAProject", 2);
  if (typeof raw.version !== "string") throw new FicpackError(`${path} has no version tag.`, "NotAProject", 2);
  return { ...raw, version: raw.version };
}

async function readProjectFile(project: Project): Promise<ProjectFile> {
  const path = projectPath(project, PROJECT_MARKER);
  return parseProjectFile(await readJsonFile(path), path);
}

export async function openProject(path: string): Promise<Project> {
  const rootDir = resolve(path);
  if (!(await isValidProject(rootDir))) {
    throw new FicpackError(`Path '${rootDir}' does not point to a valid project (missing ${PROJECT_MARKER}).`, "NotAProject", 2);
  }
  const project: Project = { rootDir };
  await readProjectFile(project);
  return project;
}

/**
 * Creates a project in `path`. The directory is created if needed (its parent
 * must exist) and must be empty otherwise.
 */
export async function initProject(path: string, reporter: Reporter = silentReporter): Promise<Project> {
  const rootDir = resolve(path);
  if (await isValidProject(rootDir)) {
    throw new FicpackError(`Already a valid project: ${rootDir}`, "AlreadyExists", 2);
  }

  reporter.info(`Initiating a new project in '${rootDir}'...`);
  if (!(await pathExists(rootDir))) {
    try {
      await mkdir(rootDir);
    } catch (err: unknown) {
      throw new FicpackError(`Failed to create project directory: ${rootDir}. ${errorMessage(err)}`, "Io");
    }
  } else {
    if (!(await isDirectory(rootDir))) throw new FicpackError(`Not a directory: ${rootDir}`, "NotAProject", 2);
    if ((await listDirectory(rootDir)).length > 0) {
      throw new FicpackError(`Path '${rootDir}' is not empty.`, "DirectoryNotEmpty", 2);
    }
  }

  await createTextFile(join(rootDir, PROJECT_MARKER), `${JSON.stringify({ version: PROJECT_VERSION }, null, 2)}\n`);
  await createTextFile(join(rootDir, TARGET_LIST_FILE), TARGET_LIST_DEFAULT_CONTENT);
  await createTextFile(join(rootDir, SUBPROJECT_LIST_FILE), SUBPROJECT_LIST_DEFAULT_CONTENT);
  reporter.info("Project initialized.");
  return { rootDir };
}

type ResolveProjectRootArgs = {
  cwd: string;
  projectOverride?: string;
};

export async function resolveProjectRoot(args: ResolveProjectRootArgs): Promise<Project> {
  const cwdAbs = resolve(args.cwd);

  if (args.projectOverride) {
    return openProject(resolve(cwdAbs, args.projectOverride));
  }

  let dir = cwdAbs;
  while (true) {
    if (await isValidProject(dir)) return openProject(dir);
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new FicpackError(`No project root found (missing ${PROJECT_MARKER}). Use --project <dir>.`, "NotAProject", 2);
}

export async function getOption(project: Project, category: string, key: string): Promise<unknown> {
  const content = await readProjectFile(project);
  const section = content[category];
  if (!isPlainObject(section)) return undefined;
  return section[key];
}

export async function setOption(project: Project, category: string, key: string, value: OptionValue): Promise<void> {
  if (category === "version") throw new FicpackError(`'version' is not an option category.`, "Usage", 2);
  const path = projectPath(project, PROJECT_MARKER);
  const content = await readProjectFile(project);
  const section = content[category];
  const next = isPlainObject(section) ? { ...section, [key]: value } : { [key]: value };
  await writeJsonFile(path, { ...content, [category]: next });
}

export async function getStringOption(project: Project, category: string, key: string, fallback: string): Promise<string> {
  const value = await getOption(project, category, key);
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return fallback;
}

// Options set from the command line arrive as strings.
export async function getBooleanOption(project: Project, category: string, key: string, fallback: boolean): Promise<boolean> {
  const value = await getOption(project, category, key);
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (["true", "yes", "1", "on"].includes(normalized)) return true;
    if (["false", "no", "0", "off"].includes(normalized)) return false;
  }
  return fallback;
}

export async function getProjectVersion(project: Project): Promise<string> {
  return (await readProjectFile(project)).version;
}

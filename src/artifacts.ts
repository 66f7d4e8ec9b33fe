import { join } from "node:path";

import { FicpackError } from "./errors.js";
import { isDirectory, listDirectory, pathExists, readJsonFile } from "./fs-utils.js";
import type { RawMetadata } from "./converters.js";
import { ARTIFACT_DIR, projectPath, type Project } from "./project.js";
import { joinInside } from "./safe-path.js";
import { type TargetIdentity } from "./target.js";
import { isPlainObject } from "./type-guards.js";

export const METADATA_FILE = "metadata.json";
export const STORY_FILE = "story.html";
export const IMAGES_DIR = "images";

export function artifactsRoot(project: Project): string {
  return projectPath(project, ARTIFACT_DIR);
}

export function artifactDir(project: Project, target: TargetIdentity): string {
  return joinInside(artifactsRoot(project), target.source, target.id);
}

export function artifactMetadataPath(project: Project, target: TargetIdentity): string {
  return join(artifactDir(project, target), METADATA_FILE);
}

export async function hasTargetLocally(project: Project, target: TargetIdentity): Promise<boolean> {
  return pathExists(artifactDir(project, target));
}

/** Every `source/id` directory under fanfics/, sorted by source then id. */
export async function listLocalArtifacts(project: Project): Promise<TargetIdentity[]> {
  const root = artifactsRoot(project);
  if (!(await isDirectory(root))) return [];
  const out: TargetIdentity[] = [];
  for (const source of await listDirectory(root)) {
    const sourceDir = join(root, source);
    if (!(await isDirectory(sourceDir))) continue;
    for (const id of await listDirectory(sourceDir)) {
      if (await isDirectory(join(sourceDir, id))) out.push({ source, id });
    }
  }
  return out;
}

export async function readRawMetadata(project: Project, target: TargetIdentity): Promise<RawMetadata> {
  const path = artifactMetadataPath(project, target);
  if (!(await pathExists(path))) {
    throw new FicpackError(`Story ${target.source}/${target.id} has no metadata (${path}).`, "MissingMetadata");
  }
  let raw: unknown;
  try {
    raw = await readJsonFile(path);
  } catch (err: unknown) {
    if (err instanceof FicpackError) throw new FicpackError(err.message, "MissingMetadata");
    throw err;
  }
  if (!isPlainObject(raw)) {
    throw new FicpackError(`Metadata of ${target.source}/${target.id} is not a JSON object (${path}).`, "MissingMetadata");
  }
  return raw;
}

import { execFile } from "node:child_process";
import { dirname, join } from "node:path";
import { promisify } from "node:util";

import { artifactDir, artifactMetadataPath, artifactsRoot } from "./artifacts.js";
import { errorMessage, FicpackError, type FicpackErrorCode } from "./errors.js";
import { ensureDir, isDirectory, movePath, pathExists, removePath, writeTextFile } from "./fs-utils.js";
import { getBooleanOption, getStringOption, projectPath, type Project } from "./project.js";
import { silentReporter, type Reporter } from "./reporter.js";
import { listTargets } from "./target-list.js";
import { targetKey, type Target } from "./target.js";
import { listMarkedForUpdate, markForUpdate } from "./update-marks.js";

const execFileAsync = promisify(execFile);

const UPDATE_BACKUP_DIR = ".update-backup";

export type RetrievalRequest = {
  target: Target;
  /** fanfics/ of the project. */
  artifactsRoot: string;
  targetDir: string;
  includeImages: boolean;
};

export type RetrievalResult = {
  /** The tool's metadata dump, stored verbatim as metadata.json. */
  metadataText: string;
};

export interface Retriever {
  retrieve(request: RetrievalRequest): Promise<RetrievalResult>;
}

export type DownloadDeps = {
  retriever: Retriever;
  reporter?: Reporter;
};

export type DownloadOutcome = {
  target: Target;
  directory: string;
  metadataPath: string;
};

export type BatchFailure = {
  target: Target;
  code: FicpackErrorCode;
  message: string;
};

export type BatchResult = {
  succeeded: DownloadOutcome[];
  failed: BatchFailure[];
};

/**
 * Command line for FanFicFare. The output file is pinned inside the target's
 * own directory; the tool's `${siteabbrev}`/`${storyId}` naming is not used
 * because it does not always agree with the target's identity.
 */
export function fanFicFareArgs(request: RetrievalRequest): string[] {
  const outputTemplate = join(request.targetDir, "story${formatext}");
  const args = ["-f", "html", "-j", "--non-interactive", "-o", "is_adult=true", "-o", `output_filename=${outputTemplate}`];
  if (request.includeImages) args.push("-o", "include_images=true", "-o", "skip_author_cover=false");
  args.push(request.target.url);
  return args;
}

export function createFanFicFareRetriever(command = "fanficfare"): Retriever {
  return {
    async retrieve(request) {
      const { stdout } = await execFileAsync(command, fanFicFareArgs(request), {
        maxBuffer: 64 * 1024 * 1024,
        encoding: "utf8"
      });
      return { metadataText: stdout };
    }
  };
}

export async function retrieverForProject(project: Project): Promise<Retriever> {
  return createFanFicFareRetriever(await getStringOption(project, "download", "command", "fanficfare"));
}

/**
 * Fetches one target into fanfics/<source>/<id>/. The directory is all or
 * nothing: when the retrieval tool fails, whatever it left behind is removed.
 */
export async function downloadTarget(project: Project, target: Target, deps: DownloadDeps): Promise<DownloadOutcome> {
  const reporter = deps.reporter ?? silentReporter;
  const directory = artifactDir(project, target);
  const metadataPath = artifactMetadataPath(project, target);

  if (await pathExists(directory)) {
    throw new FicpackError(`Story ${targetKey(target)} already exists locally: ${directory}`, "AlreadyExists");
  }

  reporter.info(`Downloading: ${target.url}...`);
  const includeImages = await getBooleanOption(project, "download", "include_images", true);
  let result: RetrievalResult;
  try {
    result = await deps.retriever.retrieve({ target, artifactsRoot: artifactsRoot(project), targetDir: directory, includeImages });
  } catch (err: unknown) {
    reporter.info(`Retrieval of ${target.url} failed; cleaning up ${directory}.`);
    await removePath(directory);
    throw new FicpackError(`Retrieval of ${target.url} failed: ${errorMessage(err)}`, "CollaboratorFailure");
  }

  if (!(await isDirectory(directory))) {
    throw new FicpackError(`Retrieval of ${target.url} reported success but produced no directory ${directory}.`, "CollaboratorFailure");
  }

  try {
    await writeTextFile(metadataPath, result.metadataText);
  } catch (err: unknown) {
    await removePath(directory);
    throw err;
  }
  reporter.info(`Saved ${targetKey(target)}.`);
  return { target, directory, metadataPath };
}

async function runBatch(targets: readonly Target[], reporter: Reporter, op: (target: Target) => Promise<DownloadOutcome>): Promise<BatchResult> {
  const result: BatchResult = { succeeded: [], failed: [] };
  for (const [index, target] of targets.entries()) {
    reporter.info(`[${index + 1}/${targets.length}] ${targetKey(target)}`);
    try {
      result.succeeded.push(await op(target));
    } catch (err: unknown) {
      if (!(err instanceof FicpackError)) throw err;
      reporter.warn(`${targetKey(target)}: ${err.message}`);
      result.failed.push({ target, code: err.code, message: err.message });
    }
  }
  return result;
}

/** Downloads targets one after another; a failing target does not stop the rest. */
export async function downloadTargets(project: Project, targets: readonly Target[], deps: DownloadDeps): Promise<BatchResult> {
  return runBatch(targets, deps.reporter ?? silentReporter, (target) => downloadTarget(project, target, deps));
}

export async function downloadMissingTargets(project: Project, deps: DownloadDeps, limit?: number): Promise<BatchResult> {
  const missing = await listTargets(project, { excludeDownloaded: true });
  return downloadTargets(project, limit === undefined ? missing : missing.slice(0, limit), deps);
}

/**
 * Re-downloads a target. The current copy is moved aside first and restored if
 * the new download fails; on success the update mark is cleared.
 */
export async function updateTarget(project: Project, target: Target, deps: DownloadDeps): Promise<DownloadOutcome> {
  const directory = artifactDir(project, target);
  const backup = join(projectPath(project, UPDATE_BACKUP_DIR), target.source, target.id);
  const hadCopy = await pathExists(directory);

  if (hadCopy) {
    await removePath(backup);
    await ensureDir(dirname(backup));
    await movePath(directory, backup);
  }

  let outcome: DownloadOutcome;
  try {
    outcome = await downloadTarget(project, target, deps);
  } catch (err: unknown) {
    if (hadCopy) {
      await removePath(directory);
      await movePath(backup, directory);
    }
    throw err;
  }

  if (hadCopy) await removePath(backup);
  await markForUpdate(project, target, false);
  return outcome;
}

export async function updateMarkedTargets(project: Project, deps: DownloadDeps, limit?: number): Promise<BatchResult> {
  const marked = await listMarkedForUpdate(project);
  const batch = limit === undefined ? marked : marked.slice(0, limit);
  return runBatch(batch, deps.reporter ?? silentReporter, (target) => updateTarget(project, target, deps));
}

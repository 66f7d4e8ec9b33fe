import { execFile } from "node:child_process";
import { join } from "node:path";
import { promisify } from "node:util";

import { artifactDir, readRawMetadata, STORY_FILE } from "./artifacts.js";
import { convertMetadata, type CanonicalMetadata } from "./converters.js";
import { errorMessage, FicpackError } from "./errors.js";
import { pathExists } from "./fs-utils.js";
import type { Project } from "./project.js";
import { resolveReference, targetKey } from "./target.js";

const execFileAsync = promisify(execFile);

export type BookMetadata = Pick<
  CanonicalMetadata,
  "title" | "author" | "description" | "category" | "language" | "numWords" | "numChapters" | "datePublished" | "dateUpdated" | "storyUrl"
>;

export type BookRequest = {
  storyPath: string;
  outPath: string;
  metadata: BookMetadata;
};

export interface BookConverter {
  convert(request: BookRequest): Promise<void>;
}

export function toBookMetadata(meta: CanonicalMetadata): BookMetadata {
  return {
    title: meta.title,
    author: meta.author,
    description: meta.description,
    category: meta.category,
    language: meta.language,
    numWords: meta.numWords,
    numChapters: meta.numChapters,
    datePublished: meta.datePublished,
    dateUpdated: meta.dateUpdated,
    storyUrl: meta.storyUrl
  };
}

export function ebookConvertArgs(request: BookRequest): string[] {
  const { metadata } = request;
  const args = [request.storyPath, request.outPath, "--title", metadata.title, "--authors", metadata.author];
  if (metadata.description) args.push("--comments", metadata.description);
  if (metadata.category) args.push("--tags", metadata.category);
  if (metadata.language) args.push("--language", metadata.language);
  if (metadata.datePublished) args.push("--pubdate", metadata.datePublished);
  return args;
}

/** Calibre's ebook-convert, fed the story HTML and its canonical metadata. */
export function createEbookConvertConverter(command = "ebook-convert"): BookConverter {
  return {
    async convert(request) {
      await execFileAsync(command, ebookConvertArgs(request), { maxBuffer: 16 * 1024 * 1024 });
    }
  };
}

export async function convertTargetToBook(project: Project, reference: string, outPath: string, deps: { converter: BookConverter }): Promise<BookMetadata> {
  const target = resolveReference(reference);
  const storyPath = join(artifactDir(project, target), STORY_FILE);
  if (!(await pathExists(storyPath))) {
    throw new FicpackError(`Story ${targetKey(target)} is not downloaded (${storyPath} missing).`, "Usage", 2);
  }
  const metadata = toBookMetadata(convertMetadata(await readRawMetadata(project, target), target));
  try {
    await deps.converter.convert({ storyPath, outPath, metadata });
  } catch (err: unknown) {
    throw new FicpackError(`E-book conversion of ${targetKey(target)} failed: ${errorMessage(err)}`, "CollaboratorFailure");
  }
  return metadata;
}

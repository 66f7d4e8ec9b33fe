import { execFile } from "node:child_process";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { promisify } from "node:util";

import { aggregateCatalog } from "./aggregate.js";
import { IMAGES_DIR, STORY_FILE } from "./artifacts.js";
import { authorStories, categoryStories, summarizeCatalog, type CatalogIndex, type CatalogSummary } from "./catalog.js";
import { errorMessage, FicpackError } from "./errors.js";
import { copyPath, isDirectory, pathExists, removePath, writeJsonFile, writeTextFile } from "./fs-utils.js";
import { ARTIFACT_DIR, getBooleanOption, getStringOption, projectPath, type Project } from "./project.js";
import { silentReporter, type Reporter } from "./reporter.js";
import { bleachName } from "./safe-path.js";

const execFileAsync = promisify(execFile);

// BUILD DIRECTORY (html/)
//   index.html                     welcome page
//   resources/                     copied from the project's resources/
//   stories/<source>-<id>/         story.html (+ images/)
//   category/<name>/stories.json   metadata of every story in the category
//   author/<source>-<id>/stories.json
// Names that bleach to a folder already taken get a -2, -3, ... suffix.
//   catalog.json                   category and author listing

export type BuildOptions = {
  title: string;
  language: string;
  description: string;
  creator: string;
  publisher: string;
  favicon: string;
};

export type PackageRequest = BuildOptions & {
  htmlDir: string;
  outPath: string;
  welcomePage: string;
};

export interface Packager {
  pack(request: PackageRequest): Promise<void>;
}

export type CatalogListing = {
  summary: CatalogSummary;
  categories: { name: string; folder: string; stories: number }[];
  authors: { key: string; folder: string; name: string; stories: number }[];
};

/** Writes the browsing pages into htmlDir; must produce the welcome page. */
export interface PageRenderer {
  render(args: { htmlDir: string; index: CatalogIndex; listing: CatalogListing; options: BuildOptions }): Promise<void>;
}

export type BuildDeps = {
  packager: Packager;
  renderer?: PageRenderer;
  reporter?: Reporter;
  includeSubprojects?: boolean;
};

export type PrepareReport = {
  storiesCopied: number;
  imagesCopied: number;
  categories: number;
  authors: number;
};

export type PreparedBuild = {
  report: PrepareReport;
  /** Contents of catalog.json. */
  listing: CatalogListing;
};

export type BuildReport = PrepareReport & {
  outPath: string;
  summary: CatalogSummary;
};

export async function readBuildOptions(project: Project): Promise<BuildOptions> {
  return {
    title: await getStringOption(project, "build", "title", "fanfiction archive"),
    language: await getStringOption(project, "build", "language", "EN"),
    description: await getStringOption(project, "build", "description", "Archived fanfictions"),
    creator: await getStringOption(project, "build", "creator", "various"),
    publisher: await getStringOption(project, "build", "publisher", "UNKNOWN"),
    favicon: await getStringOption(project, "build", "favicon", "resources/favicon.ico")
  };
}

export function createZimwriterfsPackager(command = "zimwriterfs"): Packager {
  return {
    async pack(request) {
      await execFileAsync(
        command,
        [
          "-w", request.welcomePage,
          "-f", request.favicon,
          "-l", request.language,
          "-t", request.title,
          "-d", request.description,
          "-c", request.creator,
          "-p", request.publisher,
          "-i",
          request.htmlDir,
          request.outPath
        ],
        { maxBuffer: 16 * 1024 * 1024 }
      );
    }
  };
}

export const WELCOME_PAGE = "index.html";

export function storyFolderName(source: string, id: string): string {
  return bleachName(`${source}-${id}`);
}

function uniqueFolder(name: string, taken: Set<string>): string {
  const base = bleachName(name);
  let folder = base;
  for (let n = 2; taken.has(folder); n += 1) folder = `${base}-${n}`;
  taken.add(folder);
  return folder;
}

function escapeHtml(text: string): string {
  return text
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;");
}

function linkList(items: readonly { label: string; href: string; stories: number }[]): string {
  if (items.length === 0) return "<p>None.</p>";
  const lines = items.map((it) => `  <li><a href="${escapeHtml(it.href)}">${escapeHtml(it.label)}</a> (${it.stories})</li>`);
  return ["<ul>", ...lines, "</ul>"].join("\n");
}

export function renderWelcomePage(listing: CatalogListing, options: BuildOptions): string {
  const categories = listing.categories.map((it) => ({
    label: it.name,
    href: `category/${encodeURIComponent(it.folder)}/stories.json`,
    stories: it.stories
  }));
  const authors = listing.authors.map((it) => ({
    label: it.name || it.key,
    href: `author/${encodeURIComponent(it.folder)}/stories.json`,
    stories: it.stories
  }));
  const { summary } = listing;
  return [
    "<!DOCTYPE html>",
    `<html lang="${escapeHtml(options.language.toLowerCase())}">`,
    `<head><meta charset="utf-8"><title>${escapeHtml(options.title)}</title></head>`,
    "<body>",
    `<h1>${escapeHtml(options.title)}</h1>`,
    `<p>${escapeHtml(options.description)}</p>`,
    `<p>${summary.stories} stories, ${summary.authors} authors.</p>`,
    "<h2>Categories</h2>",
    linkList(categories),
    "<h2>Authors</h2>",
    linkList(authors),
    "</body>",
    "</html>",
    ""
  ].join("\n");
}

/** Used when no renderer is given: a single welcome page linking the listings. */
export const welcomePageRenderer: PageRenderer = {
  async render({ htmlDir, listing, options }) {
    await writeTextFile(join(htmlDir, WELCOME_PAGE), renderWelcomePage(listing, options));
  }
};

/**
 * Lays out stories and the per-category / per-author JSON dumps of a catalog
 * under htmlDir, ready for page rendering and packaging.
 */
export async function prepareBuildDirectory(
  index: CatalogIndex,
  htmlDir: string,
  opts: { includeImages: boolean; reporter?: Reporter }
): Promise<PreparedBuild> {
  const reporter = opts.reporter ?? silentReporter;
  const report: PrepareReport = { storiesCopied: 0, imagesCopied: 0, categories: 0, authors: 0 };

  for (const entry of index.stories.values()) {
    const srcDir = join(entry.projectDir, ARTIFACT_DIR, entry.target.source, entry.target.id);
    const dstDir = join(htmlDir, "stories", storyFolderName(entry.target.source, entry.target.id));
    const storyPath = join(srcDir, STORY_FILE);
    if (!(await pathExists(storyPath))) {
      reporter.warn(`Story ${entry.target.source}/${entry.target.id} has no ${STORY_FILE} in ${srcDir}; not copied.`);
      continue;
    }
    await copyPath(storyPath, join(dstDir, STORY_FILE));
    report.storiesCopied += 1;
    if (opts.includeImages && (await isDirectory(join(srcDir, IMAGES_DIR)))) {
      await copyPath(join(srcDir, IMAGES_DIR), join(dstDir, IMAGES_DIR));
      report.imagesCopied += 1;
    }
  }

  const categoryFolders = new Set<string>();
  const categories: CatalogListing["categories"] = [];
  for (const [name, targets] of index.byCategory) {
    const folder = uniqueFolder(name, categoryFolders);
    await writeJsonFile(join(htmlDir, "category", folder, "stories.json"), categoryStories(index, name));
    categories.push({ name, folder, stories: targets.length });
  }
  report.categories = categories.length;

  const authorFolders = new Set<string>();
  const authors: CatalogListing["authors"] = [];
  for (const [key, author] of index.byAuthor) {
    const folder = uniqueFolder(key, authorFolders);
    await writeJsonFile(join(htmlDir, "author", folder, "stories.json"), {
      name: author.name,
      id: author.authorId,
      url: author.url,
      stories: authorStories(index, key)
    });
    authors.push({ key, folder, name: author.name, stories: author.stories.length });
  }
  report.authors = authors.length;

  const listing: CatalogListing = { summary: summarizeCatalog(index), categories, authors };
  await writeJsonFile(join(htmlDir, "catalog.json"), listing);
  return { report, listing };
}

export async function buildArchive(project: Project, outPath: string, deps: BuildDeps): Promise<BuildReport> {
  const reporter = deps.reporter ?? silentReporter;
  if (await isDirectory(outPath)) {
    throw new FicpackError(`Output path ${outPath} points to a directory.`, "AlreadyExists", 2);
  }

  const buildDir = await mkdtemp(join(tmpdir(), "ficpack-build-"));
  try {
    reporter.info(`Using '${buildDir}' as build directory.`);
    const htmlDir = join(buildDir, "html");

    reporter.info("Collecting metadata...");
    const index = await aggregateCatalog(project, { includeSubprojects: deps.includeSubprojects, reporter });
    const summary = summarizeCatalog(index);
    reporter.info(`Found ${summary.stories} stories, ${summary.categories} categories, ${summary.authors} authors.`);

    const resources = projectPath(project, "resources");
    if (await isDirectory(resources)) await copyPath(resources, join(htmlDir, "resources"));

    const includeImages = await getBooleanOption(project, "download", "include_images", true);
    const { report, listing } = await prepareBuildDirectory(index, htmlDir, { includeImages, reporter });
    reporter.info(`Copied ${report.storiesCopied} stories.`);

    const options = await readBuildOptions(project);
    await (deps.renderer ?? welcomePageRenderer).render({ htmlDir, index, listing, options });
    if (!(await pathExists(join(htmlDir, WELCOME_PAGE)))) {
      throw new FicpackError(`Page rendering did not produce ${WELCOME_PAGE} in ${htmlDir}.`, "CollaboratorFailure");
    }

    reporter.info("Packaging...");
    try {
      await deps.packager.pack({ ...options, htmlDir, outPath, welcomePage: WELCOME_PAGE });
    } catch (err: unknown) {
      throw new FicpackError(`Packaging ${outPath} failed: ${errorMessage(err)}`, "CollaboratorFailure");
    }
    reporter.info("Done.");
    return { ...report, outPath, summary };
  } finally {
    await removePath(buildDir);
  }
}

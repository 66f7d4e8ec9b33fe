import { loadAliasTable, resolveCategory } from "./aliases.js";
import { listLocalArtifacts, readRawMetadata } from "./artifacts.js";
import { createCatalogIndex, insertStory, type CatalogIndex, type StoryEntry } from "./catalog.js";
import { convertMetadata } from "./converters.js";
import { FicpackError } from "./errors.js";
import type { Project } from "./project.js";
import { silentReporter, type Reporter } from "./reporter.js";
import { getSubprojects } from "./subprojects.js";

export type AggregateOptions = {
  includeSubprojects?: boolean;
  reporter?: Reporter;
};

/**
 * Canonical metadata of every story stored in this project (not its
 * subprojects), categories resolved through the project's own alias table.
 * Stories without readable metadata are reported and skipped.
 */
export async function collectProjectMetadata(project: Project, reporter: Reporter = silentReporter): Promise<StoryEntry[]> {
  const aliases = await loadAliasTable(project);
  const entries: StoryEntry[] = [];
  for (const target of await listLocalArtifacts(project)) {
    try {
      const raw = await readRawMetadata(project, target);
      const metadata = convertMetadata(raw, target);
      entries.push({
        target,
        metadata: { ...metadata, category: resolveCategory(aliases, metadata.category) },
        projectDir: project.rootDir
      });
    } catch (err: unknown) {
      if (err instanceof FicpackError && (err.code === "MissingMetadata" || err.code === "MalformedSource")) {
        reporter.warn(`Skipping ${target.source}/${target.id} in ${project.rootDir}: ${err.message}`);
        continue;
      }
      throw err;
    }
  }
  return entries;
}

/**
 * Merges the project and (by default) its subproject tree into one catalog.
 * Projects are visited root first, then each subproject's subtree in listed
 * order; a story already catalogued by an earlier project keeps that version.
 */
export async function aggregateCatalog(root: Project, opts: AggregateOptions = {}): Promise<CatalogIndex> {
  const reporter = opts.reporter ?? silentReporter;
  const projects = opts.includeSubprojects === false ? [root] : [root, ...(await getSubprojects(root))];
  const index = createCatalogIndex();
  for (const project of projects) {
    for (const entry of await collectProjectMetadata(project, reporter)) {
      insertStory(index, entry);
    }
  }
  return index;
}

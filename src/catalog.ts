import type { CanonicalMetadata } from "./converters.js";
import { targetKey, type TargetIdentity } from "./target.js";

export const ALL_CATEGORY = "ALL";

export type StoryEntry = {
  target: TargetIdentity;
  metadata: CanonicalMetadata;
  /** Root of the project whose fanfics/ holds the story's files. */
  projectDir: string;
};

export type AuthorEntry = {
  source: string;
  authorId: string;
  name: string;
  url: string;
  stories: TargetIdentity[];
};

export type CatalogIndex = {
  stories: Map<string, StoryEntry>;
  byCategory: Map<string, TargetIdentity[]>;
  byAuthor: Map<string, AuthorEntry>;
};

export type CatalogSummary = {
  stories: number;
  categories: number;
  authors: number;
};

export function authorKey(source: string, authorId: string): string {
  return `${source}-${authorId}`;
}

export function createCatalogIndex(): CatalogIndex {
  return { stories: new Map(), byCategory: new Map([[ALL_CATEGORY, []]]), byAuthor: new Map() };
}

function pushToBucket(index: CatalogIndex, category: string, target: TargetIdentity): void {
  const bucket = index.byCategory.get(category);
  if (bucket) bucket.push(target);
  else index.byCategory.set(category, [target]);
}

/**
 * Adds a story unless its identity is already catalogued (first write wins).
 * Returns whether it was inserted.
 */
export function insertStory(index: CatalogIndex, entry: StoryEntry): boolean {
  const key = targetKey(entry.target);
  if (index.stories.has(key)) return false;

  const target: TargetIdentity = { source: entry.target.source, id: entry.target.id };
  const metadata: CanonicalMetadata = {
    ...entry.metadata,
    characters: [...entry.metadata.characters],
    ships: entry.metadata.ships.map((ship) => [...ship])
  };
  index.stories.set(key, { target, metadata, projectDir: entry.projectDir });

  pushToBucket(index, ALL_CATEGORY, target);
  if (metadata.category !== ALL_CATEGORY) pushToBucket(index, metadata.category, target);

  const aKey = authorKey(target.source, metadata.authorId);
  const author = index.byAuthor.get(aKey);
  if (author) {
    author.stories.push(target);
  } else {
    index.byAuthor.set(aKey, {
      source: target.source,
      authorId: metadata.authorId,
      name: metadata.author,
      url: metadata.authorUrl,
      stories: [target]
    });
  }
  return true;
}

function metadataFor(index: CatalogIndex, targets: readonly TargetIdentity[]): CanonicalMetadata[] {
  const out: CanonicalMetadata[] = [];
  for (const target of targets) {
    const entry = index.stories.get(targetKey(target));
    if (entry) out.push(entry.metadata);
  }
  return out;
}

export function categoryStories(index: CatalogIndex, category: string): CanonicalMetadata[] {
  return metadataFor(index, index.byCategory.get(category) ?? []);
}

export function authorStories(index: CatalogIndex, key: string): CanonicalMetadata[] {
  return metadataFor(index, index.byAuthor.get(key)?.stories ?? []);
}

export function summarizeCatalog(index: CatalogIndex): CatalogSummary {
  return { stories: index.stories.size, categories: index.byCategory.size, authors: index.byAuthor.size };
}

import { parseCount } from "./counts.js";
import { FicpackError } from "./errors.js";
import { isPlainObject, isStringArray } from "./type-guards.js";

/** Metadata as the retrieval tool wrote it; any field may be missing. */
export type RawMetadata = Record<string, unknown>;

export type CanonicalMetadata = {
  source: string;
  storyId: string;
  title: string;
  author: string;
  authorId: string;
  authorUrl: string;
  storyUrl: string;
  category: string;
  description: string;
  status: string;
  rating: string;
  language: string;
  genre: string;
  datePublished: string;
  dateUpdated: string;
  numWords: number;
  numChapters: number;
  favs: number;
  follows: number;
  reviews: number;
  /** Distinct, non-empty names in order of first appearance. */
  characters: string[];
  /** Each ship's members sorted by name. */
  ships: string[][];
};

export type ConversionContext = {
  source: string;
  /** Story id known from where the record was found (its artifact directory). */
  id?: string;
};

export type MetadataConverter = (raw: RawMetadata, context: ConversionContext) => CanonicalMetadata;

export const UNKNOWN_ID = "???";
export const DEFAULT_CATEGORY = "Uncategorized";

type Counters = Pick<CanonicalMetadata, "numWords" | "numChapters" | "favs" | "follows" | "reviews">;

function textField(raw: RawMetadata, key: string): string {
  const v = raw[key];
  if (typeof v === "string") return v.trim();
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return "";
}

function splitList(value: unknown): string[] {
  if (isStringArray(value)) return value;
  if (typeof value !== "string") return [];
  return value.split(",");
}

export function parseCharacters(value: unknown): string[] {
  const out: string[] = [];
  for (const part of splitList(value)) {
    const name = part.trim();
    if (name.length > 0 && !out.includes(name)) out.push(name);
  }
  return out;
}

function pickSentinel(text: string): string {
  let sentinel = "\u0000";
  while (text.includes(sentinel)) sentinel += "\u0000";
  return sentinel;
}

/**
 * Splits "A/B, C/D/E" into sorted member lists. Character names that contain a
 * `/` themselves survive: their slashes are swapped for a sentinel before the
 * entry is split and restored afterwards.
 */
export function parseShips(value: unknown, characters: readonly string[]): string[][] {
  const slashNames = characters.filter((name) => name.includes("/")).sort((a, b) => b.length - a.length);
  const ships: string[][] = [];
  for (const part of splitList(value)) {
    let entry = part.trim();
    if (entry.length === 0) continue;

    const sentinel = pickSentinel(entry);
    for (const name of slashNames) {
      if (entry.includes(name)) entry = entry.replaceAll(name, name.replaceAll("/", sentinel));
    }
    const members = entry
      .split("/")
      .map((member) => member.replaceAll(sentinel, "/").trim())
      .filter((member) => member.length > 0)
      .sort();
    if (members.length > 0) ships.push(members);
  }
  return ships;
}

function resolveStoryId(raw: RawMetadata, context: ConversionContext): string {
  const fromRaw = textField(raw, "storyId");
  if (fromRaw.length > 0) return fromRaw;
  if (context.id !== undefined && context.id.length > 0) return context.id;
  throw new FicpackError(`Metadata for a ${context.source} story has no storyId and none is known from its location.`, "MalformedSource");
}

function buildCanonical(raw: RawMetadata, context: ConversionContext, counters: Counters, overrides: Partial<CanonicalMetadata> = {}): CanonicalMetadata {
  const characters = parseCharacters(raw.characters);
  const category = textField(raw, "category");
  return {
    source: context.source,
    storyId: resolveStoryId(raw, context),
    title: textField(raw, "title"),
    author: textField(raw, "author"),
    authorId: textField(raw, "authorId") || UNKNOWN_ID,
    authorUrl: textField(raw, "authorUrl"),
    storyUrl: textField(raw, "storyUrl"),
    category: category || DEFAULT_CATEGORY,
    description: textField(raw, "description"),
    status: textField(raw, "status"),
    rating: textField(raw, "rating"),
    language: textField(raw, "language"),
    genre: textField(raw, "genre"),
    datePublished: textField(raw, "datePublished"),
    dateUpdated: textField(raw, "dateUpdated"),
    ...counters,
    characters,
    ships: parseShips(raw.ships, characters),
    ...overrides
  };
}

export const defaultConverter: MetadataConverter = (raw, context) =>
  buildCanonical(raw, context, {
    numWords: parseCount(raw.numWords),
    numChapters: parseCount(raw.numChapters),
    favs: parseCount(raw.favs),
    follows: parseCount(raw.follows),
    reviews: parseCount(raw.reviews)
  });

// FanFiction.Net and FictionPress share a layout; their counters already use the canonical names.
const ffnetConverter: MetadataConverter = defaultConverter;

const ao3Converter: MetadataConverter = (raw, context) =>
  buildCanonical(raw, context, {
    numWords: parseCount(raw.numWords),
    numChapters: parseCount(raw.numChapters),
    favs: parseCount(raw.kudos),
    // AO3 hides subscriptions; bookmarks are the closest public counter.
    follows: parseCount(raw.bookmarks),
    reviews: parseCount(raw.comments)
  });

function sumThreadmarkWords(zchapters: unknown): number {
  if (!Array.isArray(zchapters)) return 0;
  let total = 0;
  for (const chapter of zchapters) {
    if (!Array.isArray(chapter)) continue;
    const meta: unknown = chapter[1];
    if (isPlainObject(meta)) total += parseCount(meta.kwords);
  }
  return total;
}

const xenforoConverter: MetadataConverter = (raw, context) => {
  const chapterCount = parseCount(raw.numChapters);
  return buildCanonical(
    raw,
    context,
    {
      numWords: sumThreadmarkWords(raw.zchapters),
      numChapters: chapterCount > 0 ? chapterCount : Array.isArray(raw.zchapters) ? raw.zchapters.length : 0,
      favs: 0,
      follows: 0,
      reviews: 0
    },
    { status: "Unknown" }
  );
};

export const METADATA_CONVERTERS: Readonly<Record<string, MetadataConverter>> = {
  ffnet: ffnetConverter,
  fpcom: ffnetConverter,
  ao3: ao3Converter,
  fsb: xenforoConverter,
  fsv: xenforoConverter
};

export function getMetadataConverter(source: string): MetadataConverter {
  return Object.hasOwn(METADATA_CONVERTERS, source) ? METADATA_CONVERTERS[source] ?? defaultConverter : defaultConverter;
}

export function convertMetadata(raw: RawMetadata, context: ConversionContext): CanonicalMetadata {
  return getMetadataConverter(context.source)(raw, context);
}

import { FicpackError } from "./errors.js";
import { bleachName } from "./safe-path.js";

export type TargetIdentity = {
  source: string;
  id: string;
};

/** A resolved reference: its identity plus the URL written to the target list. */
export type Target = TargetIdentity & {
  url: string;
};

type SitePattern = {
  source: string;
  hosts: readonly string[];
  path: RegExp;
  canonicalUrl: (id: string) => string;
};

export const SITE_PATTERNS: readonly SitePattern[] = [
  {
    source: "ffnet",
    hosts: ["fanfiction.net"],
    path: /^\/s\/(\d+)(?:\/|$)/,
    canonicalUrl: (id) => `https://www.fanfiction.net/s/${id}/1/`
  },
  {
    source: "fpcom",
    hosts: ["fictionpress.com"],
    path: /^\/s\/(\d+)(?:\/|$)/,
    canonicalUrl: (id) => `https://www.fictionpress.com/s/${id}/1/`
  },
  {
    source: "ao3",
    hosts: ["archiveofourown.org", "ao3.org"],
    path: /^\/(?:collections\/[^/]+\/)?works\/(\d+)(?:\/|$)/,
    canonicalUrl: (id) => `https://archiveofourown.org/works/${id}`
  },
  {
    source: "fsb",
    hosts: ["forums.spacebattles.com"],
    path: /^\/threads\/(?:[^/]*\.)?(\d+)(?:\/|$)/,
    canonicalUrl: (id) => `https://forums.spacebattles.com/threads/${id}/`
  },
  {
    source: "fsv",
    hosts: ["forums.sufficientvelocity.com"],
    path: /^\/threads\/(?:[^/]*\.)?(\d+)(?:\/|$)/,
    canonicalUrl: (id) => `https://forums.sufficientvelocity.com/threads/${id}/`
  },
  {
    source: "rrl",
    hosts: ["royalroad.com"],
    path: /^\/fiction\/(\d+)(?:\/|$)/,
    canonicalUrl: (id) => `https://www.royalroad.com/fiction/${id}`
  }
];

// Bare numeric ids have always meant fanfiction.net stories.
const BARE_ID_SOURCE = "ffnet";

function normalizeHost(host: string): string {
  return host.toLowerCase().replace(/^(?:www|m)\./, "");
}

function normalizeNumericId(id: string): string {
  return id.replace(/^0+(?=\d)/, "");
}

function parseHttpUrl(reference: string): URL | null {
  let candidate = reference;
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(candidate)) {
    // "www.fanfiction.net/s/1" and friends
    if (!/^[a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,}(?:[/?#:]|$)/i.test(candidate)) return null;
    candidate = `https://${candidate}`;
  }
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  if (url.hostname.length === 0) return null;
  return url;
}

function matchSite(url: URL): Target | null {
  const host = normalizeHost(url.hostname);
  for (const site of SITE_PATTERNS) {
    if (!site.hosts.includes(host)) continue;
    const m = site.path.exec(url.pathname);
    const rawId = m?.[1];
    if (rawId === undefined) continue;
    const id = normalizeNumericId(rawId);
    if (id === "0") return null;
    return { source: site.source, id, url: site.canonicalUrl(id) };
  }
  return null;
}

function isRecognizedHost(url: URL): boolean {
  const host = normalizeHost(url.hostname);
  return SITE_PATTERNS.some((site) => site.hosts.includes(host));
}

function syntheticTarget(url: URL): Target {
  const source = bleachName(normalizeHost(url.hostname));
  const rest = `${url.pathname}${url.search}`.replace(/^\/+/, "").replace(/\/+$/, "");
  const id = rest.length > 0 ? bleachName(rest) : "index";
  return { source, id, url: url.href };
}

/**
 * Resolves a target reference (bare fanfiction.net id or story URL) to its identity.
 *
 * Pure: the same string always yields the same target. URLs of unknown sites get a
 * synthetic source derived from their host; a URL on a known site that is not a
 * story URL, and anything that is not a URL at all, is rejected.
 */
export function resolveReference(reference: string): Target {
  const trimmed = reference.trim();
  if (/^\d+$/.test(trimmed)) {
    const id = normalizeNumericId(trimmed);
    if (id === "0") throw new FicpackError(`Invalid target reference: ${reference} (ids start at 1).`, "InvalidReference", 2);
    const site = SITE_PATTERNS.find((it) => it.source === BARE_ID_SOURCE);
    const url = site ? site.canonicalUrl(id) : trimmed;
    return { source: BARE_ID_SOURCE, id, url };
  }

  const url = parseHttpUrl(trimmed);
  if (url === null) {
    throw new FicpackError(`Invalid target reference: ${reference} (expected a story URL or a numeric id).`, "InvalidReference", 2);
  }
  const matched = matchSite(url);
  if (matched) return matched;
  if (isRecognizedHost(url)) {
    throw new FicpackError(`Invalid target reference: ${reference} (not a story URL for ${normalizeHost(url.hostname)}).`, "InvalidReference", 2);
  }
  return syntheticTarget(url);
}

export function tryResolveReference(reference: string): Target | null {
  try {
    return resolveReference(reference);
  } catch (err: unknown) {
    if (err instanceof FicpackError && err.code === "InvalidReference") return null;
    throw err;
  }
}

export function targetKey(target: TargetIdentity): string {
  return `${target.source}/${target.id}`;
}

export function sameTarget(a: TargetIdentity, b: TargetIdentity): boolean {
  return a.source === b.source && a.id === b.id;
}

export function compareTargets(a: TargetIdentity, b: TargetIdentity): number {
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function toIdentity(target: TargetIdentity): TargetIdentity {
  return { source: target.source, id: target.id };
}

/**
 * Finds every story URL of a recognised site in free text (a saved listing page,
 * a bookmarks export). Results are canonical URLs in order of first appearance.
 */
export function findReferencesInText(text: string): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const m of text.matchAll(/(?:https?:\/\/)?[a-z0-9.-]+\.[a-z]{2,}\/[^\s"'<>()]*/gi)) {
    const url = parseHttpUrl(m[0]);
    if (url === null) continue;
    const target = matchSite(url);
    if (target === null) continue;
    const key = targetKey(target);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(target.url);
  }
  return out;
}

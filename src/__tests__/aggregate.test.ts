import assert from "node:assert/strict";
import test from "node:test";

import { aggregateCatalog, collectProjectMetadata } from "../aggregate.js";
import { addCategoryAlias } from "../aliases.js";
import { ALL_CATEGORY, authorKey, categoryStories, insertStory, createCatalogIndex, summarizeCatalog } from "../catalog.js";
import { defaultConverter } from "../converters.js";
import { createCollectingReporter } from "../reporter.js";
import { addSubproject } from "../subprojects.js";
import { targetKey } from "../target.js";
import { makeProject, makeTempDir, writeStory } from "./helpers.js";

function story(id: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { storyId: id, title: `Story ${id}`, author: "Writer", authorId: "77", category: "Harry Potter", ...extra };
}

test("stories from the root project win over subproject copies", async () => {
  const base = await makeTempDir("aggregate");
  const root = await makeProject(base, "root");
  const sub = await makeProject(base, "sub");
  await writeStory(root, "ffnet", "42", story("42", { title: "Root copy" }));
  await writeStory(sub, "ffnet", "42", story("42", { title: "Sub copy" }));
  await writeStory(sub, "ffnet", "43", story("43"));
  await addSubproject(root, "../sub");

  const index = await aggregateCatalog(root);
  assert.equal(index.stories.get("ffnet/42")?.metadata.title, "Root copy");
  assert.equal(index.stories.get("ffnet/42")?.projectDir, root.rootDir);
  assert.equal(index.stories.get("ffnet/43")?.projectDir, sub.rootDir);
  assert.deepEqual(index.byCategory.get(ALL_CATEGORY)?.map(targetKey), ["ffnet/42", "ffnet/43"]);
  assert.deepEqual(index.byCategory.get("Harry Potter")?.map(targetKey), ["ffnet/42", "ffnet/43"]);
  assert.deepEqual(summarizeCatalog(index), { stories: 2, categories: 2, authors: 1 });
});

test("aggregation can stay within the root project", async () => {
  const base = await makeTempDir("aggregate-root-only");
  const root = await makeProject(base, "root");
  const sub = await makeProject(base, "sub");
  await writeStory(sub, "ffnet", "43", story("43"));
  await addSubproject(root, "../sub");

  const index = await aggregateCatalog(root, { includeSubprojects: false });
  assert.equal(index.stories.size, 0);
  assert.deepEqual(index.byCategory.get(ALL_CATEGORY), []);
});

test("each project resolves categories through its own alias table", async () => {
  const base = await makeTempDir("aggregate-aliases");
  const root = await makeProject(base, "root");
  const sub = await makeProject(base, "sub");
  await addCategoryAlias(root, "HP", "Harry Potter");
  await writeStory(root, "ffnet", "1", story("1", { category: "HP" }));
  await writeStory(sub, "ffnet", "2", story("2", { category: "HP" }));
  await addSubproject(root, "../sub");

  const index = await aggregateCatalog(root);
  assert.deepEqual(index.byCategory.get("Harry Potter")?.map(targetKey), ["ffnet/1"]);
  assert.deepEqual(index.byCategory.get("HP")?.map(targetKey), ["ffnet/2"]);
});

test("stories without usable metadata are reported and skipped", async () => {
  const base = await makeTempDir("aggregate-missing");
  const root = await makeProject(base, "root");
  await writeStory(root, "ffnet", "1", null);
  await writeStory(root, "ffnet", "2", story("2"));
  const reporter = createCollectingReporter();

  const entries = await collectProjectMetadata(root, reporter);
  assert.deepEqual(entries.map((it) => targetKey(it.target)), ["ffnet/2"]);
  assert.equal(reporter.warnings.length, 1);
  assert.match(reporter.warnings[0] ?? "", /^Skipping ffnet\/1 in /);
});

test("the artifact directory supplies a missing story id", async () => {
  const base = await makeTempDir("aggregate-id");
  const root = await makeProject(base, "root");
  await writeStory(root, "ao3", "9", { title: "No id", kudos: "1,204" });

  const [entry] = await collectProjectMetadata(root);
  assert.equal(entry?.metadata.storyId, "9");
  assert.equal(entry?.metadata.favs, 1204);
  assert.equal(entry?.metadata.category, "Uncategorized");
});

test("stories are grouped by source and author id", async () => {
  const base = await makeTempDir("aggregate-authors");
  const root = await makeProject(base, "root");
  await writeStory(root, "ffnet", "1", story("1"));
  await writeStory(root, "ffnet", "2", story("2"));
  await writeStory(root, "ao3", "3", story("3"));

  const index = await aggregateCatalog(root);
  assert.deepEqual([...index.byAuthor.keys()], ["ao3-77", "ffnet-77"]);
  assert.deepEqual(index.byAuthor.get(authorKey("ffnet", "77"))?.stories.map(targetKey), ["ffnet/1", "ffnet/2"]);
  assert.equal(index.byAuthor.get("ffnet-77")?.name, "Writer");
});

test("insertStory keeps the first copy and never lists ALL twice", () => {
  const index = createCatalogIndex();
  const first = defaultConverter({ storyId: "5", title: "First", category: ALL_CATEGORY }, { source: "ffnet" });
  const second = { ...first, title: "Second" };

  assert.equal(insertStory(index, { target: { source: "ffnet", id: "5" }, metadata: first, projectDir: "/a" }), true);
  assert.equal(insertStory(index, { target: { source: "ffnet", id: "5" }, metadata: second, projectDir: "/b" }), false);
  assert.deepEqual(categoryStories(index, ALL_CATEGORY).map((it) => it.title), ["First"]);
  assert.equal(index.byCategory.size, 1);
});

test("catalogued metadata is a copy", () => {
  const index = createCatalogIndex();
  const metadata = defaultConverter({ storyId: "6", characters: "A, B" }, { source: "ffnet" });
  insertStory(index, { target: { source: "ffnet", id: "6" }, metadata, projectDir: "/a" });
  metadata.characters.push("C");
  assert.deepEqual(index.stories.get("ffnet/6")?.metadata.characters, ["A", "B"]);
});

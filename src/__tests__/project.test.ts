import assert from "node:assert/strict";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import test from "node:test";

import { addCategoryAlias, loadAliasTable, resolveCategory } from "../aliases.js";
import { FicpackError } from "../errors.js";
import {
  getBooleanOption,
  getOption,
  getStringOption,
  initProject,
  isValidProject,
  openProject,
  resolveProjectRoot,
  setOption
} from "../project.js";
import { makeProject, makeTempDir } from "./helpers.js";

function hasCode(code: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof FicpackError && err.code === code;
}

test("initProject writes the marker and list files", async () => {
  const base = await makeTempDir("init");
  const project = await makeProject(base);
  assert.equal(await isValidProject(project.rootDir), true);
  const marker: unknown = JSON.parse(await readFile(join(project.rootDir, "project.json"), "utf8"));
  assert.deepEqual(marker, { version: "0.3" });
  const targetList = await readFile(join(project.rootDir, "target_urls.txt"), "utf8");
  assert.ok(targetList.split("\n").every((line) => line === "" || line.startsWith("#")));
  assert.deepEqual(await openProject(project.rootDir), project);
});

test("initProject refuses existing projects and non-empty directories", async () => {
  const base = await makeTempDir("init-twice");
  const project = await makeProject(base);
  await assert.rejects(initProject(project.rootDir), hasCode("AlreadyExists"));

  const busy = join(base, "busy");
  await mkdir(busy);
  await writeFile(join(busy, "notes.txt"), "x", "utf8");
  await assert.rejects(initProject(busy), hasCode("DirectoryNotEmpty"));
});

test("openProject rejects directories without a valid marker", async () => {
  const base = await makeTempDir("open");
  await assert.rejects(openProject(base), hasCode("NotAProject"));
  await writeFile(join(base, "project.json"), "{}\n", "utf8");
  await assert.rejects(openProject(base), hasCode("NotAProject"));
});

test("resolveProjectRoot walks up to the project marker", async () => {
  const base = await makeTempDir("walk");
  const project = await makeProject(base);
  const nested = join(project.rootDir, "fanfics", "ffnet");
  await mkdir(nested, { recursive: true });
  assert.equal((await resolveProjectRoot({ cwd: nested })).rootDir, project.rootDir);
  assert.equal((await resolveProjectRoot({ cwd: base, projectOverride: "root" })).rootDir, project.rootDir);
});

test("options are stored per category and read back typed", async () => {
  const base = await makeTempDir("options");
  const project = await makeProject(base);
  assert.equal(await getOption(project, "build", "title"), undefined);
  assert.equal(await getStringOption(project, "build", "title", "fallback"), "fallback");

  await setOption(project, "build", "title", "My Archive");
  await setOption(project, "download", "include_images", "false");
  assert.equal(await getStringOption(project, "build", "title", "fallback"), "My Archive");
  assert.equal(await getBooleanOption(project, "download", "include_images", true), false);

  const marker: unknown = JSON.parse(await readFile(join(project.rootDir, "project.json"), "utf8"));
  assert.deepEqual(marker, { version: "0.3", build: { title: "My Archive" }, download: { include_images: "false" } });
  await assert.rejects(setOption(project, "version", "x", "1"), hasCode("Usage"));
});

test("category aliases resolve a single hop", async () => {
  const base = await makeTempDir("aliases");
  const project = await makeProject(base);
  await addCategoryAlias(project, "X", "Y");
  await addCategoryAlias(project, "Y", "Z");

  const table = await loadAliasTable(project);
  assert.equal(resolveCategory(table, "X"), "Y");
  assert.equal(resolveCategory(table, "Y"), "Z");
  assert.equal(resolveCategory(table, "Q"), "Q");

  await addCategoryAlias(project, "X", "W");
  assert.equal(resolveCategory(await loadAliasTable(project), "X"), "W");
  const persisted: unknown = JSON.parse(await readFile(join(project.rootDir, "aliases.json"), "utf8"));
  assert.deepEqual(persisted, { X: "W", Y: "Z" });
});

test("a project without aliases.json resolves every category to itself", async () => {
  const base = await makeTempDir("no-aliases");
  const project = await makeProject(base);
  assert.equal(resolveCategory(await loadAliasTable(project), "Naruto"), "Naruto");
});

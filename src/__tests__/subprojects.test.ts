import assert from "node:assert/strict";
import { appendFile, mkdir, symlink } from "node:fs/promises";
import { join } from "node:path";
import test from "node:test";

import { FicpackError } from "../errors.js";
import { addSubproject, getSubprojects, readSubprojectPaths } from "../subprojects.js";
import { makeProject, makeTempDir } from "./helpers.js";

function hasCode(code: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof FicpackError && err.code === code;
}

test("getSubprojects walks the tree depth-first in listed order", async () => {
  const base = await makeTempDir("tree");
  const root = await makeProject(base, "root");
  const a = await makeProject(base, "a");
  const b = await makeProject(base, "b");
  const c = await makeProject(base, "c");

  assert.equal(await addSubproject(root, "../a"), true);
  assert.equal(await addSubproject(a, "../b"), true);
  assert.equal(await addSubproject(root, "../c"), true);
  assert.equal(await addSubproject(root, "../a/"), false);

  assert.deepEqual(await readSubprojectPaths(root), ["../a", "../c"]);
  assert.deepEqual(
    (await getSubprojects(root)).map((it) => it.rootDir),
    [a.rootDir, b.rootDir, c.rootDir]
  );
  assert.deepEqual(await getSubprojects(c), []);
});

test("a project reachable along two paths is visited on each", async () => {
  const base = await makeTempDir("diamond");
  const root = await makeProject(base, "root");
  const a = await makeProject(base, "a");
  const shared = await makeProject(base, "shared");
  await addSubproject(root, "../a");
  await addSubproject(root, "../shared");
  await addSubproject(a, "../shared");

  assert.deepEqual(
    (await getSubprojects(root)).map((it) => it.rootDir),
    [a.rootDir, shared.rootDir, shared.rootDir]
  );
});

test("getSubprojects fails on a cycle instead of recursing forever", async () => {
  const base = await makeTempDir("cycle");
  const root = await makeProject(base, "root");
  const a = await makeProject(base, "a");
  await addSubproject(root, "../a");
  await addSubproject(a, "../root");
  await assert.rejects(getSubprojects(root), hasCode("CyclicSubproject"));
});

test("a hand-written self reference is a cycle too", async () => {
  const base = await makeTempDir("self");
  const root = await makeProject(base, "root");
  await appendFile(join(root.rootDir, "subprojects.txt"), ".\n", "utf8");
  await assert.rejects(getSubprojects(root), hasCode("CyclicSubproject"));
  await assert.rejects(addSubproject(root, "."), hasCode("CyclicSubproject"));
});

test("a cycle through a symlinked directory is detected", async () => {
  const base = await makeTempDir("symlink-cycle");
  const root = await makeProject(base, "root");
  await symlink(root.rootDir, join(root.rootDir, "loop"), "dir");
  await appendFile(join(root.rootDir, "subprojects.txt"), "loop\n", "utf8");

  await assert.rejects(getSubprojects(root), hasCode("CyclicSubproject"));
  await assert.rejects(addSubproject(root, "loop"), hasCode("CyclicSubproject"));
});

test("subprojects must be valid projects", async () => {
  const base = await makeTempDir("invalid-sub");
  const root = await makeProject(base, "root");
  await mkdir(join(base, "plain"));
  await assert.rejects(addSubproject(root, "../plain"), hasCode("NotAProject"));
  await assert.rejects(addSubproject(root, join(base, "plain")), hasCode("Usage"));

  await appendFile(join(root.rootDir, "subprojects.txt"), "../missing\n", "utf8");
  await assert.rejects(getSubprojects(root), hasCode("NotAProject"));
});

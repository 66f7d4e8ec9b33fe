import assert from "node:assert/strict";
import { join } from "node:path";
import test from "node:test";

import { main } from "../cli.js";
import { listTargets } from "../target-list.js";
import { openProject, getOption } from "../project.js";
import { targetKey } from "../target.js";
import { makeTempDir } from "./helpers.js";

test("init, add and option set work against a --project directory", async () => {
  const base = await makeTempDir("cli");
  const dir = join(base, "shelf");

  assert.equal(await main(["--json", "init", dir]), 0);
  assert.equal(await main(["--json", "--project", dir, "add", "https://archiveofourown.org/works/9/chapters/3"]), 0);
  assert.equal(await main(["--json", "--project", dir, "add", "42"]), 0);
  assert.equal(await main(["--json", "--project", dir, "option", "set", "build", "title", "Shelf"]), 0);

  const project = await openProject(dir);
  assert.deepEqual((await listTargets(project)).map(targetKey), ["ao3/9", "ffnet/42"]);
  assert.equal(await getOption(project, "build", "title"), "Shelf");
});

test("domain errors map to their exit codes", async () => {
  const base = await makeTempDir("cli-errors");
  const dir = join(base, "shelf");
  assert.equal(await main(["--json", "init", dir]), 0);

  assert.equal(await main(["--json", "init", dir]), 2);
  assert.equal(await main(["--json", "--project", dir, "add", "not a story"]), 2);
  assert.equal(await main(["--json", "--project", join(base, "elsewhere"), "status"]), 2);
  assert.equal(await main(["--json", "--project", dir, "option", "set", "version", "x", "1"]), 2);
});

test("unknown commands are rejected by the parser", async () => {
  assert.equal(await main(["--json", "frobnicate"]), 1);
});

import assert from "node:assert/strict";
import { join } from "node:path";
import test from "node:test";

import { convertTargetToBook, ebookConvertArgs, toBookMetadata, type BookConverter, type BookRequest } from "../epub.js";
import { defaultConverter } from "../converters.js";
import { FicpackError } from "../errors.js";
import { makeProject, makeTempDir, writeStory } from "./helpers.js";

function recordingConverter(): BookConverter & { requests: BookRequest[] } {
  const requests: BookRequest[] = [];
  return {
    requests,
    async convert(request) {
      requests.push(request);
    }
  };
}

test("ebookConvertArgs passes only the metadata that is present", () => {
  const metadata = toBookMetadata(defaultConverter({ storyId: "1", title: "Alpha", author: "Writer", language: "English" }, { source: "ffnet" }));
  assert.deepEqual(ebookConvertArgs({ storyPath: "in/story.html", outPath: "out.epub", metadata }), [
    "in/story.html",
    "out.epub",
    "--title",
    "Alpha",
    "--authors",
    "Writer",
    "--tags",
    "Uncategorized",
    "--language",
    "English"
  ]);
});

test("convertTargetToBook feeds the stored story and its metadata to the converter", async () => {
  const base = await makeTempDir("epub");
  const project = await makeProject(base);
  const dir = await writeStory(project, "ffnet", "42", {
    storyId: "42",
    title: "Alpha",
    author: "Writer",
    description: "A tale.",
    numWords: "12.5k",
    datePublished: "2020-01-02"
  });
  const converter = recordingConverter();

  const metadata = await convertTargetToBook(project, "https://m.fanfiction.net/s/42/3/Alpha", join(base, "alpha.epub"), { converter });
  assert.equal(metadata.numWords, 12500);
  assert.equal(converter.requests.length, 1);
  assert.equal(converter.requests[0]?.storyPath, join(dir, "story.html"));
  assert.equal(converter.requests[0]?.metadata.description, "A tale.");
  assert.equal(converter.requests[0]?.metadata.datePublished, "2020-01-02");
});

test("convertTargetToBook rejects a story that is not downloaded", async () => {
  const base = await makeTempDir("epub-missing");
  const project = await makeProject(base);
  const converter = recordingConverter();
  await assert.rejects(
    convertTargetToBook(project, "42", join(base, "x.epub"), { converter }),
    (err: unknown) => err instanceof FicpackError && err.code === "Usage"
  );
  assert.equal(converter.requests.length, 0);
});

test("convertTargetToBook reports converter failures", async () => {
  const base = await makeTempDir("epub-fail");
  const project = await makeProject(base);
  await writeStory(project, "ffnet", "42", { storyId: "42", title: "Alpha" });
  const converter: BookConverter = {
    async convert() {
      throw new Error("ebook-convert: not found");
    }
  };
  await assert.rejects(convertTargetToBook(project, "42", join(base, "x.epub"), { converter }), {
    code: "CollaboratorFailure",
    message: "E-book conversion of ffnet/42 failed: ebook-convert: not found"
  });
});

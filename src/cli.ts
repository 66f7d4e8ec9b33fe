#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { aggregateCatalog } from "./aggregate.js";
import { addCategoryAlias, loadAliasTable } from "./aliases.js";
import { buildArchive, createZimwriterfsPackager } from "./build.js";
import { ALL_CATEGORY, summarizeCatalog } from "./catalog.js";
import { downloadMissingTargets, retrieverForProject, updateMarkedTargets, type BatchResult } from "./download.js";
import { convertTargetToBook, createEbookConvertConverter } from "./epub.js";
import { FicpackError } from "./errors.js";
import { errJson, okJson, printJson } from "./output.js";
import {
  getOption,
  getProjectVersion,
  getStringOption,
  initProject,
  resolveProjectRoot,
  setOption,
  type Project
} from "./project.js";
import { createConsoleReporter } from "./reporter.js";
import { addSubproject, readSubprojectPaths } from "./subprojects.js";
import { addTarget, addTargetsFromFile, listTargets } from "./target-list.js";
import { resolveReference } from "./target.js";
import { listMarkedForUpdate, markForUpdate } from "./update-marks.js";

type GlobalOpts = {
  json?: boolean;
  project?: string;
};

function detectCommandName(argv: string[]): string {
  for (const token of argv) {
    if (token === "--") return "unknown";
    if (!token.startsWith("-")) return token;
  }
  return "unknown";
}

function isJsonMode(argv: string[]): boolean {
  return argv.includes("--json");
}

function parseLimit(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) throw new FicpackError(`--limit must be a positive integer, got '${value}'.`, "Usage", 2);
  return n;
}

function batchData(result: BatchResult): Record<string, unknown> {
  return {
    succeeded: result.succeeded.map((it) => it.target),
    failed: result.failed
  };
}

function buildProgram(argv: string[]): Command {
  const jsonMode = isJsonMode(argv);
  const reporter = createConsoleReporter({ json: jsonMode });

  const program = new Command();
  program.name("ficpack").description("Collect fan fiction into projects and build browsable archives.");
  program.option("--json", "Emit machine-readable JSON (single object).");
  program.option("--project <dir>", "Project root directory (defaults to auto-detect via project.json).");

  program.configureOutput({
    writeOut: (str) => process.stdout.write(str),
    writeErr: (str) => {
      if (!jsonMode) process.stderr.write(str);
    }
  });

  program.showHelpAfterError(false);
  program.showSuggestionAfterError(false);
  program.exitOverride();

  const openCurrent = async (): Promise<{ project: Project; json: boolean }> => {
    const opts = program.opts<GlobalOpts>();
    const project = await resolveProjectRoot({ cwd: process.cwd(), projectOverride: opts.project });
    return { project, json: Boolean(opts.json) };
  };

  program
    .command("init")
    .description("Create a new project in an empty (or missing) directory.")
    .argument("<dir>", "Directory to initialise.")
    .action(async (dir: string) => {
      const project = await initProject(resolve(process.cwd(), dir), reporter);
      if (program.opts<GlobalOpts>().json) printJson(okJson("init", { rootDir: project.rootDir }));
    });

  program
    .command("status")
    .description("Show project version, target counts and subprojects.")
    .action(async () => {
      const { project, json } = await openCurrent();
      const version = await getProjectVersion(project);
      const targets = await listTargets(project);
      const missing = await listTargets(project, { excludeDownloaded: true });
      const marked = await listMarkedForUpdate(project);
      const subprojects = await readSubprojectPaths(project);
      const data = {
        rootDir: project.rootDir,
        version,
        targets: targets.length,
        missing: missing.length,
        markedForUpdate: marked.length,
        subprojects
      };
      if (json) {
        printJson(okJson("status", data));
        return;
      }
      process.stdout.write(`Project: ${project.rootDir} (version ${version})\n`);
      process.stdout.write(`Targets: ${targets.length} (${missing.length} not downloaded, ${marked.length} marked for update)\n`);
      process.stdout.write(`Subprojects: ${subprojects.length > 0 ? subprojects.join(", ") : "none"}\n`);
    });

  program
    .command("add")
    .description("Add a story URL or fanfiction.net id to the target list.")
    .argument("<reference>", "Story URL or id.")
    .action(async (reference: string) => {
      const { project, json } = await openCurrent();
      const result = await addTarget(project, reference);
      if (json) {
        printJson(okJson("add", { ...result }));
        return;
      }
      if (result.status === "already-present") process.stdout.write(`Target '${reference}' already defined, skipping.\n`);
      else process.stdout.write(`Added ${result.target.url}\n`);
    });

  program
    .command("add-from-file")
    .description("Add every story URL found in a text or HTML file.")
    .argument("<file>", "File to scan.")
    .action(async (file: string) => {
      const { project, json } = await openCurrent();
      const result = await addTargetsFromFile(project, resolve(process.cwd(), file));
      if (json) {
        printJson(okJson("add-from-file", { added: result.added, alreadyPresent: result.alreadyPresent, rejected: result.rejected }));
        return;
      }
      process.stdout.write(`Added ${result.added.length} targets (${result.alreadyPresent} already present).\n`);
    });

  program
    .command("targets")
    .description("List targets.")
    .option("--missing", "Only targets that are not downloaded yet.")
    .action(async (localOpts: { missing?: boolean }) => {
      const { project, json } = await openCurrent();
      const targets = await listTargets(project, { excludeDownloaded: Boolean(localOpts.missing) });
      if (json) {
        printJson(okJson("targets", { targets }));
        return;
      }
      for (const target of targets) process.stdout.write(`${target.url}\n`);
    });

  program
    .command("titles")
    .description("List the titles of all stories stored in this project.")
    .action(async () => {
      const { project, json } = await openCurrent();
      const index = await aggregateCatalog(project, { includeSubprojects: false, reporter });
      const titles = [...index.stories.values()]
        .map((entry) => ({ source: entry.target.source, id: entry.target.id, title: entry.metadata.title }))
        .sort((a, b) => a.source.localeCompare(b.source) || a.id.localeCompare(b.id, undefined, { numeric: true }));
      if (json) {
        printJson(okJson("titles", { titles }));
        return;
      }
      for (const it of titles) process.stdout.write(`${it.source}/${it.id} - ${it.title || "???"}\n`);
    });

  program
    .command("download")
    .description("Download targets that are not stored locally yet.")
    .option("--limit <n>", "Download at most n targets.", parseLimit)
    .action(async (localOpts: { limit?: number }) => {
      const { project, json } = await openCurrent();
      const retriever = await retrieverForProject(project);
      const result = await downloadMissingTargets(project, { retriever, reporter }, localOpts.limit);
      if (json) printJson(okJson("download", batchData(result)));
      else process.stdout.write(`Downloaded ${result.succeeded.length}, failed ${result.failed.length}.\n`);
      if (result.failed.length > 0) process.exitCode = 1;
    });

  program
    .command("mark-update")
    .description("Mark a downloaded story for re-download.")
    .argument("<reference>", "Story URL or id.")
    .option("--clear", "Remove the mark instead.")
    .action(async (reference: string, localOpts: { clear?: boolean }) => {
      const { project, json } = await openCurrent();
      const target = resolveReference(reference);
      const changed = await markForUpdate(project, target, !localOpts.clear);
      if (json) printJson(okJson("mark-update", { target, marked: !localOpts.clear, changed }));
      else if (!changed) process.stdout.write("Nothing to change.\n");
    });

  program
    .command("updates")
    .description("List stories marked for update.")
    .action(async () => {
      const { project, json } = await openCurrent();
      const marked = await listMarkedForUpdate(project);
      if (json) {
        printJson(okJson("updates", { targets: marked }));
        return;
      }
      for (const target of marked) process.stdout.write(`${target.url}\n`);
    });

  program
    .command("update")
    .description("Re-download stories marked for update.")
    .option("--limit <n>", "Update at most n targets.", parseLimit)
    .action(async (localOpts: { limit?: number }) => {
      const { project, json } = await openCurrent();
      const retriever = await retrieverForProject(project);
      const result = await updateMarkedTargets(project, { retriever, reporter }, localOpts.limit);
      if (json) printJson(okJson("update", batchData(result)));
      else process.stdout.write(`Updated ${result.succeeded.length}, failed ${result.failed.length}.\n`);
      if (result.failed.length > 0) process.exitCode = 1;
    });

  const alias = program.command("alias").description("Manage category aliases (aliases.json).");

  alias
    .command("add")
    .description("Treat category <from> as category <to>.")
    .argument("<from>", "Alias category.")
    .argument("<to>", "Canonical category.")
    .action(async (from: string, to: string) => {
      const { project, json } = await openCurrent();
      await addCategoryAlias(project, from, to);
      if (json) printJson(okJson("alias add", { from, to }));
    });

  alias
    .command("list")
    .description("Show category aliases.")
    .action(async () => {
      const { project, json } = await openCurrent();
      const table = await loadAliasTable(project);
      if (json) {
        printJson(okJson("alias list", { aliases: Object.fromEntries(table) }));
        return;
      }
      for (const [from, to] of table) process.stdout.write(`${from} -> ${to}\n`);
    });

  const subproject = program.command("subproject").description("Manage subprojects (subprojects.txt).");

  subproject
    .command("add")
    .description("Merge another project into this one's catalog.")
    .argument("<dir>", "Path of the subproject, relative to this project.")
    .action(async (dir: string) => {
      const { project, json } = await openCurrent();
      const added = await addSubproject(project, dir);
      if (json) printJson(okJson("subproject add", { path: dir, added }));
      else if (!added) process.stdout.write(`Subproject '${dir}' already listed.\n`);
    });

  subproject
    .command("list")
    .description("List direct subprojects.")
    .action(async () => {
      const { project, json } = await openCurrent();
      const paths = await readSubprojectPaths(project);
      if (json) {
        printJson(okJson("subproject list", { subprojects: paths }));
        return;
      }
      for (const path of paths) process.stdout.write(`${path}\n`);
    });

  const option = program.command("option").description("Read and write project options (project.json).");

  option
    .command("get")
    .argument("<category>")
    .argument("<key>")
    .action(async (category: string, key: string) => {
      const { project, json } = await openCurrent();
      const value = await getOption(project, category, key);
      if (json) printJson(okJson("option get", { category, key, value: value ?? null }));
      else process.stdout.write(`${value === undefined ? "(unset)" : JSON.stringify(value)}\n`);
    });

  option
    .command("set")
    .argument("<category>")
    .argument("<key>")
    .argument("<value>")
    .action(async (category: string, key: string, value: string) => {
      const { project, json } = await openCurrent();
      await setOption(project, category, key, value);
      if (json) printJson(okJson("option set", { category, key, value }));
    });

  program
    .command("catalog")
    .description("Aggregate the project tree and summarise the catalog.")
    .option("--no-subprojects", "Ignore subprojects.")
    .action(async (localOpts: { subprojects: boolean }) => {
      const { project, json } = await openCurrent();
      const index = await aggregateCatalog(project, { includeSubprojects: localOpts.subprojects, reporter });
      const summary = summarizeCatalog(index);
      const categories = [...index.byCategory].map(([name, targets]) => ({ name, stories: targets.length }));
      if (json) {
        printJson(okJson("catalog", { summary, categories }));
        return;
      }
      process.stdout.write(`Stories: ${summary.stories}  Categories: ${summary.categories}  Authors: ${summary.authors}\n`);
      for (const it of categories) {
        if (it.name !== ALL_CATEGORY) process.stdout.write(`  ${it.name}: ${it.stories}\n`);
      }
    });

  program
    .command("epub")
    .description("Convert a downloaded story into an e-book.")
    .argument("<reference>", "Story URL or id.")
    .argument("<out>", "Output file.")
    .action(async (reference: string, out: string) => {
      const { project, json } = await openCurrent();
      const converter = createEbookConvertConverter(await getStringOption(project, "epub", "command", "ebook-convert"));
      const metadata = await convertTargetToBook(project, reference, resolve(process.cwd(), out), { converter });
      if (json) printJson(okJson("epub", { out, metadata }));
    });

  program
    .command("build")
    .description("Build the archive file from the project tree.")
    .argument("<out>", "Archive file to write.")
    .option("--no-subprojects", "Ignore subprojects.")
    .action(async (out: string, localOpts: { subprojects: boolean }) => {
      const { project, json } = await openCurrent();
      const packager = createZimwriterfsPackager(await getStringOption(project, "build", "command", "zimwriterfs"));
      const report = await buildArchive(project, resolve(process.cwd(), out), {
        packager,
        reporter,
        includeSubprojects: localOpts.subprojects
      });
      if (json) printJson(okJson("build", { ...report }));
    });

  return program;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const jsonMode = isJsonMode(argv);
  const program = buildProgram(argv);

  try {
    await program.parseAsync(argv, { from: "user" });
    return Number(process.exitCode ?? 0);
  } catch (err: unknown) {
    const command = detectCommandName(argv);
    if (err instanceof FicpackError) {
      if (jsonMode) {
        printJson(errJson(command, err));
      } else {
        process.stderr.write(`${err.message}\n`);
      }
      return err.exitCode;
    }

    if (err instanceof CommanderError) {
      if (err.code === "commander.helpDisplayed" || err.code === "commander.help" || err.code === "commander.version") {
        return 0;
      }
      if (jsonMode) {
        printJson(errJson(command, err));
        return err.exitCode;
      }
      process.stderr.write(`${err.message}\n`);
      return err.exitCode;
    }

    const message = err instanceof Error ? err.message : String(err);
    if (jsonMode) {
      printJson(errJson(command, message));
    } else {
      process.stderr.write(`${message}\n`);
    }
    return 1;
  }
}

const entryPath = process.argv[1] ? resolve(process.argv[1]) : null;
if (entryPath && import.meta.url === pathToFileURL(entryPath).href) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.stack ?? err.message : String(err);
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    });
}

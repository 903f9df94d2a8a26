#!/usr/bin/env node

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  loadConfig,
  getConfigDir,
  getConfigPath,
  configExists,
  defaultArtifactPath,
  type RegistryConfig,
} from "./config.js";
import { runDoctor } from "./doctor.js";
import { errorMessage, type ArtifactWriteError } from "./errors.js";
import { isValidUuid } from "./identity/resolver.js";
import type { Project, ProjectFilter, SortField } from "./projects/types.js";
import { ProjectRegistry } from "./registry.js";
import { initLogger } from "./util/logger.js";

function printUsage(): void {
  console.log(`
projreg: registry of local project directories

Usage:
  projreg init                          Create the config file
  projreg register [dir] [options]      Register or refresh a directory (default: .)
      --name <name>                       Display name
      --tag <tag>                         Add a tag (repeatable)
      --skip-ai                           Skip AI suggestions
      --dry-run                           Show the result without writing anything
  projreg list [options]                List projects
      --favorites  --all  --tag <tag>  --any  --search <text>
      --sort name|lastOpened|openCount|dateAdded|lastUpdated  --desc  --json
  projreg show <project>                Show one project
  projreg rename <project> <name>       Change the display name
  projreg notes <project> [text]        Set or clear notes
  projreg favorite <project>            Toggle favorite
  projreg enrich <project>              Re-run AI suggestions for a project
  projreg archive <project>             Hide a project (soft delete)
  projreg restore <project>             Bring an archived project back
  projreg purge <project> --yes         Delete a project for good
  projreg open <project> [--tool <name>]  Open in an editor or terminal
  projreg tags                          List the tag catalog
  projreg tags set <name> [--color <c>] [--icon <i>]
  projreg tools                         List launchers found on this machine
  projreg stats                         Usage summary
  projreg sync [--check]                Rewrite (or compare) the editor's project list
  projreg doctor                        Check the setup
  projreg help                          Show this help

<project> is a project UUID or a registered directory.

Options:
  --config <path>   Path to config file (default: ~/.projreg/config.json)
`);
}

// ---- argument parsing ----

const VALUE_OPTIONS = new Set(["--config", "--name", "--tag", "--search", "--sort", "--tool", "--color", "--icon"]);

interface ParsedArgs {
  positionals: string[];
  values: Map<string, string[]>;
  flags: Set<string>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], values: new Map(), flags: new Set() };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (VALUE_OPTIONS.has(arg)) {
      const value = argv[++i];
      if (value === undefined) throw new Error(`${arg} needs a value`);
      parsed.values.set(arg, [...(parsed.values.get(arg) ?? []), value]);
    } else if (arg.startsWith("--")) {
      parsed.flags.add(arg);
    } else {
      parsed.positionals.push(arg);
    }
  }
  return parsed;
}

function option(args: ParsedArgs, name: string): string | undefined {
  return args.values.get(name)?.at(-1);
}

function required(value: string | undefined, usage: string): string {
  if (value === undefined) throw new Error(`Usage: ${usage}`);
  return value;
}

const SORT_FIELDS: readonly SortField[] = ["name", "lastOpened", "openCount", "dateAdded", "lastUpdated"];

function parseSort(value: string | undefined): SortField | undefined {
  if (value === undefined) return undefined;
  const field = SORT_FIELDS.find((f) => f === value);
  if (!field) throw new Error(`Unknown sort field '${value}'. Use one of: ${SORT_FIELDS.join(", ")}`);
  return field;
}

// ---- output ----

function reportArtifact(error: ArtifactWriteError | undefined): void {
  if (error) console.error(`Warning: ${error.message}`);
}

function formatProject(p: Project): string {
  const lines = [
    `${p.favorite ? "★ " : ""}${p.name}${p.status === "archived" ? " (archived)" : ""}`,
    `  UUID:        ${p.uuid}`,
    `  Path:        ${p.rootPath}`,
    `  Tags:        ${p.tags.length > 0 ? p.tags.join(", ") : "-"}`,
  ];
  if (p.aiAppName) lines.push(`  App name:    ${p.aiAppName}`);
  if (p.description) lines.push(`  Description: ${p.description}`);
  if (p.notes) lines.push(`  Notes:       ${p.notes}`);
  lines.push(`  Opened:      ${p.openCount} times, last ${p.lastOpened ?? "never"}`);
  lines.push(`  Added:       ${p.dateAdded ?? "-"}`);
  return lines.join("\n");
}

async function resolveProject(registry: ProjectRegistry, ref: string): Promise<Project> {
  const project = isValidUuid(ref) ? await registry.get(ref) : await registry.getByPath(ref);
  if (!project) throw new Error(`No project matches '${ref}'`);
  return project;
}

// ---- commands ----

function cmdInit(): void {
  mkdirSync(getConfigDir(), { recursive: true });

  if (configExists()) {
    console.log(`Config already exists at ${getConfigPath()}`);
    return;
  }

  const exampleConfig = {
    store: {
      path: join(getConfigDir(), "registry.db"),
    },
    artifact: {
      path: defaultArtifactPath(),
    },
    enrichment: {
      enabled: true,
      model: "gpt-4o-mini",
    },
    log: {
      level: "warn",
    },
  };

  writeFileSync(getConfigPath(), JSON.stringify(exampleConfig, null, 2) + "\n");
  console.log(`Created config at ${getConfigPath()}`);
  console.log("\nNext steps:");
  console.log("1. Export OPENAI_API_KEY to get name, description and tag suggestions");
  console.log("2. Run 'projreg register <dir>' for each project");
}

async function cmdRegister(registry: ProjectRegistry, args: ParsedArgs): Promise<void> {
  const dir = args.positionals[1] ?? ".";
  const result = await registry.register(dir, {
    name: option(args, "--name"),
    tags: args.values.get("--tag"),
    skipEnrichment: args.flags.has("--skip-ai"),
    dryRun: args.flags.has("--dry-run"),
  });

  const verb = result.dryRun ? "Would register" : result.created ? "Registered" : "Updated";
  console.log(`${verb}:\n${formatProject(result.project)}`);
  if (!result.identity.persisted && !result.dryRun) {
    console.error("Warning: could not write the identity file; the project will get a new UUID next time.");
  }
  if (result.enrichment.kind === "none" && result.enrichment.reason === "failed") {
    console.error(`Warning: suggestions unavailable: ${result.enrichment.error?.message ?? "unknown error"}`);
  }
  reportArtifact(result.artifactError);
}

async function cmdList(registry: ProjectRegistry, args: ParsedArgs): Promise<void> {
  const filter: ProjectFilter = {
    favoritesOnly: args.flags.has("--favorites"),
    enabledOnly: !args.flags.has("--all"),
    tags: args.values.get("--tag"),
    tagMode: args.flags.has("--any") ? "or" : "and",
    text: option(args, "--search"),
    sortBy: parseSort(option(args, "--sort")),
    sortOrder: args.flags.has("--desc") ? "desc" : "asc",
  };
  const projects = await registry.list(filter);

  if (args.flags.has("--json")) {
    console.log(JSON.stringify(projects, null, 2));
    return;
  }
  if (projects.length === 0) {
    console.log("No projects found.");
    return;
  }
  console.log(`\n  Projects (${projects.length})\n`);
  for (const p of projects) {
    const marker = p.favorite ? "★" : p.status === "archived" ? "-" : " ";
    const tags = p.tags.length > 0 ? `  [${p.tags.join(", ")}]` : "";
    console.log(`  ${marker} ${p.name}${tags}`);
    console.log(`      ${p.rootPath}`);
  }
  console.log();
}

async function cmdTags(registry: ProjectRegistry, args: ParsedArgs): Promise<void> {
  if (args.positionals[1] === "set") {
    const name = required(args.positionals[2], "projreg tags set <name> [--color <color>] [--icon <icon>]");
    const { value, artifactError } = await registry.upsertTag({
      name,
      color: option(args, "--color"),
      icon: option(args, "--icon"),
    });
    console.log(`Saved tag ${value.name} (${value.color}${value.icon ? `, ${value.icon}` : ""})`);
    reportArtifact(artifactError);
    return;
  }

  const tags = await registry.listTags();
  console.log(`\n  Tags (${tags.length})\n`);
  for (const tag of tags) {
    console.log(`  ${tag.icon ?? " "} ${tag.name}  ${tag.color}`);
  }
  console.log();
}

async function cmdStats(registry: ProjectRegistry): Promise<void> {
  const stats = await registry.stats();
  console.log(`\n  Projects:  ${stats.totalProjects}`);
  console.log(`  Favorites: ${stats.favorites}`);
  console.log(`  Archived:  ${stats.archived}`);
  if (stats.topTags.length > 0) {
    console.log("\n  Top tags:");
    for (const { tag, count } of stats.topTags) console.log(`    ${tag} (${count})`);
  }
  if (stats.mostOpened.length > 0) {
    console.log("\n  Most opened:");
    for (const p of stats.mostOpened) console.log(`    ${p.name} (${p.openCount})`);
  }
  console.log();
}

function cmdSync(registry: ProjectRegistry, args: ParsedArgs): void {
  if (args.flags.has("--check")) {
    const report = registry.checkArtifact();
    if (!report) {
      console.log("Synchronization is disabled.");
      return;
    }
    if (report.inSync) {
      console.log(`${report.path} is in sync.`);
      return;
    }
    console.log(`${report.path} is out of date${report.error ? `: ${report.error}` : ""}`);
    for (const path of report.missing) console.log(`  + ${path}`);
    for (const path of report.extra) console.log(`  - ${path}`);
    process.exitCode = 1;
    return;
  }

  const result = registry.regenerateArtifact();
  if (!result) {
    console.log("Synchronization is disabled.");
    return;
  }
  console.log(`Wrote ${result.entries} projects to ${result.path}`);
}

async function cmdEnrich(registry: ProjectRegistry, args: ParsedArgs): Promise<void> {
  const project = await resolveProject(registry, required(args.positionals[1], "projreg enrich <project>"));
  await registry.enrichInBackground(project.uuid, (updated, result) => {
    if (result.kind === "enriched") {
      console.log(`Enriched:\n${formatProject(updated)}`);
    } else {
      console.log(`No suggestions (${result.reason})${result.error ? `: ${result.error.message}` : ""}`);
    }
  });
  await registry.idle();
}

async function run(args: ParsedArgs, config: RegistryConfig): Promise<void> {
  const registry = await ProjectRegistry.open(config);
  const command = args.positionals[0];
  const ref = (usage: string) => resolveProject(registry, required(args.positionals[1], usage));

  switch (command) {
    case "register":
      return cmdRegister(registry, args);

    case "list":
      return cmdList(registry, args);

    case "show": {
      const project = await ref("projreg show <project>");
      console.log(formatProject(project));
      const configs = await registry.listToolConfigs(project.uuid);
      for (const c of configs) console.log(`  Tool config: ${c.toolName} ${JSON.stringify(c.config)}`);
      return;
    }

    case "rename": {
      const project = await ref("projreg rename <project> <name>");
      const name = required(args.positionals[2], "projreg rename <project> <name>");
      const { value, artifactError } = await registry.update(project.uuid, { name });
      console.log(`Renamed to ${value.name}`);
      reportArtifact(artifactError);
      return;
    }

    case "notes": {
      const project = await ref("projreg notes <project> [text]");
      const text = args.positionals.slice(2).join(" ");
      const { artifactError } = await registry.updateNotes(project.uuid, text || null);
      console.log(text ? "Notes saved" : "Notes cleared");
      reportArtifact(artifactError);
      return;
    }

    case "favorite": {
      const project = await ref("projreg favorite <project>");
      const { value, artifactError } = await registry.toggleFavorite(project.uuid);
      console.log(`${project.name} ${value ? "is now a favorite" : "is no longer a favorite"}`);
      reportArtifact(artifactError);
      return;
    }

    case "enrich":
      return cmdEnrich(registry, args);

    case "archive": {
      const project = await ref("projreg archive <project>");
      const { artifactError } = await registry.archive(project.uuid);
      console.log(`Archived ${project.name}`);
      reportArtifact(artifactError);
      return;
    }

    case "restore": {
      const project = await ref("projreg restore <project>");
      const { artifactError } = await registry.restore(project.uuid);
      console.log(`Restored ${project.name}`);
      reportArtifact(artifactError);
      return;
    }

    case "purge": {
      const project = await ref("projreg purge <project> --yes");
      if (!args.flags.has("--yes")) {
        throw new Error(`Purging deletes ${project.name} for good. Re-run with --yes to confirm.`);
      }
      const { artifactError } = await registry.purge(project.uuid);
      console.log(`Purged ${project.name}`);
      reportArtifact(artifactError);
      return;
    }

    case "open": {
      const project = await ref("projreg open <project> [--tool <name>]");
      const result = await registry.openProject(project.uuid, option(args, "--tool"));
      if (!result.launched) {
        throw new Error(`Could not open ${project.name}${result.tool ? ` with ${result.tool}` : ""}`);
      }
      console.log(`Opened ${project.name} with ${result.tool ?? "default tool"}`);
      reportArtifact(result.artifactError);
      return;
    }

    case "tags":
      return cmdTags(registry, args);

    case "tools": {
      for (const tool of registry.tools.list()) {
        console.log(`  ${tool.isAvailable() ? "✓" : " "} ${tool.icon} ${tool.name}  ${tool.displayName}`);
      }
      return;
    }

    case "stats":
      return cmdStats(registry);

    case "sync":
      return cmdSync(registry, args);

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

// CLI entry point
let args: ParsedArgs;
try {
  args = parseArgs(process.argv.slice(2));
} catch (e) {
  console.error("Error:", errorMessage(e));
  process.exit(1);
}
const command = args.positionals[0];
const configPath = option(args, "--config");

switch (command) {
  case "init":
    cmdInit();
    break;

  case "doctor":
    runDoctor(configPath);
    break;

  case "help":
  case undefined:
    printUsage();
    break;

  default: {
    if (args.flags.has("--help")) {
      printUsage();
      break;
    }
    Promise.resolve()
      .then(() => {
        const config = loadConfig(configPath);
        initLogger(config.log.level);
        return run(args, config);
      })
      .catch((e) => {
        console.error("Error:", errorMessage(e));
        process.exit(1);
      });
  }
}

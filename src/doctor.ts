import { existsSync, statSync } from "node:fs";
import { dirname } from "node:path";
import { loadConfig, getConfigPath, type RegistryConfig } from "./config.js";
import { ArtifactSynchronizer } from "./artifact/synchronizer.js";
import { errorMessage } from "./errors.js";
import { createDefaultToolRegistry, type ToolRegistry } from "./integrations/registry.js";
import { ProjectStore } from "./projects/store.js";
import { SchemaStore } from "./store/database.js";

export interface CheckResult {
  name: string;
  status: "pass" | "warn" | "fail";
  message: string;
}

const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";

function icon(status: CheckResult["status"]): string {
  switch (status) {
    case "pass":
      return `${GREEN}✓${RESET}`;
    case "warn":
      return `${YELLOW}⚠${RESET}`;
    case "fail":
      return `${RED}✗${RESET}`;
  }
}

function checkConfig(configPath?: string): { check: CheckResult; config: RegistryConfig | null } {
  const path = configPath ?? getConfigPath();
  if (!configPath && !existsSync(path)) {
    return {
      check: { name: "Config file", status: "warn", message: `Not found at ${path}, using defaults. Run 'projreg init'.` },
      config: loadConfig(),
    };
  }
  try {
    const config = loadConfig(configPath);
    return { check: { name: "Config file", status: "pass", message: path }, config };
  } catch (e) {
    return { check: { name: "Config file", status: "fail", message: errorMessage(e) }, config: null };
  }
}

function checkDatabase(config: RegistryConfig): CheckResult {
  const dbPath = config.store.path;
  if (!existsSync(dbPath)) {
    return { name: "Database", status: "warn", message: "Not created yet (created on first use)" };
  }
  const sizeMB = (statSync(dbPath).size / 1024 / 1024).toFixed(1);
  try {
    const result = new SchemaStore(config.store).read((db) => db.pragma("integrity_check", { simple: true }));
    if (result === "ok") {
      return { name: "Database", status: "pass", message: `${sizeMB} MB, integrity OK` };
    }
    return { name: "Database", status: "fail", message: `Integrity check failed: ${String(result).slice(0, 200)}` };
  } catch (e) {
    return { name: "Database", status: "fail", message: errorMessage(e) };
  }
}

function checkArtifact(config: RegistryConfig): CheckResult {
  const path = config.artifact.path;
  if (!path) {
    return { name: "Project list", status: "warn", message: "Synchronization disabled" };
  }
  if (!existsSync(dirname(path))) {
    return { name: "Project list", status: "fail", message: `Directory not found: ${dirname(path)}` };
  }
  if (!existsSync(config.store.path)) {
    return { name: "Project list", status: "warn", message: `${path} (no database to compare against)` };
  }

  try {
    const report = new ArtifactSynchronizer(new ProjectStore(new SchemaStore(config.store)), path).checkDrift();
    if (report.error) {
      return { name: "Project list", status: "fail", message: `${path}: ${report.error}` };
    }
    if (!report.exists) {
      return { name: "Project list", status: "warn", message: `Not written yet. Run 'projreg sync'.` };
    }
    if (!report.inSync) {
      return {
        name: "Project list",
        status: "warn",
        message: `Out of date (${report.missing.length} missing, ${report.extra.length} stale). Run 'projreg sync'.`,
      };
    }
    return { name: "Project list", status: "pass", message: `${path}, in sync` };
  } catch (e) {
    return { name: "Project list", status: "fail", message: errorMessage(e) };
  }
}

function checkEnrichment(config: RegistryConfig): CheckResult {
  if (!config.enrichment.enabled) {
    return { name: "Enrichment", status: "pass", message: "Disabled" };
  }
  if (!config.enrichment.apiKey) {
    return {
      name: "Enrichment",
      status: "warn",
      message: "OPENAI_API_KEY not set. Projects are registered without suggestions.",
    };
  }
  return { name: "Enrichment", status: "pass", message: `Model ${config.enrichment.model}` };
}

function checkTools(tools: ToolRegistry): CheckResult {
  const available = tools.available();
  if (available.length === 0) {
    return { name: "Launchers", status: "warn", message: "No editor or terminal found in PATH" };
  }
  return { name: "Launchers", status: "pass", message: available.map((t) => t.name).join(", ") };
}

export function collectChecks(configPath?: string, tools: ToolRegistry = createDefaultToolRegistry()): CheckResult[] {
  const { check, config } = checkConfig(configPath);
  if (!config) return [check];
  return [check, checkDatabase(config), checkArtifact(config), checkEnrichment(config), checkTools(tools)];
}

export function runDoctor(configPath?: string): void {
  console.log(`\n${BOLD}projreg doctor${RESET}\n`);

  const checks = collectChecks(configPath);
  const maxNameLen = Math.max(...checks.map((c) => c.name.length));

  for (const check of checks) {
    const pad = " ".repeat(maxNameLen - check.name.length);
    console.log(`  ${icon(check.status)} ${check.name}${pad}  ${check.message}`);
  }

  const pass = checks.filter((c) => c.status === "pass").length;
  const warn = checks.filter((c) => c.status === "warn").length;
  const fail = checks.filter((c) => c.status === "fail").length;

  console.log(`\n  ${pass} passed, ${warn} warnings, ${fail} failures\n`);

  if (fail > 0) {
    process.exit(1);
  }
}

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("node:fs", () => ({
  readFileSync: vi.fn(),
  existsSync: vi.fn(),
}));

vi.mock("node:os", () => ({
  homedir: vi.fn(() => "/mock/home"),
}));

import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { loadConfig, resolveConfig, defaultArtifactPath, getConfigDir, getConfigPath, configExists } from "./config.js";
import { ConfigError } from "./errors.js";

const mockedExistsSync = vi.mocked(existsSync);
const mockedReadFileSync = vi.mocked(readFileSync);

function fileWith(contents: unknown): void {
  mockedExistsSync.mockReturnValue(true);
  mockedReadFileSync.mockReturnValue(JSON.stringify(contents));
}

beforeEach(() => {
  vi.resetAllMocks();
  vi.mocked(homedir).mockReturnValue("/mock/home");
});

// ---------------------------------------------------------------------------
// paths
// ---------------------------------------------------------------------------
describe("config paths", () => {
  it("lives under ~/.projreg", () => {
    expect(getConfigDir()).toBe("/mock/home/.projreg");
    expect(getConfigPath()).toBe("/mock/home/.projreg/config.json");
  });

  it("configExists checks the config file", () => {
    mockedExistsSync.mockReturnValue(true);
    expect(configExists()).toBe(true);
    expect(mockedExistsSync).toHaveBeenCalledWith("/mock/home/.projreg/config.json");
  });
});

describe("defaultArtifactPath", () => {
  const tail = "Cursor/User/globalStorage/alefragnani.project-manager/projects.json";

  it("uses XDG_CONFIG_HOME on linux when set", () => {
    expect(defaultArtifactPath("linux", { XDG_CONFIG_HOME: "/xdg" })).toBe(`/xdg/${tail}`);
  });

  it("falls back to ~/.config on linux", () => {
    expect(defaultArtifactPath("linux", {})).toBe(`/mock/home/.config/${tail}`);
  });

  it("uses Application Support on macOS", () => {
    expect(defaultArtifactPath("darwin", {})).toBe(`/mock/home/Library/Application Support/${tail}`);
  });
});

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------
describe("loadConfig", () => {
  // 1. No file at the default location means defaults
  it("returns defaults when the default config file is missing", () => {
    mockedExistsSync.mockReturnValue(false);
    const config = loadConfig(undefined, {});

    expect(config.store.path).toBe("/mock/home/.projreg/registry.db");
    expect(config.store.busyTimeoutMs).toBe(100);
    expect(config.identity.sentinelName).toBe(".projectid");
    expect(config.enrichment.enabled).toBe(true);
    expect(config.enrichment.apiKey).toBeUndefined();
    expect(config.enrichment.maxFiles).toBe(30);
    expect(config.enrichment.maxFileChars).toBe(10_000);
    expect(config.enrichment.importantExtensions[0]).toBe(".py");
    expect(config.log.level).toBe("warn");
  });

  // 2. An explicit path that does not exist is an error
  it("throws when an explicit config path is missing", () => {
    mockedExistsSync.mockReturnValue(false);
    expect(() => loadConfig("/etc/projreg.json", {})).toThrow("Config file not found at /etc/projreg.json");
  });

  // 3. Sections merge over defaults key by key
  it("merges a partial file over the defaults", () => {
    fileWith({ store: { path: "/data/reg.db" }, enrichment: { maxFiles: 5, model: "test-model" } });
    const config = loadConfig("/cfg.json", {});

    expect(config.store).toEqual({ path: "/data/reg.db", busyTimeoutMs: 100 });
    expect(config.enrichment.maxFiles).toBe(5);
    expect(config.enrichment.model).toBe("test-model");
    expect(config.enrichment.timeoutMs).toBe(30_000);
  });

  it("accepts a null artifact path to disable synchronization", () => {
    fileWith({ artifact: { path: null } });
    expect(loadConfig("/cfg.json", {}).artifact.path).toBeNull();
  });

  // 4. Malformed JSON
  it("wraps JSON syntax errors in ConfigError", () => {
    mockedExistsSync.mockReturnValue(true);
    mockedReadFileSync.mockReturnValue("{ not json");
    expect(() => loadConfig("/cfg.json", {})).toThrow(ConfigError);
    expect(() => loadConfig("/cfg.json", {})).toThrow(/^Failed to parse config at \/cfg\.json/);
  });

  // 5. Schema violations name the offending key
  it("names the offending key on invalid values", () => {
    fileWith({ enrichment: { maxFiles: -1 } });
    expect(() => loadConfig("/cfg.json", {})).toThrow(/Invalid config at \/cfg\.json: 'enrichment\.maxFiles'/);
  });

  it("rejects a sentinel name containing a path separator", () => {
    fileWith({ identity: { sentinelName: "sub/.projectid" } });
    expect(() => loadConfig("/cfg.json", {})).toThrow("'identity.sentinelName' must be a bare file name");
  });

  it("rejects an unknown log level", () => {
    fileWith({ log: { level: "loud" } });
    expect(() => loadConfig("/cfg.json", {})).toThrow(/'log\.level'/);
  });
});

// ---------------------------------------------------------------------------
// environment overrides
// ---------------------------------------------------------------------------
describe("resolveConfig environment overrides", () => {
  it("applies PROJREG_* and OPENAI_API_KEY over the file", () => {
    const config = resolveConfig(
      { store: { path: "/from/file.db" }, log: { level: "info" } },
      {
        PROJREG_DB_PATH: "/from/env.db",
        PROJREG_ARTIFACT_PATH: "/tmp/projects.json",
        OPENAI_API_KEY: "test-secret",
        PROJREG_LOG_LEVEL: "debug",
      },
    );

    expect(config.store.path).toBe("/from/env.db");
    expect(config.artifact.path).toBe("/tmp/projects.json");
    expect(config.enrichment.apiKey).toBe("test-secret");
    expect(config.log.level).toBe("debug");
  });

  it("PROJREG_ARTIFACT_PATH=none disables the artifact", () => {
    expect(resolveConfig({}, { PROJREG_ARTIFACT_PATH: "none" }).artifact.path).toBeNull();
  });
});

import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

export interface StoreConfig {
  /** SQLite database file */
  path: string;
  /** How long SQLite waits on a locked database before reporting busy */
  busyTimeoutMs: number;
}

export interface IdentityConfig {
  /** Name of the sentinel file written at each project root */
  sentinelName: string;
}

export interface ArtifactConfig {
  /** Consumer file rebuilt after every mutation; null disables synchronization */
  path: string | null;
}

export interface EnrichmentConfig {
  enabled: boolean;
  apiKey?: string;
  apiUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  /** Number of files sampled per project */
  maxFiles: number;
  /** Per-file excerpt ceiling, in characters */
  maxFileChars: number;
  /** Ceiling for all excerpts combined in one request */
  maxPayloadChars: number;
  /** Files larger than this are never read */
  maxFileBytes: number;
  /** Ranked: earlier entries are sampled first */
  importantExtensions: string[];
  excludeDirs: string[];
}

export interface LogConfig {
  level: string;
}

export interface RegistryConfig {
  store: StoreConfig;
  identity: IdentityConfig;
  artifact: ArtifactConfig;
  enrichment: EnrichmentConfig;
  log: LogConfig;
}

const CONFIG_DIR = join(homedir(), ".projreg");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}

export function configExists(): boolean {
  return existsSync(CONFIG_PATH);
}

/** Where the editor's project-manager extension reads its project list from. */
export function defaultArtifactPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const tail = ["Cursor", "User", "globalStorage", "alefragnani.project-manager", "projects.json"];
  if (platform === "win32") {
    return join(env.APPDATA ?? join(homedir(), "AppData", "Roaming"), ...tail);
  }
  if (platform === "darwin") {
    return join(homedir(), "Library", "Application Support", ...tail);
  }
  return join(env.XDG_CONFIG_HOME ?? join(homedir(), ".config"), ...tail);
}

export function defaultConfig(): RegistryConfig {
  return {
    store: {
      path: join(CONFIG_DIR, "registry.db"),
      busyTimeoutMs: 100,
    },
    identity: {
      sentinelName: ".projectid",
    },
    artifact: {
      path: defaultArtifactPath(),
    },
    enrichment: {
      enabled: true,
      apiUrl: "https://api.openai.com/v1/chat/completions",
      model: "gpt-4o-mini",
      temperature: 1,
      timeoutMs: 30_000,
      maxFiles: 30,
      maxFileChars: 10_000,
      maxPayloadChars: 30_000,
      maxFileBytes: 1_000_000,
      importantExtensions: [
        ".py", ".js", ".ts", ".jsx", ".tsx", ".java", ".go",
        ".rs", ".c", ".cpp", ".h", ".cs", ".php", ".rb",
        ".md", ".html", ".css", ".json", ".yml", ".yaml",
        ".toml", ".ini", ".conf", ".vue", ".svelte",
      ],
      excludeDirs: [
        "node_modules", "venv", ".venv", ".git", "__pycache__",
        "dist", "build", "target", ".docs", ".vscode",
        ".idea", "vendor", "cache", ".next",
      ],
    },
    log: {
      level: "warn",
    },
  };
}

const positiveInt = z.number().int().positive();

const configFileSchema = z.object({
  store: z
    .object({
      path: z.string().min(1),
      busyTimeoutMs: z.number().int().nonnegative(),
    })
    .partial()
    .optional(),
  identity: z
    .object({
      sentinelName: z
        .string()
        .min(1)
        .refine((name) => !/[\\/]/.test(name), "must be a bare file name"),
    })
    .partial()
    .optional(),
  artifact: z
    .object({
      path: z.string().min(1).nullable(),
    })
    .partial()
    .optional(),
  enrichment: z
    .object({
      enabled: z.boolean(),
      apiKey: z.string(),
      apiUrl: z.string().url(),
      model: z.string().min(1),
      temperature: z.number().min(0).max(2),
      timeoutMs: positiveInt,
      maxFiles: positiveInt,
      maxFileChars: positiveInt,
      maxPayloadChars: positiveInt,
      maxFileBytes: positiveInt,
      importantExtensions: z.array(z.string().startsWith(".")),
      excludeDirs: z.array(z.string().min(1)),
    })
    .partial()
    .optional(),
  log: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]),
    })
    .partial()
    .optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Overlay a parsed config file and the environment onto the defaults. */
export function resolveConfig(file: ConfigFile, env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const defaults = defaultConfig();
  const config: RegistryConfig = {
    store: { ...defaults.store, ...file.store },
    identity: { ...defaults.identity, ...file.identity },
    artifact: { ...defaults.artifact, ...file.artifact },
    enrichment: { ...defaults.enrichment, ...file.enrichment },
    log: { ...defaults.log, ...file.log },
  };

  if (env.PROJREG_DB_PATH) config.store.path = env.PROJREG_DB_PATH;
  if (env.PROJREG_ARTIFACT_PATH) {
    config.artifact.path = env.PROJREG_ARTIFACT_PATH === "none" ? null : env.PROJREG_ARTIFACT_PATH;
  }
  if (env.OPENAI_API_KEY) config.enrichment.apiKey = env.OPENAI_API_KEY;
  if (env.PROJREG_LOG_LEVEL) config.log.level = env.PROJREG_LOG_LEVEL;

  return config;
}

/**
 * Load configuration from disk. A missing file is not an error: every
 * setting has a default.
 */
export function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const configPath = path ?? CONFIG_PATH;

  if (!existsSync(configPath)) {
    if (path) {
      throw new ConfigError(`Config file not found at ${configPath}`);
    }
    return resolveConfig({}, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    throw new ConfigError(`Failed to parse config at ${configPath}: ${errorMessage(e)}`, e);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join(".") : "(root)";
    throw new ConfigError(`Invalid config at ${configPath}: '${key}' ${issue?.message ?? "is invalid"}`);
  }

  return resolveConfig(parsed.data, env);
}

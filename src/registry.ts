/**
 * ProjectRegistry -- the operations front ends call.
 *
 * Wires identity resolution, the project store, enrichment and the artifact
 * together. Store calls retry on lock contention; every mutation is followed
 * by an artifact rebuild whose failure is returned to the caller instead of
 * undoing the mutation.
 */

import { statSync } from "node:fs";
import { basename, resolve } from "node:path";
import type { RegistryConfig } from "./config.js";
import { ArtifactSynchronizer, type DriftReport, type RegenerateResult } from "./artifact/synchronizer.js";
import { EnrichmentPipeline, mergeEnrichedTags, type EnrichmentResult } from "./enrichment/pipeline.js";
import { EnrichmentQueue } from "./enrichment/queue.js";
import { readReadmeSummary } from "./enrichment/readme.js";
import { ArtifactWriteError, InvalidDirectoryError, ProjectNotFoundError } from "./errors.js";
import { IdentityResolver, type ResolvedIdentity } from "./identity/resolver.js";
import { createDefaultToolRegistry, type ToolRegistry } from "./integrations/registry.js";
import { statusOf } from "./projects/lifecycle.js";
import { ProjectStore } from "./projects/store.js";
import type { Project, ProjectFields, ProjectFilter, ProjectStats } from "./projects/types.js";
import { SchemaStore, type MigrationReport } from "./store/database.js";
import { TagRegistry, seedStarterTags } from "./tags/registry.js";
import { normalizeTags } from "./tags/normalize.js";
import type { Tag, UpsertTagInput } from "./tags/types.js";
import { ToolConfigStore, type ToolConfig, type ToolSettings } from "./tool-configs/store.js";
import { getLogger } from "./util/logger.js";
import { withBusyRetry } from "./util/retry.js";

const log = getLogger("registry");

export interface RegisterOptions {
  /** Display name; new projects default to the directory name */
  name?: string;
  tags?: string[];
  skipEnrichment?: boolean;
  /** Resolve and enrich, but write nothing: no sentinel, no row, no artifact */
  dryRun?: boolean;
}

export interface RegisterResult {
  project: Project;
  created: boolean;
  identity: ResolvedIdentity;
  enrichment: EnrichmentResult;
  dryRun: boolean;
  artifactError?: ArtifactWriteError;
}

/** Outcome of a mutation plus the artifact rebuild that followed it. */
export interface Synced<T> {
  value: T;
  artifactError?: ArtifactWriteError;
}

export interface OpenResult {
  launched: boolean;
  tool?: string;
  project: Project;
  artifactError?: ArtifactWriteError;
}

export interface RegistryDeps {
  pipeline?: EnrichmentPipeline;
  tools?: ToolRegistry;
}

export class ProjectRegistry {
  readonly projects: ProjectStore;
  readonly tags: TagRegistry;
  readonly toolConfigs: ToolConfigStore;
  readonly tools: ToolRegistry;
  private identity: IdentityResolver;
  private pipeline: EnrichmentPipeline;
  private artifact: ArtifactSynchronizer | null;
  private queue: EnrichmentQueue | null = null;
  private listeners = new Map<string, Array<(project: Project, result: EnrichmentResult) => void>>();

  private constructor(
    private config: RegistryConfig,
    private store: SchemaStore,
    readonly migration: MigrationReport,
    deps: RegistryDeps,
  ) {
    this.projects = new ProjectStore(store);
    this.tags = new TagRegistry(store);
    this.toolConfigs = new ToolConfigStore(store);
    this.identity = new IdentityResolver(config.identity.sentinelName);
    this.pipeline = deps.pipeline ?? new EnrichmentPipeline(config.enrichment);
    this.tools = deps.tools ?? createDefaultToolRegistry();
    this.artifact = config.artifact.path ? new ArtifactSynchronizer(this.projects, config.artifact.path) : null;
  }

  /**
   * Open (creating and migrating as needed) the store named in `config`.
   *
   * @throws SchemaMigrationError when the schema cannot be brought current
   */
  static async open(config: RegistryConfig, deps: RegistryDeps = {}): Promise<ProjectRegistry> {
    const store = new SchemaStore(config.store);
    const migration = await withBusyRetry(() => store.open([seedStarterTags]));
    return new ProjectRegistry(config, store, migration, deps);
  }

  getStorePath(): string {
    return this.store.getPath();
  }

  getArtifactPath(): string | null {
    return this.artifact?.getPath() ?? null;
  }

  // ---- registration ----

  /**
   * Register a directory, or refresh it when its sentinel names a known
   * project. Identity and enrichment problems never fail the call.
   *
   * @throws InvalidDirectoryError
   * @throws DuplicatePathError when another live project holds the path
   */
  async register(directory: string, options: RegisterOptions = {}): Promise<RegisterResult> {
    const root = resolve(directory);
    assertDirectory(root);
    const dryRun = options.dryRun ?? false;

    const identity = this.identity.resolveForOperation(root, !dryRun);
    const existing = await this.retry(() => this.projects.get(identity.uuid));

    const enrichment = await this.enrich(root, options.skipEnrichment ?? false);
    const tags = mergeEnrichedTags([...(existing?.tags ?? []), ...(options.tags ?? [])], enrichment);
    const derived = enrichment.kind === "enriched" ? enrichment : undefined;
    const description = derived?.description ?? (existing?.description ? undefined : readReadmeSummary(root) ?? undefined);

    if (dryRun) {
      return {
        project: previewProject(identity.uuid, root, existing, options.name, tags, {
          aiAppName: derived?.name,
          aiAppDescription: derived?.description,
          description,
        }),
        created: !existing,
        identity,
        enrichment,
        dryRun,
      };
    }

    // Re-registering an archived project restores it; the path guard runs
    // before the caller's edits are written
    const { created } = await this.retry(() =>
      this.projects.upsert(identity.uuid, { rootPath: root, name: options.name, tags }, { restore: true }),
    );
    const project = await this.retry(() =>
      this.projects.applyEnrichment(identity.uuid, {
        aiAppName: derived?.name,
        aiAppDescription: derived?.description,
        description,
        tags,
      }),
    );

    log.info({ uuid: identity.uuid, root, created, enrichment: enrichment.kind }, "project registered");
    return { project, created, identity, enrichment, dryRun, artifactError: await this.syncArtifact() };
  }

  /**
   * Enrich a registered project on the background queue. The result is
   * applied without overwriting fields that are already set, then passed to
   * every `onDone` registered for the project while it waited. Resolves false
   * when the project was already queued.
   *
   * @throws ProjectNotFoundError
   */
  async enrichInBackground(
    uuid: string,
    onDone?: (project: Project, result: EnrichmentResult) => void,
  ): Promise<boolean> {
    const project = await this.get(uuid);
    if (!project) throw new ProjectNotFoundError(uuid);

    if (!this.queue) {
      this.queue = new EnrichmentQueue(
        (job) => this.pipeline.run(job.directory),
        async (job, result) => {
          const listeners = this.listeners.get(job.uuid) ?? [];
          this.listeners.delete(job.uuid);
          const updated = result.kind === "enriched" ? await this.applyDerived(job.uuid, result) : await this.get(job.uuid);
          if (!updated) return;
          for (const listener of listeners) listener(updated, result);
        },
      );
    }

    if (onDone) this.listeners.set(uuid, [...(this.listeners.get(uuid) ?? []), onDone]);
    return this.queue.enqueue({ uuid, directory: project.rootPath });
  }

  /** Resolves when no background enrichment is pending. */
  async idle(): Promise<void> {
    await this.queue?.onIdle();
  }

  // ---- reads ----

  list(filter: ProjectFilter = {}): Promise<Project[]> {
    return this.retry(() => this.projects.list(filter));
  }

  get(uuid: string): Promise<Project | undefined> {
    return this.retry(() => this.projects.get(uuid));
  }

  getByPath(rootPath: string): Promise<Project | undefined> {
    return this.retry(() => this.projects.getByPath(resolve(rootPath)));
  }

  stats(): Promise<ProjectStats> {
    return this.retry(() => this.projects.stats());
  }

  listTags(): Promise<Tag[]> {
    return this.retry(() => this.tags.list());
  }

  getToolConfig(uuid: string, tool: string): Promise<ToolConfig | undefined> {
    return this.retry(() => this.toolConfigs.get(uuid, tool));
  }

  listToolConfigs(uuid: string): Promise<ToolConfig[]> {
    return this.retry(() => this.toolConfigs.list(uuid));
  }

  // ---- mutations ----

  update(uuid: string, fields: ProjectFields): Promise<Synced<Project>> {
    const { rootPath, ...rest } = fields;
    const normalized: ProjectFields = rootPath === undefined ? rest : { ...rest, rootPath: resolve(rootPath) };
    return this.mutate(() => this.projects.update(uuid, normalized));
  }

  toggleFavorite(uuid: string): Promise<Synced<boolean>> {
    return this.mutate(() => this.projects.toggleFavorite(uuid));
  }

  updateNotes(uuid: string, notes: string | null): Promise<Synced<Project>> {
    return this.mutate(() => this.projects.updateNotes(uuid, notes));
  }

  /** Call after a confirmed launch. */
  recordOpen(uuid: string): Promise<Synced<Project>> {
    return this.mutate(() => this.projects.recordOpen(uuid));
  }

  archive(uuid: string): Promise<Synced<Project>> {
    return this.mutate(() => this.projects.archive(uuid));
  }

  restore(uuid: string): Promise<Synced<Project>> {
    return this.mutate(() => this.projects.restore(uuid));
  }

  purge(uuid: string): Promise<Synced<void>> {
    return this.mutate(() => this.projects.purge(uuid));
  }

  upsertTag(input: UpsertTagInput): Promise<Synced<Tag>> {
    return this.mutate(() => this.tags.upsert(input));
  }

  setToolConfig(uuid: string, tool: string, config: ToolSettings): Promise<Synced<ToolConfig>> {
    return this.mutate(() => this.toolConfigs.set(uuid, tool, config));
  }

  deleteToolConfig(uuid: string, tool: string): Promise<Synced<boolean>> {
    return this.mutate(() => this.toolConfigs.delete(uuid, tool));
  }

  /**
   * Launch a project with the named tool (or the first available one) and
   * count the open when the launch succeeds.
   *
   * @throws ProjectNotFoundError
   */
  async openProject(uuid: string, toolName?: string): Promise<OpenResult> {
    const project = await this.get(uuid);
    if (!project) throw new ProjectNotFoundError(uuid);

    const tool = toolName ? this.tools.get(toolName) : this.tools.defaultTool();
    if (!tool) {
      log.warn({ uuid, tool: toolName }, "no tool to open project with");
      return { launched: false, tool: toolName, project };
    }

    const launched = await this.tools.launch(tool.name, project.rootPath);
    if (!launched) return { launched, tool: tool.name, project };

    const { value, artifactError } = await this.recordOpen(uuid);
    return { launched, tool: tool.name, project: value, artifactError };
  }

  // ---- artifact ----

  /**
   * Rebuild the artifact now. Returns null when synchronization is disabled.
   *
   * @throws ArtifactWriteError
   */
  regenerateArtifact(): RegenerateResult | null {
    return this.artifact?.regenerate() ?? null;
  }

  checkArtifact(): DriftReport | null {
    return this.artifact?.checkDrift() ?? null;
  }

  // ---- internals ----

  private retry<T>(operation: () => T): Promise<T> {
    return withBusyRetry(operation);
  }

  private async mutate<T>(operation: () => T): Promise<Synced<T>> {
    const value = await this.retry(operation);
    return { value, artifactError: await this.syncArtifact() };
  }

  /**
   * Rebuild the artifact after a committed mutation. Never throws: once the
   * busy retries run out, any failure comes back as the returned error so
   * the caller does not repeat a mutation that already stands.
   */
  private async syncArtifact(): Promise<ArtifactWriteError | undefined> {
    const artifact = this.artifact;
    if (!artifact) return undefined;
    try {
      await this.retry(() => artifact.regenerate());
      return undefined;
    } catch (e) {
      if (e instanceof ArtifactWriteError) return e;
      log.warn({ err: e, path: artifact.getPath() }, "artifact rebuild failed");
      return new ArtifactWriteError(artifact.getPath(), e);
    }
  }

  /** Apply a background result; undefined when the project was purged meanwhile. */
  private async applyDerived(
    uuid: string,
    result: Extract<EnrichmentResult, { kind: "enriched" }>,
  ): Promise<Project | undefined> {
    const current = await this.get(uuid);
    if (!current) return undefined;
    const { value } = await this.mutate(() =>
      this.projects.applyEnrichment(uuid, {
        aiAppName: result.name,
        aiAppDescription: result.description,
        description: result.description,
        tags: mergeEnrichedTags(current.tags, result),
      }),
    );
    return value;
  }

  private async enrich(root: string, skip: boolean): Promise<EnrichmentResult> {
    if (!this.config.enrichment.enabled) return { kind: "none", reason: "disabled" };
    if (skip) return { kind: "none", reason: "skipped" };
    return this.pipeline.run(root);
  }
}

function assertDirectory(path: string): void {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(path).isDirectory();
  } catch (e) {
    throw new InvalidDirectoryError(path, e);
  }
  if (!isDirectory) throw new InvalidDirectoryError(path);
}

/** What register() would store, built without touching the store. */
function previewProject(
  uuid: string,
  rootPath: string,
  existing: Project | undefined,
  name: string | undefined,
  tags: string[],
  derived: { aiAppName?: string; aiAppDescription?: string; description?: string },
): Project {
  const now = new Date().toISOString();
  const base: Project = existing ?? {
    uuid,
    name: basename(rootPath),
    rootPath,
    tags: [],
    aiAppName: null,
    aiAppDescription: null,
    description: null,
    notes: null,
    favorite: false,
    lastOpened: null,
    openCount: 0,
    dateAdded: now,
    lastUpdated: now,
    enabled: true,
    status: statusOf(true),
    colorTheme: "blue",
  };
  return {
    ...base,
    name: name ?? base.name,
    rootPath,
    tags: normalizeTags(tags),
    aiAppName: base.aiAppName ?? derived.aiAppName ?? null,
    aiAppDescription: base.aiAppDescription ?? derived.aiAppDescription ?? null,
    description: base.description ?? derived.description ?? null,
    enabled: true,
    status: "active",
  };
}

/**
 * Collaborator contracts the manager consumes, plus the default implementations.
 *
 * Validators live in validation.ts, refreshers in refresher.ts.
 */
import type { Settings } from "../infra/config-schema.ts";
import type { Project } from "./types.ts";

// ── Serialization ───────────────────────────────────

export interface ProjectReader<TProject extends Project = Project> {
  /** Read the project stored at `location`; null when there is nothing to read. */
  read(location: string): Promise<TProject | null>;
}

export interface ProjectWriter<TProject extends Project = Project> {
  /** Write `project` to `location`. Resolves false when the write was rejected. */
  write(project: TProject, location: string): Promise<boolean>;
}

/** Maps a location to the reader/writer able to handle it. */
export interface ProjectSerializerSelector<TProject extends Project = Project> {
  getReader(location: string): ProjectReader<TProject> | null;
  getWriter(location: string): ProjectWriter<TProject> | null;
}

/** Uses the same reader and writer for every location. */
export class FixedProjectSerializerSelector<TProject extends Project = Project>
  implements ProjectSerializerSelector<TProject>
{
  constructor(
    private readonly reader: ProjectReader<TProject> | null,
    private readonly writer: ProjectWriter<TProject> | null,
  ) {}

  getReader(_location: string): ProjectReader<TProject> | null {
    return this.reader;
  }

  getWriter(_location: string): ProjectWriter<TProject> | null {
    return this.writer;
  }
}

// ── Upgrade ─────────────────────────────────────────

/** Migrates an old-format location to a new one before it is loaded. */
export interface ProjectUpgrader {
  requiresUpgrade(location: string): Promise<boolean>;
  /** Returns the location to load from after the upgrade. */
  upgrade(location: string): Promise<string>;
}

export class NoopProjectUpgrader implements ProjectUpgrader {
  async requiresUpgrade(_location: string): Promise<boolean> {
    return false;
  }

  async upgrade(location: string): Promise<string> {
    return location;
  }
}

// ── Initialization ──────────────────────────────────

/** Supplies the locations loaded when the manager initializes. */
export interface ProjectInitializer {
  getInitialLocations(): string[];
}

export class EmptyProjectInitializer implements ProjectInitializer {
  getInitialLocations(): string[] {
    return [];
  }
}

/** Reads `management.initialLocations` from settings. */
export class SettingsProjectInitializer implements ProjectInitializer {
  constructor(private readonly settings: Pick<Settings, "management">) {}

  getInitialLocations(): string[] {
    return [...this.settings.management.initialLocations];
  }
}

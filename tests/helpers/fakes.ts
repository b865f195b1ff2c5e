/**
 * In-process stand-ins for the manager's collaborators.
 */
import type { ProjectReader, ProjectWriter, ProjectSerializerSelector } from "../../src/projects/collaborators.ts";
import { FixedProjectSerializerSelector } from "../../src/projects/collaborators.ts";
import { normalizeLocation } from "../../src/projects/location.ts";
import { ProjectManager, type ProjectManagerDeps } from "../../src/projects/manager.ts";
import {
  ProjectRefresherBase,
  type ProjectRefresher,
  type ProjectRefresherSelector,
} from "../../src/projects/refresher.ts";
import type { DataProject } from "../../src/projects/types.ts";
import { ProjectEventType } from "../../src/events/types.ts";

/** Reader/writer over an in-memory map of location → data. */
export class MemorySerializer implements ProjectReader<DataProject>, ProjectWriter<DataProject> {
  readonly files = new Map<string, unknown>();
  readonly reads: string[] = [];
  readonly writes: Array<{ location: string; data: unknown }> = [];

  /** When set, `read` waits for this promise before returning. */
  readGate: Promise<void> | null = null;
  /** When set, `write` waits for this promise before returning. */
  writeGate: Promise<void> | null = null;
  readError: Error | null = null;
  writeError: Error | null = null;
  writeResult = true;

  constructor(files: Record<string, unknown> = {}) {
    for (const [location, data] of Object.entries(files)) {
      this.files.set(normalizeLocation(location), data);
    }
  }

  async read(location: string): Promise<DataProject | null> {
    this.reads.push(location);
    if (this.readGate) await this.readGate;
    if (this.readError) throw this.readError;

    const key = normalizeLocation(location);
    if (!this.files.has(key)) return null;
    return { location, data: this.files.get(key) };
  }

  async write(project: DataProject, location: string): Promise<boolean> {
    if (this.writeGate) await this.writeGate;
    if (this.writeError) throw this.writeError;
    if (!this.writeResult) return false;

    this.writes.push({ location, data: project.data });
    this.files.set(normalizeLocation(location), project.data);
    return true;
  }

  selector(): ProjectSerializerSelector<DataProject> {
    return new FixedProjectSerializerSelector<DataProject>(this, this);
  }
}

/** Refresher whose updates are raised by the test. */
export class ManualRefresher extends ProjectRefresherBase {
  subscribeCalls = 0;
  unsubscribeCalls = 0;
  failSubscribe = false;
  failUnsubscribe = false;

  protected onSubscribe(): void {
    this.subscribeCalls++;
    if (this.failSubscribe) throw new Error("subscribe failed");
  }

  protected onUnsubscribe(): void {
    this.unsubscribeCalls++;
    if (this.failUnsubscribe) throw new Error("unsubscribe failed");
  }
}

/** Hands out one ManualRefresher per location and remembers them all. */
export class ManualRefresherSelector implements ProjectRefresherSelector {
  readonly created: ManualRefresher[] = [];
  configure: ((refresher: ManualRefresher) => void) | null = null;

  getRefresher(location: string): ProjectRefresher | null {
    const refresher = new ManualRefresher(location);
    this.configure?.(refresher);
    this.created.push(refresher);
    return refresher;
  }

  /** Latest refresher created for a location. */
  latest(location: string): ManualRefresher | null {
    const key = normalizeLocation(location);
    for (let i = this.created.length - 1; i >= 0; i--) {
      const refresher = this.created[i];
      if (refresher && normalizeLocation(refresher.location) === key) return refresher;
    }
    return null;
  }
}

/** Deferred promise for gating collaborators. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Subscribe to every event type and record their names in order. */
export function recordEvents(manager: ProjectManager<DataProject>): string[] {
  const log: string[] = [];
  for (const type of Object.values(ProjectEventType)) {
    manager.on(type, () => {
      log.push(type);
    });
  }
  return log;
}

export function createManager(
  serializer: MemorySerializer,
  deps: Partial<ProjectManagerDeps<DataProject>> = {},
): ProjectManager<DataProject> {
  return new ProjectManager<DataProject>({
    ...deps,
    serializerSelector: deps.serializerSelector ?? serializer.selector(),
  });
}

import { describe, it, expect } from "vitest";
import type { ProjectLocationCancelEvent } from "../../../src/events/types.ts";
import type { ProjectManager } from "../../../src/projects/manager.ts";
import type { DataProject } from "../../../src/projects/types.ts";
import { CloseBeforeLoadProjectWatcher, ProjectWatcherBase } from "../../../src/projects/watcher.ts";
import { MemorySerializer, createManager, recordEvents } from "../../helpers/fakes.ts";

class RecordingWatcher extends ProjectWatcherBase<DataProject> {
  readonly calls: string[] = [];

  constructor(manager: ProjectManager<DataProject>) {
    super(manager);
  }

  protected override async onLoading(e: ProjectLocationCancelEvent): Promise<void> {
    this.calls.push(`loading:${e.location}`);
  }

  protected override async onLoadingFailed(location: string, error: Error | null): Promise<void> {
    this.calls.push(`loadingFailed:${location}:${error?.message ?? "none"}`);
  }

  protected override async onLoaded(project: DataProject): Promise<void> {
    this.calls.push(`loaded:${project.location}`);
  }

  protected override async onSaved(project: DataProject): Promise<void> {
    this.calls.push(`saved:${project.location}`);
  }

  protected override async onClosed(project: DataProject): Promise<void> {
    this.calls.push(`closed:${project.location}`);
  }

  protected override async onRefreshed(project: DataProject): Promise<void> {
    this.calls.push(`refreshed:${project.location}`);
  }

  protected override async onActivated(
    oldProject: DataProject | null,
    newProject: DataProject | null,
  ): Promise<void> {
    this.calls.push(`activated:${oldProject?.location ?? "-"}>${newProject?.location ?? "-"}`);
  }
}

describe("ProjectWatcherBase", () => {
  it("forwards events to the matching hooks", async () => {
    const m = createManager(new MemorySerializer({ "a.proj": 1 }));
    const watcher = new RecordingWatcher(m);

    await m.load("a.proj");
    await m.save();
    await m.refresh();
    await m.close();
    await m.load("missing.proj");

    expect(watcher.calls).toEqual([
      "loading:a.proj",
      "loaded:a.proj",
      "activated:->a.proj",
      "saved:a.proj",
      "activated:a.proj>-",
      "refreshed:a.proj",
      "activated:->a.proj",
      "activated:a.proj>-",
      "closed:a.proj",
      "loading:missing.proj",
      "loadingFailed:missing.proj:Project could not be loaded from 'missing.proj'",
    ]);
  });

  it("stops receiving events after dispose", async () => {
    const m = createManager(new MemorySerializer({ "a.proj": 1 }));
    const watcher = new RecordingWatcher(m);

    watcher.dispose();
    await m.load("a.proj");

    expect(watcher.calls).toEqual([]);
  });
});

describe("CloseBeforeLoadProjectWatcher", () => {
  it("closes the active project before another one loads", async () => {
    const m = createManager(new MemorySerializer({ "a.proj": 1, "b.proj": 2 }));
    new CloseBeforeLoadProjectWatcher(m);

    await m.load("a.proj");
    expect(await m.load("b.proj")).toBe(true);

    expect(m.projects.map((p) => p.location)).toEqual(["b.proj"]);
    expect(m.activeProject?.location).toBe("b.proj");
  });

  it("cancels the load when the active project stays open", async () => {
    const serializer = new MemorySerializer({ "a.proj": 1, "b.proj": 2 });
    const m = createManager(serializer);
    new CloseBeforeLoadProjectWatcher(m);
    await m.load("a.proj");
    m.on("closing", (e) => {
      e.cancel = true;
    });
    const log = recordEvents(m);

    expect(await m.load("b.proj")).toBe(false);
    // The watcher runs first, so the nested close is recorded before "loading"
    expect(log).toEqual(["closing", "closingCanceled", "loading", "loadingCanceled"]);
    expect(serializer.reads).toEqual(["a.proj"]);
    expect(m.activeProject?.location).toBe("a.proj");
  });
});

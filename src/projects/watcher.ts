/**
 * Project watchers: typed observers of a ProjectManager.
 *
 * A watcher attaches one handler per lifecycle event in its constructor and
 * forwards each to a protected hook. Subclasses override only the hooks they
 * need; the defaults do nothing.
 */
import type {
  ProjectCancelEvent,
  ProjectLocationCancelEvent,
  ProjectSaveCancelEvent,
  ProjectUpdatingCancelEvent,
} from "../events/types.ts";
import { getLogger } from "../infra/logger.ts";
import type { ProjectManager } from "./manager.ts";
import type { Project } from "./types.ts";
import type { ValidationContext } from "./validation.ts";

const logger = getLogger("project_watcher");

export abstract class ProjectWatcherBase<TProject extends Project = Project> {
  protected readonly projectManager: ProjectManager<TProject>;
  private readonly detachers: Array<() => void>;

  constructor(projectManager: ProjectManager<TProject>) {
    this.projectManager = projectManager;

    const m = projectManager;
    this.detachers = [
      m.on("loading", (e) => this.onLoading(e)),
      m.on("loadingFailed", (e) => this.onLoadingFailed(e.location, e.error, e.validation)),
      m.on("loadingCanceled", (e) => this.onLoadingCanceled(e.location)),
      m.on("loaded", (e) => this.onLoaded(e.project)),

      m.on("saving", (e) => this.onSaving(e)),
      m.on("savingFailed", (e) => this.onSavingFailed(e.project, e.error)),
      m.on("savingCanceled", (e) => this.onSavingCanceled(e.project)),
      m.on("saved", (e) => this.onSaved(e.project)),

      m.on("closing", (e) => this.onClosing(e)),
      m.on("closingCanceled", (e) => this.onClosingCanceled(e.project)),
      m.on("closed", (e) => this.onClosed(e.project)),

      m.on("refreshing", (e) => this.onRefreshing(e)),
      m.on("refreshingFailed", (e) => this.onRefreshingFailed(e.project, e.error, e.validation)),
      m.on("refreshingCanceled", (e) => this.onRefreshingCanceled(e.project)),
      m.on("refreshed", (e) => this.onRefreshed(e.project)),

      m.on("activation", (e) => this.onActivation(e)),
      m.on("activationFailed", (e) => this.onActivationFailed(e.project, e.error)),
      m.on("activationCanceled", (e) => this.onActivationCanceled(e.project)),
      m.on("activated", (e) => this.onActivated(e.oldProject, e.newProject)),
    ];
  }

  /** Detach every handler from the manager. */
  dispose(): void {
    for (const detach of this.detachers.splice(0)) {
      detach();
    }
    logger.debug({ watcher: this.constructor.name }, "watcher_disposed");
  }

  // ── Load ──

  protected async onLoading(_e: ProjectLocationCancelEvent): Promise<void> {}

  protected async onLoadingFailed(
    _location: string,
    _error: Error | null,
    _validation: ValidationContext | null,
  ): Promise<void> {}

  protected async onLoadingCanceled(_location: string): Promise<void> {}

  protected async onLoaded(_project: TProject): Promise<void> {}

  // ── Save ──

  protected async onSaving(_e: ProjectSaveCancelEvent<TProject>): Promise<void> {}

  protected async onSavingFailed(_project: TProject, _error: Error | null): Promise<void> {}

  protected async onSavingCanceled(_project: TProject): Promise<void> {}

  protected async onSaved(_project: TProject): Promise<void> {}

  // ── Close ──

  protected async onClosing(_e: ProjectCancelEvent<TProject>): Promise<void> {}

  protected async onClosingCanceled(_project: TProject): Promise<void> {}

  protected async onClosed(_project: TProject): Promise<void> {}

  // ── Refresh ──

  protected async onRefreshing(_e: ProjectCancelEvent<TProject>): Promise<void> {}

  protected async onRefreshingFailed(
    _project: TProject,
    _error: Error | null,
    _validation: ValidationContext | null,
  ): Promise<void> {}

  protected async onRefreshingCanceled(_project: TProject): Promise<void> {}

  protected async onRefreshed(_project: TProject): Promise<void> {}

  // ── Activation ──

  protected async onActivation(_e: ProjectUpdatingCancelEvent<TProject>): Promise<void> {}

  protected async onActivationFailed(_project: TProject, _error: Error | null): Promise<void> {}

  protected async onActivationCanceled(_project: TProject): Promise<void> {}

  protected async onActivated(_oldProject: TProject | null, _newProject: TProject | null): Promise<void> {}
}

/**
 * Closes the active project before another one loads, so a host in
 * multiple-document mode still keeps a single project open. If the close
 * fails or is canceled, the load is canceled too.
 */
export class CloseBeforeLoadProjectWatcher<
  TProject extends Project = Project,
> extends ProjectWatcherBase<TProject> {
  protected override async onLoading(e: ProjectLocationCancelEvent): Promise<void> {
    if (e.cancel || this.projectManager.activeProject === null) {
      return;
    }

    const closed = await this.projectManager.close();
    if (!closed) {
      logger.info({ location: e.location }, "load_canceled_active_project_not_closed");
      e.cancel = true;
    }
  }
}

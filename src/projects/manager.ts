/**
 * ProjectManager: sequences the project lifecycle: load, save, close,
 * refresh and activation.
 *
 * Every transition emits a cancellable begin event, then exactly one
 * outcome (failed, canceled or completed):
 *
 *   load     loading    → loadingFailed | loadingCanceled | loaded
 *   save     saving     → savingFailed | savingCanceled | saved
 *   close    closing    → closingCanceled | closed
 *   refresh  refreshing → refreshingFailed | refreshingCanceled | refreshed
 *   activate activation → activationFailed | activationCanceled | activated
 *
 * Loads and the re-read step of a refresh are serialized by the load lock,
 * activation changes by the activate lock. Neither lock is re-entrant: an
 * observer must not await a load or a refresh from a load event, nor change
 * the active project from an activation event.
 */
import {
  ConfigError,
  ProjectError,
  ProjectIOError,
  ProjectValidationError,
  SingleDocumentModeError,
  errorToString,
  toError,
} from "../infra/errors.ts";
import { AsyncLock } from "../infra/async-lock.ts";
import { getLogger } from "../infra/logger.ts";
import { ProjectEventPipeline } from "../events/pipeline.ts";
import type { ProjectEventHandler, ProjectEventType } from "../events/types.ts";
import {
  EmptyProjectInitializer,
  NoopProjectUpgrader,
  type ProjectInitializer,
  type ProjectSerializerSelector,
  type ProjectUpgrader,
} from "./collaborators.ts";
import { assertLocation, isBlankLocation, locationsEqual, normalizeLocation } from "./location.ts";
import {
  NullProjectRefresherSelector,
  type ProjectRefresher,
  type ProjectRefresherSelector,
} from "./refresher.ts";
import { ProjectRegistry } from "./registry.ts";
import { ProjectStateService, type ProjectState } from "./state.ts";
import { ManagementMode, type Project } from "./types.ts";
import { ProjectValidatorBase, ValidationContext, type ProjectValidator } from "./validation.ts";

const logger = getLogger("project_manager");

/** Collaborators wired into a manager. Only the serializer selector is required. */
export interface ProjectManagerDeps<TProject extends Project = Project> {
  serializerSelector: ProjectSerializerSelector<TProject>;
  validator?: ProjectValidator<TProject>;
  upgrader?: ProjectUpgrader;
  refresherSelector?: ProjectRefresherSelector;
  initializer?: ProjectInitializer;
  mode?: ManagementMode;
  stateService?: ProjectStateService;
}

type ReloadOutcome<TProject> =
  | { refreshed: TProject }
  | { error: ProjectError; validation: ValidationContext | null };

interface RefresherHandle {
  refresher: ProjectRefresher;
  detach: () => void;
}

export class ProjectManager<TProject extends Project = Project> {
  readonly managementMode: ManagementMode;
  readonly stateService: ProjectStateService;

  private readonly serializerSelector: ProjectSerializerSelector<TProject>;
  private readonly validator: ProjectValidator<TProject>;
  private readonly upgrader: ProjectUpgrader;
  private readonly refresherSelector: ProjectRefresherSelector;
  private readonly initializer: ProjectInitializer;

  private readonly registry = new ProjectRegistry<TProject>();
  private readonly events = new ProjectEventPipeline<TProject>();
  private readonly refreshers = new Map<string, RefresherHandle>();
  private readonly loadLock = new AsyncLock();
  private readonly activateLock = new AsyncLock();

  private _activeProject: TProject | null = null;
  private _isLoading = false;
  private savingCount = 0;

  constructor(deps: ProjectManagerDeps<TProject>) {
    this.serializerSelector = deps.serializerSelector;
    this.validator = deps.validator ?? new ProjectValidatorBase<TProject>();
    this.upgrader = deps.upgrader ?? new NoopProjectUpgrader();
    this.refresherSelector = deps.refresherSelector ?? new NullProjectRefresherSelector();
    this.initializer = deps.initializer ?? new EmptyProjectInitializer();
    this.managementMode = deps.mode ?? ManagementMode.MULTIPLE_DOCUMENTS;
    this.stateService = deps.stateService ?? new ProjectStateService();
  }

  // ── Queries ─────────────────────────────────────────────────

  /** Registered projects in load order (snapshot). */
  get projects(): readonly TProject[] {
    return this.registry.list();
  }

  get activeProject(): TProject | null {
    return this._activeProject;
  }

  /** True while a load holds the load lock. */
  get isLoading(): boolean {
    return this._isLoading;
  }

  /** True while at least one save is in flight. */
  get isSaving(): boolean {
    return this.savingCount > 0;
  }

  getProject(location: string): TProject | null {
    return this.registry.get(location);
  }

  /** Copy of the transition flags for a location. */
  getState(location: string): ProjectState {
    return this.stateService.getState(location);
  }

  // ── Events ──────────────────────────────────────────────────

  /** Subscribe to a lifecycle event. Returns a function that unsubscribes. */
  on<K extends ProjectEventType>(type: K, handler: ProjectEventHandler<TProject, K>): () => void {
    return this.events.subscribe(type, handler);
  }

  off<K extends ProjectEventType>(type: K, handler: ProjectEventHandler<TProject, K>): void {
    this.events.unsubscribe(type, handler);
  }

  // ── Initialization ──────────────────────────────────────────

  /**
   * Load the initializer's locations in order. A location that fails to load
   * does not stop the batch. Returns how many ended up loaded.
   */
  async initialize(): Promise<number> {
    const locations = this.initializer
      .getInitialLocations()
      .filter((location) => !isBlankLocation(location));

    let loaded = 0;
    for (const location of locations) {
      logger.debug({ location }, "loading_initial_project");
      try {
        if (await this.load(location)) loaded++;
      } catch (err) {
        logger.error({ location, error: errorToString(err) }, "initial_project_load_failed");
      }
    }

    logger.info({ requested: locations.length, loaded }, "initial_projects_loaded");
    return loaded;
  }

  // ── Load ────────────────────────────────────────────────────

  /** Load a project and make it the active one. */
  async load(location: string): Promise<boolean> {
    assertLocation(location);

    const project = await this.loadProject(location);
    if (project) {
      await this.setActive(project);
    }
    return project !== null;
  }

  /** Load a project without changing the active one. */
  async loadInactive(location: string): Promise<boolean> {
    assertLocation(location);

    const project = await this.loadProject(location);
    return project !== null;
  }

  private loadProject(location: string): Promise<TProject | null> {
    return this.loadLock.run(async () => {
      const registered = this.registry.get(location);
      if (registered) {
        logger.debug({ location }, "project_already_loaded");
        return registered;
      }

      this._isLoading = true;
      try {
        return await this.loadUnderLock(location);
      } finally {
        this._isLoading = false;
      }
    });
  }

  private async loadUnderLock(requestedLocation: string): Promise<TProject | null> {
    let location = requestedLocation;
    try {
      if (await this.upgrader.requiresUpgrade(location)) {
        logger.debug({ location }, "project_upgrade_required");
        location = await this.upgrader.upgrade(location);
        logger.info({ from: requestedLocation, to: location }, "project_upgraded");
      }
    } catch (err) {
      const error = new ProjectError(
        requestedLocation,
        `Failed to upgrade project at '${requestedLocation}'`,
        { cause: err },
      );
      logger.error({ location: requestedLocation, error: errorToString(err) }, "project_upgrade_failed");
      await this.events.emit("loadingFailed", { location: requestedLocation, error, validation: null });
      return null;
    }

    if (location !== requestedLocation) {
      const registered = this.registry.get(location);
      if (registered) {
        logger.debug({ location }, "project_already_loaded");
        return registered;
      }
    }

    return this.stateService.track(location, "isLoading", async () => {
      logger.debug({ location }, "loading_project");

      const begin = { location, cancel: false };
      await this.events.emit("loading", begin);
      if (begin.cancel) {
        logger.debug({ location }, "project_loading_canceled");
        await this.events.emit("loadingCanceled", { location });
        return null;
      }

      let validation: ValidationContext | null = null;
      let project: TProject;
      try {
        if (this.managementMode === ManagementMode.SINGLE_DOCUMENT && this.registry.size > 0) {
          throw new SingleDocumentModeError(location);
        }

        if (!(await this.validator.canStartLoading(location))) {
          validation = ValidationContext.withError(
            "Project validator informed that project could not be loaded",
          );
          throw new ProjectValidationError(location, `Cannot load project from '${location}'`, validation);
        }

        validation = await this.validator.validateBeforeLoading(location);
        if (validation.hasErrors) {
          throw new ProjectValidationError(
            location,
            `Project could not be loaded from '${location}', validator returned errors`,
            validation,
          );
        }

        project = await this.readProject(location);

        validation = await this.validator.validateLoaded(project);
        if (validation.hasErrors) {
          throw new ProjectValidationError(
            location,
            `Project data was loaded from '${location}', but the validator returned errors`,
            validation,
          );
        }

        this.registerProject(project);
      } catch (err) {
        if (err instanceof ConfigError) throw err;

        const error = toError(err);
        logger.error({ location, error: errorToString(error) }, "project_loading_failed");
        await this.events.emit("loadingFailed", { location, error, validation });
        return null;
      }

      await this.events.emit("loaded", { project });
      logger.info({ location }, "project_loaded");
      return project;
    });
  }

  /** Read through the selected reader. Throws ConfigError when none handles the location. */
  private async readProject(location: string): Promise<TProject> {
    const reader = this.serializerSelector.getReader(location);
    if (!reader) {
      logger.error({ location }, "project_reader_missing");
      throw new ConfigError(`No project reader is found for location '${location}'`);
    }

    let project: TProject | null;
    try {
      project = await reader.read(location);
    } catch (err) {
      throw new ProjectIOError(location, `Failed to read project from '${location}'`, err);
    }

    if (!project) {
      throw new ProjectError(location, `Project could not be loaded from '${location}'`);
    }
    return project;
  }

  // ── Save ────────────────────────────────────────────────────

  /**
   * Save a project (the active one by default) to a location (its own by
   * default). Resolves false when there is nothing to save, the save was
   * canceled, the writer threw, or the writer rejected the write.
   */
  async save(project?: TProject | null, location?: string): Promise<boolean> {
    const target = project ?? this._activeProject;
    if (!target) {
      logger.error("cannot_save_empty_project");
      return false;
    }

    const saveLocation =
      location !== undefined && !isBlankLocation(location) ? location : target.location;

    this.savingCount++;
    try {
      return await this.stateService.track(target.location, "isSaving", () =>
        this.saveProject(target, saveLocation),
      );
    } finally {
      this.savingCount--;
    }
  }

  private async saveProject(project: TProject, location: string): Promise<boolean> {
    logger.debug({ project: project.location, location }, "saving_project");

    const begin = { project, location, cancel: false };
    await this.events.emit("saving", begin);
    if (begin.cancel) {
      logger.debug({ location }, "project_saving_canceled");
      await this.events.emit("savingCanceled", { project, location });
      return false;
    }

    const writer = this.serializerSelector.getWriter(location);
    if (!writer) {
      logger.error({ location }, "project_writer_missing");
      throw new ConfigError(`No project writer is found for location '${location}'`);
    }

    let written: boolean;
    try {
      written = await writer.write(project, location);
    } catch (err) {
      const error = new ProjectIOError(location, `Failed to save project to '${location}'`, err);
      logger.error({ location, error: errorToString(err) }, "project_saving_failed");
      await this.events.emit("savingFailed", { project, location, error });
      return false;
    }

    if (!written) {
      logger.error({ location }, "project_write_rejected");
      await this.events.emit("savingFailed", { project, location, error: null });
      return false;
    }

    await this.events.emit("saved", { project, location });
    logger.info({ project: project.location, location }, "project_saved");
    return true;
  }

  // ── Close ───────────────────────────────────────────────────

  /** Close a project (the active one by default), deactivating it first when active. */
  async close(project?: TProject | null): Promise<boolean> {
    const target = project ?? this._activeProject;
    if (!target) {
      return false;
    }
    if (!this.registry.contains(target)) {
      logger.warn({ location: target.location }, "close_unknown_project");
      return false;
    }

    return this.stateService.track(target.location, "isClosing", async () => {
      logger.debug({ location: target.location }, "closing_project");

      const begin = { project: target, cancel: false };
      await this.events.emit("closing", begin);
      if (begin.cancel) {
        logger.debug({ location: target.location }, "project_closing_canceled");
        await this.events.emit("closingCanceled", { project: target });
        return false;
      }

      if (this.isActive(target)) {
        await this.setActive(null);
        if (this.isActive(target)) {
          logger.info({ location: target.location }, "project_closing_canceled_by_deactivation");
          await this.events.emit("closingCanceled", { project: target });
          return false;
        }
      }

      this.unregisterProject(target);

      await this.events.emit("closed", { project: target });
      logger.info({ location: target.location }, "project_closed");
      return true;
    });
  }

  // ── Refresh ─────────────────────────────────────────────────

  /**
   * Reload a project (the active one by default) from its location. The old
   * instance is unregistered before the read, so a failed refresh leaves the
   * location unregistered. An active project is reactivated as the new instance.
   */
  async refresh(project?: TProject | null): Promise<boolean> {
    const target = project ?? this._activeProject;
    if (!target) {
      return false;
    }
    if (!this.registry.contains(target)) {
      logger.warn({ location: target.location }, "refresh_unknown_project");
      return false;
    }

    return this.stateService.track(target.location, "isRefreshing", () => this.refreshProject(target));
  }

  private async refreshProject(project: TProject): Promise<boolean> {
    const location = project.location;
    logger.debug({ location }, "refreshing_project");

    const begin = { project, cancel: false };
    await this.events.emit("refreshing", begin);
    if (begin.cancel) {
      logger.debug({ location }, "project_refreshing_canceled");
      await this.events.emit("refreshingCanceled", { project });
      return false;
    }

    const wasActive = this.isActive(project);
    if (wasActive) {
      this.stateService.setRefreshingActiveProject(true);
    }

    try {
      if (wasActive) {
        await this.setActive(null);
        if (this.isActive(project)) {
          logger.info({ location }, "project_refreshing_canceled_by_deactivation");
          await this.events.emit("refreshingCanceled", { project });
          return false;
        }
      }

      const outcome = await this.loadLock.run(() => this.reloadUnderLock(project));
      if (!("refreshed" in outcome)) {
        await this.events.emit("refreshingFailed", {
          project,
          error: outcome.error,
          validation: outcome.validation,
        });
        return false;
      }
      const refreshed = outcome.refreshed;

      await this.events.emit("refreshed", { project: refreshed });

      if (wasActive) {
        await this.setActive(refreshed);
      }

      logger.info({ location }, "project_refreshed");
      return true;
    } finally {
      if (wasActive) {
        this.stateService.setRefreshingActiveProject(false);
      }
    }
  }

  /**
   * Swap the registered instance for a fresh read. Called under the load
   * lock; the caller emits the outcome once the lock is released.
   */
  private async reloadUnderLock(project: TProject): Promise<ReloadOutcome<TProject>> {
    const location = project.location;
    if (!this.registry.contains(project)) {
      logger.warn({ location }, "refresh_target_unregistered");
      return {
        error: new ProjectError(location, `Project '${location}' was unregistered before it could be refreshed`),
        validation: null,
      };
    }
    this.unregisterProject(project);

    let validation: ValidationContext | null = null;
    try {
      validation = await this.validator.validateBeforeLoading(location);
      if (validation.hasErrors) {
        throw new ProjectValidationError(
          location,
          `Project could not be loaded from '${location}', the validator returned errors`,
          validation,
        );
      }

      const refreshed = await this.readProject(location);

      validation = await this.validator.validateLoaded(refreshed);
      if (validation.hasErrors) {
        throw new ProjectValidationError(
          location,
          `Project data was loaded from '${location}', but the validator returned errors`,
          validation,
        );
      }

      this.registerProject(refreshed);
      return { refreshed };
    } catch (err) {
      if (err instanceof ConfigError) throw err;

      const error = new ProjectError(
        location,
        `Failed to load project from location '${location}' while refreshing.`,
        { cause: err },
      );
      logger.error({ location, error: errorToString(err) }, "project_refreshing_failed");
      return { error, validation };
    }
  }

  /**
   * A refresher reported an external change. Ignored while this manager is
   * loading or saving, since the change is most likely its own write.
   */
  private async onRefresherUpdated(location: string): Promise<void> {
    if (this._isLoading || this.savingCount > 0) {
      logger.debug(
        { location, isLoading: this._isLoading, savingCount: this.savingCount },
        "refresh_request_ignored",
      );
      return;
    }

    const project = this.registry.get(location);
    if (!project) {
      logger.debug({ location }, "refresh_request_for_unknown_project");
      return;
    }

    try {
      await this.refresh(project);
    } catch (err) {
      logger.error({ location, error: errorToString(err) }, "refresh_request_failed");
    }
  }

  // ── Activation ──────────────────────────────────────────────

  /**
   * Make `project` the active project, or deactivate the current one when
   * `project` is null. Resolves false when nothing changed.
   */
  setActive(project: TProject | null): Promise<boolean> {
    return this.activateLock.run(() =>
      project === null ? this.deactivateActiveProject() : this.activateProject(project),
    );
  }

  private async activateProject(project: TProject): Promise<boolean> {
    const location = project.location;
    if (!this.registry.contains(project)) {
      logger.warn({ location }, "activate_unknown_project");
      return false;
    }

    const current = this._activeProject;
    if (current !== null && locationsEqual(current.location, location)) {
      logger.debug({ location }, "project_already_active");
      return false;
    }

    return this.stateService.track(location, "isActivating", async () => {
      logger.info({ location }, "activating_project");

      const isRefresh = isRefreshPair(current, project);
      const begin = { oldProject: current, newProject: project, isRefresh, cancel: false };
      await this.events.emit("activation", begin);
      if (begin.cancel) {
        logger.info({ location }, "project_activation_canceled");
        await this.events.emit("activationCanceled", { project });
        return false;
      }

      try {
        if (!this.registry.contains(project)) {
          throw new ProjectError(location, `Project '${location}' was unregistered during activation`);
        }
        this.assignActiveProject(project);
      } catch (err) {
        const error = toError(err);
        logger.error({ location, error: errorToString(error) }, "project_activation_failed");
        await this.events.emit("activationFailed", { project, error, validation: null });
        return false;
      }

      await this.events.emit("activated", { oldProject: current, newProject: project, isRefresh });
      logger.debug({ location }, "project_activated");
      return true;
    });
  }

  private async deactivateActiveProject(): Promise<boolean> {
    const current = this._activeProject;
    if (current === null) {
      return false;
    }
    const location = current.location;

    return this.stateService.track(location, "isDeactivating", async () => {
      logger.info({ location }, "deactivating_project");

      const begin = { oldProject: current, newProject: null, isRefresh: false, cancel: false };
      await this.events.emit("activation", begin);
      if (begin.cancel) {
        logger.info({ location }, "project_deactivation_canceled");
        await this.events.emit("activationCanceled", { project: current });
        return false;
      }

      try {
        this.assignActiveProject(null);
      } catch (err) {
        const error = toError(err);
        logger.error({ location, error: errorToString(error) }, "project_deactivation_failed");
        await this.events.emit("activationFailed", { project: current, error, validation: null });
        return false;
      }

      await this.events.emit("activated", { oldProject: current, newProject: null, isRefresh: false });
      logger.debug({ location }, "project_deactivated");
      return true;
    });
  }

  /** Restores the previous pointer when `applyActiveProject` throws. */
  private assignActiveProject(project: TProject | null): void {
    const previous = this._activeProject;
    try {
      this.applyActiveProject(project);
    } catch (err) {
      this._activeProject = previous;
      throw err;
    }
  }

  /**
   * Store the active-project pointer. Subclasses may override to veto an
   * assignment by throwing; the manager then reports `activationFailed`.
   */
  protected applyActiveProject(project: TProject | null): void {
    this._activeProject = project;
  }

  private isActive(project: TProject): boolean {
    return this._activeProject !== null && locationsEqual(this._activeProject.location, project.location);
  }

  // ── Registration ────────────────────────────────────────────

  private registerProject(project: TProject): void {
    this.initializeRefresher(project.location);
    this.registry.register(project);
  }

  private unregisterProject(project: TProject): void {
    this.registry.remove(project.location);
    this.releaseRefresher(project.location);
  }

  private initializeRefresher(location: string): void {
    const key = normalizeLocation(location);
    if (this.refreshers.has(key)) return;

    try {
      const refresher = this.refresherSelector.getRefresher(location);
      if (!refresher) return;

      const detach = refresher.onUpdated((updated) => this.onRefresherUpdated(updated));
      try {
        refresher.subscribe();
      } catch (err) {
        detach();
        throw err;
      }

      this.refreshers.set(key, { refresher, detach });
      logger.debug({ location }, "project_refresher_subscribed");
    } catch (err) {
      logger.warn({ location, error: errorToString(err) }, "project_refresher_subscribe_failed");
      throw err;
    }
  }

  private releaseRefresher(location: string): void {
    const key = normalizeLocation(location);
    const handle = this.refreshers.get(key);
    if (!handle) return;

    try {
      handle.refresher.unsubscribe();
    } catch (err) {
      logger.warn({ location, error: errorToString(err) }, "project_refresher_unsubscribe_failed");
    }

    handle.detach();
    this.refreshers.delete(key);
    logger.debug({ location }, "project_refresher_released");
  }
}

// ── helpers ─────────────────────────────────────────────────

function isRefreshPair(oldProject: Project | null, newProject: Project | null): boolean {
  if (oldProject === null || newProject === null) return false;
  return locationsEqual(oldProject.location, newProject.location);
}

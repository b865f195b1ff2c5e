/**
 * Project lifecycle events.
 *
 * One family per transition: a cancellable begin event followed by exactly
 * one outcome (failed, canceled or completed). Closing has no failed outcome.
 */
import type { Project } from "../projects/types.ts";
import type { ValidationContext } from "../projects/validation.ts";

export const ProjectEventType = {
  // Load
  LOADING: "loading",
  LOADING_FAILED: "loadingFailed",
  LOADING_CANCELED: "loadingCanceled",
  LOADED: "loaded",

  // Save
  SAVING: "saving",
  SAVING_FAILED: "savingFailed",
  SAVING_CANCELED: "savingCanceled",
  SAVED: "saved",

  // Close
  CLOSING: "closing",
  CLOSING_CANCELED: "closingCanceled",
  CLOSED: "closed",

  // Refresh
  REFRESHING: "refreshing",
  REFRESHING_FAILED: "refreshingFailed",
  REFRESHING_CANCELED: "refreshingCanceled",
  REFRESHED: "refreshed",

  // Activation (deactivation when `newProject` is null)
  ACTIVATION: "activation",
  ACTIVATION_FAILED: "activationFailed",
  ACTIVATION_CANCELED: "activationCanceled",
  ACTIVATED: "activated",
} as const;

export type ProjectEventType = (typeof ProjectEventType)[keyof typeof ProjectEventType];

// ── Payloads ─────────────────────────────────────────

/** Mixed into begin events; any observer may set `cancel`. */
export interface Cancellable {
  cancel: boolean;
}

export interface ProjectLocationEvent {
  readonly location: string;
}

export interface ProjectLocationCancelEvent extends ProjectLocationEvent, Cancellable {}

export interface ProjectLocationErrorEvent extends ProjectLocationEvent {
  /** Null when the failure is fully described by `validation`. */
  readonly error: Error | null;
  readonly validation: ValidationContext | null;
}

export interface ProjectEvent<TProject extends Project = Project> {
  readonly project: TProject;
}

export interface ProjectCancelEvent<TProject extends Project = Project>
  extends ProjectEvent<TProject>, Cancellable {}

export interface ProjectSaveEvent<TProject extends Project = Project> extends ProjectEvent<TProject> {
  /** Target location of the write; may differ from `project.location`. */
  readonly location: string;
}

export interface ProjectSaveCancelEvent<TProject extends Project = Project>
  extends ProjectSaveEvent<TProject>, Cancellable {}

export interface ProjectSaveErrorEvent<TProject extends Project = Project>
  extends ProjectSaveEvent<TProject> {
  /** Null when the writer rejected the write without throwing. */
  readonly error: Error | null;
}

export interface ProjectErrorEvent<TProject extends Project = Project> extends ProjectEvent<TProject> {
  readonly error: Error | null;
  readonly validation: ValidationContext | null;
}

export interface ProjectUpdatedEvent<TProject extends Project = Project> {
  readonly oldProject: TProject | null;
  readonly newProject: TProject | null;
  /** Both sides are set and share a location. */
  readonly isRefresh: boolean;
}

export interface ProjectUpdatingCancelEvent<TProject extends Project = Project>
  extends ProjectUpdatedEvent<TProject>, Cancellable {}

/** Payload type of every event, keyed by event type. */
export interface ProjectEventMap<TProject extends Project = Project> {
  loading: ProjectLocationCancelEvent;
  loadingFailed: ProjectLocationErrorEvent;
  loadingCanceled: ProjectLocationEvent;
  loaded: ProjectEvent<TProject>;

  saving: ProjectSaveCancelEvent<TProject>;
  savingFailed: ProjectSaveErrorEvent<TProject>;
  savingCanceled: ProjectSaveEvent<TProject>;
  saved: ProjectSaveEvent<TProject>;

  closing: ProjectCancelEvent<TProject>;
  closingCanceled: ProjectEvent<TProject>;
  closed: ProjectEvent<TProject>;

  refreshing: ProjectCancelEvent<TProject>;
  refreshingFailed: ProjectErrorEvent<TProject>;
  refreshingCanceled: ProjectEvent<TProject>;
  refreshed: ProjectEvent<TProject>;

  activation: ProjectUpdatingCancelEvent<TProject>;
  activationFailed: ProjectErrorEvent<TProject>;
  activationCanceled: ProjectEvent<TProject>;
  activated: ProjectUpdatedEvent<TProject>;
}

export type ProjectEventHandler<
  TProject extends Project,
  K extends ProjectEventType,
> = (event: ProjectEventMap<TProject>[K]) => Promise<void> | void;

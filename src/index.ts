export {
  ProjectManager,
  ProjectRegistry,
  ProjectStateService,
  createProjectState,
  ManagementMode,
  normalizeLocation,
  locationsEqual,
  isBlankLocation,
  assertLocation,
  ValidationContext,
  ProjectValidatorBase,
  FileExistsProjectValidator,
  FixedProjectSerializerSelector,
  NoopProjectUpgrader,
  EmptyProjectInitializer,
  SettingsProjectInitializer,
  ProjectRefresherBase,
  NullProjectRefresherSelector,
  ProjectWatcherBase,
  CloseBeforeLoadProjectWatcher,
  YamlProjectSerializer,
} from "./projects/index.ts";
export type {
  ProjectManagerDeps,
  ProjectState,
  ProjectStateFlag,
  Project,
  DataProject,
  ProjectValidator,
  ValidationResult,
  ValidationSeverity,
  ProjectReader,
  ProjectWriter,
  ProjectSerializerSelector,
  ProjectUpgrader,
  ProjectInitializer,
  ProjectRefresher,
  ProjectRefresherSelector,
  RefresherUpdatedHandler,
} from "./projects/index.ts";
export { ProjectEventPipeline, ProjectEventType } from "./events/index.ts";
export type {
  Cancellable,
  ProjectEventMap,
  ProjectEventHandler,
  ProjectEvent,
  ProjectCancelEvent,
  ProjectErrorEvent,
  ProjectLocationEvent,
  ProjectLocationCancelEvent,
  ProjectLocationErrorEvent,
  ProjectSaveEvent,
  ProjectSaveCancelEvent,
  ProjectSaveErrorEvent,
  ProjectUpdatedEvent,
  ProjectUpdatingCancelEvent,
} from "./events/index.ts";
export {
  KeystoneError,
  ConfigError,
  ArgumentError,
  ProjectError,
  ProjectValidationError,
  SingleDocumentModeError,
  ProjectIOError,
  getLogger,
  getSettings,
  setSettings,
  resetSettings,
  loadSettings,
  SettingsSchema,
  AsyncLock,
} from "./infra/index.ts";
export type { Settings, ManagementConfig, LogFormat } from "./infra/index.ts";

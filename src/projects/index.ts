export { ProjectManager } from "./manager.ts";
export type { ProjectManagerDeps } from "./manager.ts";
export { ProjectRegistry } from "./registry.ts";
export { ProjectStateService, createProjectState } from "./state.ts";
export type { ProjectState, ProjectStateFlag } from "./state.ts";
export { ManagementMode } from "./types.ts";
export type { Project, DataProject } from "./types.ts";
export { normalizeLocation, locationsEqual, isBlankLocation, assertLocation } from "./location.ts";
export {
  ValidationContext,
  ProjectValidatorBase,
  FileExistsProjectValidator,
} from "./validation.ts";
export type { ProjectValidator, ValidationResult, ValidationSeverity } from "./validation.ts";
export {
  FixedProjectSerializerSelector,
  NoopProjectUpgrader,
  EmptyProjectInitializer,
  SettingsProjectInitializer,
} from "./collaborators.ts";
export type {
  ProjectReader,
  ProjectWriter,
  ProjectSerializerSelector,
  ProjectUpgrader,
  ProjectInitializer,
} from "./collaborators.ts";
export { ProjectRefresherBase, NullProjectRefresherSelector } from "./refresher.ts";
export type { ProjectRefresher, ProjectRefresherSelector, RefresherUpdatedHandler } from "./refresher.ts";
export { ProjectWatcherBase, CloseBeforeLoadProjectWatcher } from "./watcher.ts";
export { YamlProjectSerializer } from "./yaml-serializer.ts";

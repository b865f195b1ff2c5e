export { ProjectEventPipeline } from "./pipeline.ts";
export { ProjectEventType } from "./types.ts";
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
} from "./types.ts";

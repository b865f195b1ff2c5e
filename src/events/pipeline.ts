/**
 * ProjectEventPipeline: ordered, awaited fan-out of lifecycle events.
 *
 * Handlers run one after another in subscription order; each is awaited
 * before the next starts, so a begin handler sees the `cancel` value left by
 * the ones before it. Handler errors propagate to the emitter.
 */
import { getLogger } from "../infra/logger.ts";
import type { Project } from "../projects/types.ts";
import type { ProjectEventHandler, ProjectEventMap, ProjectEventType } from "./types.ts";

const logger = getLogger("event_pipeline");

type HandlerTable<TProject extends Project> = {
  [K in ProjectEventType]: Array<ProjectEventHandler<TProject, K>>;
};

function createHandlerTable<TProject extends Project>(): HandlerTable<TProject> {
  return {
    loading: [],
    loadingFailed: [],
    loadingCanceled: [],
    loaded: [],
    saving: [],
    savingFailed: [],
    savingCanceled: [],
    saved: [],
    closing: [],
    closingCanceled: [],
    closed: [],
    refreshing: [],
    refreshingFailed: [],
    refreshingCanceled: [],
    refreshed: [],
    activation: [],
    activationFailed: [],
    activationCanceled: [],
    activated: [],
  };
}

export class ProjectEventPipeline<TProject extends Project = Project> {
  private readonly handlers: HandlerTable<TProject> = createHandlerTable<TProject>();

  // ── Subscribe / Unsubscribe ──

  /** Subscribe to one event type. Returns a function that unsubscribes. */
  subscribe<K extends ProjectEventType>(
    type: K,
    handler: ProjectEventHandler<TProject, K>,
  ): () => void {
    const list: Array<ProjectEventHandler<TProject, K>> = this.handlers[type];
    list.push(handler);
    return () => this.unsubscribe(type, handler);
  }

  unsubscribe<K extends ProjectEventType>(type: K, handler: ProjectEventHandler<TProject, K>): void {
    const list: Array<ProjectEventHandler<TProject, K>> = this.handlers[type];
    const idx = list.indexOf(handler);
    if (idx >= 0) list.splice(idx, 1);
  }

  listenerCount(type: ProjectEventType): number {
    return this.handlers[type].length;
  }

  // ── Emit ──

  /**
   * Deliver `event` to every handler of `type`, in order.
   * The handler list is snapshotted first, so (un)subscribing from inside a
   * handler takes effect on the next emit.
   */
  async emit<K extends ProjectEventType>(type: K, event: ProjectEventMap<TProject>[K]): Promise<void> {
    const list: Array<ProjectEventHandler<TProject, K>> = [...this.handlers[type]];
    logger.debug({ eventType: type, handlers: list.length }, "event_emitted");

    for (const handler of list) {
      await handler(event);
    }
  }
}

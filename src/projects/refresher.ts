/**
 * Refreshers: per-location notifiers that report external changes.
 *
 * The manager attaches a handler with `onUpdated`, then calls `subscribe()`
 * when the location is registered; on unregistration it calls
 * `unsubscribe()` and detaches the handler.
 */
import { getLogger } from "../infra/logger.ts";

const logger = getLogger("project_refresher");

export type RefresherUpdatedHandler = (location: string) => Promise<void> | void;

export interface ProjectRefresher {
  readonly location: string;
  /** Start watching the location. */
  subscribe(): void;
  /** Stop watching the location. */
  unsubscribe(): void;
  /** Attach an update handler. Returns a function that detaches it. */
  onUpdated(handler: RefresherUpdatedHandler): () => void;
}

export interface ProjectRefresherSelector {
  getRefresher(location: string): ProjectRefresher | null;
}

export class NullProjectRefresherSelector implements ProjectRefresherSelector {
  getRefresher(_location: string): ProjectRefresher | null {
    return null;
  }
}

/**
 * Keeps the handler list and subscription flag. Subclasses hook the
 * watching mechanism into `onSubscribe`/`onUnsubscribe` and call
 * `raiseUpdated()` when the location changes.
 */
export abstract class ProjectRefresherBase implements ProjectRefresher {
  readonly location: string;
  private readonly handlers: RefresherUpdatedHandler[] = [];
  private _isSubscribed = false;

  constructor(location: string) {
    this.location = location;
  }

  get isSubscribed(): boolean {
    return this._isSubscribed;
  }

  get handlerCount(): number {
    return this.handlers.length;
  }

  subscribe(): void {
    if (this._isSubscribed) return;
    this.onSubscribe();
    this._isSubscribed = true;
    logger.debug({ location: this.location }, "refresher_subscribed");
  }

  unsubscribe(): void {
    if (!this._isSubscribed) return;
    this._isSubscribed = false;
    this.onUnsubscribe();
    logger.debug({ location: this.location }, "refresher_unsubscribed");
  }

  onUpdated(handler: RefresherUpdatedHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const idx = this.handlers.indexOf(handler);
      if (idx >= 0) this.handlers.splice(idx, 1);
    };
  }

  /** Notify handlers in attach order, awaiting each. */
  async raiseUpdated(): Promise<void> {
    if (!this._isSubscribed) {
      logger.debug({ location: this.location }, "refresher_update_ignored_unsubscribed");
      return;
    }
    for (const handler of [...this.handlers]) {
      await handler(this.location);
    }
  }

  protected abstract onSubscribe(): void;
  protected abstract onUnsubscribe(): void;
}

/**
 * ProjectStateService: per-location transition flags exposed to observers.
 *
 * Every read hands out a copy; the manager is the only writer, through
 * `updateState`.
 */
import { getLogger } from "../infra/logger.ts";
import { normalizeLocation } from "./location.ts";

const logger = getLogger("project_state");

export interface ProjectState {
  location: string;
  isLoading: boolean;
  isSaving: boolean;
  isRefreshing: boolean;
  isActivating: boolean;
  isDeactivating: boolean;
  isClosing: boolean;
}

export type ProjectStateFlag = Exclude<keyof ProjectState, "location">;

export function createProjectState(location: string): ProjectState {
  return {
    location,
    isLoading: false,
    isSaving: false,
    isRefreshing: false,
    isActivating: false,
    isDeactivating: false,
    isClosing: false,
  };
}

export type ProjectStateListener = (state: ProjectState) => void;
export type RefreshingActiveProjectListener = (isRefreshingActiveProject: boolean) => void;

export class ProjectStateService {
  private readonly states = new Map<string, ProjectState>();
  private readonly stateListeners: ProjectStateListener[] = [];
  private readonly refreshingListeners: RefreshingActiveProjectListener[] = [];
  private _isRefreshingActiveProject = false;

  /** Snapshot of a location's state; unseen locations report all flags false. */
  getState(location: string): ProjectState {
    const state = this.states.get(normalizeLocation(location));
    return state ? { ...state } : createProjectState(location);
  }

  /** Apply `update` to the live state of a location, creating it on first touch. */
  updateState(location: string, update: (state: ProjectState) => void): void {
    const key = normalizeLocation(location);
    let state = this.states.get(key);
    if (!state) {
      state = createProjectState(location);
      this.states.set(key, state);
    }

    update(state);
    // The key is fixed; observers always see the canonical spelling
    state.location = location;

    const snapshot = { ...state };
    for (const listener of [...this.stateListeners]) {
      listener(snapshot);
    }
  }

  /** Set one flag for the duration of `section`, clearing it on every exit path. */
  async track<T>(location: string, flag: ProjectStateFlag, section: () => Promise<T>): Promise<T> {
    this.updateState(location, (state) => {
      state[flag] = true;
    });
    try {
      return await section();
    } finally {
      this.updateState(location, (state) => {
        state[flag] = false;
      });
    }
  }

  get isRefreshingActiveProject(): boolean {
    return this._isRefreshingActiveProject;
  }

  setRefreshingActiveProject(value: boolean): void {
    if (this._isRefreshingActiveProject === value) return;
    this._isRefreshingActiveProject = value;
    logger.debug({ isRefreshingActiveProject: value }, "refreshing_active_project_changed");
    for (const listener of [...this.refreshingListeners]) {
      listener(value);
    }
  }

  /** Listen for state changes. Returns an unsubscribe function. */
  onStateUpdated(listener: ProjectStateListener): () => void {
    this.stateListeners.push(listener);
    return () => removeListener(this.stateListeners, listener);
  }

  onRefreshingActiveProjectChanged(listener: RefreshingActiveProjectListener): () => void {
    this.refreshingListeners.push(listener);
    return () => removeListener(this.refreshingListeners, listener);
  }
}

function removeListener<T>(list: T[], listener: T): void {
  const idx = list.indexOf(listener);
  if (idx >= 0) list.splice(idx, 1);
}

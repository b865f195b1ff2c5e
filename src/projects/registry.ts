/**
 * ProjectRegistry: registered projects keyed by case-insensitive location,
 * in insertion order.
 */
import { getLogger } from "../infra/logger.ts";
import { normalizeLocation } from "./location.ts";
import type { Project } from "./types.ts";

const logger = getLogger("project_registry");

export class ProjectRegistry<TProject extends Project = Project> {
  private readonly projects = new Map<string, TProject>();

  /**
   * Register a project. Re-registering a location replaces the project
   * but keeps the location's original position.
   */
  register(project: TProject): void {
    this.projects.set(normalizeLocation(project.location), project);
    logger.debug({ location: project.location, total: this.projects.size }, "project_registered");
  }

  /** Remove the entry for a location. Returns the removed project, or null. */
  remove(location: string): TProject | null {
    const key = normalizeLocation(location);
    const project = this.projects.get(key);
    if (!project) return null;

    this.projects.delete(key);
    logger.debug({ location, total: this.projects.size }, "project_unregistered");
    return project;
  }

  get(location: string): TProject | null {
    return this.projects.get(normalizeLocation(location)) ?? null;
  }

  /** True when this exact instance is the one registered for its location. */
  contains(project: TProject): boolean {
    return this.get(project.location) === project;
  }

  /** Snapshot in insertion order. */
  list(): TProject[] {
    return [...this.projects.values()];
  }

  get size(): number {
    return this.projects.size;
  }
}

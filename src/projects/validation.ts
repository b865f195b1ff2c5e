/**
 * Validation: results collected by project validators before and after a read.
 */
import { access } from "node:fs/promises";
import type { Project } from "./types.ts";

export type ValidationSeverity = "error" | "warning";

export interface ValidationResult {
  severity: ValidationSeverity;
  message: string;
  /** Optional tag for grouping results (e.g. the rule that produced it). */
  tag?: string;
}

/** Collected validation results for one location or project. */
export class ValidationContext {
  private readonly results: ValidationResult[] = [];

  constructor(results: Iterable<ValidationResult> = []) {
    for (const result of results) {
      this.results.push({ ...result });
    }
  }

  static withError(message: string, tag?: string): ValidationContext {
    const context = new ValidationContext();
    context.addError(message, tag);
    return context;
  }

  addError(message: string, tag?: string): this {
    this.results.push({ severity: "error", message, tag });
    return this;
  }

  addWarning(message: string, tag?: string): this {
    this.results.push({ severity: "warning", message, tag });
    return this;
  }

  getResults(): ValidationResult[] {
    return this.results.map((r) => ({ ...r }));
  }

  get errors(): ValidationResult[] {
    return this.getResults().filter((r) => r.severity === "error");
  }

  get warnings(): ValidationResult[] {
    return this.getResults().filter((r) => r.severity === "warning");
  }

  get hasErrors(): boolean {
    return this.results.some((r) => r.severity === "error");
  }

  get hasWarnings(): boolean {
    return this.results.some((r) => r.severity === "warning");
  }

  toString(): string {
    return this.results.map((r) => `[${r.severity}] ${r.message}`).join("\n");
  }
}

/** Gates consulted before and after a project is read. */
export interface ProjectValidator<TProject extends Project = Project> {
  canStartLoading(location: string): Promise<boolean>;
  validateBeforeLoading(location: string): Promise<ValidationContext>;
  validateLoaded(project: TProject): Promise<ValidationContext>;
}

/** Lets everything through; subclasses override the gates they care about. */
export class ProjectValidatorBase<TProject extends Project = Project>
  implements ProjectValidator<TProject>
{
  async canStartLoading(_location: string): Promise<boolean> {
    return true;
  }

  async validateBeforeLoading(_location: string): Promise<ValidationContext> {
    return new ValidationContext();
  }

  async validateLoaded(_project: TProject): Promise<ValidationContext> {
    return new ValidationContext();
  }
}

/** Only starts loading when the location exists on disk. */
export class FileExistsProjectValidator<
  TProject extends Project = Project,
> extends ProjectValidatorBase<TProject> {
  override async canStartLoading(location: string): Promise<boolean> {
    try {
      await access(location);
      return true;
    } catch {
      return false;
    }
  }
}

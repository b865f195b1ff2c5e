/** Types for the project lifecycle: file-backed units of application state. */

/**
 * A loaded project. The location is its identity (compared case-insensitively);
 * everything else is payload owned by the reader that produced it.
 */
export interface Project {
  readonly location: string;
}

/** A project carrying an arbitrary payload, as produced by the bundled serializers. */
export interface DataProject<TData = unknown> extends Project {
  data: TData;
}

/** How many projects may be registered at once. */
export const ManagementMode = {
  SINGLE_DOCUMENT: "single",
  MULTIPLE_DOCUMENTS: "multiple",
} as const;

export type ManagementMode = (typeof ManagementMode)[keyof typeof ManagementMode];

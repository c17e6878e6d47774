export interface WorkspaceItems {
  readonly semanticModels: readonly string[];
  readonly reports: readonly string[];
}

/** Items grouped by the folder that holds them. */
export type WorkspaceIndex = ReadonlyMap<string, WorkspaceItems>;

export interface SeverityCounts {
  readonly infos: number;
  readonly warnings: number;
  readonly errors: number;
}

export interface SeverityTagged {
  readonly severity: number;
}

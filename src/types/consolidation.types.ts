export interface ShowDirectory {
  readonly path: string;
  readonly rawTitle: string;
  readonly season?: number;
  readonly year?: number;
  readonly normalizedTitle: string;
  readonly confidence: number;
}

export interface ShowGroup {
  canonicalTitle: string;
  year?: number;
  externalId?: string;
  readonly members: ShowDirectory[];
}

export interface ConsolidationOperation {
  readonly source: string;
  readonly destination?: string;
  readonly season?: number;
  readonly success: boolean;
  readonly error?: string;
  /** Files left in place because the destination already had them. */
  readonly skipped?: readonly string[];
}

export interface ConsolidationResult {
  readonly showTitle: string;
  readonly unifiedDirectory: string;
  readonly externalId?: string;
  readonly operations: readonly ConsolidationOperation[];
}

export interface ConsolidateOptions {
  dryRun: boolean;
}

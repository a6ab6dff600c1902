/** Classified output of the update-check command. `found === count > 0`. */
export interface UpdateResult {
  readonly lines: readonly string[];
  readonly count: number;
  readonly found: boolean;
}

/** Ordered report lines, rendered with `\n` between them. */
export interface ReportBody {
  readonly lines: readonly string[];
}

/** A size-bounded slice of the report; ordinals start at 1. */
export interface Chunk {
  readonly text: string;
  readonly ordinal: number;
}

export type DispatchOutcome =
  | { readonly ordinal: number; readonly ok: true; readonly status: number }
  | { readonly ordinal: number; readonly ok: false; readonly cause: "http"; readonly status: number }
  | { readonly ordinal: number; readonly ok: false; readonly cause: "transport"; readonly message: string };

export interface TransferConfig {
  destination: string;
  transportArgs: string[];
  baseFlags: string[];
  preserveRelativePaths: boolean;
  extraFlags: string[];
  installDefaultKeybindings: boolean;
  listHide: string[];
}

export type Severity = "info" | "warning" | "error";

export interface Notifier {
  notify(message: string, severity: Severity): void;
}

export type TransferResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: TransferError };

export interface TransferError {
  category: FailureCategory;
  message: string;
  exitCode?: number;
}

export type FailureCategory =
  | "NO_TARGET"
  | "DESTINATION_UNSET"
  | "NOTHING_MARKED"
  | "TOOL_NOT_FOUND"
  | "TRANSFER_FAILED"
  | "SURFACE_FAILED"
  | "BUSY";

export type MarkOutcome = "marked" | "unmarked" | "no_target";

export type SessionState =
  | "idle"
  | "launching"
  | "running"
  | "succeeded"
  | "failed";

export interface SessionOutcome {
  state: "succeeded" | "failed";
  exitCode?: number;
  error?: TransferError;
}

export interface SurfaceRequest {
  title: string;
  commandLine: string;
}

export interface ExecutionSurface {
  /** Resolves with the process exit code once it has terminated. */
  readonly exit: Promise<number>;
}

export interface SurfaceFactory {
  create(request: SurfaceRequest): ExecutionSurface;
}

export interface ListingEntry {
  line: number;
  path: string;
}

export interface ListingContext<V> {
  view: V;
  directory: string;
  line: number;
  lineText: string;
  column: number;
}

export interface ListingHost<V> {
  activeContext(): ListingContext<V> | undefined;
  /** Every listing view currently on screen. */
  visibleListings(): readonly V[];
  entriesOf(view: V): ListingEntry[];
}

export interface TransferRecord {
  finishedAt: string;
  mode: "upload" | "uploadAndRemove";
  pathCount: number;
  outcome: SessionOutcome;
}

import type {
  ListingHost,
  MarkOutcome,
  Notifier,
  Severity,
  TransferConfig,
  TransferError,
  TransferRecord,
  TransferResult,
} from "./types.js";
import type { MarkStore } from "./markStore.js";
import type { TransferSession, TransferSupervisor } from "./session.js";
import { buildTransferCommand, type BuildOptions } from "./command.js";
import { isDestinationSet, withRemoveSourceFiles, type SettingsSource } from "./config.js";
import { resolveEntryPath } from "./paths.js";
import { collectDirectories, removeEmptiedDirectories } from "./cleanup.js";
import { recordTransfer } from "./diagnostics.js";
import { updateStatusBar } from "./statusbar.js";
import { refreshSidebar } from "./sidebar.js";

export type TransferMode = TransferRecord["mode"];

export interface TransferControllerDeps<V, H> {
  store: MarkStore<V, H>;
  listings: ListingHost<V>;
  supervisor: Pick<TransferSupervisor, "run">;
  notifier: Notifier;
  settings: SettingsSource;
  buildOptions?: BuildOptions;
}

/**
 * The user-facing mark and upload operations.
 */
export class TransferController<V, H = number> {
  private readonly store: MarkStore<V, H>;
  private readonly listings: ListingHost<V>;
  private readonly supervisor: Pick<TransferSupervisor, "run">;
  private readonly notifier: Notifier;
  private readonly settings: SettingsSource;
  private readonly buildOptions: BuildOptions | undefined;

  private transferLock = false;
  private lastTransferFailed = false;

  constructor(deps: TransferControllerDeps<V, H>) {
    this.store = deps.store;
    this.listings = deps.listings;
    this.supervisor = deps.supervisor;
    this.notifier = deps.notifier;
    this.settings = deps.settings;
    this.buildOptions = deps.buildOptions;
  }

  isTransferring(): boolean {
    return this.transferLock;
  }

  toggleMark(): MarkOutcome {
    const context = this.listings.activeContext();
    if (!context) {
      this.notifier.notify("Not in a directory listing", "warning");
      return "no_target";
    }

    const target = resolveEntryPath(context.directory, context.lineText, context.column);
    if (!target) {
      this.notifier.notify("No file under cursor", "warning");
      return "no_target";
    }

    const outcome = this.store.toggle(target, context.view, context.line);
    for (const view of this.listings.visibleListings()) {
      if (view !== context.view) {
        this.store.redraw(view, this.listings.entriesOf(view));
      }
    }
    if (outcome === "marked") {
      this.notifier.notify(`Marked: ${target}`, "info");
    } else if (outcome === "unmarked") {
      this.notifier.notify(`Unmarked: ${target}`, "info");
    }
    this.refreshViews();
    return outcome;
  }

  clearMarks(): void {
    this.store.clearAll();
    this.notifier.notify("Cleared all marks", "info");
    this.refreshViews();
  }

  setDestination(destination: string | undefined): boolean {
    const target = destination?.trim();
    if (!target) {
      this.notifier.notify(
        "Usage: Set Destination user@host:/path/to/destination/",
        "info"
      );
      return false;
    }
    this.settings.setDestination(target);
    this.notifier.notify(`Rsync destination set to: ${target}`, "info");
    this.refreshViews();
    return true;
  }

  uploadMarked(): Promise<TransferResult<TransferSession>> {
    return this.startTransfer("upload");
  }

  uploadMarkedRemove(): Promise<TransferResult<TransferSession>> {
    return this.startTransfer("uploadAndRemove");
  }

  refreshViews(): void {
    let state: Parameters<typeof updateStatusBar>[0] = "idle";
    if (this.transferLock) {
      state = "transferring";
    } else if (!isDestinationSet(this.settings.current().destination)) {
      state = "unconfigured";
    } else if (this.lastTransferFailed) {
      state = "error";
    }
    updateStatusBar(state, this.store.size);
    refreshSidebar();
  }

  private async startTransfer(
    mode: TransferMode
  ): Promise<TransferResult<TransferSession>> {
    if (this.transferLock) {
      return this.reject(
        { category: "BUSY", message: "A transfer is already in progress." },
        "warning"
      );
    }

    const config = this.settings.current();
    if (!isDestinationSet(config.destination)) {
      return this.reject(
        {
          category: "DESTINATION_UNSET",
          message: "Rsync destination not set! Use \"Rsync Marks: Set Destination\".",
        },
        "error"
      );
    }

    const paths = this.store.snapshot();
    if (paths.length === 0) {
      return this.reject(
        { category: "NOTHING_MARKED", message: "No marked files to upload" },
        "warning"
      );
    }

    this.transferLock = true;
    let launched: TransferResult<TransferSession>;
    try {
      launched = await this.launch(mode, paths, config);
    } catch (err) {
      this.transferLock = false;
      throw err;
    }
    if (!launched.ok) {
      this.transferLock = false;
      return launched;
    }

    const session = launched.data;
    this.refreshViews();
    void session.completion.then((outcome) => {
      this.transferLock = false;
      this.lastTransferFailed = outcome.state === "failed";
      recordTransfer({
        finishedAt: new Date().toISOString(),
        mode,
        pathCount: paths.length,
        outcome,
      });
      this.refreshViews();
    });

    return { ok: true, data: session };
  }

  private async launch(
    mode: TransferMode,
    paths: string[],
    config: TransferConfig
  ): Promise<TransferResult<TransferSession>> {
    const removeSources = mode === "uploadAndRemove";
    const built = await buildTransferCommand(
      paths,
      removeSources ? withRemoveSourceFiles(config) : config,
      this.buildOptions
    );
    if (!built.ok) {
      return this.reject(built.error, "error");
    }

    const directories = removeSources ? await collectDirectories(paths) : [];
    const session = this.supervisor.run(
      built.data,
      removeSources ? () => this.afterRemoveUpload(directories) : undefined
    );
    return { ok: true, data: session };
  }

  private async afterRemoveUpload(directories: string[]): Promise<void> {
    const removed = await removeEmptiedDirectories(directories);
    if (removed.length > 0) {
      this.notifier.notify(`Removed empty directories: ${removed.join(", ")}`, "info");
    }
    this.store.clearAll();
    this.refreshViews();
  }

  private reject(
    error: TransferError,
    severity: Severity
  ): TransferResult<TransferSession> {
    this.notifier.notify(error.message, severity);
    return { ok: false, error };
  }
}

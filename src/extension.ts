import * as vscode from "vscode";
import * as path from "node:path";
import { MarkStore } from "./markStore.js";
import { MarkDecorations } from "./decorations.js";
import {
  LISTING_SCHEME,
  ListingProvider,
  ListingViews,
  isListingEditor,
  openListing,
} from "./listing.js";
import { TransferSettings, CONFIG_SECTION } from "./config.js";
import { TransferSupervisor } from "./session.js";
import { TerminalSurfaceFactory } from "./terminal.js";
import { TransferController } from "./upload.js";
import { createNotifier, log, showStatus } from "./diagnostics.js";
import { initializeStatusBar } from "./statusbar.js";
import { initializeSidebar } from "./sidebar.js";
import {
  LISTING_LINE_CHARS,
  extractEntryToken,
  isParentOrSelf,
  resolveEntryPath,
} from "./paths.js";
import type { TransferConfig } from "./types.js";

const KEYBINDINGS_CONTEXT = "rsyncMarks.keybindingsEnabled";

export interface RsyncMarksApi {
  configure(options: Record<string, unknown>): TransferConfig;
  snapshot(): string[];
}

export function activate(context: vscode.ExtensionContext): RsyncMarksApi {
  const settings = new TransferSettings();
  const notifier = createNotifier();
  const decorations = new MarkDecorations();
  const store = new MarkStore<vscode.TextEditor>(decorations);
  const listings = new ListingViews();
  const provider = new ListingProvider(() => settings.current().listHide);
  const controller = new TransferController({
    store,
    listings,
    supervisor: new TransferSupervisor(new TerminalSurfaceFactory(), notifier),
    notifier,
    settings,
  });

  context.subscriptions.push(decorations, provider);
  context.subscriptions.push(
    vscode.workspace.registerTextDocumentContentProvider(LISTING_SCHEME, provider)
  );

  initializeStatusBar(context);
  const sidebarProvider = initializeSidebar({
    destination: () => settings.current().destination,
    markedPaths: () => store.snapshot(),
  });
  context.subscriptions.push(
    vscode.window.registerTreeDataProvider("rsyncMarks.sidebar", sidebarProvider)
  );

  context.subscriptions.push(
    vscode.commands.registerCommand("rsyncMarks.toggleMark", () =>
      controller.toggleMark()
    ),
    vscode.commands.registerCommand("rsyncMarks.upload", () =>
      controller.uploadMarked()
    ),
    vscode.commands.registerCommand("rsyncMarks.uploadAndRemove", () =>
      controller.uploadMarkedRemove()
    ),
    vscode.commands.registerCommand("rsyncMarks.clearMarks", () =>
      controller.clearMarks()
    ),
    vscode.commands.registerCommand("rsyncMarks.setDestination", (target?: unknown) =>
      setDestination(controller, settings, target)
    ),
    vscode.commands.registerCommand("rsyncMarks.openListing", (uri?: vscode.Uri) =>
      openListingFor(uri)
    ),
    vscode.commands.registerCommand("rsyncMarks.refreshListing", () => {
      const editor = vscode.window.activeTextEditor;
      if (editor && isListingEditor(editor)) {
        provider.refresh(editor.document.uri);
      }
    }),
    vscode.commands.registerCommand("rsyncMarks.openEntry", () => openEntry(listings)),
    vscode.commands.registerCommand("rsyncMarks.showStatus", () =>
      showStatus(settings.current().destination, store.snapshot())
    )
  );

  // A listing that is reloaded or shown again loses its decorations.
  let knownListingEditors: vscode.TextEditor[] =
    vscode.window.visibleTextEditors.filter(isListingEditor);
  context.subscriptions.push(
    vscode.workspace.onDidChangeTextDocument((event) => {
      if (event.document.uri.scheme !== LISTING_SCHEME) {
        return;
      }
      for (const editor of vscode.window.visibleTextEditors) {
        if (editor.document === event.document) {
          store.redraw(editor, listings.entriesOf(editor));
        }
      }
    }),
    vscode.window.onDidChangeVisibleTextEditors((editors) => {
      const visible = new Set(editors);
      for (const editor of editors) {
        if (isListingEditor(editor)) {
          store.redraw(editor, listings.entriesOf(editor));
        }
      }
      for (const editor of knownListingEditors) {
        if (!visible.has(editor)) {
          store.releaseView(editor);
          decorations.forget(editor);
        }
      }
      knownListingEditors = editors.filter(isListingEditor);
    })
  );

  context.subscriptions.push(
    vscode.workspace.onDidChangeConfiguration((e) => {
      if (e.affectsConfiguration(CONFIG_SECTION)) {
        void updateKeybindingContext(settings);
        controller.refreshViews();
      }
    })
  );

  void updateKeybindingContext(settings);
  controller.refreshViews();
  log("Rsync Marks activated");

  return {
    configure(options: Record<string, unknown>): TransferConfig {
      const config = settings.configure(options);
      void updateKeybindingContext(settings);
      controller.refreshViews();
      return config;
    },
    snapshot: () => store.snapshot(),
  };
}

export function deactivate(): void {}

async function updateKeybindingContext(settings: TransferSettings): Promise<void> {
  await vscode.commands.executeCommand(
    "setContext",
    KEYBINDINGS_CONTEXT,
    settings.current().installDefaultKeybindings
  );
}

async function setDestination(
  controller: TransferController<vscode.TextEditor>,
  settings: TransferSettings,
  target: unknown
): Promise<void> {
  if (typeof target === "string") {
    controller.setDestination(target);
    return;
  }

  const value = await vscode.window.showInputBox({
    prompt: "rsync destination (user@host:/path/to/destination/)",
    value: settings.current().destination,
    ignoreFocusOut: true,
  });
  if (value === undefined) {
    return;
  }
  controller.setDestination(value);
}

async function openListingFor(uri?: vscode.Uri): Promise<void> {
  let directory = uri?.scheme === "file" ? uri.fsPath : undefined;

  if (!directory) {
    const folder = vscode.workspace.workspaceFolders?.[0];
    directory = folder?.uri.fsPath;
  }

  if (!directory) {
    const picked = await vscode.window.showOpenDialog({
      canSelectFiles: false,
      canSelectFolders: true,
      canSelectMany: false,
      openLabel: "Open Listing",
    });
    directory = picked?.[0]?.fsPath;
  }

  if (directory) {
    await openListing(directory);
  }
}

async function openEntry(listings: ListingViews): Promise<void> {
  const context = listings.activeContext();
  if (!context) {
    return;
  }

  const token = extractEntryToken(context.lineText, context.column, LISTING_LINE_CHARS);
  if (token && isParentOrSelf(token)) {
    await openListing(token.startsWith("..") ? path.dirname(context.directory) : context.directory);
    return;
  }

  const target = resolveEntryPath(context.directory, context.lineText, context.column);
  if (!target) {
    return;
  }

  if (token?.endsWith("/")) {
    await openListing(target);
  } else {
    await vscode.window.showTextDocument(vscode.Uri.file(target));
  }
}

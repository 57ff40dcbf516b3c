import * as vscode from "vscode";
import * as fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import * as path from "node:path";
import { minimatch } from "minimatch";
import type { ListingContext, ListingEntry, ListingHost } from "./types.js";
import { resolveEntryPath } from "./paths.js";
import { log } from "./diagnostics.js";

export const LISTING_SCHEME = "rsync-listing";

const PARENT_ENTRY = "../";

export function listingUri(directory: string): vscode.Uri {
  return vscode.Uri.from({ scheme: LISTING_SCHEME, path: directory });
}

export function isListingEditor(editor: vscode.TextEditor): boolean {
  return editor.document.uri.scheme === LISTING_SCHEME;
}

function isHidden(name: string, hideGlobs: readonly string[]): boolean {
  return hideGlobs.some((glob) => minimatch(name, glob, { dot: true }));
}

async function isDirectoryEntry(
  directory: string,
  entry: Dirent
): Promise<boolean> {
  if (entry.isDirectory()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return (await fs.stat(path.join(directory, entry.name))).isDirectory();
  } catch {
    return false;
  }
}

/**
 * One line per entry: `../` first, then directories (suffixed with `/`), then
 * files, each group sorted by name.
 */
export async function renderListing(
  directory: string,
  hideGlobs: readonly string[] = []
): Promise<string> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const directories: string[] = [];
  const files: string[] = [];

  for (const entry of entries) {
    if (isHidden(entry.name, hideGlobs)) {
      continue;
    }
    if (await isDirectoryEntry(directory, entry)) {
      directories.push(`${entry.name}/`);
    } else {
      files.push(entry.name);
    }
  }

  directories.sort((a, b) => a.localeCompare(b));
  files.sort((a, b) => a.localeCompare(b));
  return [PARENT_ENTRY, ...directories, ...files].join("\n");
}

export function listingEntries(
  directory: string,
  lines: readonly string[]
): ListingEntry[] {
  const entries: ListingEntry[] = [];
  lines.forEach((text, line) => {
    const resolved = resolveEntryPath(directory, text, 0);
    if (resolved) {
      entries.push({ line, path: resolved });
    }
  });
  return entries;
}

export class ListingProvider implements vscode.TextDocumentContentProvider {
  private readonly _onDidChange = new vscode.EventEmitter<vscode.Uri>();
  readonly onDidChange = this._onDidChange.event;

  constructor(private readonly hideGlobs: () => readonly string[]) {}

  async provideTextDocumentContent(uri: vscode.Uri): Promise<string> {
    try {
      return await renderListing(uri.path, this.hideGlobs());
    } catch (err) {
      log(
        `Could not list ${uri.path}: ${err instanceof Error ? err.message : String(err)}`
      );
      return PARENT_ENTRY;
    }
  }

  refresh(uri: vscode.Uri): void {
    this._onDidChange.fire(uri);
  }

  dispose(): void {
    this._onDidChange.dispose();
  }
}

/**
 * Reads the directory and cursor entry of the active listing editor.
 */
export class ListingViews implements ListingHost<vscode.TextEditor> {
  activeContext(): ListingContext<vscode.TextEditor> | undefined {
    const editor = vscode.window.activeTextEditor;
    if (!editor || !isListingEditor(editor)) {
      return undefined;
    }
    const position = editor.selection.active;
    return {
      view: editor,
      directory: editor.document.uri.path,
      line: position.line,
      lineText: editor.document.lineAt(position.line).text,
      column: position.character,
    };
  }

  visibleListings(): readonly vscode.TextEditor[] {
    return vscode.window.visibleTextEditors.filter(isListingEditor);
  }

  entriesOf(editor: vscode.TextEditor): ListingEntry[] {
    const document = editor.document;
    const lines: string[] = [];
    for (let i = 0; i < document.lineCount; i++) {
      lines.push(document.lineAt(i).text);
    }
    return listingEntries(document.uri.path, lines);
  }
}

export async function openListing(directory: string): Promise<vscode.TextEditor> {
  const document = await vscode.workspace.openTextDocument(listingUri(directory));
  return vscode.window.showTextDocument(document, { preview: false });
}

import * as vscode from "vscode";
import type { AnnotationHost } from "./markStore.js";
import { isListingEditor } from "./listing.js";

/**
 * Draws a dot after each marked line of a listing editor.
 */
export class MarkDecorations
  implements AnnotationHost<vscode.TextEditor, number>, vscode.Disposable
{
  private readonly decorationType: vscode.TextEditorDecorationType;
  private readonly placed = new Map<vscode.TextEditor, Map<number, number>>();
  private nextHandle = 1;

  constructor() {
    this.decorationType = vscode.window.createTextEditorDecorationType({
      after: {
        contentText: " ●",
        color: new vscode.ThemeColor("testing.iconPassed"),
      },
    });
  }

  place(editor: vscode.TextEditor, line: number): number {
    const handle = this.nextHandle++;
    let handles = this.placed.get(editor);
    if (!handles) {
      handles = new Map();
      this.placed.set(editor, handles);
    }
    handles.set(handle, line);
    this.apply(editor, handles);
    return handle;
  }

  remove(editor: vscode.TextEditor, handle: number): void {
    const handles = this.placed.get(editor);
    if (!handles || !handles.delete(handle)) {
      throw new Error(`Unknown decoration handle ${handle}`);
    }
    this.apply(editor, handles);
  }

  clear(editor: vscode.TextEditor): void {
    this.placed.delete(editor);
    editor.setDecorations(this.decorationType, []);
  }

  liveViews(): readonly vscode.TextEditor[] {
    return vscode.window.visibleTextEditors.filter(isListingEditor);
  }

  forget(editor: vscode.TextEditor): void {
    this.placed.delete(editor);
  }

  dispose(): void {
    this.decorationType.dispose();
    this.placed.clear();
  }

  private apply(editor: vscode.TextEditor, handles: Map<number, number>): void {
    const ranges = [...handles.values()]
      .filter((line) => line < editor.document.lineCount)
      .map((line) => new vscode.Range(line, 0, line, 0));
    editor.setDecorations(this.decorationType, ranges);
  }
}

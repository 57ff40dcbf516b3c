import { describe, it, expect, vi, afterEach } from "vitest";

vi.mock("vscode", () => import("./__mocks__/vscode.js"));

import { window as mockWindow } from "./__mocks__/vscode.js";
import { MarkDecorations } from "../src/decorations.js";
import { MarkStore } from "../src/markStore.js";

function fakeEditor(scheme: string, lineCount: number) {
  const drawn: number[][] = [];
  const editor = {
    document: { uri: { scheme, path: "/srv" }, lineCount },
    setDecorations: (_type: unknown, ranges: Array<{ startLine: number }>) => {
      drawn.push(ranges.map((range) => range.startLine));
    },
  } as unknown as import("vscode").TextEditor;
  return { editor, drawn };
}

describe("MarkDecorations", () => {
  afterEach(() => {
    mockWindow.visibleTextEditors = [];
  });

  it("draws placed lines that exist in the document", () => {
    const decorations = new MarkDecorations();
    const { editor, drawn } = fakeEditor("rsync-listing", 5);

    expect(decorations.place(editor, 2)).toBe(1);
    expect(decorations.place(editor, 9)).toBe(2);
    decorations.remove(editor, 1);

    expect(drawn).toEqual([[2], [2], []]);
  });

  it("throws on a handle it did not place", () => {
    const decorations = new MarkDecorations();
    const { editor } = fakeEditor("rsync-listing", 5);

    expect(() => decorations.remove(editor, 99)).toThrow("Unknown decoration handle 99");
  });

  it("only reports visible listing editors as live", () => {
    const decorations = new MarkDecorations();
    const listing = fakeEditor("rsync-listing", 3);
    const source = fakeEditor("file", 3);
    mockWindow.visibleTextEditors = [listing.editor, source.editor];

    expect(decorations.liveViews()).toEqual([listing.editor]);
  });

  it("follows a mark store through mark, unmark and clear", () => {
    const decorations = new MarkDecorations();
    const store = new MarkStore(decorations);
    const { editor, drawn } = fakeEditor("rsync-listing", 4);
    mockWindow.visibleTextEditors = [editor];

    store.toggle("/srv/a.txt", editor, 1);
    store.toggle("/srv/b.txt", editor, 3);
    store.toggle("/srv/a.txt", editor, 1);
    store.toggle("/srv/c.txt", editor, 0);
    store.clearAll();

    expect(drawn).toEqual([[1], [1, 3], [3], [3, 0], []]);
  });
});

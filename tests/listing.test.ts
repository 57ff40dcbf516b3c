import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

vi.mock("vscode", () => import("./__mocks__/vscode.js"));

import { window as mockWindow } from "./__mocks__/vscode.js";
import {
  ListingProvider,
  ListingViews,
  listingEntries,
  renderListing,
} from "../src/listing.js";

function fakeListingEditor(directory: string, lines: string[], line: number, character: number) {
  return {
    document: {
      uri: { scheme: "rsync-listing", path: directory },
      lineCount: lines.length,
      lineAt: (index: number) => ({ text: lines[index] ?? "" }),
    },
    selection: { active: { line, character } },
  };
}

describe("listing", () => {
  let root: string;

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "rsync-marks-listing-"));
    await fs.mkdir(path.join(root, "a"));
    await fs.mkdir(path.join(root, "b dir"));
    await fs.symlink(path.join(root, "a"), path.join(root, "link-to-a"));
    await fs.writeFile(path.join(root, "z.txt"), "");
    await fs.writeFile(path.join(root, "c (1).txt"), "");
    await fs.writeFile(path.join(root, ".hidden"), "");
    await fs.writeFile(path.join(root, "debug.log"), "");
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  afterEach(() => {
    mockWindow.activeTextEditor = undefined;
    mockWindow.visibleTextEditors = [];
  });

  describe("renderListing", () => {
    it("lists the parent, then directories, then files, skipping hidden globs", async () => {
      const text = await renderListing(root, ["*.log", ".hidden"]);

      expect(text).toBe("../\na/\nb dir/\nlink-to-a/\nc (1).txt\nz.txt");
    });
  });

  describe("ListingProvider", () => {
    it("falls back to the parent entry when the directory cannot be read", async () => {
      const provider = new ListingProvider(() => []);
      const missing = path.join(root, "missing");

      const text = await provider.provideTextDocumentContent({
        path: missing,
      } as unknown as import("vscode").Uri);

      expect(text).toBe("../");
    });
  });

  describe("listingEntries", () => {
    it("resolves every entry line except the parent", () => {
      expect(listingEntries("/srv", ["../", "a/", "b dir/", "c (1).txt"])).toEqual([
        { line: 1, path: "/srv/a" },
        { line: 2, path: "/srv/b dir" },
        { line: 3, path: "/srv/c (1).txt" },
      ]);
    });

    it("keeps quotes and glob characters in entry names", () => {
      expect(listingEntries("/tmp/d", ["../", "don't/", "a*b.txt"])).toEqual([
        { line: 1, path: "/tmp/d/don't" },
        { line: 2, path: "/tmp/d/a*b.txt" },
      ]);
    });
  });

  describe("ListingViews", () => {
    it("reads the cursor line of the active listing", () => {
      const editor = fakeListingEditor("/srv", ["../", "a/", "b dir/"], 2, 3);
      mockWindow.activeTextEditor = editor;

      expect(new ListingViews().activeContext()).toEqual({
        view: editor,
        directory: "/srv",
        line: 2,
        lineText: "b dir/",
        column: 3,
      });
    });

    it("lists only visible listing editors", () => {
      const listing = fakeListingEditor("/srv", ["../"], 0, 0);
      const source = fakeListingEditor("/srv", ["a.txt"], 0, 0);
      source.document.uri.scheme = "file";
      mockWindow.visibleTextEditors = [listing, source];

      expect(new ListingViews().visibleListings()).toEqual([listing]);
    });

    it("has no context outside a listing", () => {
      const editor = fakeListingEditor("/srv", ["a.txt"], 0, 0);
      editor.document.uri.scheme = "file";
      mockWindow.activeTextEditor = editor;

      expect(new ListingViews().activeContext()).toBeUndefined();
    });
  });
});

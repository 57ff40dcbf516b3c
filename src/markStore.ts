import type { ListingEntry, MarkOutcome } from "./types.js";

/**
 * Places and removes the visual indicator of a mark on one line of a view.
 */
export interface AnnotationHost<V, H> {
  place(view: V, line: number): H;
  /** May throw when the handle is stale. */
  remove(view: V, handle: H): void;
  clear(view: V): void;
  /** Views currently showing a directory listing. */
  liveViews(): readonly V[];
}

/**
 * Marked paths shared by every listing view, plus the per-view line index of
 * the annotations drawn for them.
 */
export class MarkStore<V, H = number> {
  private readonly marks = new Set<string>();
  private readonly annotations = new Map<V, Map<number, H>>();

  constructor(private readonly host: AnnotationHost<V, H>) {}

  get size(): number {
    return this.marks.size;
  }

  has(path: string): boolean {
    return this.marks.has(path);
  }

  toggle(path: string | undefined, view: V | undefined, line: number): MarkOutcome {
    if (!path || view === undefined) {
      return "no_target";
    }

    const viewIndex = this.getOrCreateIndex(view);

    if (this.marks.has(path)) {
      this.marks.delete(path);
      const handle = viewIndex.get(line);
      if (handle !== undefined) {
        this.removeQuietly(view, handle);
        viewIndex.delete(line);
      }
      return "unmarked";
    }

    this.marks.add(path);
    this.annotate(view, viewIndex, line);
    return "marked";
  }

  clearAll(): void {
    this.marks.clear();
    for (const view of this.host.liveViews()) {
      this.host.clear(view);
    }
    this.annotations.clear();
  }

  snapshot(): string[] {
    return [...this.marks].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * The listing in `view` was reloaded: its annotations are gone, the marks stay.
   */
  onViewReset(view: V): void {
    this.host.clear(view);
    this.annotations.delete(view);
  }

  redraw(view: V, entries: readonly ListingEntry[]): void {
    this.onViewReset(view);
    const marked = entries.filter((entry) => this.marks.has(entry.path));
    if (marked.length === 0) {
      return;
    }
    const viewIndex = this.getOrCreateIndex(view);
    for (const entry of marked) {
      this.annotate(view, viewIndex, entry.line);
    }
  }

  releaseView(view: V): void {
    this.annotations.delete(view);
  }

  annotatedLines(view: V): number[] {
    const viewIndex = this.annotations.get(view);
    return viewIndex ? [...viewIndex.keys()].sort((a, b) => a - b) : [];
  }

  private annotate(view: V, viewIndex: Map<number, H>, line: number): void {
    const previous = viewIndex.get(line);
    if (previous !== undefined) {
      this.removeQuietly(view, previous);
      viewIndex.delete(line);
    }
    viewIndex.set(line, this.host.place(view, line));
  }

  private removeQuietly(view: V, handle: H): void {
    try {
      this.host.remove(view, handle);
    } catch {
      // stale handle, the mark itself is already updated
    }
  }

  private getOrCreateIndex(view: V): Map<number, H> {
    let viewIndex = this.annotations.get(view);
    if (!viewIndex) {
      viewIndex = new Map();
      this.annotations.set(view, viewIndex);
    }
    return viewIndex;
  }
}

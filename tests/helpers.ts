import type { AnnotationHost } from "../src/markStore.js";
import type {
  ExecutionSurface,
  Notifier,
  Severity,
  SurfaceFactory,
  SurfaceRequest,
} from "../src/types.js";

export class FakeAnnotations implements AnnotationHost<string, number> {
  readonly placed = new Map<string, Map<number, number>>();
  readonly cleared: string[] = [];
  live: string[] = [];
  placeCount = 0;
  failRemoval = false;
  private nextHandle = 1;

  place(view: string, line: number): number {
    const handle = this.nextHandle++;
    this.placeCount++;
    let handles = this.placed.get(view);
    if (!handles) {
      handles = new Map();
      this.placed.set(view, handles);
    }
    handles.set(handle, line);
    return handle;
  }

  remove(view: string, handle: number): void {
    if (this.failRemoval || !this.placed.get(view)?.delete(handle)) {
      throw new Error(`stale handle ${handle}`);
    }
  }

  clear(view: string): void {
    this.cleared.push(view);
    this.placed.delete(view);
  }

  liveViews(): readonly string[] {
    return this.live;
  }

  linesOf(view: string): number[] {
    return [...(this.placed.get(view)?.values() ?? [])].sort((a, b) => a - b);
  }
}

export class FakeSurfaces implements SurfaceFactory {
  readonly requests: SurfaceRequest[] = [];
  failWith: Error | undefined;
  private readonly resolvers: Array<(code: number) => void> = [];

  create(request: SurfaceRequest): ExecutionSurface {
    if (this.failWith) {
      throw this.failWith;
    }
    this.requests.push(request);
    return {
      exit: new Promise<number>((resolve) => {
        this.resolvers.push(resolve);
      }),
    };
  }

  exitWith(code: number, index = this.resolvers.length - 1): void {
    const resolve = this.resolvers[index];
    if (!resolve) {
      throw new Error(`no surface at ${index}`);
    }
    resolve(code);
  }
}

export class RecordingNotifier implements Notifier {
  readonly events: string[] = [];

  notify(message: string, severity: Severity): void {
    this.events.push(`${severity}:${message}`);
  }
}

/**
 * Splits a command line the way a POSIX shell does for quoting, without any
 * expansion.
 */
export function parseShellWords(line: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let i = 0;

  while (i < line.length) {
    const ch = line.charAt(i);

    if (ch === "'") {
      const end = line.indexOf("'", i + 1);
      if (end < 0) {
        throw new Error("unterminated single quote");
      }
      current += line.slice(i + 1, end);
      inWord = true;
      i = end + 1;
    } else if (ch === '"') {
      let j = i + 1;
      while (j < line.length && line.charAt(j) !== '"') {
        if (line.charAt(j) === "\\" && '"\\$`'.includes(line.charAt(j + 1))) {
          current += line.charAt(j + 1);
          j += 2;
        } else {
          current += line.charAt(j);
          j++;
        }
      }
      if (j >= line.length) {
        throw new Error("unterminated double quote");
      }
      inWord = true;
      i = j + 1;
    } else if (ch === "\\") {
      current += line.charAt(i + 1);
      inWord = true;
      i += 2;
    } else if (ch === " " || ch === "\t") {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      i++;
    } else {
      current += ch;
      inWord = true;
      i++;
    }
  }

  if (inWord) {
    words.push(current);
  }
  return words;
}

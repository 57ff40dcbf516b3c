import * as vscode from "vscode";
import type { ExecutionSurface, SurfaceFactory, SurfaceRequest } from "./types.js";
import { log } from "./diagnostics.js";

const SHELL = "/bin/sh";

// Reported when the terminal went away without a process exit code.
export const CLOSED_EXIT_CODE = 1;

export function exitCodeOf(status: vscode.TerminalExitStatus | undefined): number {
  return status?.code ?? CLOSED_EXIT_CODE;
}

/**
 * Runs the command line in an editor terminal with its own pty, so ssh can
 * prompt for passwords and host keys. Closing the terminal ends the process.
 */
export class TerminalSurfaceFactory implements SurfaceFactory {
  create(request: SurfaceRequest): ExecutionSurface {
    const terminal = vscode.window.createTerminal({
      name: request.title,
      shellPath: SHELL,
      shellArgs: ["-c", request.commandLine],
      location: vscode.TerminalLocation.Editor,
    });

    const exit = new Promise<number>((resolve) => {
      const subscription = vscode.window.onDidCloseTerminal((closed) => {
        if (closed !== terminal) {
          return;
        }
        subscription.dispose();
        const code = exitCodeOf(closed.exitStatus);
        log(`Terminal "${request.title}" closed with code ${code}`);
        resolve(code);
      });
    });

    terminal.show();
    return { exit };
  }
}

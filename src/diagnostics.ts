import * as vscode from "vscode";
import type { Notifier, Severity, TransferRecord } from "./types.js";
import { isDestinationSet } from "./config.js";

let outputChannel: vscode.OutputChannel | undefined;
let lastTransfer: TransferRecord | undefined;

export function getLogger(): vscode.OutputChannel {
  if (!outputChannel) {
    outputChannel = vscode.window.createOutputChannel("Rsync Marks");
  }
  return outputChannel;
}

export function log(message: string): void {
  getLogger().appendLine(`[${new Date().toISOString()}] ${message}`);
}

/**
 * Notification sink backed by the editor's message popups and the output channel.
 */
export function createNotifier(): Notifier {
  return {
    notify(message: string, severity: Severity): void {
      log(`${severity.toUpperCase()} ${message}`);
      switch (severity) {
        case "error":
          void vscode.window.showErrorMessage(message);
          break;
        case "warning":
          void vscode.window.showWarningMessage(message);
          break;
        default:
          void vscode.window.showInformationMessage(message);
      }
    },
  };
}

export function recordTransfer(record: TransferRecord): void {
  lastTransfer = record;
}

export function getLastTransfer(): TransferRecord | undefined {
  return lastTransfer;
}

export async function showStatus(
  destination: string,
  markedPaths: string[]
): Promise<void> {
  const items: vscode.QuickPickItem[] = [];

  items.push({
    label: "Destination",
    description: isDestinationSet(destination) ? destination : "Not set",
  });
  items.push({
    label: "Marked",
    description: `${markedPaths.length} path(s)`,
  });

  if (lastTransfer) {
    const { outcome } = lastTransfer;
    items.push({
      label: "Last Transfer",
      description: `${lastTransfer.mode}, ${lastTransfer.pathCount} path(s), ${outcome.state}${
        outcome.exitCode !== undefined ? ` (exit ${outcome.exitCode})` : ""
      }`,
      detail: lastTransfer.finishedAt,
    });
  } else {
    items.push({ label: "Last Transfer", description: "None this session" });
  }

  for (const markedPath of markedPaths) {
    items.push({ label: "$(circle-filled)", description: markedPath });
  }

  await vscode.window.showQuickPick(items, { title: "Rsync Marks Status" });
}

import * as vscode from "vscode";

let statusBarItem: vscode.StatusBarItem | undefined;

export type TransferStatus = "idle" | "transferring" | "error" | "unconfigured";

export function initializeStatusBar(context: vscode.ExtensionContext): void {
  statusBarItem = vscode.window.createStatusBarItem(
    vscode.StatusBarAlignment.Left,
    100
  );
  statusBarItem.command = "rsyncMarks.showStatus";
  context.subscriptions.push(statusBarItem);

  updateStatusBar("unconfigured", 0);
  statusBarItem.show();
}

export function updateStatusBar(state: TransferStatus, markCount: number): void {
  if (!statusBarItem) {
    return;
  }

  let icon = "";
  let text = `rsync: ${markCount} marked`;
  let tooltip = "Rsync Marks";

  switch (state) {
    case "idle":
      icon = "$(cloud-upload)";
      tooltip = markCount > 0 ? "Click to see marked paths" : "Nothing marked";
      break;
    case "transferring":
      icon = "$(sync~spin)";
      text = "rsync: transferring...";
      tooltip = "Transfer in progress. Output is in the rsync terminal.";
      break;
    case "error":
      icon = "$(error)";
      tooltip = "Last transfer failed. Marks were kept for a retry.";
      break;
    case "unconfigured":
      icon = "$(gear)";
      tooltip = "No rsync destination set. Click to set one.";
      // Point at the destination prompt until one is set
      statusBarItem.command = "rsyncMarks.setDestination";
      break;
  }

  if (state !== "unconfigured") {
    statusBarItem.command = "rsyncMarks.showStatus";
  }

  statusBarItem.text = `${icon} ${text}`;
  statusBarItem.tooltip = tooltip;
}

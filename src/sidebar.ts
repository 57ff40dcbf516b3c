import * as vscode from "vscode";
import * as path from "node:path";
import { isDestinationSet } from "./config.js";

export interface SidebarState {
  destination(): string;
  markedPaths(): string[];
}

let sidebarProviderInstance: SidebarProvider | undefined;

export function initializeSidebar(state: SidebarState): SidebarProvider {
  sidebarProviderInstance = new SidebarProvider(state);
  return sidebarProviderInstance;
}

export function refreshSidebar(): void {
  sidebarProviderInstance?.refresh();
}

export class MarkTreeItem extends vscode.TreeItem {
  constructor(
    label: string,
    description: string | undefined,
    commandId: string | undefined,
    iconPath: vscode.ThemeIcon | undefined,
    collapsibleState: vscode.TreeItemCollapsibleState = vscode.TreeItemCollapsibleState.None,
    tooltip?: string
  ) {
    super(label, collapsibleState);
    this.description = description;

    if (commandId) {
      this.command = {
        command: commandId,
        title: label,
      };
    }

    if (iconPath) {
      this.iconPath = iconPath;
    }

    if (tooltip) {
      this.tooltip = tooltip;
    }
  }
}

export class SidebarProvider implements vscode.TreeDataProvider<MarkTreeItem> {
  private readonly _onDidChangeTreeData = new vscode.EventEmitter<MarkTreeItem | undefined | void>();
  readonly onDidChangeTreeData: vscode.Event<MarkTreeItem | undefined | void> =
    this._onDidChangeTreeData.event;

  constructor(private readonly state: SidebarState) {}

  refresh(): void {
    this._onDidChangeTreeData.fire();
  }

  getTreeItem(element: MarkTreeItem): vscode.TreeItem {
    return element;
  }

  getChildren(element?: MarkTreeItem): MarkTreeItem[] {
    const marked = this.state.markedPaths();

    if (!element) {
      return [
        new MarkTreeItem(
          "Destination",
          undefined,
          undefined,
          new vscode.ThemeIcon("remote"),
          vscode.TreeItemCollapsibleState.Expanded
        ),
        new MarkTreeItem(
          "Marked",
          String(marked.length),
          undefined,
          new vscode.ThemeIcon("checklist"),
          vscode.TreeItemCollapsibleState.Expanded
        ),
        new MarkTreeItem(
          "Actions",
          undefined,
          undefined,
          new vscode.ThemeIcon("zap"),
          vscode.TreeItemCollapsibleState.Expanded
        ),
      ];
    }

    if (element.label === "Destination") {
      const destination = this.state.destination();
      const isSet = isDestinationSet(destination);
      return [
        new MarkTreeItem(
          isSet ? destination : "Not set",
          undefined,
          "rsyncMarks.setDestination",
          new vscode.ThemeIcon(isSet ? "pass" : "warning"),
          vscode.TreeItemCollapsibleState.None,
          "Click to change the rsync destination for this session"
        ),
      ];
    }

    if (element.label === "Marked") {
      return marked.map(
        (markedPath) =>
          new MarkTreeItem(
            path.basename(markedPath) || markedPath,
            path.dirname(markedPath),
            undefined,
            new vscode.ThemeIcon("circle-filled", new vscode.ThemeColor("testing.iconPassed")),
            vscode.TreeItemCollapsibleState.None,
            markedPath
          )
      );
    }

    if (element.label === "Actions") {
      return [
        new MarkTreeItem(
          "Upload",
          "Transfer marked paths",
          "rsyncMarks.upload",
          new vscode.ThemeIcon("cloud-upload"),
          vscode.TreeItemCollapsibleState.None
        ),
        new MarkTreeItem(
          "Upload and Remove",
          "Delete sources after transfer",
          "rsyncMarks.uploadAndRemove",
          new vscode.ThemeIcon("trash"),
          vscode.TreeItemCollapsibleState.None
        ),
        new MarkTreeItem(
          "Clear Marks",
          undefined,
          "rsyncMarks.clearMarks",
          new vscode.ThemeIcon("clear-all"),
          vscode.TreeItemCollapsibleState.None
        ),
      ];
    }

    return [];
  }
}

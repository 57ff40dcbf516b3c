import * as fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import * as path from "node:path";
import type { TransferConfig, TransferResult } from "./types.js";

export const TRANSFER_TOOL = "rsync";
export const REMOTE_SHELL = "ssh";
export const RECURSIVE_FLAG = "-r";
export const RELATIVE_FLAG = "--relative";

export interface BuildOptions {
  findExecutable?: (name: string) => Promise<string | undefined>;
  isDirectory?: (p: string) => Promise<boolean>;
}

/**
 * Quotes one word for a POSIX shell. Embedded single quotes become `'"'"'`,
 * which rsync also understands when it splits its `-e` command.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function toCommandLine(argv: readonly string[]): string {
  return argv.join(" ");
}

export async function findExecutable(
  name: string,
  searchPath: string = process.env["PATH"] ?? ""
): Promise<string | undefined> {
  if (name.includes("/")) {
    return (await isExecutableFile(name)) ? name : undefined;
  }

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) {
      continue;
    }
    const candidate = path.join(dir, name);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

async function isExecutableFile(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    if (!stat.isFile()) {
      return false;
    }
    await fs.access(p, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

async function isDirectoryPath(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export function normalizeFlags(flags: readonly string[]): string[] {
  const result: string[] = [];
  for (const raw of flags) {
    const flag = raw.trim();
    if (!flag) {
      continue;
    }
    result.push(flag.startsWith("-") ? flag : `-${flag}`);
  }
  return result;
}

export function hasRecursionFlag(flags: readonly string[]): boolean {
  return flags.some((flag) => {
    if (flag === "--archive" || flag === "--recursive") {
      return true;
    }
    return /^-[A-Za-z0-9]+$/.test(flag) && /[ar]/.test(flag);
  });
}

export function buildRemoteShell(transportArgs: readonly string[]): string {
  return [REMOTE_SHELL, ...transportArgs.map(shellQuote)].join(" ");
}

/**
 * Builds the rsync argument vector for `paths`. Every element is a shell word:
 * paths, the destination and plain extra arguments are quoted, so the vector
 * joined with spaces is safe to hand to `/bin/sh -c`.
 */
export async function buildTransferCommand(
  paths: readonly string[],
  config: TransferConfig,
  options: BuildOptions = {}
): Promise<TransferResult<string[]>> {
  const locate = options.findExecutable ?? ((name: string) => findExecutable(name));
  const isDirectory = options.isDirectory ?? isDirectoryPath;

  if (!(await locate(TRANSFER_TOOL))) {
    return {
      ok: false,
      error: {
        category: "TOOL_NOT_FOUND",
        message: `${TRANSFER_TOOL} was not found on PATH`,
      },
    };
  }

  const argv: string[] = [TRANSFER_TOOL];
  const baseFlags = normalizeFlags(config.baseFlags);
  argv.push(...baseFlags);

  if (!hasRecursionFlag([...baseFlags, ...config.extraFlags])) {
    for (const p of paths) {
      if (await isDirectory(p)) {
        argv.push(RECURSIVE_FLAG);
        break;
      }
    }
  }

  if (config.preserveRelativePaths) {
    argv.push(RELATIVE_FLAG);
  }

  for (const flag of config.extraFlags) {
    if (!flag.trim()) {
      continue;
    }
    argv.push(flag.startsWith("-") ? flag : shellQuote(flag));
  }

  if (config.transportArgs.length > 0) {
    argv.push("-e", shellQuote(buildRemoteShell(config.transportArgs)));
  }

  const sorted = [...paths].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  for (const p of sorted) {
    argv.push(shellQuote(p));
  }

  argv.push(shellQuote(config.destination));
  return { ok: true, data: argv };
}

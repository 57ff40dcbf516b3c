import * as vscode from "vscode";
import type { TransferConfig } from "./types.js";

export const CONFIG_SECTION = "rsyncMarks";

export const PLACEHOLDER_DESTINATION =
  "destination_user@destination_host:/path/to/destination/";

export const REMOVE_SOURCE_FLAG = "--remove-source-files";

export const DEFAULT_CONFIG: Readonly<TransferConfig> = Object.freeze({
  destination: PLACEHOLDER_DESTINATION,
  transportArgs: [],
  baseFlags: ["-avhP", "--progress"],
  preserveRelativePaths: false,
  extraFlags: [],
  installDefaultKeybindings: true,
  listHide: [],
});

type ConfigKey = keyof TransferConfig;

const STRING_KEYS: readonly ConfigKey[] = ["destination"];
const STRING_LIST_KEYS: readonly ConfigKey[] = [
  "transportArgs",
  "baseFlags",
  "extraFlags",
  "listHide",
];
const BOOLEAN_KEYS: readonly ConfigKey[] = [
  "preserveRelativePaths",
  "installDefaultKeybindings",
];

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(DEFAULT_CONFIG, key);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Validates options handed to the extension API. Unknown keys and values of the
 * wrong type are rejected rather than merged.
 */
export function parseConfigOptions(
  options: Record<string, unknown>
): Partial<TransferConfig> {
  const parsed: Partial<TransferConfig> = {};

  for (const [key, value] of Object.entries(options)) {
    if (!isConfigKey(key)) {
      throw new ConfigError(`Unknown ${CONFIG_SECTION} option "${key}"`, key);
    }

    if (STRING_KEYS.includes(key)) {
      if (typeof value !== "string") {
        throw new ConfigError(`Option "${key}" must be a string`, key);
      }
      parsed.destination = value;
    } else if (STRING_LIST_KEYS.includes(key)) {
      if (!isStringList(value)) {
        throw new ConfigError(`Option "${key}" must be a list of strings`, key);
      }
      assignList(parsed, key, value);
    } else if (BOOLEAN_KEYS.includes(key)) {
      if (typeof value !== "boolean") {
        throw new ConfigError(`Option "${key}" must be a boolean`, key);
      }
      if (key === "preserveRelativePaths") {
        parsed.preserveRelativePaths = value;
      } else {
        parsed.installDefaultKeybindings = value;
      }
    }
  }

  return parsed;
}

function assignList(
  target: Partial<TransferConfig>,
  key: ConfigKey,
  value: string[]
): void {
  switch (key) {
    case "transportArgs":
      target.transportArgs = [...value];
      break;
    case "baseFlags":
      target.baseFlags = [...value];
      break;
    case "extraFlags":
      target.extraFlags = [...value];
      break;
    case "listHide":
      target.listHide = [...value];
      break;
  }
}

export function isDestinationSet(destination: string | undefined): boolean {
  return (
    destination !== undefined &&
    destination.trim() !== "" &&
    destination !== PLACEHOLDER_DESTINATION
  );
}

/**
 * Configuration for a single remove-after-transfer run. The base value is left
 * as it is.
 */
export function withRemoveSourceFiles(config: TransferConfig): TransferConfig {
  return {
    ...config,
    extraFlags: [...config.extraFlags, REMOVE_SOURCE_FLAG],
  };
}

export function readSettings(): TransferConfig {
  const config = vscode.workspace.getConfiguration(CONFIG_SECTION);
  return {
    destination:
      config.get<string>("destination") ?? DEFAULT_CONFIG.destination,
    transportArgs:
      config.get<string[]>("transportArgs") ?? [...DEFAULT_CONFIG.transportArgs],
    baseFlags: config.get<string[]>("baseFlags") ?? [...DEFAULT_CONFIG.baseFlags],
    preserveRelativePaths:
      config.get<boolean>("preserveRelativePaths") ??
      DEFAULT_CONFIG.preserveRelativePaths,
    extraFlags:
      config.get<string[]>("extraFlags") ?? [...DEFAULT_CONFIG.extraFlags],
    installDefaultKeybindings:
      config.get<boolean>("installDefaultKeybindings") ??
      DEFAULT_CONFIG.installDefaultKeybindings,
    listHide: config.get<string[]>("listHide") ?? [...DEFAULT_CONFIG.listHide],
  };
}

export interface SettingsSource {
  current(): TransferConfig;
  setDestination(destination: string): void;
}

/**
 * Workspace settings with the overrides applied during this editor session.
 * Nothing set here is written back to the settings files.
 */
export class TransferSettings implements SettingsSource {
  private overrides: Partial<TransferConfig> = {};

  constructor(private readonly read: () => TransferConfig = readSettings) {}

  current(): TransferConfig {
    return { ...this.read(), ...this.overrides };
  }

  setDestination(destination: string): void {
    this.overrides = { ...this.overrides, destination };
  }

  configure(options: Record<string, unknown>): TransferConfig {
    const parsed = parseConfigOptions(options);
    this.overrides = { ...this.overrides, ...parsed };
    return this.current();
  }
}

/**
 * `--extra-opts` support: loads plugin options from an ini file section
 *
 *   [check_swap]
 *   measurement=swap_usage
 *   warning=80
 *   verbose
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { ConfigurationError } from "../plugin/errors.js";

export interface ExtraOptsSpec {
  readonly section: string;
  readonly file?: string;
}

export interface ExtraOptsContext {
  readonly defaultSection: string;
  readonly searchPath: readonly string[];
}

export interface LoadedExtraOpts {
  readonly file: string;
  readonly section: string;
  readonly args: readonly string[];
}

export interface ExpandedArgv {
  readonly argv: readonly string[];
  readonly loaded: readonly LoadedExtraOpts[];
}

export type IniSections = ReadonlyMap<string, ReadonlyArray<readonly [string, string | undefined]>>;

const FLAG = "--extra-opts";

/**
 * Parses `[section][@file]`. A value without `@` that looks like a path is
 * taken as the file, anything else as the section.
 */
export function parseExtraOptsSpec(value: string | undefined, defaultSection: string): ExtraOptsSpec {
  if (!value) {
    return { section: defaultSection };
  }
  const at = value.indexOf("@");
  if (at !== -1) {
    const section = value.slice(0, at) || defaultSection;
    const file = value.slice(at + 1);
    return file ? { section, file } : { section };
  }
  if (value.includes("/") || value.endsWith(".ini")) {
    return { section: defaultSection, file: value };
  }
  return { section: value };
}

/**
 * Parses ini content into sections of ordered key/value entries.
 * Keys may repeat; a bare key is a flag with no value.
 */
export function parseIni(content: string): IniSections {
  const sections = new Map<string, Array<readonly [string, string | undefined]>>();
  let current: Array<readonly [string, string | undefined]> | undefined;

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith(";")) {
      continue;
    }

    const header = /^\[(.+)\]$/.exec(trimmed);
    if (header) {
      const name = header[1].trim();
      current = sections.get(name) ?? [];
      sections.set(name, current);
      continue;
    }

    // Entries before the first section header belong to no section
    if (!current) continue;

    const equalIndex = trimmed.indexOf("=");
    if (equalIndex === -1) {
      current.push([trimmed, undefined]);
      continue;
    }
    const key = trimmed.slice(0, equalIndex).trim();
    const value = trimmed.slice(equalIndex + 1).trim();
    // Remove surrounding quotes if present
    current.push([key, value.replace(/^(["'])(.*)\1$/, "$2")]);
  }

  return sections;
}

/**
 * Converts ini entries into command line arguments
 */
export function toArgs(entries: ReadonlyArray<readonly [string, string | undefined]>): string[] {
  return entries.map(([key, value]) => {
    if (key.length === 1) {
      return value === undefined ? `-${key}` : `-${key}${value}`;
    }
    return value === undefined ? `--${key}` : `--${key}=${value}`;
  });
}

function findIniFile(searchPath: readonly string[]): string {
  const found = searchPath.find((candidate) => existsSync(candidate));
  if (found) {
    return found;
  }
  throw new ConfigurationError(
    `No extra-opts ini file found (searched ${searchPath.join(", ")})`,
  );
}

/**
 * Reads the arguments stored under one ini section
 */
export async function loadExtraOpts(
  spec: ExtraOptsSpec,
  context: ExtraOptsContext,
): Promise<LoadedExtraOpts> {
  const file = spec.file ?? findIniFile(context.searchPath);

  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read extra-opts file ${file}: ${reason}`, { cause: error });
  }

  const entries = parseIni(content).get(spec.section);
  if (!entries) {
    throw new ConfigurationError(`Section [${spec.section}] not found in ${file}`);
  }

  return { file, section: spec.section, args: toArgs(entries) };
}

/**
 * Replaces every `--extra-opts[=spec]` in argv by the options it names.
 * Loaded options go before the remaining arguments so the command line wins.
 */
export async function expandExtraOpts(
  argv: readonly string[],
  context: ExtraOptsContext,
): Promise<ExpandedArgv> {
  const loaded: LoadedExtraOpts[] = [];
  const rest: string[] = [];

  for (const arg of argv) {
    if (arg === FLAG || arg.startsWith(`${FLAG}=`)) {
      const value = arg === FLAG ? undefined : arg.slice(FLAG.length + 1);
      loaded.push(await loadExtraOpts(parseExtraOptsSpec(value, context.defaultSection), context));
    } else {
      rest.push(arg);
    }
  }

  return { argv: [...loaded.flatMap((entry) => entry.args), ...rest], loaded };
}

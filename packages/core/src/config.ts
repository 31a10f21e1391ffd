import { existsSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { basename, dirname, join, resolve } from 'node:path';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { looseObject, minLength, optional, parse, picklist, pipe, string, ValiError } from 'valibot';
import { AdrConfigError, AdrIoError, describeError } from './errors.js';
import type { SerializationMode } from './render.js';

export const DEFAULT_ADR_DIR = 'doc/adr';

/** Structured settings file. */
export const CONFIG_FILE = 'adrs.toml';

/** adr-tools settings file: a single line naming the directory. */
export const LEGACY_CONFIG_FILE = '.adr-dir';

export const VCS_ROOT_MARKER = '.git';

export const CONFIG_ENV = 'ADRS_CONFIG';
export const DIRECTORY_ENV = 'ADRS_DIR';

export type AdrsConfig = {
  /** Collection directory, relative to the project root unless absolute. */
  adrDir: string;
  mode: SerializationMode;
};

export type ConfigSource =
  | 'explicit'
  | 'project'
  | 'legacy'
  | 'default-directory'
  | 'global'
  | 'defaults';

export type ResolvedConfig = {
  root: string;
  config: AdrsConfig;
  source: ConfigSource;
  /** Settings file that supplied the configuration, if any. */
  configPath?: string;
  /** Set when a directory override replaced `config.adrDir`. */
  directoryOverride?: string;
};

export type ResolveConfigOptions = {
  /** Directory the search starts from. Default: `process.cwd()` */
  cwd?: string;
  /** Settings file to use instead of searching. */
  configPath?: string;
  /** Collection directory that wins over any settings found. */
  directory?: string;
  /** Environment consulted for overrides. Default: `process.env` */
  env?: Record<string, string | undefined>;
  /** Home directory for the user-global settings. Default: `os.homedir()` */
  homeDir?: string;
};

export function defaultConfig(): AdrsConfig {
  return { adrDir: DEFAULT_ADR_DIR, mode: 'compatible' };
}

const configSchema = looseObject({
  adr_dir: optional(pipe(string(), minLength(1))),
  mode: optional(picklist(['compatible', 'ng'])),
});

function validateConfig(value: unknown, configPath: string): AdrsConfig {
  try {
    const parsed = parse(configSchema, value);
    const defaults = defaultConfig();
    return {
      adrDir: parsed.adr_dir ?? defaults.adrDir,
      mode: parsed.mode ?? defaults.mode,
    };
  } catch (err) {
    if (err instanceof ValiError) {
      throw new AdrConfigError(err.message, configPath, err);
    }
    throw err;
  }
}

function readSettings(configPath: string): string {
  try {
    return readFileSync(configPath, 'utf8');
  } catch (err) {
    throw new AdrConfigError(`cannot read file: ${describeError(err)}`, configPath, err);
  }
}

/**
 * Load a settings file. `.adr-dir` files are read as the adr-tools single
 * line; anything else as TOML.
 */
export function loadConfigFile(configPath: string): AdrsConfig {
  const content = readSettings(configPath);

  if (basename(configPath) === LEGACY_CONFIG_FILE) {
    const adrDir = content.trim();
    if (!adrDir) throw new AdrConfigError('file is empty', configPath);
    return { adrDir, mode: 'compatible' };
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (err) {
    throw new AdrConfigError(`not valid TOML: ${describeError(err)}`, configPath, err);
  }
  return validateConfig(raw, configPath);
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

export function globalConfigPath(
  env: Record<string, string | undefined> = process.env,
  homeDir: string = homedir(),
): string {
  const base = env.XDG_CONFIG_HOME || join(homeDir, '.config');
  return join(base, 'adrs', 'config.toml');
}

function searchProject(cwd: string): ResolvedConfig | null {
  let dir = cwd;
  for (;;) {
    const structured = join(dir, CONFIG_FILE);
    if (isFile(structured)) {
      return { root: dir, config: loadConfigFile(structured), source: 'project', configPath: structured };
    }

    const legacy = join(dir, LEGACY_CONFIG_FILE);
    if (isFile(legacy)) {
      return { root: dir, config: loadConfigFile(legacy), source: 'legacy', configPath: legacy };
    }

    if (isDirectory(join(dir, DEFAULT_ADR_DIR))) {
      return { root: dir, config: defaultConfig(), source: 'default-directory' };
    }

    if (existsSync(join(dir, VCS_ROOT_MARKER))) return null;
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Locate the project root and its settings.
 *
 * Search order:
 * 1. An explicit settings file (`configPath` or `ADRS_CONFIG`)
 * 2. Walking up from `cwd`, stopping at the version-control root:
 *    `adrs.toml`, then `.adr-dir`, then an existing `doc/adr` directory
 * 3. The user-global `adrs/config.toml`
 * 4. Built-in defaults
 *
 * A directory override (`directory` or `ADRS_DIR`) is applied last.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): ResolvedConfig {
  const env = options.env ?? process.env;
  const cwd = resolve(options.cwd ?? process.cwd());
  const explicit = options.configPath ?? env[CONFIG_ENV];

  let resolved: ResolvedConfig;
  if (explicit) {
    const configPath = resolve(cwd, explicit);
    resolved = {
      root: dirname(configPath),
      config: loadConfigFile(configPath),
      source: 'explicit',
      configPath,
    };
  } else {
    const project = searchProject(cwd);
    if (project) {
      resolved = project;
    } else {
      const globalPath = globalConfigPath(env, options.homeDir ?? homedir());
      resolved = isFile(globalPath)
        ? { root: cwd, config: loadConfigFile(globalPath), source: 'global', configPath: globalPath }
        : { root: cwd, config: defaultConfig(), source: 'defaults' };
    }
  }

  const directory = options.directory ?? env[DIRECTORY_ENV];
  if (directory) {
    resolved = {
      ...resolved,
      config: { ...resolved.config, adrDir: directory },
      directoryOverride: directory,
    };
  }
  return resolved;
}

export function adrDirPath(resolved: Pick<ResolvedConfig, 'root' | 'config'>): string {
  return resolve(resolved.root, resolved.config.adrDir);
}

/**
 * Write settings for `root`: `.adr-dir` in compatible mode, `adrs.toml` in ng
 * mode. Returns the written path.
 */
export function saveConfig(root: string, config: AdrsConfig): string {
  const path = join(root, config.mode === 'ng' ? CONFIG_FILE : LEGACY_CONFIG_FILE);
  const content =
    config.mode === 'ng'
      ? stringifyToml({ adr_dir: config.adrDir, mode: config.mode })
      : config.adrDir;
  try {
    writeFileSync(path, content);
  } catch (err) {
    throw new AdrIoError(`Failed to write ${path}: ${describeError(err)}`, path, err);
  }
  return path;
}

export function describeConfigSource(resolved: ResolvedConfig): string {
  const where = resolved.configPath ? ` (${resolved.configPath})` : '';
  const base = {
    explicit: `explicit settings file${where}`,
    project: `project settings${where}`,
    legacy: `adr-tools settings${where}`,
    'default-directory': `default directory ${DEFAULT_ADR_DIR}`,
    global: `user settings${where}`,
    defaults: 'built-in defaults',
  }[resolved.source];
  return resolved.directoryOverride ? `${base}, directory overridden` : base;
}

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync, type Dirent } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import {
  adrDirPath,
  defaultConfig,
  resolveConfig,
  saveConfig,
  type AdrsConfig,
  type ConfigSource,
  type ResolveConfigOptions,
} from './config.js';
import {
  AdrAmbiguousError,
  AdrDirExistsError,
  AdrFormatError,
  AdrIoError,
  AdrNotFoundError,
  describeError,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { createFuzzyMatcher, rankMatches, type TitleMatcher } from './match.js';
import { isLegacyStatus, parseAdrFile } from './parse.js';
import { renderAdr, type SerializationMode } from './render.js';
import {
  ADR_EXTENSIONS,
  Link,
  Status,
  addLink,
  adrFilename,
  createAdr,
  createLink,
  formatStatus,
  hasLink,
  type Adr,
  type AdrInit,
  type AdrStatus,
  type LinkKind,
} from './types.js';

export type RepositoryOptions = {
  root: string;
  config?: AdrsConfig;
  /** Which settings source produced `config`, when it was resolved. */
  source?: ConfigSource;
  logger?: Logger;
  matcher?: TitleMatcher;
  /**
   * How many times the best fuzzy score must exceed the runner-up for
   * `find` to pick it. Default: 2
   */
  ambiguityRatio?: number;
};

export type OpenRepositoryOptions = ResolveConfigOptions &
  Omit<RepositoryOptions, 'root' | 'config' | 'source'>;

export type InitOptions = {
  /** Collection directory relative to the root. Default: `doc/adr` */
  directory?: string;
  mode?: SerializationMode;
  logger?: Logger;
};

/** A file that looked like a record but could not be parsed. */
export type SkippedFile = {
  path: string;
  reason: string;
};

export type ScanResult = {
  adrs: Adr[];
  skipped: SkippedFile[];
};

export const DEFAULT_AMBIGUITY_RATIO = 2;

const MAX_AMBIGUOUS_CANDIDATES = 5;

const FIRST_ADR_TITLE = 'Record architecture decisions';

/**
 * File-backed collection of decision records.
 *
 * Nothing is cached: every read re-scans the directory, so each call sees
 * the current state on disk. All operations are synchronous.
 */
export class Repository {
  readonly root: string;
  readonly config: AdrsConfig;
  readonly source: ConfigSource | undefined;
  private readonly logger: Logger;
  private readonly matcher: TitleMatcher;
  private readonly ambiguityRatio: number;

  constructor(opts: RepositoryOptions) {
    this.root = resolve(opts.root);
    this.config = opts.config ?? defaultConfig();
    this.source = opts.source;
    this.logger = opts.logger ?? silentLogger;
    this.matcher = opts.matcher ?? createFuzzyMatcher();
    this.ambiguityRatio = opts.ambiguityRatio ?? DEFAULT_AMBIGUITY_RATIO;
  }

  /**
   * Resolve settings from `cwd` (see `resolveConfig`) and open the collection
   * they point at.
   */
  static open(options: OpenRepositoryOptions = {}): Repository {
    const { cwd, configPath, directory, env, homeDir, ...rest } = options;
    const resolved = resolveConfig({ cwd, configPath, directory, env, homeDir });
    return new Repository({
      ...rest,
      root: resolved.root,
      config: resolved.config,
      source: resolved.source,
    });
  }

  /**
   * Create a new collection under `root`: the directory, the settings file
   * for the chosen mode and a first record documenting the practice.
   */
  static init(root: string, options: InitOptions = {}): Repository {
    const config: AdrsConfig = {
      adrDir: options.directory ?? defaultConfig().adrDir,
      mode: options.mode ?? 'compatible',
    };
    const repo = new Repository({ root, config, logger: options.logger });
    const dir = repo.adrPath();
    if (existsSync(dir)) throw new AdrDirExistsError(dir);

    try {
      mkdirSync(dir, { recursive: true });
    } catch (err) {
      throw new AdrIoError(`Failed to create ${dir}: ${describeError(err)}`, dir, err);
    }
    saveConfig(repo.root, config);

    repo.create(
      createAdr(1, FIRST_ADR_TITLE, {
        status: Status.Accepted,
        context: 'We need to record the architectural decisions made on this project.',
        decision:
          'We will use Architecture Decision Records, as described by Michael Nygard in his article "Documenting Architecture Decisions".',
        consequences:
          "See Michael Nygard's article, linked above. For a lightweight ADR toolset, see Nat Pryce's adr-tools.",
      }),
    );
    return repo;
  }

  adrPath(): string {
    return adrDirPath(this);
  }

  get mode(): SerializationMode {
    return this.config.mode;
  }

  /**
   * Enumerate and parse every record file. Files that fail to parse are
   * reported in `skipped` instead of aborting the scan.
   */
  scan(): ScanResult {
    const dir = this.adrPath();
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      throw new AdrIoError(
        `ADR directory not found or unreadable: ${dir}. Run 'adrs init' to create one.`,
        dir,
        err,
      );
    }

    const adrs: Adr[] = [];
    const skipped: SkippedFile[] = [];
    const names = entries
      .filter((entry) => entry.isFile() && isRecordFilename(entry.name))
      .map((entry) => entry.name)
      .sort();

    for (const name of names) {
      const path = join(dir, name);
      try {
        adrs.push(parseAdrFile(path));
      } catch (err) {
        if (!(err instanceof AdrFormatError) && !(err instanceof AdrIoError)) throw err;
        this.logger.warn?.(`Skipping ${name}: ${describeError(err)}`);
        skipped.push({ path, reason: describeError(err) });
      }
    }

    adrs.sort((a, b) => a.number - b.number);
    return { adrs, skipped };
  }

  list(): Adr[] {
    return this.scan().adrs;
  }

  nextNumber(): number {
    const adrs = this.list();
    const last = adrs[adrs.length - 1];
    return last ? last.number + 1 : 1;
  }

  get(number: number): Adr {
    const adr = this.list().find((a) => a.number === number);
    if (!adr) throw new AdrNotFoundError(String(number));
    return adr;
  }

  /**
   * Look a record up by number (all-digit query) or by fuzzy title match.
   */
  find(query: string): Adr {
    const trimmed = query.trim();
    if (/^\d+$/.test(trimmed)) return this.get(Number(trimmed));

    const ranked = rankMatches(this.list(), trimmed, (adr) => adr.title, this.matcher);
    const [best, runnerUp] = ranked;
    if (!best) throw new AdrNotFoundError(query);
    if (!runnerUp || best.score > runnerUp.score * this.ambiguityRatio) return best.item;

    throw new AdrAmbiguousError(
      query,
      ranked.slice(0, MAX_AMBIGUOUS_CANDIDATES).map((match) => match.item.title),
    );
  }

  /**
   * Write a new record file named after its number and title. An existing
   * file of the same name is overwritten.
   */
  create(adr: Adr): string {
    const path = join(this.adrPath(), adrFilename(adr.number, adr.title));
    this.write(adr, path);
    return path;
  }

  /** Allocate the next number and write a new record. */
  newAdr(title: string, init: AdrInit = {}): Adr {
    const adr = createAdr(this.nextNumber(), title, init);
    this.create(adr);
    return adr;
  }

  /** Re-render a record to the file it came from (or its derived name). */
  update(adr: Adr): string {
    const path = this.pathOf(adr);
    this.write(adr, path);
    return path;
  }

  /**
   * Create a record that supersedes `supersededNumber` and mark the old one
   * as superseded. The old record is loaded before anything is written.
   */
  supersede(title: string, supersededNumber: number): Adr {
    const previous = this.get(supersededNumber);
    const number = this.nextNumber();

    const adr = createAdr(number, title, {
      links: [createLink(supersededNumber, Link.Supersedes)],
    });
    previous.status = Status.Superseded;
    addLink(previous, createLink(number, Link.SupersededBy));

    this.create(adr);
    this.update(previous);
    return adr;
  }

  /**
   * Change a record's status. With a Superseded status and `supersededBy`,
   * the superseding record must exist and a Superseded-by link is added once.
   */
  setStatus(number: number, status: AdrStatus, supersededBy?: number): string {
    const adr = this.get(number);
    adr.status = status;

    if (status.type === 'superseded' && supersededBy !== undefined) {
      this.get(supersededBy);
      const link = createLink(supersededBy, Link.SupersededBy);
      if (!hasLink(adr, link)) addLink(adr, link);
    }

    return this.update(adr);
  }

  /**
   * Add a link in each direction. Repeated calls add repeated links.
   */
  link(source: number, target: number, sourceKind: LinkKind, targetKind: LinkKind): void {
    const sourceAdr = this.get(source);
    const targetAdr = this.get(target);

    addLink(sourceAdr, createLink(target, sourceKind));
    addLink(targetAdr, createLink(source, targetKind));

    this.update(sourceAdr);
    this.update(targetAdr);
  }

  readContent(adr: Adr): string {
    const path = this.pathOf(adr);
    try {
      return readFileSync(path, 'utf8');
    } catch (err) {
      throw new AdrIoError(`Failed to read ${path}: ${describeError(err)}`, path, err);
    }
  }

  writeContent(adr: Adr, content: string): string {
    const path = this.pathOf(adr);
    writeFile(path, content);
    return path;
  }

  private pathOf(adr: Adr): string {
    return adr.path ?? join(this.adrPath(), adrFilename(adr.number, adr.title));
  }

  private write(adr: Adr, path: string): void {
    if (this.mode === 'compatible' && !isLegacyStatus(adr.status)) {
      throw new AdrFormatError(
        `status '${formatStatus(adr.status)}' cannot be stored in compatible mode; use one of Proposed, Accepted, Deprecated, Superseded, Draft or Rejected`,
        path,
      );
    }
    const titles = new Map<number, string>();
    if (adr.links.length > 0) {
      for (const other of this.list()) titles.set(other.number, other.title);
      titles.set(adr.number, adr.title);
    }
    writeFile(path, renderAdr(adr, { mode: this.mode, titleOf: (n) => titles.get(n) }));
    adr.path = path;
    this.logger.log?.(`Wrote ${path}`);
  }
}

export function isRecordFilename(name: string): boolean {
  return /^[0-9]/.test(name) && ADR_EXTENSIONS.includes(extname(name).toLowerCase());
}

function writeFile(path: string, content: string): void {
  try {
    writeFileSync(path, content);
  } catch (err) {
    throw new AdrIoError(`Failed to write ${path}: ${describeError(err)}`, path, err);
  }
}

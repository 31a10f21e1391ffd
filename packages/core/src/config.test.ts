import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  adrDirPath,
  describeConfigSource,
  globalConfigPath,
  loadConfigFile,
  resolveConfig,
  saveConfig,
} from './config.js';
import { AdrConfigError } from './errors.js';

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'adrs-config-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** A project root with a `.git` marker so the upward search stops there. */
async function withProject<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  return withTempDir(async (dir) => {
    await mkdir(join(dir, '.git'));
    return fn(dir);
  });
}

function isolated(dir: string) {
  return { env: {}, homeDir: join(dir, 'home') };
}

describe('resolveConfig', () => {
  it('finds adrs.toml in an ancestor directory', async () => {
    await withProject(async (dir) => {
      await writeFile(join(dir, 'adrs.toml'), 'adr_dir = "decisions"\nmode = "ng"\n');
      const cwd = join(dir, 'src', 'nested');
      await mkdir(cwd, { recursive: true });

      const resolved = resolveConfig({ cwd, ...isolated(dir) });
      expect(resolved).toEqual({
        root: dir,
        config: { adrDir: 'decisions', mode: 'ng' },
        source: 'project',
        configPath: join(dir, 'adrs.toml'),
      });
      expect(adrDirPath(resolved)).toBe(join(dir, 'decisions'));
    });
  });

  it('reads the adr-tools .adr-dir file', async () => {
    await withProject(async (dir) => {
      await writeFile(join(dir, '.adr-dir'), 'docs/decisions\n');
      const resolved = resolveConfig({ cwd: dir, ...isolated(dir) });
      expect(resolved.source).toBe('legacy');
      expect(resolved.config).toEqual({ adrDir: 'docs/decisions', mode: 'compatible' });
    });
  });

  it('prefers adrs.toml over .adr-dir in the same directory', async () => {
    await withProject(async (dir) => {
      await writeFile(join(dir, '.adr-dir'), 'legacy\n');
      await writeFile(join(dir, 'adrs.toml'), 'adr_dir = "modern"\n');
      const resolved = resolveConfig({ cwd: dir, ...isolated(dir) });
      expect(resolved.source).toBe('project');
      expect(resolved.config).toEqual({ adrDir: 'modern', mode: 'compatible' });
    });
  });

  it('recognizes an existing default directory', async () => {
    await withProject(async (dir) => {
      await mkdir(join(dir, 'doc', 'adr'), { recursive: true });
      const cwd = join(dir, 'doc');
      const resolved = resolveConfig({ cwd, ...isolated(dir) });
      expect(resolved.root).toBe(dir);
      expect(resolved.source).toBe('default-directory');
    });
  });

  it('does not search past the repository root', async () => {
    await withTempDir(async (dir) => {
      await writeFile(join(dir, 'adrs.toml'), 'adr_dir = "outside"\n');
      const repo = join(dir, 'repo');
      await mkdir(join(repo, '.git'), { recursive: true });

      const resolved = resolveConfig({ cwd: repo, ...isolated(dir) });
      expect(resolved).toEqual({
        root: repo,
        config: { adrDir: 'doc/adr', mode: 'compatible' },
        source: 'defaults',
      });
    });
  });

  it('falls back to the user settings file', async () => {
    await withProject(async (dir) => {
      const xdg = join(dir, 'xdg');
      await mkdir(join(xdg, 'adrs'), { recursive: true });
      await writeFile(join(xdg, 'adrs', 'config.toml'), 'adr_dir = "records"\n');

      const resolved = resolveConfig({ cwd: dir, env: { XDG_CONFIG_HOME: xdg } });
      expect(resolved.source).toBe('global');
      expect(resolved.root).toBe(dir);
      expect(resolved.config.adrDir).toBe('records');
      expect(resolved.configPath).toBe(join(xdg, 'adrs', 'config.toml'));
    });
  });

  it('uses an explicit settings file relative to cwd', async () => {
    await withProject(async (dir) => {
      await mkdir(join(dir, 'conf'));
      await writeFile(join(dir, 'conf', 'custom.toml'), 'adr_dir = "adr"\n');

      const resolved = resolveConfig({ cwd: dir, configPath: 'conf/custom.toml', ...isolated(dir) });
      expect(resolved.source).toBe('explicit');
      expect(resolved.root).toBe(join(dir, 'conf'));
      expect(adrDirPath(resolved)).toBe(join(dir, 'conf', 'adr'));
    });
  });

  it('honours ADRS_CONFIG and ADRS_DIR', async () => {
    await withProject(async (dir) => {
      await writeFile(join(dir, 'other.toml'), 'mode = "ng"\n');

      const resolved = resolveConfig({
        cwd: dir,
        env: { ADRS_CONFIG: join(dir, 'other.toml'), ADRS_DIR: 'architecture' },
        homeDir: join(dir, 'home'),
      });
      expect(resolved.source).toBe('explicit');
      expect(resolved.config).toEqual({ adrDir: 'architecture', mode: 'ng' });
      expect(resolved.directoryOverride).toBe('architecture');
      expect(describeConfigSource(resolved)).toBe(
        `explicit settings file (${join(dir, 'other.toml')}), directory overridden`,
      );
    });
  });

  it('lets the directory option win over ADRS_DIR', async () => {
    await withProject(async (dir) => {
      const resolved = resolveConfig({
        cwd: dir,
        directory: 'from-flag',
        env: { ADRS_DIR: 'from-env' },
        homeDir: join(dir, 'home'),
      });
      expect(resolved.config.adrDir).toBe('from-flag');
      expect(resolved.source).toBe('defaults');
    });
  });
});

describe('loadConfigFile', () => {
  it('rejects malformed TOML', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'adrs.toml');
      await writeFile(path, 'adr_dir = \n');
      expect(() => loadConfigFile(path)).toThrow(AdrConfigError);
      expect(() => loadConfigFile(path)).toThrow(/not valid TOML/);
    });
  });

  it('rejects an unknown mode', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'adrs.toml');
      await writeFile(path, 'mode = "fancy"\n');
      expect(() => loadConfigFile(path)).toThrow(`Invalid configuration (${path}):`);
    });
  });

  it('rejects an empty .adr-dir', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, '.adr-dir');
      await writeFile(path, '  \n');
      expect(() => loadConfigFile(path)).toThrow(`Invalid configuration (${path}): file is empty`);
    });
  });

  it('ignores unknown keys', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'adrs.toml');
      await writeFile(path, 'adr_dir = "x"\ntemplate = "nygard"\n');
      expect(loadConfigFile(path)).toEqual({ adrDir: 'x', mode: 'compatible' });
    });
  });
});

describe('saveConfig', () => {
  it('writes .adr-dir in compatible mode', async () => {
    await withTempDir(async (dir) => {
      const path = saveConfig(dir, { adrDir: 'doc/adr', mode: 'compatible' });
      expect(path).toBe(join(dir, '.adr-dir'));
      expect(await readFile(path, 'utf8')).toBe('doc/adr');
    });
  });

  it('writes adrs.toml in ng mode that loads back', async () => {
    await withTempDir(async (dir) => {
      const config = { adrDir: 'decisions', mode: 'ng' } as const;
      const path = saveConfig(dir, config);
      expect(path).toBe(join(dir, 'adrs.toml'));
      expect(loadConfigFile(path)).toEqual(config);
    });
  });
});

describe('globalConfigPath', () => {
  it('prefers XDG_CONFIG_HOME', () => {
    expect(globalConfigPath({ XDG_CONFIG_HOME: '/xdg' }, '/home/u')).toBe('/xdg/adrs/config.toml');
    expect(globalConfigPath({}, '/home/u')).toBe('/home/u/.config/adrs/config.toml');
  });
});

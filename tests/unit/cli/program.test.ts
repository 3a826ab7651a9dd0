/**
 * CLI Program Tests
 *
 * 通过注入的引擎工厂驱动 commander 程序，验证选项到运行参数的映射。
 */

import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import { createProgram } from '../../../src/cli/index.ts';
import { resolveBumpMode, resolveTargetSelection } from '../../../src/cli/commands/bump.ts';
import type { CommandDeps, GlobalOptions } from '../../../src/cli/commands/types.ts';
import { ConfigurationError, InvalidOverrideFormatError } from '../../../src/common/errors.ts';
import { VersionEngine } from '../../../src/engine/version-engine.ts';
import {
  createFakeGit,
  createWorkspace,
  readFile,
  removeWorkspace,
  silentLogger,
  type GitCall,
} from '../../fixtures/workspace.ts';

describe('resolveBumpMode', () => {
  it('should prefer the override over skip', () => {
    expect(resolveBumpMode({ versionOverride: '2031.7', skipBump: true })).toEqual({ kind: 'override', text: '2031.7' });
    expect(resolveBumpMode({ skipBump: true })).toEqual({ kind: 'skip' });
    expect(resolveBumpMode({})).toEqual({ kind: 'increment' });
  });
});

describe('resolveTargetSelection', () => {
  it('should map the target flags', () => {
    expect(resolveTargetSelection({})).toEqual({ kind: 'required' });
    expect(resolveTargetSelection({ updateAll: true })).toEqual({ kind: 'all' });
    expect(resolveTargetSelection({ only: 'cargo' })).toEqual({ kind: 'only', id: 'cargo' });
  });

  it('should reject --update-all together with --only', () => {
    expect(() => resolveTargetSelection({ updateAll: true, only: 'cargo' })).toThrow(ConfigurationError);
  });
});

describe('createProgram', () => {
  let root: string;
  let calls: GitCall[];
  let seen: GlobalOptions[];
  let output: string[];

  const deps = (): CommandDeps => {
    const git = createFakeGit();
    calls = git.calls;
    return {
      createEngine: async (globals) => {
        seen.push(globals);
        return VersionEngine.create({
          rootDir: root,
          logger: silentLogger(),
          now: () => new Date(2024, 5, 15),
          gitExec: git.exec,
        });
      },
    };
  };

  const run = (args: string[]) => createProgram(deps()).exitOverride().parseAsync(args, { from: 'user' });
  const printed = () => output.join('\n');

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    root = createWorkspace({ '.build_meta.json': '{"year": 2024, "build": 5}\n' });
    seen = [];
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeWorkspace(root);
  });

  it('should bump and commit by default', async () => {
    await run([]);

    expect(readFile(root, 'src/version.rs')).toBe('pub const VERSION: &str = "2024.6";\n');
    expect(calls.map((call) => call.args[0])).toEqual(['add', 'commit']);
    expect(printed()).toContain('Committed: Bump version to 2024.6 [skip ci]');
  });

  it('should honour --skip-bump and --skip-git', async () => {
    await run(['--skip-bump', '--skip-git']);

    expect(readFile(root, '.build_meta.json')).toBe('{"year": 2024, "build": 5}\n');
    expect(readFile(root, 'src/version.rs')).toBe('pub const VERSION: &str = "2024.5";\n');
    expect(calls).toEqual([]);
    expect(printed().split('\n').at(-1)).toBe('Git commit skipped');
  });

  it('should print a JSON report', async () => {
    await run(['--json', '--skip-git']);

    const report: unknown = JSON.parse(printed());
    expect(report).toMatchObject({
      previous: '2024.5',
      version: '2024.6',
      modifiedFiles: ['.build_meta.json', path.join('src', 'version.rs')],
      commit: { committed: false, reason: 'skipped' },
    });
  });

  it('should reject a malformed override without touching any file', async () => {
    await expect(run(['--version-override', '2024-7'])).rejects.toBeInstanceOf(InvalidOverrideFormatError);
    expect(fs.existsSync(path.join(root, 'src', 'version.rs'))).toBe(false);
  });

  it('should reject --update-all with --only', async () => {
    await expect(run(['--update-all', '--only', 'wix'])).rejects.toBeInstanceOf(ConfigurationError);
    expect(seen).toEqual([]);
  });

  it('should print the current version in the requested format', async () => {
    await run(['current', '--format', 'installer']);
    expect(printed()).toBe('2024.5.0.0');
  });

  it('should pass global options through to subcommands', async () => {
    await run(['--root', root, '--config', 'custom.json', 'current']);
    expect(seen[0]).toMatchObject({ root, config: 'custom.json' });
  });

  it('should initialize the state file', async () => {
    fs.rmSync(path.join(root, '.build_meta.json'));

    await run(['init', '--year', '2030']);

    expect(readFile(root, '.build_meta.json')).toBe('{\n  "year": 2030,\n  "build": 0\n}\n');
    expect(printed()).toBe(`Created ${path.join(root, '.build_meta.json')} (2030.0)`);
  });

  it('should reject a non-numeric build for init', async () => {
    fs.rmSync(path.join(root, '.build_meta.json'));
    await expect(run(['init', '--build', 'one'])).rejects.toThrow('--build must be a non-negative integer, got "one"');
  });

  it('should list targets with the versions found on disk', async () => {
    await run(['targets']);

    const lines = printed().split('\n');
    expect(lines.slice(0, 3)).toEqual(['Configured targets', 'built-in defaults', '']);
    expect(lines).toContain('version-constant (source-constant, bare, required)');
    expect(lines).toContain('  src/version.rs: not found');
    expect(lines).toContain(`  ${path.join('vscode-extension', 'package.json')}: not found`);
  });
});

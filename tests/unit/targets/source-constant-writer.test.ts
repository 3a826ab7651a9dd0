/**
 * SourceConstantWriter Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { SourceConstantWriter } from '../../../src/targets/source-constant-writer.ts';
import { ChangeTracker } from '../../../src/targets/change-tracker.ts';
import { SourceConstantTargetSchema } from '../../../src/config/config-schema.ts';
import { MissingRequiredTargetError } from '../../../src/common/errors.ts';
import { deriveVersionStrings } from '../../../src/version/deriver.ts';
import { createWorkspace, readFile, removeWorkspace, silentLogger, writeFiles } from '../../fixtures/workspace.ts';

const strings = deriveVersionStrings({ year: 2024, build: 6 });

describe('SourceConstantWriter', () => {
  let root: string;

  const createWriter = (overrides: Record<string, unknown> = {}) =>
    new SourceConstantWriter(
      SourceConstantTargetSchema.parse({ kind: 'source-constant', id: 'version-constant', path: 'src/version.rs', ...overrides }),
      { rootDir: root, logger: silentLogger() },
    );

  beforeEach(() => {
    root = createWorkspace();
  });

  afterEach(() => {
    removeWorkspace(root);
  });

  it('should create the file and its directory when absent', async () => {
    const tracker = new ChangeTracker();
    const [result] = await createWriter().apply(strings, tracker);

    expect(result).toMatchObject({ targetId: 'version-constant', status: 'created', version: '2024.6' });
    expect(readFile(root, 'src/version.rs')).toBe('pub const VERSION: &str = "2024.6";\n');
    expect(tracker.list()).toEqual([path.join(root, 'src/version.rs')]);
  });

  it('should overwrite the whole file', async () => {
    writeFiles(root, { 'src/version.rs': '// old header\npub const VERSION: &str = "2024.5";\n' });

    const [result] = await createWriter().apply(strings, new ChangeTracker());

    expect(result?.status).toBe('updated');
    expect(readFile(root, 'src/version.rs')).toBe('pub const VERSION: &str = "2024.6";\n');
  });

  it('should report unchanged and leave the tracker empty on a second application', async () => {
    const writer = createWriter();
    await writer.apply(strings, new ChangeTracker());

    const tracker = new ChangeTracker();
    const [result] = await writer.apply(strings, tracker);

    expect(result?.status).toBe('unchanged');
    expect(tracker.isEmpty()).toBe(true);
  });

  it('should render a custom template', async () => {
    const writer = createWriter({ path: 'src/version.ts', template: "export const VERSION = '{version}';\n" });
    await writer.apply(strings, new ChangeTracker());
    expect(readFile(root, 'src/version.ts')).toBe("export const VERSION = '2024.6';\n");
  });

  it('should fail when a required file is absent and creation is disabled', async () => {
    const writer = createWriter({ createIfMissing: false });
    await expect(writer.apply(strings, new ChangeTracker())).rejects.toBeInstanceOf(MissingRequiredTargetError);
    expect(fs.existsSync(path.join(root, 'src/version.rs'))).toBe(false);
  });

  it('should skip an optional absent file when creation is disabled', async () => {
    const writer = createWriter({ createIfMissing: false, required: false });
    const [result] = await writer.apply(strings, new ChangeTracker());
    expect(result).toMatchObject({ status: 'skipped', reason: 'missing' });
  });

  describe('detect', () => {
    it('should read the quoted version', async () => {
      writeFiles(root, { 'src/version.rs': 'pub const VERSION: &str = "2023.9";\n' });
      await expect(createWriter().detect()).resolves.toEqual([
        { file: path.join(root, 'src/version.rs'), version: '2023.9' },
      ]);
    });

    it('should return undefined for a missing file', async () => {
      const [detected] = await createWriter().detect();
      expect(detected?.version).toBeUndefined();
    });
  });
});

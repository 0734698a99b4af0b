import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readJsonFile, writeJsonFileAtomic } from '../json-file';

describe('json-file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'statuscast-json-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('存在しないファイルは undefined', async () => {
    await expect(readJsonFile(path.join(dir, 'missing.json'))).resolves.toBeUndefined();
  });

  it('ディレクトリを作って書き込み、一時ファイルを残さない', async () => {
    const file = path.join(dir, 'nested', 'state.json');

    await writeJsonFileAtomic(file, { kind: 'feed', seen: ['1'] });

    await expect(readJsonFile(file)).resolves.toEqual({ kind: 'feed', seen: ['1'] });
    expect(await readdir(path.join(dir, 'nested'))).toEqual(['state.json']);
    expect(await readFile(file, 'utf-8')).toBe(
      JSON.stringify({ kind: 'feed', seen: ['1'] }, null, 2)
    );
  });

  it('壊れた JSON は例外', async () => {
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '{"kind":', 'utf-8');

    await expect(readJsonFile(file)).rejects.toBeInstanceOf(SyntaxError);
  });
});

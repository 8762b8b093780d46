import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { WriteError } from '../../api/base';
import type { CompiledDataset } from '../compile';
import { configureLogger } from '../log';
import { serializeDataset, writeDataset } from '../output';

configureLogger({ level: 'error' });

const dataset: CompiledDataset = [
  { neoInfo: { id: '2000433', name: '433 Eros (A898 PA)' }, orbitalData: { object: { fullname: '433 Eros (A898 PA)' } } },
];

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'neo-orbits-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('serializes an array of neoInfo/orbitalData pairs', () => {
  const text = serializeDataset(dataset);
  assert.equal(
    text,
    [
      '[',
      '  {',
      '    "neoInfo": {',
      '      "id": "2000433",',
      '      "name": "433 Eros (A898 PA)"',
      '    },',
      '    "orbitalData": {',
      '      "object": {',
      '        "fullname": "433 Eros (A898 PA)"',
      '      }',
      '    }',
      '  }',
      ']',
      '',
    ].join('\n'),
  );
});

test('an empty dataset is an empty JSON array', () => {
  assert.equal(serializeDataset([]), '[]\n');
});

test('writes the document and creates missing directories', async () => {
  await withTempDir(async dir => {
    const path = join(dir, 'nested', 'out.json');
    await writeDataset(path, dataset);
    assert.deepEqual(JSON.parse(await readFile(path, 'utf8')), dataset);
    assert.deepEqual(await readdir(join(dir, 'nested')), ['out.json']);
  });
});

test('replaces an existing file', async () => {
  await withTempDir(async dir => {
    const path = join(dir, 'out.json');
    await writeFile(path, 'old', 'utf8');
    await writeDataset(path, []);
    assert.equal(await readFile(path, 'utf8'), '[]\n');
  });
});

test('a failed write raises WriteError and leaves the old file alone', async () => {
  await withTempDir(async dir => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, 'keep me', 'utf8');
    const path = join(blocker, 'out.json');

    await assert.rejects(writeDataset(path, dataset), (error: unknown) => {
      assert.ok(error instanceof WriteError);
      assert.equal(error.path, path);
      return true;
    });
    assert.equal(await readFile(blocker, 'utf8'), 'keep me');
  });
});

import test from 'node:test';
import assert from 'node:assert/strict';
import { access, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ArchiveError, type ArchiveErrorCode } from '../src/index.js';
import { loadState, parseState, saveState, type ExtractionState } from '../src/extract/state.js';
import { withTempDir } from './zip-fixture.js';

const STATE: ExtractionState = {
  archive_identity: '/data/archive.zip',
  base_directory: 'payload',
  order: ['payload/b.csv', 'payload/a.csv'],
  cursor: 1,
  batch_size: 1,
  seed: 123,
  extension_filter: ['.csv'],
  failed: [],
  on_error: 'skip',
  max_retries: 1,
  validate_crc: false
};

const rejectsWith = (code: ArchiveErrorCode) => (err: unknown) => err instanceof ArchiveError && err.code === code;

test('saveState writes indented JSON with stable keys and no leftover temp file', async () => {
  await withTempDir(async (dir) => {
    const statePath = path.join(dir, 'state.json');
    await saveState(statePath, STATE);
    const text = await readFile(statePath, 'utf8');
    assert.equal(text, `${JSON.stringify(STATE, null, 2)}\n`);
    assert.deepEqual(Object.keys(JSON.parse(text)), [
      'archive_identity',
      'base_directory',
      'order',
      'cursor',
      'batch_size',
      'seed',
      'extension_filter',
      'failed',
      'on_error',
      'max_retries',
      'validate_crc'
    ]);
    await assert.rejects(() => access(`${statePath}.tmp`));
    assert.deepEqual(await loadState(statePath), STATE);
  });
});

test('loadState: missing file is NOT_FOUND, bad JSON is STATE_INVALID', async () => {
  await withTempDir(async (dir) => {
    const statePath = path.join(dir, 'state.json');
    await assert.rejects(() => loadState(statePath), rejectsWith('ARCHIVE_NOT_FOUND'));
    await writeFile(statePath, '{"archive_identity": ');
    await assert.rejects(() => loadState(statePath), rejectsWith('ARCHIVE_STATE_INVALID'));
  });
});

test('parseState rejects a cursor past the end and unknown policies', () => {
  assert.throws(() => parseState({ ...STATE, cursor: 3 }), rejectsWith('ARCHIVE_STATE_INVALID'));
  assert.throws(() => parseState({ ...STATE, on_error: 'retry' }), rejectsWith('ARCHIVE_STATE_INVALID'));
  assert.throws(() => parseState({ ...STATE, batch_size: 0 }), rejectsWith('ARCHIVE_STATE_INVALID'));
  assert.throws(() => parseState([STATE]), rejectsWith('ARCHIVE_STATE_INVALID'));
  const { seed: _seed, ...withoutSeed } = STATE;
  assert.throws(() => parseState(withoutSeed), rejectsWith('ARCHIVE_STATE_INVALID'));
});

test('parseState normalizes the filter and dedupes failures', () => {
  const parsed = parseState({ ...STATE, extension_filter: ['CSV', '.csv'], failed: ['x', 'x', 'y'] });
  assert.deepEqual(parsed.extension_filter, ['.csv']);
  assert.deepEqual(parsed.failed, ['x', 'y']);
  assert.equal(parseState({ ...STATE, cursor: 2 }).cursor, 2);
});

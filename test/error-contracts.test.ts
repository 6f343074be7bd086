import test from 'node:test';
import assert from 'node:assert/strict';
import { ArchiveError, ZipNavigator } from '../src/index.js';
import { withTempDir, writeZip } from './zip-fixture.js';

test('ArchiveError.toJSON has a stable shape', () => {
  const cause = new Error('disk went away');
  const err = new ArchiveError('ARCHIVE_EXTRACTION_FAILED', 'Error extracting a.txt: disk went away', {
    memberName: 'a.txt',
    context: { attempts: '2' },
    cause
  });
  assert.equal(err.name, 'ArchiveError');
  assert.equal(err.cause, cause);
  assert.ok(err instanceof Error);
  assert.deepEqual(err.toJSON(), {
    schemaVersion: '1',
    name: 'ArchiveError',
    code: 'ARCHIVE_EXTRACTION_FAILED',
    message: 'Error extracting a.txt: disk went away',
    hint: 'Error extracting a.txt: disk went away',
    context: { attempts: '2' },
    memberName: 'a.txt'
  });
});

test('context keys that shadow top-level fields are dropped', () => {
  const err = new ArchiveError('ARCHIVE_UNSAFE_MEMBER', 'Unsafe member name: ../x', {
    memberName: '../x',
    context: { memberName: 'spoofed', code: 'X', hint: 'h', schemaVersion: '9', extra: 'kept' }
  });
  assert.deepEqual(err.toJSON().context, { extra: 'kept' });
});

test('codes with a fixed remedy carry a dedicated hint', () => {
  const conflict = new ArchiveError('ARCHIVE_STATE_CONFLICT', 'mismatch');
  assert.equal(conflict.toJSON().hint, 'Initialize with reset enabled or choose another extraction subdirectory.');
  const space = new ArchiveError('ARCHIVE_INSUFFICIENT_SPACE', 'full');
  assert.equal(space.toJSON().hint, 'Free disk space or lower the batch size.');
  const plain = new ArchiveError('ARCHIVE_NOT_FOUND', 'No such file: x');
  assert.equal(plain.toJSON().hint, 'No such file: x');
  assert.equal('memberName' in plain.toJSON(), false);
});

test('errors raised by navigation serialize through JSON.stringify', async () => {
  await withTempDir(async (dir) => {
    const nav = await ZipNavigator.open(await writeZip(dir, 'fixture.zip', [{ name: 'a/b.txt', data: 'b' }]));
    try {
      let caught: unknown;
      try {
        nav.cd('missing');
      } catch (err) {
        caught = err;
      }
      assert.ok(caught instanceof ArchiveError);
      assert.deepEqual(JSON.parse(JSON.stringify(caught)), {
        schemaVersion: '1',
        name: 'ArchiveError',
        code: 'ARCHIVE_NOT_FOUND',
        message: 'No such directory: missing',
        hint: 'No such directory: missing',
        context: { path: 'missing' }
      });
    } finally {
      await nav.close();
    }
  });
});

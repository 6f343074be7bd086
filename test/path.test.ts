import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { ArchiveError, extensionOf, isSafeMemberName, normalizeExtensions, resolvePath, toDisplayPath } from '../src/index.js';
import { collapseSegments } from '../src/path/resolve.js';
import { memberOutputPath } from '../src/path/safety.js';
import { sameExtensionFilter } from '../src/path/extensions.js';

const isInvalidArgument = (err: unknown) => err instanceof ArchiveError && err.code === 'ARCHIVE_INVALID_ARGUMENT';

test('resolvePath: ".." from the root is rejected', () => {
  assert.throws(() => resolvePath('', '..'), isInvalidArgument);
  assert.throws(() => resolvePath('a/', '../../x'), isInvalidArgument);
});

test('resolvePath: segments collapse relative to the root', () => {
  assert.equal(resolvePath('', 'a/../b'), 'b');
  assert.equal(resolvePath('', './a/./b'), 'a/b');
  assert.equal(resolvePath('payload/', '..'), '');
  assert.equal(resolvePath('', '..foo'), '..foo');
});

test('resolvePath: relative input joins the cursor, absolute input the root', () => {
  assert.equal(resolvePath('payload/', 'sub'), 'payload/sub');
  assert.equal(resolvePath('payload/', '/other'), 'other');
  assert.equal(resolvePath('payload/', '/'), '');
});

test('resolvePath: empty input is the cursor without its trailing slash', () => {
  assert.equal(resolvePath('payload/', ''), 'payload');
  assert.equal(resolvePath('payload/', undefined), 'payload');
  assert.equal(resolvePath('payload/', null), 'payload');
  assert.equal(resolvePath(''), '');
});

test('resolvePath: trailing slash survives and backslashes become separators', () => {
  assert.equal(resolvePath('', 'dir/'), 'dir/');
  assert.equal(resolvePath('', 'a\\b'), 'a/b');
  assert.equal(resolvePath('', 'a\\b\\'), 'a/b/');
});

test('toDisplayPath renders the root as "/"', () => {
  assert.equal(toDisplayPath(''), '/');
  assert.equal(toDisplayPath('payload/'), '/payload/');
});

test('collapseSegments keeps leading ".." it cannot pop', () => {
  assert.deepEqual(collapseSegments('../a/../../b'), ['..', '..', 'b']);
  assert.deepEqual(collapseSegments('a//b/./c/..'), ['a', 'b']);
});

test('isSafeMemberName rejects traversal, absolute and drive-letter names', () => {
  assert.equal(isSafeMemberName('ok/file.txt'), true);
  assert.equal(isSafeMemberName('a/../b'), true);
  assert.equal(isSafeMemberName('..foo/bar'), true);
  assert.equal(isSafeMemberName('../evil.txt'), false);
  assert.equal(isSafeMemberName('a/../../x'), false);
  assert.equal(isSafeMemberName('..'), false);
  assert.equal(isSafeMemberName('.'), false);
  assert.equal(isSafeMemberName('/etc/passwd'), false);
  assert.equal(isSafeMemberName('\\abs.txt'), false);
  assert.equal(isSafeMemberName('C:/x.txt'), false);
  assert.equal(isSafeMemberName('c:x.txt'), false);
  assert.equal(isSafeMemberName('nul\u0000.txt'), false);
});

test('memberOutputPath stays inside the extraction directory', () => {
  const base = path.resolve('/tmp/ziptrail-out');
  assert.equal(memberOutputPath(base, 'a/b.txt'), path.join(base, 'a', 'b.txt'));
  assert.equal(memberOutputPath(base, 'a/../c.txt'), path.join(base, 'c.txt'));
  assert.throws(
    () => memberOutputPath(base, '../evil.txt'),
    (err: unknown) => err instanceof ArchiveError && err.code === 'ARCHIVE_UNSAFE_MEMBER' && err.memberName === '../evil.txt'
  );
});

test('normalizeExtensions lowercases, dot-prefixes, dedupes and sorts', () => {
  assert.deepEqual(normalizeExtensions(['CSV', '.txt', ' csv ', '']), ['.csv', '.txt']);
  assert.equal(normalizeExtensions([]), null);
  assert.equal(normalizeExtensions(['  ']), null);
  assert.equal(normalizeExtensions(null), null);
  assert.equal(normalizeExtensions(undefined), null);
  assert.deepEqual(normalizeExtensions(['.JSON', 'json']), ['.json']);
});

test('extensionOf uses the last suffix of the basename', () => {
  assert.equal(extensionOf('a.tar.gz'), '.gz');
  assert.equal(extensionOf('DATA.CSV'), '.csv');
  assert.equal(extensionOf('.bashrc'), '');
  assert.equal(extensionOf('..hidden.TXT'), '.txt');
  assert.equal(extensionOf('dir.d/file'), '');
});

test('sameExtensionFilter treats null and empty alike', () => {
  assert.equal(sameExtensionFilter(null, []), true);
  assert.equal(sameExtensionFilter(['.csv'], ['.csv']), true);
  assert.equal(sameExtensionFilter(['.csv'], ['.txt']), false);
  assert.equal(sameExtensionFilter(['.csv'], null), false);
});

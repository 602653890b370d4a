import { describe, test, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, realpath, rm, symlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PathGuard, isContained } from '../src/services/path-guard.js';
import { setLogLevel } from '../src/utils/logger.js';

let root: string;
let realRoot: string;
let outside: string;

beforeAll(async () => {
  root = await mkdtemp(join(tmpdir(), 'pathguard-'));
  realRoot = await realpath(root);
  outside = await mkdtemp(join(tmpdir(), 'escape-target-'));

  await writeFile(join(root, 'ok.txt'), 'hello from inside', 'utf-8');
  await writeFile(join(root, 'notes..txt'), 'dotted', 'utf-8');
  await writeFile(join(root, 'binary.bin'), Buffer.from([0xff, 0xfe, 0xfd]));
  await writeFile(join(root, 'big.txt'), 'x'.repeat(64), 'utf-8');
  await writeFile(join(root, 'Readme.MD'), '# readme', 'utf-8');
  await mkdir(join(root, 'nested'));
  await writeFile(join(root, 'nested', 'deep.txt'), 'deep', 'utf-8');
  await writeFile(join(outside, 'secret.txt'), 'outside', 'utf-8');
  await symlink(join(outside, 'secret.txt'), join(root, 'escape.txt'));

  await mkdir(`${root}-evil`);
  await writeFile(join(`${root}-evil`, 'loot.txt'), 'sibling', 'utf-8');
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
  await rm(`${root}-evil`, { recursive: true, force: true });
  await rm(outside, { recursive: true, force: true });
});

beforeEach(() => {
  setLogLevel('silent');
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('PathGuard.safeRead', () => {
  test('reads a file inside the root', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.safeRead(join(root, 'ok.txt'))).toBe('hello from inside');
  });

  test('reads nested files', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.safeRead(join(root, 'nested', 'deep.txt'))).toBe('deep');
  });

  test('rejects traversal out of the root', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.safeRead(`${root}/../../etc/passwd`)).toBeNull();
  });

  test('rejects a path in another directory', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.safeRead('/other/dir/file.txt')).toBeNull();
  });

  test('rejects a symlink pointing outside the root', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.safeRead(join(root, 'escape.txt'))).toBeNull();
  });

  test('returns null for a missing file', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.safeRead(join(root, 'missing.txt'))).toBeNull();
  });

  test('returns null for a directory', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.safeRead(join(root, 'nested'))).toBeNull();
  });

  test('returns null for content that is not UTF-8', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.safeRead(join(root, 'binary.bin'))).toBeNull();
  });

  test('gives the same answer on repeated calls', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    const target = join(root, 'ok.txt');
    expect(await guard.safeRead(target)).toBe(await guard.safeRead(target));
  });

  test('logs the reason for a rejection', async () => {
    setLogLevel('error');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const guard = new PathGuard({ allowedRoot: root });

    await guard.safeRead('/other/dir/file.txt');

    expect(error).toHaveBeenCalledWith(expect.stringContaining('File access outside allowed directory'));
  });
});

describe('PathGuard.perform', () => {
  test('reports a successful read', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.perform(join(root, 'ok.txt'), 'read')).toEqual({
      status: 'ok',
      path: join(realRoot, 'ok.txt'),
      content: 'hello from inside',
    });
  });

  test('treats write as unsupported', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.perform(join(root, 'ok.txt'), 'write')).toEqual({
      status: 'unsupported',
      path: join(realRoot, 'ok.txt'),
      operation: 'write',
    });
  });

  test('rejects a write outside the root before reporting it unsupported', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    const outcome = await guard.perform('/other/dir/file.txt', 'write');
    expect(outcome).toEqual({
      status: 'rejected',
      path: '/other/dir/file.txt',
      reason: 'File access outside allowed directory',
    });
  });

  test('rejects a resolved path that still contains a parent marker', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.perform(join(root, 'notes..txt'), 'read')).toEqual({
      status: 'rejected',
      path: join(realRoot, 'notes..txt'),
      reason: 'Directory traversal attempt detected',
    });
  });

  test('reports read failures', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    const outcome = await guard.perform(join(root, 'missing.txt'), 'read');
    expect(outcome.status).toBe('failed');
  });
});

describe('size and extension limits', () => {
  test('fails a file over the size cap', async () => {
    const guard = new PathGuard({ allowedRoot: root, maxFileSize: 16 });
    expect(await guard.perform(join(root, 'big.txt'), 'read')).toEqual({
      status: 'failed',
      path: join(realRoot, 'big.txt'),
      error: 'File size 64 bytes exceeds limit of 16 bytes',
    });
  });

  test('reads a file exactly at the cap', async () => {
    const guard = new PathGuard({ allowedRoot: root, maxFileSize: 64 });
    expect(await guard.safeRead(join(root, 'big.txt'))).toBe('x'.repeat(64));
  });

  test('returns null and logs for an oversize file', async () => {
    setLogLevel('error');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const guard = new PathGuard({ allowedRoot: root, maxFileSize: 16 });

    expect(await guard.safeRead(join(root, 'big.txt'))).toBeNull();
    expect(error).toHaveBeenCalledWith(expect.stringContaining('exceeds limit of 16 bytes'));
  });

  test('admits small files under the default 1 MiB cap', async () => {
    const guard = new PathGuard({ allowedRoot: root });
    expect(await guard.safeRead(join(root, 'big.txt'))).toBe('x'.repeat(64));
  });

  test('rejects an extension outside the allowlist', async () => {
    const guard = new PathGuard({ allowedRoot: root, allowedExtensions: ['.txt', '.json', '.md'] });
    expect(await guard.perform(join(root, 'binary.bin'), 'read')).toEqual({
      status: 'rejected',
      path: join(realRoot, 'binary.bin'),
      reason: 'File type not allowed',
    });
  });

  test('matches extensions without regard to case', async () => {
    const guard = new PathGuard({ allowedRoot: root, allowedExtensions: ['.md'] });
    expect(await guard.safeRead(join(root, 'Readme.MD'))).toBe('# readme');
  });

  test('checks the extension before a write is reported unsupported', async () => {
    const guard = new PathGuard({ allowedRoot: root, allowedExtensions: ['.txt'] });
    const outcome = await guard.perform(join(root, 'binary.bin'), 'write');
    expect(outcome.status).toBe('rejected');
  });
});

describe('containment modes', () => {
  test('prefix mode admits a sibling sharing the root name', async () => {
    const guard = new PathGuard({ allowedRoot: root, containment: 'prefix' });
    expect(await guard.safeRead(join(`${root}-evil`, 'loot.txt'))).toBe('sibling');
  });

  test('segment mode rejects the sibling', async () => {
    const guard = new PathGuard({ allowedRoot: root, containment: 'segment' });
    expect(await guard.safeRead(join(`${root}-evil`, 'loot.txt'))).toBeNull();
  });

  test('segment mode still reads files inside the root', async () => {
    const guard = new PathGuard({ allowedRoot: root, containment: 'segment' });
    expect(await guard.safeRead(join(root, 'ok.txt'))).toBe('hello from inside');
  });
});

describe('isContained', () => {
  test.each([
    ['/allowed/dir/file.txt', 'prefix', true],
    ['/allowed/dir-evil/file.txt', 'prefix', true],
    ['/allowed/dir-evil/file.txt', 'segment', false],
    ['/allowed/dir', 'segment', true],
    ['/allowed/dir/a/b', 'segment', true],
    ['/allowed', 'segment', false],
    ['/elsewhere/file.txt', 'prefix', false],
  ] as const)('%s under /allowed/dir (%s) -> %s', (target, mode, expected) => {
    expect(isContained(target, '/allowed/dir', mode)).toBe(expected);
  });
});

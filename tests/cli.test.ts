import { describe, test, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import process from 'process';
import { runCli } from '../src/program.js';
import { setLogLevel } from '../src/utils/logger.js';

let root: string;

beforeAll(async () => {
  root = await mkdtemp(join(tmpdir(), 'sapi-cli-'));
  await writeFile(join(root, 'note.txt'), 'cli content', 'utf-8');
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

beforeEach(() => {
  setLogLevel('info');
  vi.stubEnv('API_BASE_URL', '');
  vi.stubEnv('ALLOWED_ROOT', root);
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  process.exitCode = undefined;
  setLogLevel('silent');
});

describe('sapi read', () => {
  test('prints the file contents', async () => {
    vi.stubEnv('LOG_LEVEL', 'silent');
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await runCli(['node', 'sapi', 'read', join(root, 'note.txt')]);

    expect(write).toHaveBeenCalledWith('cli content');
    expect(process.exitCode).toBeUndefined();
  });

  test('reports a path outside the root', async () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await runCli(['node', 'sapi', 'read', '/other/dir/file.txt']);

    expect(error).toHaveBeenCalledWith(expect.stringContaining('Could not read /other/dir/file.txt'));
    expect(process.exitCode).toBe(1);
  });

  test('reports an invalid environment before exiting', async () => {
    vi.stubEnv('LOG_LEVEL', 'loud');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await runCli(['node', 'sapi', 'read', join(root, 'note.txt')]);

    expect(error).toHaveBeenCalledWith(
      expect.stringContaining('[INVALID_CONFIG] Invalid environment configuration')
    );
    expect(exit).toHaveBeenCalledWith(1);
    expect(process.exitCode).toBe(1);
  });
});

describe('sapi check', () => {
  test('accepts ordinary input', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await runCli(['node', 'sapi', 'check', 'hello']);

    expect(log).toHaveBeenCalledWith(expect.stringContaining('Input passed the pattern check'));
    expect(process.exitCode).toBeUndefined();
  });

  test('rejects a script tag and shows the stripped text', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await runCli(['node', 'sapi', 'check', '<script>x']);

    expect(log).toHaveBeenCalledWith(expect.stringContaining('Input contains a dangerous pattern: <script>'));
    expect(log).toHaveBeenCalledWith('Sanitized: scriptx');
    expect(process.exitCode).toBe(1);
  });
});

import * as fs from 'fs/promises';
import * as path from 'path';
import { match } from 'ts-pattern';
import type {
  ContainmentMode,
  FileOperation,
  FileOperationOutcome,
  PathGuardOptions,
} from '../types/security.js';
import { DEFAULT_CONTAINMENT, DEFAULT_MAX_FILE_SIZE, PARENT_DIR_MARKER } from '../constants/security.js';
import { ERROR_MESSAGES } from '../constants/messages.js';
import { logger } from '../utils/logger.js';
import { sanitizeError } from '../utils/redaction.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

// Follows symlinks where the target exists; a missing target is resolved
// lexically so the containment checks still see an absolute path.
const canonicalize = async (target: string): Promise<string> => {
  const absolute = path.resolve(target);
  try {
    return await fs.realpath(absolute);
  } catch {
    return absolute;
  }
};

export const isContained = (resolvedPath: string, root: string, mode: ContainmentMode): boolean =>
  match(mode)
    .with('prefix', () => resolvedPath.startsWith(root))
    .with('segment', () => {
      const relative = path.relative(root, resolvedPath);
      return (
        relative === '' ||
        (!relative.startsWith(`..${path.sep}`) && relative !== '..' && !path.isAbsolute(relative))
      );
    })
    .exhaustive();

/**
 * Restricts file access to one directory tree.
 *
 * Advisory, like the input denylist: with the default `prefix` containment a
 * sibling whose name starts with the root's name (`/srv/data-old` next to
 * `/srv/data`) is accepted. Use `containment: 'segment'` to compare whole
 * path components instead. `allowedExtensions` narrows what may be opened
 * and `maxFileSize` caps how much a read loads.
 */
export class PathGuard {
  private readonly allowedRoot: string;
  private readonly containment: ContainmentMode;
  private readonly maxFileSize: number;
  private readonly allowedExtensions?: readonly string[];

  constructor({
    allowedRoot,
    containment = DEFAULT_CONTAINMENT,
    maxFileSize = DEFAULT_MAX_FILE_SIZE,
    allowedExtensions,
  }: PathGuardOptions) {
    this.allowedRoot = allowedRoot;
    this.containment = containment;
    this.maxFileSize = maxFileSize;
    this.allowedExtensions = allowedExtensions;
  }

  /** Resolves the path and applies the path checks; never touches file contents. */
  resolve = async (
    requestedPath: string
  ): Promise<{ ok: true; path: string } | { ok: false; path: string; reason: string }> => {
    const resolved = await canonicalize(requestedPath);

    // Textual check on the resolved form, kept alongside containment.
    if (resolved.includes(PARENT_DIR_MARKER)) {
      logger.error(ERROR_MESSAGES.TRAVERSAL_DETECTED);
      return { ok: false, path: resolved, reason: ERROR_MESSAGES.TRAVERSAL_DETECTED };
    }

    const root = await canonicalize(this.allowedRoot);
    if (!isContained(resolved, root, this.containment)) {
      logger.error(ERROR_MESSAGES.OUTSIDE_ALLOWED_DIR);
      return { ok: false, path: resolved, reason: ERROR_MESSAGES.OUTSIDE_ALLOWED_DIR };
    }

    if (this.allowedExtensions && !this.allowedExtensions.includes(path.extname(resolved).toLowerCase())) {
      logger.error(`${ERROR_MESSAGES.FILE_TYPE_NOT_ALLOWED}: ${resolved}`);
      return { ok: false, path: resolved, reason: ERROR_MESSAGES.FILE_TYPE_NOT_ALLOWED };
    }

    return { ok: true, path: resolved };
  };

  perform = async (requestedPath: string, operation: FileOperation): Promise<FileOperationOutcome> => {
    const resolution = await this.resolve(requestedPath);

    if (!resolution.ok) {
      return { status: 'rejected', path: resolution.path, reason: resolution.reason };
    }

    return match(operation)
      .with('read', () => this.read(resolution.path))
      .with('write', (): FileOperationOutcome => {
        logger.warn(`${ERROR_MESSAGES.WRITE_NOT_SUPPORTED}: ${resolution.path}`);
        return { status: 'unsupported', path: resolution.path, operation };
      })
      .exhaustive();
  };

  /** Contents of the file, or `null` for any rejection or failure. */
  safeRead = async (requestedPath: string): Promise<string | null> => {
    const outcome = await this.perform(requestedPath, 'read');
    return outcome.status === 'ok' ? outcome.content : null;
  };

  private readonly read = async (resolvedPath: string): Promise<FileOperationOutcome> => {
    try {
      const stats = await fs.stat(resolvedPath);
      if (stats.size > this.maxFileSize) {
        const message = `File size ${stats.size} bytes exceeds limit of ${this.maxFileSize} bytes`;
        logger.error(`File operation failed: ${message}`);
        return { status: 'failed', path: resolvedPath, error: message };
      }

      const bytes = await fs.readFile(resolvedPath);
      return { status: 'ok', path: resolvedPath, content: utf8.decode(bytes) };
    } catch (error) {
      const message = sanitizeError(error);
      logger.error(`File operation failed: ${message}`);
      return { status: 'failed', path: resolvedPath, error: message };
    }
  };
}

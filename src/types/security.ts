export interface ValidationResult {
  isValid: boolean;
  error?: string;
  matchedPattern?: string;
  sanitizedValue?: string;
}

/**
 * How a resolved path is tested against the allowed root.
 *
 * `prefix` is a plain string-prefix test, so `/allowed/dir` also admits
 * `/allowed/dir-evil`. `segment` compares whole path components.
 */
export type ContainmentMode = 'prefix' | 'segment';

export type FileOperation = 'read' | 'write';

export type FileOperationOutcome =
  | { status: 'ok'; path: string; content: string }
  | { status: 'rejected'; path: string; reason: string }
  | { status: 'failed'; path: string; error: string }
  | { status: 'unsupported'; path: string; operation: FileOperation };

export interface PathGuardOptions {
  allowedRoot: string;
  containment?: ContainmentMode;
  /** Largest file `read` will load, in bytes. Defaults to 1 MiB. */
  maxFileSize?: number;
  /** Lower-case extensions with the dot (`.txt`). Unset admits every extension. */
  allowedExtensions?: readonly string[];
}

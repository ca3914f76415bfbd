export type ScanErrorKind =
  | 'config'
  | 'file-system'
  | 'deserialize'
  | 'cursor-mismatch'
  | 'process-launch'
  | 'probe-network'
  | 'body-mismatch';

export abstract class ScanError extends Error {
  abstract readonly kind: ScanErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends ScanError {
  readonly kind = 'config';
}

export class FileSystemError extends ScanError {
  readonly kind = 'file-system';

  constructor(
    readonly path: string,
    readonly code: string | undefined,
    cause: unknown,
  ) {
    super(`IO error on ${path}${code ? ` (${code})` : ''}: ${describeCause(cause)}`, { cause });
  }

  get isNotFound(): boolean {
    return this.code === 'ENOENT';
  }

  static from(path: string, cause: unknown): FileSystemError {
    return new FileSystemError(path, errorCode(cause), cause);
  }
}

export class DeserializeError extends ScanError {
  readonly kind = 'deserialize';

  constructor(
    readonly source: string,
    reason: string,
    readonly line?: number,
    options?: { cause?: unknown },
  ) {
    super(`Cannot read ${source}${line !== undefined ? ` (line ${line})` : ''}: ${reason}`, options);
  }
}

export class CursorMismatchError extends ScanError {
  readonly kind = 'cursor-mismatch';
}

export class ProcessLaunchError extends ScanError {
  readonly kind = 'process-launch';

  constructor(
    readonly command: string,
    reason: string,
    readonly output: string,
    options?: { cause?: unknown },
  ) {
    super(`Tunnel process "${command}" failed to start: ${reason}${output ? `\noutput:\n${output}` : ''}`, options);
  }
}

export class ProbeNetworkError extends ScanError {
  readonly kind = 'probe-network';

  constructor(
    readonly url: string,
    readonly timedOut: boolean,
    options?: { cause?: unknown },
  ) {
    super(`${timedOut ? 'Timed out' : 'Request failed'} for ${url}: ${describeCause(options?.cause)}`, options);
  }
}

export class BodyMismatchError extends ScanError {
  readonly kind = 'body-mismatch';

  constructor(
    readonly url: string,
    readonly expected: string,
    readonly body: string,
  ) {
    super(`Expected body ${JSON.stringify(expected)} not found in response from ${url}: ${JSON.stringify(truncate(body, 200))}`);
  }
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeCause(cause: unknown): string {
  if (cause === undefined) {
    return 'unknown cause';
  }
  return cause instanceof Error ? cause.message : String(cause);
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

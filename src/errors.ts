export enum ErrorKind {
  TRANSPORT = 'transport',
  FILESYSTEM = 'filesystem',
  DECODE = 'decode',
  CONFIGURATION = 'configuration'
}

export abstract class MnistError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'MnistError';
    Object.setPrototypeOf(this, MnistError.prototype);
  }
}

export class TransportError extends MnistError {
  readonly kind = ErrorKind.TRANSPORT;
  public statusCode?: number;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, cause);
    this.name = 'TransportError';
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class FilesystemError extends MnistError {
  readonly kind = ErrorKind.FILESYSTEM;
  public path?: string;

  constructor(message: string, path?: string, cause?: unknown) {
    super(message, cause);
    this.name = 'FilesystemError';
    this.path = path;
    Object.setPrototypeOf(this, FilesystemError.prototype);
  }
}

/** Truncated or corrupt archive data. Not worth retrying. */
export class DecodeError extends MnistError {
  readonly kind = ErrorKind.DECODE;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'DecodeError';
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

export class ConfigurationError extends MnistError {
  readonly kind = ErrorKind.CONFIGURATION;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof MnistError && err.kind === ErrorKind.TRANSPORT;
}

// Matches on shape: Node core errors can belong to another realm
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function describeError(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

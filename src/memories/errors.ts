export type MementoErrorCode =
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "PAIRING"
  | "INVALID_ARCHIVE"
  | "UNSUPPORTED_MEDIA"
  | "UNSUPPORTED_ENTRY"
  | "CODEC";

/**
 * Base class for every failure the pipeline raises on purpose.
 * `path` is the entry, file or directory the failure is about.
 */
export class MementoError extends Error {
  readonly code: MementoErrorCode;
  readonly path: string;

  constructor(code: MementoErrorCode, message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MementoError";
    this.code = code;
    this.path = path;
  }
}

export class NotFoundError extends MementoError {
  constructor(what: string, path: string) {
    super("NOT_FOUND", `${what} not found: ${path}`, path);
    this.name = "NotFoundError";
  }
}

export class InvalidArgumentError extends MementoError {
  constructor(message: string, path: string) {
    super("INVALID_ARGUMENT", message, path);
    this.name = "InvalidArgumentError";
  }
}

export type PairRole = "main" | "overlay";

export class PairingError extends MementoError {
  readonly role: PairRole;
  readonly found: number;

  constructor(dir: string, role: PairRole, found: number) {
    const expectation =
      role === "overlay"
        ? `exactly one image whose name contains "overlay"`
        : `exactly one image or video whose name contains "main"`;
    super("PAIRING", `${dir}: expected ${expectation}, found ${found}`, dir);
    this.name = "PairingError";
    this.role = role;
    this.found = found;
  }
}

export class InvalidArchiveError extends MementoError {
  constructor(reason: string, path: string, options?: ErrorOptions) {
    super("INVALID_ARCHIVE", `Invalid archive ${path}: ${reason}`, path, options);
    this.name = "InvalidArchiveError";
  }
}

export class UnsupportedMediaError extends MementoError {
  constructor(path: string) {
    super("UNSUPPORTED_MEDIA", `Not a decodable image or video: ${path}`, path);
    this.name = "UnsupportedMediaError";
  }
}

export class UnsupportedEntryError extends MementoError {
  constructor(path: string) {
    super(
      "UNSUPPORTED_ENTRY",
      `Unsupported entry (not an image, video, archive or directory): ${path}`,
      path,
    );
    this.name = "UnsupportedEntryError";
  }
}

export class CodecError extends MementoError {
  constructor(operation: string, path: string, cause: unknown) {
    super(
      "CODEC",
      `${operation} failed for ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      path,
      { cause },
    );
    this.name = "CodecError";
  }
}

export function isMementoError(err: unknown): err is MementoError {
  return err instanceof MementoError;
}

/**
 * Re-point a failure raised inside an unpacked archive at the archive:
 * every mention of `scratchDir` becomes `archivePath`, so `<scratch>/x_main.jpg`
 * reads as `<archive>/x_main.jpg`. Errors that are not MementoErrors pass
 * through unchanged.
 */
export function relocateError(err: unknown, scratchDir: string, archivePath: string): unknown {
  if (!isMementoError(err)) {
    return err;
  }
  const relocated = new MementoError(
    err.code,
    err.message.split(scratchDir).join(archivePath),
    err.path.split(scratchDir).join(archivePath),
    { cause: err },
  );
  relocated.name = err.name;
  return relocated;
}

/**
 * Container error types
 *
 * ContainerFormatError: the bytes are not a valid analog container
 * (bad magic, unsupported version, truncated header, invalid metadata,
 * wrong frame size). Fatal for the file.
 *
 * ContainerIOError: the file could not be opened, read or written.
 * The originating fs error is kept as `cause`.
 */
export class ContainerFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContainerFormatError';
  }
}

export class ContainerIOError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`${message}${detail}`, { cause });
    this.name = 'ContainerIOError';
    this.path = path;
  }
}

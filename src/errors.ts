export class ImageProcessingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ImageProcessingError";
  }
}

export class UnsupportedFormatError extends ImageProcessingError {
  readonly extension: string;

  constructor(extension: string) {
    super(`Unsupported image format: ${extension === "" ? "no file extension" : extension}`);
    this.name = "UnsupportedFormatError";
    this.extension = extension;
  }
}

export class QualityOutOfRangeError extends ImageProcessingError {
  readonly raw: number;

  constructor(raw: number) {
    super(`Quality must be an integer between 0 and 100, got ${raw}`);
    this.name = "QualityOutOfRangeError";
    this.raw = raw;
  }
}

export class ImageIoError extends ImageProcessingError {
  /** errno string such as ENOENT or EACCES, when the cause is a system error */
  readonly code: string | undefined;

  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = "ImageIoError";
    this.code = isErrnoException(cause) ? cause.code : undefined;
  }
}

export class DecodingError extends ImageProcessingError {
  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = "DecodingError";
  }
}

export class FetchError extends ImageProcessingError {
  readonly url: string;
  readonly status: number | undefined;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`Failed to fetch image from ${url}: ${message}`, { cause: options.cause });
    this.name = "FetchError";
    this.url = url;
    this.status = options.status;
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
}

export class ConfigurationError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `- ${i.field}: ${i.message}`).join("\n")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value && typeof value.code === "string";
}

export function toProcessingError(err: unknown): ImageProcessingError {
  if (err instanceof ImageProcessingError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ImageProcessingError(message, { cause: err });
}

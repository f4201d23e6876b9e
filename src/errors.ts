export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ImageDecodeError extends Error {
  readonly imagePath: string;

  constructor(imagePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not decode image ${imagePath}: ${reason}`, { cause });
    this.name = 'ImageDecodeError';
    this.imagePath = imagePath;
  }
}

/**
 * Error thrown when the font configuration file cannot be read or parsed.
 * The registry recovers from it by loading an empty font set.
 */
export class FontConfigUnreadableError extends Error {
  constructor(
    public readonly configPath: string,
    cause?: unknown,
  ) {
    super(`Failed to load font configuration from ${configPath}`, { cause });
    this.name = 'FontConfigUnreadableError';
  }
}

/**
 * Error thrown when a font file is missing, unreadable, or not an sfnt outline font.
 */
export class FontFileInvalidError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Invalid font file ${filePath}: ${reason}`, { cause });
    this.name = 'FontFileInvalidError';
  }
}

export class InvalidFontRequestError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'InvalidFontRequestError';
  }
}

/**
 * Raised by the command line layer when an input cannot be read or the tree
 * library rejects an expression. Library functions never throw this; errors
 * from the tree library propagate from them unchanged.
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    readonly source: string,
    readonly xpath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

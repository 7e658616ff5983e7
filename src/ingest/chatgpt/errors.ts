/**
 * Fatal conversion errors
 * Everything else degrades per message instead of aborting the run.
 */

/**
 * Base class for errors that halt a conversion
 */
export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversionError';
  }
}

/**
 * The input is not valid JSON
 */
export class ParseError extends ConversionError {
  constructor(public readonly detail: string) {
    super(`Invalid JSON: ${detail}`);
    this.name = 'ParseError';
  }
}

/**
 * The JSON parsed but matches none of the known export shapes
 */
export class UnsupportedFormatError extends ConversionError {
  constructor(public readonly shape: string) {
    super(
      `Unsupported format: expected a message list, an object with "messages" or an object with "mapping", got ${shape}`
    );
    this.name = 'UnsupportedFormatError';
  }
}

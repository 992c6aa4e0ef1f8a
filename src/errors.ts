/**
 * Error handling for probe matching
 *
 * Every error carries a machine-readable code plus optional line and context
 * information so that batch reports can point at the offending probe row.
 */

/**
 * Base error class for all probe-locator errors
 */
export class ProbeLocatorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "ProbeLocatorError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or requests
 */
export class ValidationError extends ProbeLocatorError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * A probe or target contains characters outside A, T, G, C
 */
export class InvalidAlphabetError extends ProbeLocatorError {
  constructor(
    message: string,
    public readonly invalidBases: readonly string[],
    lineNumber?: number,
    context?: string
  ) {
    super(message, "INVALID_ALPHABET", lineNumber, context);
    this.name = "InvalidAlphabetError";
  }
}

/**
 * An empty probe sequence, target or probe table
 */
export class EmptyInputError extends ProbeLocatorError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "EMPTY_INPUT", lineNumber, context);
    this.name = "EmptyInputError";
  }
}

/**
 * Reverse complement hit a character with no Watson-Crick partner.
 * Returned as the left side of an Either, not thrown.
 */
export class InvalidBaseError extends ProbeLocatorError {
  constructor(
    public readonly base: string,
    public readonly position: number
  ) {
    super(
      `Cannot complement base '${base}' at position ${position}`,
      "INVALID_BASE",
      undefined,
      "Only A, T, G and C have a complement"
    );
    this.name = "InvalidBaseError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends ProbeLocatorError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * No usable probe could be loaded from a probe table
 */
export class ProbeLoadError extends ProbeLocatorError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly rejectedCount: number,
    context?: string
  ) {
    super(message, "PROBE_LOAD_ERROR", undefined, context);
    this.name = "ProbeLoadError";
  }
}

/**
 * File I/O errors with the failing operation and path
 */
export class FileError extends ProbeLocatorError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Expected a file but found a directory";
    }
    return undefined;
  }
}

/**
 * Helper function to create context-aware error messages
 */
export function createContextualError<E extends ProbeLocatorError>(
  ErrorClass: new (message: string, lineNumber?: number, context?: string) => E,
  message: string,
  options: {
    lineNumber?: number;
    context?: string;
  } = {}
): E {
  return new ErrorClass(message, options.lineNumber, options.context);
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  INVALID_NUCLEOTIDE: "Only A, T, G and C are allowed (case-insensitive)",
  EMPTY_PROBE: "Every probe row needs a name and a non-empty sequence",
  EMPTY_TARGET: "Provide a target nucleotide sequence",
  NO_VALID_PROBES: "Check that the probe table has name and sequence columns",
} as const;

/**
 * Error handling for sponge design
 *
 * The pure design core reports infeasible outcomes as data (`success: false`,
 * a non-empty `uncovered` list). Errors are reserved for malformed input at
 * the API boundary: bad options, unusable sequences, unreadable datasets.
 */

/**
 * Base error class for all mirsponge errors
 */
export class SpongeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SpongeError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or parameters
 */
export class ValidationError extends SpongeError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Sequence errors for nucleotide input that cannot be turned into a binding site
 */
export class SequenceError extends SpongeError {
  constructor(
    message: string,
    public readonly elementId: string,
    public readonly sequenceLength: number,
    context?: string
  ) {
    super(message, "SEQUENCE_ERROR", context);
    this.name = "SequenceError";
  }
}

/**
 * Parsing errors for dataset documents and structure annotations
 */
export class ParseError extends SpongeError {
  constructor(
    message: string,
    public readonly format: "JSON" | "dot-bracket",
    context?: string
  ) {
    super(message, "PARSE_ERROR", context);
    this.name = "ParseError";
  }
}

/**
 * File system errors with path and operation context
 */
export class FileError extends SpongeError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
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
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }

  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    msg += `\nFile: ${this.filePath}`;
    msg += `\nOperation: ${this.operation}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Error handling for rearrangement index computation
 *
 * Every failure carries enough context (file, line, offending text) to find
 * the bad input without re-running the pipeline.
 */

/**
 * Base error class for all rearrangement-index errors
 */
export class RearrangementError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "RearrangementError";
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
 * Invalid options or values rejected by a schema
 */
export class ValidationError extends RearrangementError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * The input path is missing, is not a directory, or holds no coordinates files
 */
export class InputDirectoryError extends RearrangementError {
  constructor(
    message: string,
    public readonly directory: string,
    public readonly reason: "missing" | "not-directory" | "empty"
  ) {
    super(message, "INPUT_DIRECTORY_ERROR", undefined, `Directory: ${directory}`);
    this.name = "InputDirectoryError";
  }

  static missing(directory: string): InputDirectoryError {
    return new InputDirectoryError(
      `Input directory does not exist: ${directory}`,
      directory,
      "missing"
    );
  }

  static notDirectory(directory: string): InputDirectoryError {
    return new InputDirectoryError(
      `Input path is not a directory: ${directory}`,
      directory,
      "not-directory"
    );
  }

  static empty(directory: string, extensions: readonly string[]): InputDirectoryError {
    return new InputDirectoryError(
      `No coordinates files (${extensions.join(", ")}) found in ${directory}`,
      directory,
      "empty"
    );
  }
}

/**
 * A coordinates row that cannot be turned into a gene record
 */
export class MalformedInputError extends RearrangementError {
  constructor(
    message: string,
    public readonly file: string,
    lineNumber?: number,
    public readonly line?: string
  ) {
    super(
      `${file}: ${message}`,
      "MALFORMED_INPUT",
      lineNumber,
      line !== undefined ? JSON.stringify(line) : undefined
    );
    this.name = "MalformedInputError";
  }

  static tooFewFields(
    file: string,
    lineNumber: number,
    line: string,
    found: number,
    expected: number
  ): MalformedInputError {
    return new MalformedInputError(
      `Expected at least ${expected} tab-separated fields, found ${found}`,
      file,
      lineNumber,
      line
    );
  }

  static emptyField(
    file: string,
    lineNumber: number,
    line: string,
    field: string
  ): MalformedInputError {
    return new MalformedInputError(`Required field "${field}" is empty`, file, lineNumber, line);
  }

  static invalidCoordinate(
    file: string,
    lineNumber: number,
    line: string,
    field: string,
    value: string
  ): MalformedInputError {
    return new MalformedInputError(
      `Field "${field}" must be a non-negative number, got "${value}"`,
      file,
      lineNumber,
      line
    );
  }
}

/**
 * A genome file that parsed to zero genes
 *
 * Reported through the warning hook rather than thrown; the genome's index is
 * written as missing.
 */
export class EmptyGenomeWarning extends RearrangementError {
  constructor(public readonly species: string) {
    super(
      `Genome ${species} contains no genes; its rearrangement index is reported as missing`,
      "EMPTY_GENOME"
    );
    this.name = "EmptyGenomeWarning";
  }
}

/**
 * Gzip errors with detailed context
 */
export class CompressionError extends RearrangementError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}`,
      format,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with the path and a troubleshooting hint
 */
export class FileError extends RearrangementError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "list",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

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
      return "Check that the path is correct and exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or choose another output directory";
    }

    return undefined;
  }
}

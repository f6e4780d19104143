/**
 * Error types shared across the analyzer.
 */

/**
 * Thrown by the parser adapter when source text is not valid Python.
 * Positions are 1-based.
 */
export class ParseError extends Error {
  public readonly line: number;
  public readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = "ParseError";
    this.line = line;
    this.column = column;
  }
}

/**
 * Thrown for a bad command-line path or an invalid config file.
 * Fatal: raised before any analysis begins.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

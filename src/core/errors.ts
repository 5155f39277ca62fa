export class CliError extends Error {
  constructor(message: string, public readonly causeError?: unknown) {
    super(message);
    this.name = "CliError";
  }
}

/**
 * Raised when a line of a configuration file fits none of the line grammars
 * or names a malformed key. Parsing stops at the first one.
 */
export class ConfParseError extends Error {
  constructor(public readonly line: number, public readonly detail: string) {
    super(`parse error at line ${line}: ${detail}`);
    this.name = "ConfParseError";
  }
}

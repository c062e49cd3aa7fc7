/**
 * Error kinds raised while extracting packets from wiki markup
 */

export class WikiExtractError extends Error {
  /** Packet or section the error was raised for, when known */
  section?: string;

  constructor(message: string, section?: string) {
    super(section ? `${message} (in ${section})` : message);
    this.name = new.target.name;
    this.section = section;
  }
}

/** Malformed table markup */
export class FormatError extends WikiExtractError {}

/** Name and type columns disagree on the table's row structure */
export class SymmetryError extends WikiExtractError {}

/** Composite fields nested deeper than the configured limit */
export class DepthLimitError extends WikiExtractError {
  readonly limit: number;

  constructor(limit: number, section?: string) {
    super(`Field nesting exceeds the depth limit of ${limit}`, section);
    this.limit = limit;
  }
}

/** Markup no longer matches the layout the extractor understands */
export class DialectError extends WikiExtractError {}

export class MissingTableError extends DialectError {
  constructor(section: string) {
    super(`Cannot find packet table for ${section}. Intervention required!`);
    this.section = section;
  }
}

export class RevisionError extends WikiExtractError {}

export class ConfigError extends WikiExtractError {}

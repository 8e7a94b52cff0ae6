// src/cpe-core/errors.ts

export type CpeErrorCategory = 'input' | 'config';

export class CpeError extends Error {
  readonly category: CpeErrorCategory;

  constructor(message: string, category: CpeErrorCategory) {
    super(message);
    this.name = new.target.name;
    this.category = category;
  }
}

export class DateParseError extends CpeError {
  constructor(readonly input: string) {
    super(`failed to parse date: "${input}"`, 'input');
  }
}

/** A table row whose width cannot be aligned with its header. */
export class TableFormatError extends CpeError {
  constructor(
    readonly table: string,
    readonly row: number,
    detail: string,
  ) {
    super(`table "${table}" row ${row}: ${detail}`, 'input');
  }
}

export class LookupError extends CpeError {
  constructor(message: string) {
    super(message, 'input');
  }
}

export class ConfigError extends CpeError {
  constructor(message: string) {
    super(message, 'config');
  }
}

export type ConversionErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'HEADER_NOT_FOUND'
  | 'EMPTY_PAYLOAD'
  | 'MISSING_COLUMN'
  | 'MISSING_FIELD'
  | 'DATE_PARSE'
  | 'AMOUNT_PARSE'
  | 'CONFIG';

/**
 * Base class for every failure that aborts a conversion run.
 * Nothing is written once one of these has been thrown.
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputNotFoundError extends ConversionError {
  constructor(readonly path: string) {
    super('INPUT_NOT_FOUND', `Input file ${path} not found`);
  }
}

export class HeaderNotFoundError extends ConversionError {
  constructor() {
    super(
      'HEADER_NOT_FOUND',
      'Could not find the Venmo transaction header (ID, Datetime, Type, Status, Note, From, To, Amount (total))',
    );
  }
}

export class EmptyPayloadError extends ConversionError {
  constructor() {
    super('EMPTY_PAYLOAD', 'Header found but no data rows follow it');
  }
}

export class MissingColumnError extends ConversionError {
  constructor(readonly columns: string[]) {
    super('MISSING_COLUMN', `Missing required columns: ${columns.join(', ')}`);
  }
}

export class MissingFieldError extends ConversionError {
  constructor(readonly field: string, readonly row: number) {
    super('MISSING_FIELD', `Row ${row}: "${field}" is empty`);
  }
}

export class DateParseError extends ConversionError {
  constructor(readonly value: string, readonly row: number) {
    super('DATE_PARSE', `Row ${row}: could not parse date "${value}"`);
  }
}

export class AmountParseError extends ConversionError {
  constructor(readonly value: string, readonly row: number) {
    super('AMOUNT_PARSE', `Row ${row}: could not parse amount "${value}"`);
  }
}

export class ConfigError extends ConversionError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

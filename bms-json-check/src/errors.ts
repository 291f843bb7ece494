export type CheckErrorCode = 'PARSE_ERROR' | 'PREFIX_MISSING' | 'SERIALIZATION_ERROR';

export class CheckError extends Error {
  code: CheckErrorCode;

  constructor(message: string, code: CheckErrorCode) {
    super(message);
    this.name = 'CheckError';
    this.code = code;
  }
}

export class ParseError extends CheckError {
  constructor(message: string) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class PrefixMissingError extends CheckError {
  prefix: string;

  constructor(prefix: string) {
    super(`Line does not start with ${JSON.stringify(prefix)}`, 'PREFIX_MISSING');
    this.name = 'PrefixMissingError';
    this.prefix = prefix;
  }
}

export class SerializationError extends CheckError {
  constructor(message: string) {
    super(message, 'SERIALIZATION_ERROR');
    this.name = 'SerializationError';
  }
}

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

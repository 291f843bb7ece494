import { config } from './config.js';
import { ParseError, SerializationError, describeError } from './errors.js';
import { getField, isJsonObject, jsonEquals, parseDocument, standardCodec, utf8Length } from './json.js';
import { logger } from './logger.js';
import { summarizeReport } from './reportFields.js';
import type {
  CheckOutcome,
  JsonCodec,
  JsonValue,
  ReportValidation,
  RoundTripField,
  RoundTripMismatch
} from './types.js';

export interface ReportValidationOptions {
  indent?: number;
  codec?: JsonCodec;
}

export const ROUND_TRIP_FIELDS: readonly RoundTripField[] = ['timestamp', 'device', 'data_found'];

export const compareRoundTrip = (original: JsonValue, reparsed: JsonValue): RoundTripMismatch[] => {
  return ROUND_TRIP_FIELDS.map((field) => ({
    field,
    before: getField(original, field),
    after: getField(reparsed, field)
  })).filter(({ before, after }) => !jsonEquals(before, after));
};

const describeKind = (value: JsonValue): string => {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
};

const encode = (
  codec: JsonCodec,
  document: JsonValue,
  indent: number
): CheckOutcome<{ indented: string; compact: string }> => {
  try {
    return {
      ok: true,
      value: {
        indented: codec.stringify(document, indent),
        compact: codec.stringify(document)
      }
    };
  } catch (error) {
    return { ok: false, error: new SerializationError(describeError(error)) };
  }
};

export const validateReport = (
  documentText: string,
  options: ReportValidationOptions = {}
): CheckOutcome<ReportValidation> => {
  const codec = options.codec ?? standardCodec;
  const indent = options.indent ?? config.report.indent;

  logger.debug('Testing JSON parsing');
  const parsed = parseDocument(documentText, codec);
  if (!parsed.ok) {
    logger.error({ err: parsed.error }, 'JSON parsing failed');
    return parsed;
  }
  const original = parsed.value;
  // Leniency stops at the top level: a report is always a mapping.
  if (!isJsonObject(original)) {
    const error = new ParseError(`Expected a JSON object at the top level, got ${describeKind(original)}`);
    logger.error({ err: error }, 'JSON parsing failed');
    return { ok: false, error };
  }
  logger.info('JSON parsing successful');

  const summary = summarizeReport(original);
  logger.info(
    {
      timestamp: summary.timestamp,
      device: summary.device,
      macAddress: summary.macAddress,
      dataFound: summary.dataFound,
      status: summary.status
    },
    'Report fields accessed'
  );
  if (summary.mainInfo) {
    logger.info({ mainInfo: summary.mainInfo }, 'Main info fields accessed');
  } else {
    logger.debug('Report carries no parsed main info');
  }

  const encoded = encode(codec, original, indent);
  if (!encoded.ok) {
    logger.error({ err: encoded.error }, 'JSON serialization failed');
    return encoded;
  }
  const { indented, compact } = encoded.value;
  const indentedBytes = utf8Length(indented);
  const compactBytes = utf8Length(compact);
  logger.info({ indentedBytes, compactBytes }, 'JSON serialization successful');

  const reparsed = parseDocument(compact, codec);
  if (!reparsed.ok) {
    logger.error({ err: reparsed.error }, 'Compact encoding could not be parsed back');
    return reparsed;
  }

  const mismatches = compareRoundTrip(original, reparsed.value);
  const roundTrip = mismatches.length === 0;
  const structurallyEqual = jsonEquals(original, reparsed.value);
  if (roundTrip) {
    logger.info({ structurallyEqual }, 'Round-trip serialization successful');
  } else {
    logger.error({ mismatches, structurallyEqual }, 'Round-trip serialization failed');
  }

  return {
    ok: true,
    value: {
      parsing: true,
      fieldAccess: true,
      serialization: true,
      roundTrip,
      passed: roundTrip,
      structurallyEqual,
      summary,
      indentedBytes,
      compactBytes,
      mismatches
    }
  };
};

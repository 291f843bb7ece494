import { config } from './config.js';
import { PrefixMissingError } from './errors.js';
import { parseDocument, readBoolean, readString } from './json.js';
import { logger } from './logger.js';
import type { CheckOutcome, PrefixedLineValidation } from './types.js';

export const stripPrefix = (line: string, prefix: string): string | null => {
  if (!line.startsWith(prefix)) {
    return null;
  }
  return line.slice(prefix.length);
};

export const extractPrefixedPayloads = (output: string, prefix: string = config.prefix): string[] => {
  return output
    .split(/\r?\n/)
    .map((line) => stripPrefix(line, prefix))
    .filter((payload): payload is string => payload !== null);
};

export const validatePrefixedLine = (
  line: string,
  prefix: string = config.prefix
): CheckOutcome<PrefixedLineValidation> => {
  logger.debug({ prefix }, 'Testing prefixed line parsing');

  const payload = stripPrefix(line, prefix);
  if (payload === null) {
    const error = new PrefixMissingError(prefix);
    logger.error({ err: error }, 'Prefix not found');
    return { ok: false, error };
  }

  const parsed = parseDocument(payload);
  if (!parsed.ok) {
    logger.error({ err: parsed.error }, 'JSON parsing after prefix removal failed');
    return parsed;
  }

  const device = readString(parsed.value, 'device');
  const dataFound = readBoolean(parsed.value, 'data_found');
  logger.info({ device, dataFound }, 'Prefixed line parsing successful');

  return { ok: true, value: { passed: true, payload, device, dataFound } };
};

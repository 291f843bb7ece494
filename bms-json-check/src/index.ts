export { buildDefaultChecks, runChecks, type NamedCheck } from './checks.js';
export { config, DEFAULT_PREFIX } from './config.js';
export { CheckError, ParseError, PrefixMissingError, SerializationError, type CheckErrorCode } from './errors.js';
export { descend, getField, jsonEquals, parseDocument, standardCodec } from './json.js';
export { summarizeReport } from './reportFields.js';
export { extractPrefixedPayloads, stripPrefix, validatePrefixedLine } from './prefixValidator.js';
export { compareRoundTrip, validateReport, type ReportValidationOptions } from './reportValidator.js';
export { buildSamples, SAMPLE_LINE_PAYLOAD, SAMPLE_REPORT, type SampleInputs } from './samples.js';
export type * from './types.js';

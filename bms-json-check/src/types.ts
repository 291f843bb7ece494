import type { CheckError } from './errors.js';

export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export interface JsonCodec {
  parse(text: string): JsonValue;
  // Compact output when `indent` is omitted.
  stringify(value: JsonValue, indent?: number): string;
}

export type CheckOutcome<T> = { ok: true; value: T } | { ok: false; error: CheckError };

export interface CellVoltageReading {
  cellNumber: number | null;
  voltage: number | null;
}

export interface TemperatureReading {
  sensor: string | null;
  temperature: number | null;
}

export interface MosStatus {
  chargingMos: boolean | null;
  dischargingMos: boolean | null;
  balancing: boolean | null;
}

export interface MainInfoSummary {
  packVoltage: number | null;
  current: number | null;
  soc: number | null;
  remainingCapacity: number | null;
  totalCapacity: number | null;
  cycles: number | null;
  cellCount: number;
  temperatureSensorCount: number;
  firstCell: CellVoltageReading | null;
  firstTemperature: TemperatureReading | null;
  mosStatus: MosStatus | null;
}

export interface ReportSummary {
  timestamp: number | null;
  device: string | null;
  macAddress: string | null;
  dataFound: boolean | null;
  status: string | null;
  mainInfo: MainInfoSummary | null;
}

export type RoundTripField = 'timestamp' | 'device' | 'data_found';

export interface RoundTripMismatch {
  field: RoundTripField;
  before: JsonValue | undefined;
  after: JsonValue | undefined;
}

export interface ReportValidation {
  parsing: boolean;
  fieldAccess: boolean;
  serialization: boolean;
  roundTrip: boolean;
  passed: boolean;
  structurallyEqual: boolean;
  summary: ReportSummary;
  indentedBytes: number;
  compactBytes: number;
  mismatches: RoundTripMismatch[];
}

export interface PrefixedLineValidation {
  passed: boolean;
  payload: string;
  device: string | null;
  dataFound: boolean | null;
}

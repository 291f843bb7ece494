import { descend, getArray, getField, getObject, isJsonObject, readBoolean, readNumber, readString } from './json.js';
import type {
  CellVoltageReading,
  JsonObject,
  JsonValue,
  MainInfoSummary,
  MosStatus,
  ReportSummary,
  TemperatureReading
} from './types.js';

export const PARSED_DATA_PATH = ['daly_protocol', 'commands', 'main_info', 'parsed_data'] as const;

const toCellReading = (entry: JsonValue): CellVoltageReading => ({
  cellNumber: readNumber(entry, 'cellNumber'),
  voltage: readNumber(entry, 'voltage')
});

const toTemperatureReading = (entry: JsonValue): TemperatureReading => ({
  sensor: readString(entry, 'sensor'),
  temperature: readNumber(entry, 'temperature')
});

const toMosStatus = (parsedData: JsonObject): MosStatus | null => {
  const mos = getField(parsedData, 'mosStatus');
  if (!isJsonObject(mos)) {
    return null;
  }

  return {
    chargingMos: readBoolean(mos, 'chargingMos'),
    dischargingMos: readBoolean(mos, 'dischargingMos'),
    balancing: readBoolean(mos, 'balancing')
  };
};

export const summarizeMainInfo = (parsedData: JsonObject): MainInfoSummary | null => {
  if (Object.keys(parsedData).length === 0) {
    return null;
  }

  const cellVoltages = getArray(parsedData, 'cellVoltages');
  const temperatures = getArray(parsedData, 'temperatures');
  const [firstCell] = cellVoltages;
  const [firstTemperature] = temperatures;

  return {
    packVoltage: readNumber(parsedData, 'packVoltage'),
    current: readNumber(parsedData, 'current'),
    soc: readNumber(parsedData, 'soc'),
    remainingCapacity: readNumber(parsedData, 'remainingCapacity'),
    totalCapacity: readNumber(parsedData, 'totalCapacity'),
    cycles: readNumber(parsedData, 'cycles'),
    cellCount: cellVoltages.length,
    temperatureSensorCount: temperatures.length,
    firstCell: cellVoltages.length > 0 ? toCellReading(firstCell) : null,
    firstTemperature: temperatures.length > 0 ? toTemperatureReading(firstTemperature) : null,
    mosStatus: toMosStatus(parsedData)
  };
};

export const summarizeReport = (document: JsonValue): ReportSummary => {
  const protocol = getObject(document, 'daly_protocol');

  return {
    timestamp: readNumber(document, 'timestamp'),
    device: readString(document, 'device'),
    macAddress: readString(document, 'mac_address'),
    dataFound: readBoolean(document, 'data_found'),
    status: readString(protocol, 'status'),
    mainInfo: summarizeMainInfo(descend(document, PARSED_DATA_PATH))
  };
};

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { standardCodec } from '../json.js';
import { summarizeMainInfo, summarizeReport } from '../reportFields.js';
import { SAMPLE_REPORT } from '../samples.js';

describe('summarizeReport', () => {
  it('reads every field of the sample report', () => {
    const summary = summarizeReport(standardCodec.parse(SAMPLE_REPORT));

    assert.deepEqual(summary, {
      timestamp: 1234567890,
      device: 'DL-41181201189F',
      macAddress: '41:18:12:01:18:9f',
      dataFound: true,
      status: 'characteristics_found',
      mainInfo: {
        packVoltage: 53.08,
        current: 0,
        soc: 90.4,
        remainingCapacity: 207.9,
        totalCapacity: 230,
        cycles: 1,
        cellCount: 16,
        temperatureSensorCount: 2,
        firstCell: { cellNumber: 1, voltage: 3.318 },
        firstTemperature: { sensor: 'T1', temperature: 30 },
        mosStatus: { chargingMos: true, dischargingMos: true, balancing: false }
      }
    });
  });

  it('defaults when daly_protocol is missing', () => {
    const summary = summarizeReport({ timestamp: 42, device: 'DL-1' });

    assert.deepEqual(summary, {
      timestamp: 42,
      device: 'DL-1',
      macAddress: null,
      dataFound: null,
      status: null,
      mainInfo: null
    });
  });

  it('defaults when an intermediate level is not a mapping', () => {
    const summary = summarizeReport({ daly_protocol: { status: 'scanning', commands: 'none' } });

    assert.equal(summary.status, 'scanning');
    assert.equal(summary.mainInfo, null);
  });

  it('tolerates a document that is not a mapping', () => {
    const summary = summarizeReport([1, 2, 3]);

    assert.equal(summary.timestamp, null);
    assert.equal(summary.device, null);
    assert.equal(summary.mainInfo, null);
  });
});

describe('summarizeMainInfo', () => {
  it('treats an empty parsed_data mapping as absent', () => {
    assert.equal(summarizeMainInfo({}), null);
  });

  it('defaults empty or mistyped readings', () => {
    const mainInfo = summarizeMainInfo({ cellVoltages: [], temperatures: 'T1', soc: '90' });

    assert.deepEqual(mainInfo, {
      packVoltage: null,
      current: null,
      soc: null,
      remainingCapacity: null,
      totalCapacity: null,
      cycles: null,
      cellCount: 0,
      temperatureSensorCount: 0,
      firstCell: null,
      firstTemperature: null,
      mosStatus: null
    });
  });

  it('reads null sub-fields from a malformed first entry', () => {
    const mainInfo = summarizeMainInfo({ cellVoltages: [7], temperatures: [{ sensor: 'T9' }] });

    assert.deepEqual(mainInfo?.firstCell, { cellNumber: null, voltage: null });
    assert.deepEqual(mainInfo?.firstTemperature, { sensor: 'T9', temperature: null });
  });
});

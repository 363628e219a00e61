import { describe, it, expect, vi } from 'vitest';
import type { Coverage, ErrorPayload } from '@erddap-covjson/shared';
import { DATA_TABLE, ERDDAP, METADATA_TABLE, envelope, fakeFetch } from '../../__tests__/erddap-fixtures.js';
import type { Reply } from '../../__tests__/erddap-fixtures.js';
import { ErddapClient } from './client.js';
import { CoverageService } from './coverage.js';

const DATA_URL = `${ERDDAP}/tabledap/buoyA.json`;
const INFO_URL = `${ERDDAP}/info/buoyA/index.json`;

function service(routes: Record<string, Reply>, vocabHost?: string) {
  const fetch = fakeFetch(routes);
  const client = new ErddapClient({ baseUrl: ERDDAP, fetch });
  return { fetch, coverage: new CoverageService({ client, vocabHost }) };
}

function asCoverage(body: Coverage | ErrorPayload): Coverage {
  if (!('type' in body)) throw new Error(`expected a coverage, got error: ${body.error}`);
  return body;
}

describe('CoverageService.fetchCoverage', () => {
  it('assembles a coverage from data and metadata', async () => {
    const { coverage, fetch } = service({
      [DATA_URL]: { body: envelope(DATA_TABLE) },
      [INFO_URL]: { body: envelope(METADATA_TABLE) },
    });
    const { body, status } = await coverage.fetchCoverage('buoyA', 'time,latitude,longitude,TEMP');
    expect(status).toBe(200);
    const cov = asCoverage(body);
    expect(cov.domain.axes.t.values).toHaveLength(2);
    expect(cov.ranges.TEMP.shape).toEqual([2]);
    expect(cov.location.coordinates).toEqual([2.25, 41.25]);
    expect(cov.parameters.TEMP.observedProperty).toEqual({
      id: 'http://vocab.nerc.ac.uk/collection/P01/current/TEMPPR01/',
      label: { en: 'sea_water_temperature' },
    });
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([`${DATA_URL}?time,latitude,longitude,TEMP`, INFO_URL]);
  });

  it('passes an upstream failure through without touching metadata', async () => {
    const { coverage, fetch } = service({
      [DATA_URL]: { status: 500, body: 'Internal Server Error' },
      [INFO_URL]: { body: envelope(METADATA_TABLE) },
    });
    expect(await coverage.fetchCoverage('buoyA', '')).toEqual({
      body: { error: 'Internal Server Error' },
      status: 500,
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('falls back to column names when metadata is unavailable', async () => {
    const { coverage } = service({ [DATA_URL]: { body: envelope(DATA_TABLE) } });
    const { body, status } = await coverage.fetchCoverage('buoyA', '');
    expect(status).toBe(200);
    expect(asCoverage(body).parameters.TEMP).toEqual({
      type: 'Parameter',
      description: { en: 'TEMP' },
      unit: { label: { en: '' }, symbol: '' },
      observedProperty: { label: { en: 'TEMP' } },
    });
  });

  it('falls back to column names when the metadata body is not a table', async () => {
    const { coverage } = service({
      [DATA_URL]: { body: envelope(DATA_TABLE) },
      [INFO_URL]: { body: '<html>maintenance</html>' },
    });
    const { body, status } = await coverage.fetchCoverage('buoyA', '');
    expect(status).toBe(200);
    expect(asCoverage(body).parameters.TEMP.description).toEqual({ en: 'TEMP' });
  });

  it('falls back to column names when the metadata request fails', async () => {
    const data = fakeFetch({ [DATA_URL]: { body: envelope(DATA_TABLE) } });
    const fetch = vi.fn(async (url: string, init?: { signal?: AbortSignal }) => {
      if (url === INFO_URL) throw new TypeError('fetch failed');
      return data(url, init);
    });
    const coverage = new CoverageService({ client: new ErddapClient({ baseUrl: ERDDAP, fetch }) });
    const { body, status } = await coverage.fetchCoverage('buoyA', '');
    expect(status).toBe(200);
    expect(asCoverage(body).parameters.TEMP.unit).toEqual({ label: { en: '' }, symbol: '' });
  });

  it('leaves out the vocabulary id of a malformed code only', async () => {
    const { coverage } = service({
      [DATA_URL]: {
        body: envelope({
          columnNames: ['time', 'latitude', 'longitude', 'TEMP', 'PSAL'],
          rows: [['2024-01-01T00:00:00Z', 41, 2, 13.1, 38.2]],
        }),
      },
      [INFO_URL]: { body: envelope(METADATA_TABLE) },
    });
    const cov = asCoverage((await coverage.fetchCoverage('buoyA', '')).body);
    expect(cov.parameters.PSAL.observedProperty).toEqual({ label: { en: 'sea_water_practical_salinity' } });
    expect(cov.parameters.TEMP.observedProperty.id).toBe('http://vocab.nerc.ac.uk/collection/P01/current/TEMPPR01/');
  });

  it('uses the configured vocabulary host', async () => {
    const { coverage } = service(
      { [DATA_URL]: { body: envelope(DATA_TABLE) }, [INFO_URL]: { body: envelope(METADATA_TABLE) } },
      'vocab.test',
    );
    const cov = asCoverage((await coverage.fetchCoverage('buoyA', '')).body);
    expect(cov.parameters.TEMP.observedProperty.id).toBe('http://vocab.test/collection/P01/current/TEMPPR01/');
  });

  it('answers 400 when the table has no time column', async () => {
    const { coverage } = service({
      [DATA_URL]: { body: envelope({ columnNames: ['latitude', 'longitude', 'TEMP'], rows: [[41, 2, 13]] }) },
      [INFO_URL]: { body: envelope(METADATA_TABLE) },
    });
    expect(await coverage.fetchCoverage('buoyA', 'TEMP')).toEqual({
      body: { error: 'data table has no "time" column' },
      status: 400,
    });
  });

  it('answers 400 when the table has no rows', async () => {
    const { coverage, fetch } = service({
      [DATA_URL]: { body: envelope({ columnNames: ['time', 'latitude', 'longitude', 'TEMP'], rows: [] }) },
      [INFO_URL]: { body: envelope(METADATA_TABLE) },
    });
    expect(await coverage.fetchCoverage('buoyA', 'time,latitude,longitude,TEMP&time>=2030-01-01')).toEqual({
      body: { error: 'data table has no rows' },
      status: 400,
    });
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('answers 502 when the metadata table is malformed', async () => {
    const { coverage } = service({
      [DATA_URL]: { body: envelope(DATA_TABLE) },
      [INFO_URL]: { body: envelope({ columnNames: ['Value'], rows: [['x']] }) },
    });
    expect(await coverage.fetchCoverage('buoyA', '')).toEqual({
      body: { error: 'metadata table lacks column(s): Variable Name, Attribute Name' },
      status: 502,
    });
  });

  it('answers 502 when ERDDAP cannot be reached', async () => {
    const fetch = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    const coverage = new CoverageService({ client: new ErddapClient({ baseUrl: ERDDAP, fetch }) });
    expect(await coverage.fetchCoverage('buoyA', '')).toEqual({
      body: { error: `ERDDAP request failed (${DATA_URL}): fetch failed` },
      status: 502,
    });
  });
});

import { describe, it, expect, vi } from 'vitest';
import { UpstreamError } from '../../errors.js';
import { DATA_TABLE, ERDDAP, LISTING_CSV, envelope, fakeFetch } from '../../__tests__/erddap-fixtures.js';
import { ErddapClient } from './client.js';

describe('ErddapClient urls', () => {
  const client = new ErddapClient({ baseUrl: `${ERDDAP}/`, fetch: fakeFetch({}) });

  it('forwards the raw query string untouched', () => {
    expect(client.tabledapUrl('buoyA', 'time,TEMP&time%3E=2024-01-01')).toBe(
      `${ERDDAP}/tabledap/buoyA.json?time,TEMP&time%3E=2024-01-01`,
    );
  });

  it('omits the ? without a query', () => {
    expect(client.tabledapUrl('buoyA', '')).toBe(`${ERDDAP}/tabledap/buoyA.json`);
  });

  it('builds info and search urls', () => {
    expect(client.infoUrl('buoyA')).toBe(`${ERDDAP}/info/buoyA/index.json`);
    expect(client.searchUrl()).toBe(
      `${ERDDAP}/search/advanced.csv?page=1&itemsPerPage=1000000&protocol=tabledap&searchFor=all`,
    );
  });
});

describe('ErddapClient requests', () => {
  it('parses a table envelope', async () => {
    const fetch = fakeFetch({ [`${ERDDAP}/tabledap/buoyA.json`]: { body: envelope(DATA_TABLE) } });
    const client = new ErddapClient({ baseUrl: ERDDAP, fetch });
    expect(await client.getData('buoyA', 'time')).toEqual({ ok: true, status: 200, table: DATA_TABLE });
    expect(fetch).toHaveBeenCalledWith(`${ERDDAP}/tabledap/buoyA.json?time`, { signal: expect.any(AbortSignal) });
  });

  it('returns the body of an upstream error', async () => {
    const body = 'Error {\n    code=404;\n    message="Not Found: Your query produced no matching results.";\n}\n';
    const fetch = fakeFetch({ [`${ERDDAP}/tabledap/`]: { status: 404, body } });
    const client = new ErddapClient({ baseUrl: ERDDAP, fetch });
    expect(await client.getData('buoyA', '')).toEqual({ ok: false, status: 404, body });
  });

  it('raises UpstreamError for a body that is not a table', async () => {
    const fetch = fakeFetch({ [`${ERDDAP}/info/`]: { body: { table: { columnNames: ['a'], rows: [[1, 2]] } } } });
    const client = new ErddapClient({ baseUrl: ERDDAP, fetch });
    await expect(client.getMetadata('buoyA')).rejects.toThrow(UpstreamError);
    await expect(client.getMetadata('buoyA')).rejects.toThrow('row length does not match columnNames');
  });

  it('raises UpstreamError for invalid JSON', async () => {
    const fetch = fakeFetch({ [`${ERDDAP}/info/`]: { body: '<html>' } });
    const client = new ErddapClient({ baseUrl: ERDDAP, fetch });
    await expect(client.getMetadata('buoyA')).rejects.toThrow(/^ERDDAP returned an invalid table/);
  });

  it('raises UpstreamError with status 502 when the network fails', async () => {
    const fetch = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    const client = new ErddapClient({ baseUrl: ERDDAP, fetch });
    const err = await client.getData('buoyA', '').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({
      status: 502,
      message: `ERDDAP request failed (${ERDDAP}/tabledap/buoyA.json): fetch failed`,
    });
  });

  it('reports a timeout', async () => {
    const fetch = vi.fn(async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });
    const client = new ErddapClient({ baseUrl: ERDDAP, timeoutMs: 5, fetch });
    await expect(client.getData('buoyA', '')).rejects.toThrow(/: timeout$/);
  });

  it('loads the dataset listing', async () => {
    const fetch = fakeFetch({ [`${ERDDAP}/search/`]: { body: LISTING_CSV } });
    const client = new ErddapClient({ baseUrl: ERDDAP, fetch });
    expect(await client.getDatasetListing()).toBe(LISTING_CSV);
  });

  it('throws when the listing request fails', async () => {
    const fetch = fakeFetch({ [`${ERDDAP}/search/`]: { status: 503, body: 'busy' } });
    const client = new ErddapClient({ baseUrl: ERDDAP, fetch });
    await expect(client.getDatasetListing()).rejects.toThrow('ERDDAP search failed with HTTP 503');
  });
});

import type {
  Cell,
  Coverage,
  ErddapTable,
  NdArray,
  Parameter,
  ReferenceSystemConnection,
  VariableMetadata,
} from '@erddap-covjson/shared';
import { TableShapeError } from '../../errors.js';
import { columnIndex, dedupeBy } from '../erddap/table.js';

export const TIME = 'time';
export const LATITUDE = 'latitude';
export const LONGITUDE = 'longitude';
const POSITIONAL = new Set([TIME, LATITUDE, LONGITUDE]);

export const CRS84 = 'http://www.opengis.net/def/crs/OGC/1.3/CRS84';

const REFERENCING: ReferenceSystemConnection[] = [
  { coordinates: ['x', 'y'], system: { type: 'GeographicCRS', id: CRS84 } },
  { coordinates: ['t'], system: { type: 'TemporalRS', calendar: 'Gregorian' } },
];

function requireColumn(table: ErddapTable, name: string): number {
  const i = columnIndex(table, name);
  if (i < 0) throw new TableShapeError(`data table has no "${name}" column`);
  return i;
}

function toNumber(v: Cell): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

// Mean of the numeric cells; null when there are none
function mean(rows: Cell[][], i: number): number | null {
  let sum = 0;
  let n = 0;
  for (const r of rows) {
    const v = toNumber(r[i]);
    if (v === null) continue;
    sum += v;
    n++;
  }
  return n ? sum / n : null;
}

function parameter({ name, units, definition }: VariableMetadata): Parameter {
  return {
    type: 'Parameter',
    description: { en: name },
    unit: { label: { en: units }, symbol: units },
    observedProperty: definition ? { id: definition, label: { en: name } } : { label: { en: name } },
  };
}

export function dedupeByTime(table: ErddapTable): ErddapTable {
  return dedupeBy(table, TIME);
}

/**
 * Builds a PointSeries coverage from an ERDDAP table. Rows are deduplicated
 * by time (first occurrence kept); the single location is the mean of the
 * latitude/longitude columns. Every other column becomes a parameter, in
 * table column order. Tables without rows, or with an empty time cell, are
 * rejected with a TableShapeError.
 */
export function assembleCoverage(table: ErddapTable, variables: ReadonlyMap<string, VariableMetadata>): Coverage {
  const ti = requireColumn(table, TIME);
  const yi = requireColumn(table, LATITUDE);
  const xi = requireColumn(table, LONGITUDE);

  const { rows } = dedupeByTime(table);
  if (!rows.length) throw new TableShapeError('data table has no rows');
  if (rows.some((r) => r[ti] === null || r[ti] === '')) {
    throw new TableShapeError('data table has a row without a time value');
  }
  const lon = mean(rows, xi);
  const lat = mean(rows, yi);

  const parameters: Record<string, Parameter> = {};
  const ranges: Record<string, NdArray> = {};
  table.columnNames.forEach((column, i) => {
    if (POSITIONAL.has(column)) return;
    parameters[column] = parameter(variables.get(column) ?? { name: column, units: '' });
    ranges[column] = {
      type: 'NdArray',
      dataType: 'float',
      axisNames: ['t'],
      shape: [rows.length],
      values: rows.map((r) => toNumber(r[i])),
    };
  });

  return {
    type: 'Coverage',
    domain: {
      type: 'Domain',
      domainType: 'PointSeries',
      axes: {
        t: { values: rows.map((r) => String(r[ti])) },
        x: { values: [lon] },
        y: { values: [lat] },
      },
      referencing: REFERENCING.map((c) => structuredClone(c)),
    },
    parameters,
    ranges,
    location: { type: 'Point', coordinates: [lon, lat] },
  };
}

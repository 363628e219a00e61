import { z } from 'zod';
import type { Cell, ErddapTable } from '@erddap-covjson/shared';

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// {"table": {"columnNames": [...], "columnTypes": [...], "columnUnits": [...], "rows": [[...]]}}
export const TableEnvelopeSchema = z.object({
  table: z
    .object({
      columnNames: z.array(z.string()),
      rows: z.array(z.array(CellSchema)),
    })
    .refine((t) => t.rows.every((r) => r.length === t.columnNames.length), {
      message: 'row length does not match columnNames',
    }),
});

export function parseTableEnvelope(body: unknown): ErddapTable {
  const { table } = TableEnvelopeSchema.parse(body);
  return { columnNames: table.columnNames, rows: table.rows };
}

export function columnIndex(table: ErddapTable, name: string): number {
  return table.columnNames.indexOf(name);
}

/**
 * Drops rows whose `key` value was already seen; the first occurrence wins
 * and row order is preserved. Tables without the column are returned as-is.
 */
export function dedupeBy(table: ErddapTable, key: string): ErddapTable {
  const i = columnIndex(table, key);
  if (i < 0) return table;
  const seen = new Set<Cell>();
  const rows = table.rows.filter((r) => {
    if (seen.has(r[i])) return false;
    seen.add(r[i]);
    return true;
  });
  return { columnNames: table.columnNames, rows };
}

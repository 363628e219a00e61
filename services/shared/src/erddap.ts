// Shapes returned by ERDDAP's .json table responses.

export type Cell = string | number | boolean | null;

export type ErddapTable = {
  columnNames: string[];
  rows: Cell[][];
};

export type VariableMetadata = {
  name: string;
  units: string;
  definition?: string;
};

export type DatasetCatalogMap = Record<string, string>;

export type ErrorPayload = { error: string };

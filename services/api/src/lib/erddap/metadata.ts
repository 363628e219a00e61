import type { ErddapTable, VariableMetadata } from '@erddap-covjson/shared';
import { MetadataTableError, VocabularyCodeError } from '../../errors.js';

export const DEFAULT_VOCAB_HOST = 'vocab.nerc.ac.uk';

const VARIABLE = 'Variable Name';
const ATTRIBUTE = 'Attribute Name';
const VALUE = 'Value';

/** (variable, attribute) -> value, built once per info/{id}/index.json table. */
export type MetadataIndex = ReadonlyMap<string, string>;

const key = (variable: string, attribute: string) => `${variable}\u0000${attribute}`;

export function indexMetadata(table: ErddapTable): MetadataIndex {
  const missing = [VARIABLE, ATTRIBUTE, VALUE].filter((c) => !table.columnNames.includes(c));
  if (missing.length) {
    throw new MetadataTableError(`metadata table lacks column(s): ${missing.join(', ')}`);
  }
  const vi = table.columnNames.indexOf(VARIABLE);
  const ai = table.columnNames.indexOf(ATTRIBUTE);
  const xi = table.columnNames.indexOf(VALUE);
  const index = new Map<string, string>();
  for (const row of table.rows) {
    const k = key(String(row[vi] ?? ''), String(row[ai] ?? ''));
    if (!index.has(k)) index.set(k, String(row[xi] ?? ''));
  }
  return index;
}

export const EMPTY_METADATA: MetadataIndex = new Map();

export function resolve(index: MetadataIndex, variable: string, attribute: string, fallback: string): string {
  return index.get(key(variable, attribute)) ?? fallback;
}

/**
 * `SDN:P01::TEMPPR01` style codes become
 * `http://{host}/collection/P01/current/TEMPPR01/`.
 */
export function vocabularyUri(variable: string, code: string, host = DEFAULT_VOCAB_HOST): string {
  const parts = code.split(':');
  if (parts.length !== 4) throw new VocabularyCodeError(variable, code);
  const [, vocab, , term] = parts;
  return `http://${host}/collection/${vocab}/current/${term}/`;
}

export interface ResolvedVariable {
  metadata: VariableMetadata;
  problem?: VocabularyCodeError;
}

export function resolveVariable(index: MetadataIndex, column: string, host = DEFAULT_VOCAB_HOST): ResolvedVariable {
  const metadata: VariableMetadata = {
    name: resolve(index, column, 'standard_name', column),
    units: resolve(index, column, 'units', ''),
  };
  const code = resolve(index, column, 'sdn_parameter_urn', '');
  if (!code) return { metadata };
  try {
    metadata.definition = vocabularyUri(column, code, host);
    return { metadata };
  } catch (e) {
    if (e instanceof VocabularyCodeError) return { metadata, problem: e };
    throw e;
  }
}

export function resolveVariables(
  index: MetadataIndex,
  columns: readonly string[],
  host = DEFAULT_VOCAB_HOST,
): { variables: Map<string, VariableMetadata>; problems: VocabularyCodeError[] } {
  const variables = new Map<string, VariableMetadata>();
  const problems: VocabularyCodeError[] = [];
  for (const column of columns) {
    const { metadata, problem } = resolveVariable(index, column, host);
    variables.set(column, metadata);
    if (problem) problems.push(problem);
  }
  return { variables, problems };
}

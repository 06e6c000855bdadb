const ID_COLUMNS = ['gene_id', 'ensembl_gene_id', 'feature_id', 'id_ref'];
const NAME_COLUMNS = ['gene_name'];
const PREFERRED_VALUE_COLUMNS = ['unstranded', 'tpm_unstranded'];
// Only taken when no column mentions counts or tpm.
const GENERIC_VALUE_COLUMNS = ['value', 'expression_value'];

function findColumn(header: readonly string[], candidates: readonly string[]): number {
  const lowered = header.map((name) => name.toLowerCase());
  for (const candidate of candidates) {
    const index = lowered.indexOf(candidate);
    if (index !== -1) {
      return index;
    }
  }
  return -1;
}

export function findIdColumn(header: readonly string[]): number {
  const index = findColumn(header, ID_COLUMNS);
  return index === -1 ? 0 : index;
}

export function findNameColumn(header: readonly string[], idIndex: number): number {
  const index = findColumn(header, NAME_COLUMNS);
  return index === idIndex ? -1 : index;
}

function findAllowedColumn(header: readonly string[], candidates: readonly string[], excluded: readonly number[]): number {
  for (const candidate of candidates) {
    const index = findColumn(header, [candidate]);
    if (index !== -1 && !excluded.includes(index)) {
      return index;
    }
  }
  return -1;
}

export function findValueColumn(header: readonly string[], excluded: readonly number[]): number {
  const preferred = findAllowedColumn(header, PREFERRED_VALUE_COLUMNS, excluded);
  if (preferred !== -1) {
    return preferred;
  }
  const measured = header.findIndex((name, index) => {
    if (excluded.includes(index)) {
      return false;
    }
    const lowered = name.toLowerCase();
    return lowered.includes('count') || lowered.includes('tpm');
  });
  if (measured !== -1) {
    return measured;
  }
  return findAllowedColumn(header, GENERIC_VALUE_COLUMNS, excluded);
}

export function parseNumericCell(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

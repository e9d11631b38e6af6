/**
 * Labeled matrices built from the engine's flat arrays.
 *
 * Data is stored column-major, the layout the engine uses for multi-class
 * coefficient blocks and conditional probability tables.
 */

import { MalformedResponseError } from "../errors";

export interface LabeledMatrix {
  readonly nrow: number;
  readonly ncol: number;
  readonly data: readonly number[];
  readonly rowNames: readonly string[] | null;
  readonly colNames: readonly string[] | null;
}

export const ESTIMATE_COLUMN = "Estimate";

export function fromColumnMajor(
  data: readonly number[],
  nrow: number,
  ncol: number,
  rowNames: readonly string[] | null = null,
  colNames: readonly string[] | null = null
): LabeledMatrix {
  if (!Number.isInteger(nrow) || !Number.isInteger(ncol) || nrow < 0 || ncol < 0) {
    throw new MalformedResponseError(`cannot shape a matrix of ${nrow} x ${ncol}`);
  }
  if (data.length !== nrow * ncol) {
    throw new MalformedResponseError(`expected ${nrow * ncol} values for a ${nrow} x ${ncol} matrix, got ${data.length}`);
  }
  if (rowNames && rowNames.length !== nrow) {
    throw new MalformedResponseError(`expected ${nrow} row names, got ${rowNames.length}`);
  }
  if (colNames && colNames.length !== ncol) {
    throw new MalformedResponseError(`expected ${ncol} column names, got ${colNames.length}`);
  }

  return Object.freeze({
    nrow,
    ncol,
    data: Object.freeze([...data]),
    rowNames: rowNames ? Object.freeze([...rowNames]) : null,
    colNames: colNames ? Object.freeze([...colNames]) : null,
  });
}

/**
 * Shape a coefficient vector into one row per feature. A single column is
 * labeled "Estimate"; several columns are labeled with the class labels.
 */
export function coefficientMatrix(
  coefficients: readonly number[],
  features: readonly string[],
  labels: readonly string[]
): LabeledMatrix {
  if (features.length === 0) {
    throw new MalformedResponseError("model reports no features");
  }
  const ncol = coefficients.length / features.length;
  if (!Number.isInteger(ncol) || ncol === 0) {
    throw new MalformedResponseError(
      `${coefficients.length} coefficients do not divide evenly over ${features.length} features`
    );
  }
  const colNames = ncol === 1 ? [ESTIMATE_COLUMN] : labels;
  return fromColumnMajor(coefficients, features.length, ncol, features, colNames);
}

export function cell(m: LabeledMatrix, row: number, col: number): number {
  if (row < 0 || row >= m.nrow || col < 0 || col >= m.ncol) {
    throw new RangeError(`cell (${row}, ${col}) outside ${m.nrow} x ${m.ncol} matrix`);
  }
  return m.data[col * m.nrow + row];
}

/**
 * Look a cell up by its row and column labels.
 */
export function valueAt(m: LabeledMatrix, rowName: string, colName: string): number {
  const row = m.rowNames?.indexOf(rowName) ?? -1;
  const col = m.colNames?.indexOf(colName) ?? -1;
  if (row < 0 || col < 0) {
    throw new RangeError(`no cell labeled (${rowName}, ${colName})`);
  }
  return cell(m, row, col);
}

export function toRows(m: LabeledMatrix): number[][] {
  const rows: number[][] = [];
  for (let r = 0; r < m.nrow; r++) {
    const row: number[] = [];
    for (let c = 0; c < m.ncol; c++) {
      row.push(cell(m, r, c));
    }
    rows.push(row);
  }
  return rows;
}

/** Flatten back to the column-major vector the matrix was built from. */
export function flattenColumnMajor(m: LabeledMatrix): number[] {
  return [...m.data];
}

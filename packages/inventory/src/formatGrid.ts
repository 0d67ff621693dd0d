/**
 * Render a column-major `matrix[x][y]` as text, one line per row:
 *
 * ```
 * [Sword][Sword][]
 * [][][Potion]
 * ```
 *
 * Empty cells print as `[]`. Columns shorter than the first are padded
 * with empty cells.
 */
export function formatGrid<T>(
  matrix: ReadonlyArray<ReadonlyArray<T | null>>,
  label: (cell: T) => string = (cell) => String(cell),
): string {
  const width = matrix.length;
  const height = width > 0 ? matrix[0].length : 0;
  const rows: string[] = [];

  for (let y = 0; y < height; y++) {
    let row = "";
    for (let x = 0; x < width; x++) {
      const cell = matrix[x][y];
      row += cell === null || cell === undefined ? "[]" : `[${label(cell)}]`;
    }
    rows.push(row);
  }

  return rows.join("\n");
}

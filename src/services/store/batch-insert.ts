const CHUNK_SIZE = 100;

/** The slice of pg.PoolClient a batch insert needs. */
export interface InsertClient {
  query(text: string, values: unknown[]): Promise<{ rowCount: number | null }>;
}

export function chunk<T>(arr: readonly T[], size = CHUNK_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < arr.length; i += size) {
    chunks.push(arr.slice(i, i + size));
  }
  return chunks;
}

/**
 * Build the `($1, $2, ...), ($n+1, ...)` placeholder list for a multi-row
 * INSERT along with the flattened parameter array.
 */
export function buildValuesClause(rows: readonly unknown[][]): { placeholders: string; values: unknown[] } {
  const values: unknown[] = [];
  const groups: string[] = [];

  for (const row of rows) {
    const offset = values.length;
    groups.push(`(${row.map((_, i) => `$${offset + i + 1}`).join(', ')})`);
    values.push(...row);
  }

  return { placeholders: groups.join(', '), values };
}

/**
 * Insert rows in chunks of 100. `suffix` is appended after the VALUES list
 * (e.g. an ON CONFLICT clause). Returns the total rowCount.
 */
export async function batchInsert(
  client: InsertClient,
  table: string,
  columns: readonly string[],
  rows: readonly unknown[][],
  suffix = '',
): Promise<number> {
  let total = 0;

  for (const batch of chunk(rows)) {
    const { placeholders, values } = buildValuesClause(batch);
    const result = await client.query(
      `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${placeholders} ${suffix}`,
      values,
    );
    total += result.rowCount ?? 0;
  }

  return total;
}

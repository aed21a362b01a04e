export type SqlValue = string | number | null;

/** Accumulates `AND`-joined WHERE conditions with their positional parameters. */
export class Filters {
  private readonly clauses: string[] = [];
  readonly params: SqlValue[] = [];

  add(clause: string, ...values: SqlValue[]): this {
    this.clauses.push(clause);
    this.params.push(...values);
    return this;
  }

  toSql(): string {
    return this.clauses.length > 0 ? `WHERE ${this.clauses.join(" AND ")}` : "";
  }
}

/**
 * Builds a `SET` list from column/value pairs, skipping undefined values so a
 * partial update leaves those columns untouched.
 */
export function assignments(values: Record<string, SqlValue | undefined>): { sql: string; params: SqlValue[] } {
  const parts: string[] = [];
  const params: SqlValue[] = [];
  for (const [column, value] of Object.entries(values)) {
    if (value === undefined) continue;
    parts.push(`${column} = ?`);
    params.push(value);
  }
  return { sql: parts.join(", "), params };
}

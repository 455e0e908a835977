/**
 * In-process stand-in for the slice of the Supabase query builder the data
 * layer uses. Tables are plain arrays; unique keys, row-policy denials and
 * upstream failures are configured per test.
 */

export type FakeRow = Record<string, unknown>;

export type FakeResponse = {
  data: unknown;
  error: { message: string; code?: string | null } | null;
  status: number;
  count: number | null;
};

export type FakeOperation = "select" | "insert" | "upsert" | "update" | "delete";

type Filter = (row: FakeRow) => boolean;

type InjectedFailure = {
  table: string;
  operation: FakeOperation;
  error: { message: string; code?: string | null };
  status: number;
  remaining: number;
};

export type FakeSupabaseOptions = {
  tables?: Record<string, FakeRow[]>;
  uniqueKeys?: Record<string, string[][]>;
  numericIdTables?: string[];
};

type SharedState = {
  tables: Map<string, FakeRow[]>;
  uniqueKeys: Record<string, string[][]>;
  numericIdTables: Set<string>;
  nextId: number;
};

export class FakeSupabase {
  readonly calls: Array<{ table: string; operation: FakeOperation }> = [];
  private readonly state: SharedState;
  private readonly deniedWrites = new Set<string>();
  private readonly failures: InjectedFailure[] = [];

  constructor(options: FakeSupabaseOptions | { shared: SharedState } = {}) {
    if ("shared" in options) {
      this.state = options.shared;
      return;
    }
    const tables = new Map<string, FakeRow[]>();
    for (const [table, rows] of Object.entries(options.tables ?? {})) {
      tables.set(table, rows.map((row) => ({ ...row })));
    }
    this.state = {
      tables,
      uniqueKeys: options.uniqueKeys ?? {},
      numericIdTables: new Set(options.numericIdTables ?? []),
      nextId: 1,
    };
  }

  /**
   * A second client over the same tables, with its own denials, injected
   * failures and call log. Pairs a caller-scoped client with an elevated one.
   */
  view(): FakeSupabase {
    return new FakeSupabase({ shared: this.state });
  }

  from(table: string): FakeQuery {
    return new FakeQuery(this, table);
  }

  rows(table: string): FakeRow[] {
    let rows = this.state.tables.get(table);
    if (!rows) {
      rows = [];
      this.state.tables.set(table, rows);
    }
    return rows;
  }

  /** Make inserts and upserts into `table` fail the way a row policy does. */
  denyWrites(table: string): void {
    this.deniedWrites.add(table);
  }

  failNext(
    table: string,
    operation: FakeOperation,
    failure: { error: { message: string; code?: string | null }; status: number; times?: number },
  ): void {
    this.failures.push({
      table,
      operation,
      error: failure.error,
      status: failure.status,
      remaining: failure.times ?? 1,
    });
  }

  takeFailure(table: string, operation: FakeOperation): InjectedFailure | null {
    const failure = this.failures.find(
      (entry) => entry.table === table && entry.operation === operation && entry.remaining > 0,
    );
    if (!failure) {
      return null;
    }
    failure.remaining -= 1;
    return failure;
  }

  isDenied(table: string): boolean {
    return this.deniedWrites.has(table);
  }

  uniqueKeysFor(table: string): string[][] {
    return this.state.uniqueKeys[table] ?? [];
  }

  assignId(table: string): number | string {
    const id = this.state.nextId;
    this.state.nextId += 1;
    return this.state.numericIdTables.has(table) ? id : `${table}-${id}`;
  }
}

export class FakeQuery implements PromiseLike<FakeResponse> {
  private operation: FakeOperation = "select";
  private columns: string | null = null;
  private returning = false;
  private countOnly = false;
  private values: FakeRow[] = [];
  private onConflict: string[] = [];
  private ignoreDuplicates = false;
  private readonly filters: Filter[] = [];
  private ordering: { column: string; ascending: boolean; nullsFirst: boolean } | null = null;
  private rowLimit: number | null = null;
  private cardinality: "many" | "single" | "maybe" = "many";

  constructor(
    private readonly db: FakeSupabase,
    private readonly table: string,
  ) {}

  select(columns = "*", options: { count?: string; head?: boolean } = {}): this {
    this.columns = columns;
    if (this.operation === "select") {
      this.countOnly = options.head === true;
    } else {
      this.returning = true;
    }
    return this;
  }

  insert(values: FakeRow | ReadonlyArray<FakeRow>): this {
    this.operation = "insert";
    this.values = toArray(values);
    return this;
  }

  upsert(
    values: FakeRow | ReadonlyArray<FakeRow>,
    options: { onConflict?: string; ignoreDuplicates?: boolean } = {},
  ): this {
    this.operation = "upsert";
    this.values = toArray(values);
    this.onConflict = (options.onConflict ?? "id").split(",").map((column) => column.trim());
    this.ignoreDuplicates = options.ignoreDuplicates === true;
    return this;
  }

  update(values: FakeRow): this {
    this.operation = "update";
    this.values = [values];
    return this;
  }

  delete(): this {
    this.operation = "delete";
    return this;
  }

  eq(column: string, value: unknown): this {
    this.filters.push((row) => sameValue(row[column], value));
    return this;
  }

  neq(column: string, value: unknown): this {
    this.filters.push((row) => !sameValue(row[column], value));
    return this;
  }

  gte(column: string, value: string | number): this {
    this.filters.push((row) => compareValues(row[column], value) >= 0);
    return this;
  }

  lt(column: string, value: string | number): this {
    this.filters.push((row) => compareValues(row[column], value) < 0);
    return this;
  }

  in(column: string, values: ReadonlyArray<unknown>): this {
    this.filters.push((row) => values.some((value) => sameValue(row[column], value)));
    return this;
  }

  /** Nulls sort as in Postgres: last ascending, first descending, unless `nullsFirst` says otherwise. */
  order(column: string, options: { ascending?: boolean; nullsFirst?: boolean } = {}): this {
    const ascending = options.ascending !== false;
    this.ordering = { column, ascending, nullsFirst: options.nullsFirst ?? !ascending };
    return this;
  }

  limit(count: number): this {
    this.rowLimit = count;
    return this;
  }

  single(): this {
    this.cardinality = "single";
    return this;
  }

  maybeSingle(): this {
    this.cardinality = "maybe";
    return this;
  }

  then<TResult1 = FakeResponse, TResult2 = never>(
    onfulfilled?: ((value: FakeResponse) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): PromiseLike<TResult1 | TResult2> {
    return Promise.resolve().then(() => this.execute()).then(onfulfilled, onrejected);
  }

  private execute(): FakeResponse {
    this.db.calls.push({ table: this.table, operation: this.operation });

    const failure = this.db.takeFailure(this.table, this.operation);
    if (failure) {
      return { data: null, error: failure.error, status: failure.status, count: null };
    }

    const isWrite = this.operation === "insert" || this.operation === "upsert";
    if (isWrite && this.db.isDenied(this.table)) {
      return {
        data: null,
        error: { code: "42501", message: `new row violates row-level security policy for table "${this.table}"` },
        status: 403,
        count: null,
      };
    }

    switch (this.operation) {
      case "select":
        return this.runSelect();
      case "insert":
        return this.runInsert();
      case "upsert":
        return this.runUpsert();
      case "update":
        return this.runUpdate();
      case "delete":
        return this.runDelete();
    }
  }

  private runSelect(): FakeResponse {
    let rows = this.db.rows(this.table).filter((row) => this.filters.every((filter) => filter(row)));
    if (this.countOnly) {
      return { data: null, error: null, status: 200, count: rows.length };
    }
    if (this.ordering) {
      const { column, ascending, nullsFirst } = this.ordering;
      rows = [...rows].sort((left, right) => {
        const leftNull = left[column] === null || left[column] === undefined;
        const rightNull = right[column] === null || right[column] === undefined;
        if (leftNull || rightNull) {
          return leftNull === rightNull ? 0 : leftNull === nullsFirst ? -1 : 1;
        }
        const result = compareValues(left[column], right[column]);
        return ascending ? result : -result;
      });
    }
    if (this.rowLimit !== null) {
      rows = rows.slice(0, this.rowLimit);
    }
    return this.respond(rows, 200);
  }

  private runInsert(): FakeResponse {
    const stored = this.db.rows(this.table);
    const pending: FakeRow[] = [];
    for (const value of this.values) {
      const row: FakeRow = { id: this.db.assignId(this.table), ...value };
      if (this.violatesUnique(row, [...stored, ...pending])) {
        return uniqueViolation(this.table);
      }
      pending.push(row);
    }
    stored.push(...pending);
    return this.respond(pending, 201);
  }

  private runUpsert(): FakeResponse {
    const stored = this.db.rows(this.table);
    const written: FakeRow[] = [];
    for (const value of this.values) {
      const existing = stored.find((row) =>
        this.onConflict.every((column) => value[column] != null && sameValue(row[column], value[column])),
      );
      if (existing) {
        if (!this.ignoreDuplicates) {
          Object.assign(existing, value);
          written.push(existing);
        }
        continue;
      }
      const row: FakeRow = { id: this.db.assignId(this.table), ...value };
      if (this.violatesUnique(row, stored)) {
        return uniqueViolation(this.table);
      }
      stored.push(row);
      written.push(row);
    }
    return this.respond(written, 201);
  }

  private runUpdate(): FakeResponse {
    const [patch] = this.values;
    const matched = this.db.rows(this.table).filter((row) => this.filters.every((filter) => filter(row)));
    for (const row of matched) {
      Object.assign(row, patch);
    }
    return this.respond(matched, 200);
  }

  private runDelete(): FakeResponse {
    const stored = this.db.rows(this.table);
    const kept = stored.filter((row) => !this.filters.every((filter) => filter(row)));
    const removed = stored.length - kept.length;
    stored.splice(0, stored.length, ...kept);
    return { data: null, error: null, status: 204, count: removed };
  }

  private violatesUnique(row: FakeRow, existing: ReadonlyArray<FakeRow>): boolean {
    return this.db.uniqueKeysFor(this.table).some((columns) =>
      existing.some((other) =>
        columns.every((column) => row[column] != null && sameValue(other[column], row[column])),
      ),
    );
  }

  private respond(rows: FakeRow[], status: number): FakeResponse {
    const isRead = this.operation === "select";
    if (!isRead && !this.returning) {
      return { data: null, error: null, status, count: null };
    }

    const projected = rows.map((row) => project(row, this.columns));
    if (this.cardinality === "many") {
      return { data: projected, error: null, status, count: null };
    }
    if (projected.length > 1 || (this.cardinality === "single" && projected.length === 0)) {
      return {
        data: null,
        error: { code: "PGRST116", message: "JSON object requested, multiple (or no) rows returned" },
        status: 406,
        count: null,
      };
    }
    return { data: projected[0] ?? null, error: null, status, count: null };
  }
}

function uniqueViolation(table: string): FakeResponse {
  return {
    data: null,
    error: { code: "23505", message: `duplicate key value violates unique constraint on "${table}"` },
    status: 409,
    count: null,
  };
}

function toArray(values: FakeRow | ReadonlyArray<FakeRow>): FakeRow[] {
  const output: FakeRow[] = [];
  return output.concat(values);
}

function project(row: FakeRow, columns: string | null): FakeRow {
  if (!columns || columns.trim() === "*") {
    return { ...row };
  }
  const output: FakeRow = {};
  for (const column of columns.split(",").map((entry) => entry.trim())) {
    output[column] = row[column] ?? null;
  }
  return output;
}

function sameValue(left: unknown, right: unknown): boolean {
  if (left === null || left === undefined || right === null || right === undefined) {
    return false;
  }
  return String(left) === String(right);
}

function compareValues(left: unknown, right: unknown): number {
  if (left === right) {
    return 0;
  }
  if (left === null || left === undefined) {
    return 1;
  }
  if (right === null || right === undefined) {
    return -1;
  }
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

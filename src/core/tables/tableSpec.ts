export type ColumnSpec = {
  name: string;
  type: string;       // SQL type, e.g. "BIGINT" or "BYTEA[]"
  nullable?: boolean; // columns are NOT NULL unless marked nullable
};

export type IndexSpec = {
  name: string;       // suffix; the full name is `<table>_<name>`
  columns: string[];
  using?: string;     // access method, e.g. "gin"
  where?: string;     // partial index predicate, passed through verbatim
};

export type CopyTableSpec = {
  from: string;
  to: string;
  key: string;
};

/**
 * Layout of one range-partitioned table and where its rows come from.
 */
export type TableSpec = {
  parent: string;
  source: string;
  key: string;
  columns: ColumnSpec[];
  primaryKey: string[];
  indexes: IndexSpec[];
  partitions: {
    lo: number;
    hi: number;
    size: number;
    firstId: number;
  };
  copyTables: CopyTableSpec[];
};

export class TableSpecError extends Error {
  readonly code = "invalid_table_spec";
  readonly context: { path: string };

  constructor(path: string, message: string) {
    super(`Invalid table spec at ${path}: ${message}`);
    this.name = "TableSpecError";
    this.context = { path };
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const identifierPattern = /^[A-Za-z_][A-Za-z0-9_]*$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readRecord = (value: unknown, path: string): Record<string, unknown> => {
  if (!isRecord(value)) throw new TableSpecError(path, "expected an object");
  return value;
};

const readArray = (value: unknown, path: string): unknown[] => {
  if (!Array.isArray(value)) throw new TableSpecError(path, "expected an array");
  return value;
};

const readString = (value: unknown, path: string): string => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new TableSpecError(path, "expected a non-empty string");
  }
  return value.trim();
};

const readIdentifier = (value: unknown, path: string): string => {
  const name = readString(value, path);
  if (!identifierPattern.test(name)) {
    throw new TableSpecError(path, `"${name}" is not a plain SQL identifier`);
  }
  return name;
};

const readInteger = (value: unknown, path: string, min: number): number => {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < min) {
    throw new TableSpecError(path, `expected an integer >= ${min}`);
  }
  return value;
};

const readOptionalString = (value: unknown, path: string): string | undefined =>
  value == null ? undefined : readString(value, path);

const readIdentifiers = (value: unknown, path: string): string[] => {
  const names = readArray(value, path).map((name, i) => readIdentifier(name, `${path}[${i}]`));
  if (names.length === 0) throw new TableSpecError(path, "expected at least one column");
  return names;
};

const readColumn = (value: unknown, path: string): ColumnSpec => {
  const raw = readRecord(value, path);
  const column: ColumnSpec = {
    name: readIdentifier(raw.name, `${path}.name`),
    type: readString(raw.type, `${path}.type`)
  };
  if (raw.nullable != null) {
    if (typeof raw.nullable !== "boolean") throw new TableSpecError(`${path}.nullable`, "expected a boolean");
    column.nullable = raw.nullable;
  }
  return column;
};

const readIndex = (value: unknown, path: string): IndexSpec => {
  const raw = readRecord(value, path);
  const index: IndexSpec = {
    name: readIdentifier(raw.name, `${path}.name`),
    columns: readIdentifiers(raw.columns, `${path}.columns`)
  };
  const using = readOptionalString(raw.using, `${path}.using`);
  if (using) {
    if (!identifierPattern.test(using)) throw new TableSpecError(`${path}.using`, `unknown access method "${using}"`);
    index.using = using;
  }
  const where = readOptionalString(raw.where, `${path}.where`);
  if (where) index.where = where;
  return index;
};

const readCopyTable = (value: unknown, path: string): CopyTableSpec => {
  const raw = readRecord(value, path);
  return {
    from: readIdentifier(raw.from, `${path}.from`),
    to: readIdentifier(raw.to, `${path}.to`),
    key: readIdentifier(raw.key, `${path}.key`)
  };
};

export const parseTableSpec = (value: unknown): TableSpec => {
  const raw = readRecord(value, "$");
  const columns = readArray(raw.columns, "$.columns").map((column, i) => readColumn(column, `$.columns[${i}]`));
  const columnNames = new Set(columns.map((column) => column.name));

  const key = readIdentifier(raw.key, "$.key");
  if (!columnNames.has(key)) throw new TableSpecError("$.key", `"${key}" is not a declared column`);

  const primaryKey = readIdentifiers(raw.primaryKey, "$.primaryKey");
  primaryKey.forEach((name, i) => {
    if (!columnNames.has(name)) throw new TableSpecError(`$.primaryKey[${i}]`, `"${name}" is not a declared column`);
  });
  if (!primaryKey.includes(key)) {
    throw new TableSpecError("$.primaryKey", `must include the partition key "${key}"`);
  }

  const indexes = raw.indexes == null
    ? []
    : readArray(raw.indexes, "$.indexes").map((index, i) => readIndex(index, `$.indexes[${i}]`));

  const rawPartitions = readRecord(raw.partitions, "$.partitions");
  const lo = readInteger(rawPartitions.lo, "$.partitions.lo", 0);
  const hi = readInteger(rawPartitions.hi, "$.partitions.hi", lo + 1);
  const partitions = {
    lo,
    hi,
    size: readInteger(rawPartitions.size, "$.partitions.size", 1),
    firstId: rawPartitions.firstId == null ? 0 : readInteger(rawPartitions.firstId, "$.partitions.firstId", 0)
  };

  const copyTables = raw.copyTables == null
    ? []
    : readArray(raw.copyTables, "$.copyTables").map((table, i) => readCopyTable(table, `$.copyTables[${i}]`));

  return {
    parent: readIdentifier(raw.parent, "$.parent"),
    source: readIdentifier(raw.source, "$.source"),
    key,
    columns,
    primaryKey,
    indexes,
    partitions,
    copyTables
  };
};

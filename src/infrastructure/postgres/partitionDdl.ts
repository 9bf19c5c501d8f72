import type { Partition } from "../../core/partition/partition";
import type { ColumnSpec, CopyTableSpec, IndexSpec, TableSpec } from "../../core/tables/tableSpec";
import type { KeyRange } from "../../core/work/workItem";

export type Statement = {
  text: string;
  values?: unknown[];
};

export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

const quoteList = (names: readonly string[]): string => names.map(quoteIdentifier).join(", ");

// Bounds are inlined into DDL, where Postgres takes no parameters.
const inlineInteger = (name: string, value: number): string => {
  if (!Number.isSafeInteger(value)) {
    throw new Error(`${name} must be a safe integer. Received: ${String(value)}`);
  }
  return String(value);
};

export const partitionTableName = (spec: TableSpec, partition: Partition): string =>
  `${spec.parent}_partition_${partition.id}`;

export const rangeCheckName = (table: string): string => `${table}_partition_check`;

const columnDefinition = (column: ColumnSpec, constrained: boolean): string =>
  constrained && !column.nullable
    ? `${quoteIdentifier(column.name)} ${column.type} NOT NULL`
    : `${quoteIdentifier(column.name)} ${column.type}`;

const indexStatement = (table: string, index: IndexSpec): string => {
  const using = index.using ? ` USING ${index.using}` : "";
  const where = index.where ? ` WHERE ${index.where}` : "";
  return `CREATE INDEX ${quoteIdentifier(`${table}_${index.name}`)} ON ${quoteIdentifier(table)}${using} (${quoteList(index.columns)})${where}`;
};

export const statementTimeout = (timeoutMs: number): string =>
  `SET statement_timeout = ${inlineInteger("timeoutMs", timeoutMs)}`;

export const resetStatementTimeout = "RESET statement_timeout";

/** Parent table with its primary key and partitioned indexes. */
export const createParentStatements = (spec: TableSpec): string[] => [
  [
    `CREATE TABLE ${quoteIdentifier(spec.parent)} (`,
    [...spec.columns.map((column) => `  ${columnDefinition(column, true)}`), `  PRIMARY KEY (${quoteList(spec.primaryKey)})`].join(",\n"),
    `) PARTITION BY RANGE (${quoteIdentifier(spec.key)})`
  ].join("\n"),
  ...spec.indexes.map((index) => indexStatement(spec.parent, index))
];

/**
 * A loose table to copy into: no keys, no NOT NULL, autovacuum off.
 * Constraints are added in bulk once the rows are in.
 */
export const createPartitionStatements = (spec: TableSpec, partition: Partition): string[] => [
  [
    `CREATE TABLE ${quoteIdentifier(partitionTableName(spec, partition))} (`,
    spec.columns.map((column) => `  ${columnDefinition(column, false)}`).join(",\n"),
    ") WITH (autovacuum_enabled = false)"
  ].join("\n")
];

export const disableAutovacuumStatement = (table: string): string =>
  `ALTER TABLE ${quoteIdentifier(table)} SET (autovacuum_enabled = false)`;

export const resetAutovacuumStatement = (table: string): string =>
  `ALTER TABLE ${quoteIdentifier(table)} RESET (autovacuum_enabled)`;

export const copyRangeStatement = (spec: TableSpec, partition: Partition, range: KeyRange): Statement => {
  const columns = quoteList(spec.columns.map((column) => column.name));
  const key = quoteIdentifier(spec.key);
  return {
    text:
      `INSERT INTO ${quoteIdentifier(partitionTableName(spec, partition))} (${columns}) ` +
      `SELECT ${columns} FROM ${quoteIdentifier(spec.source)} WHERE $1 <= ${key} AND ${key} < $2`,
    values: [range.lo, range.hi]
  };
};

/**
 * Primary key, NOT NULL columns and a CHECK matching the partition bounds,
 * so attaching does not have to scan the table.
 */
export const constrainStatement = (spec: TableSpec, partition: Partition): string => {
  const table = partitionTableName(spec, partition);
  const key = quoteIdentifier(spec.key);
  const clauses = [
    `ADD PRIMARY KEY (${quoteList(spec.primaryKey)})`,
    ...spec.columns
      .filter((column) => !column.nullable)
      .map((column) => `ALTER COLUMN ${quoteIdentifier(column.name)} SET NOT NULL`),
    `ADD CONSTRAINT ${quoteIdentifier(rangeCheckName(table))} CHECK (` +
      `${inlineInteger("lo", partition.lo)} <= ${key} AND ${key} < ${inlineInteger("hi", partition.hi)})`
  ];
  return `ALTER TABLE ${quoteIdentifier(table)}\n  ${clauses.join(",\n  ")}`;
};

export const buildIndexStatement = (spec: TableSpec, partition: Partition, index: number): string => {
  const definition = spec.indexes[index];
  if (definition === undefined) {
    throw new Error(`No index ${index} on ${spec.parent}; it declares ${spec.indexes.length}`);
  }
  return indexStatement(partitionTableName(spec, partition), definition);
};

export const attachStatement = (spec: TableSpec, partition: Partition): string =>
  `ALTER TABLE ${quoteIdentifier(spec.parent)} ATTACH PARTITION ${quoteIdentifier(partitionTableName(spec, partition))} ` +
  `FOR VALUES FROM (${inlineInteger("lo", partition.lo)}) TO (${inlineInteger("hi", partition.hi)})`;

export const dropRangeCheckStatement = (spec: TableSpec, partition: Partition): string => {
  const table = partitionTableName(spec, partition);
  return `ALTER TABLE ${quoteIdentifier(table)} DROP CONSTRAINT ${quoteIdentifier(rangeCheckName(table))}`;
};

export const vacuumAnalyzeStatement = (table: string): string => `VACUUM ANALYZE ${quoteIdentifier(table)}`;

export const dropTableStatement = (table: string): string => `DROP TABLE IF EXISTS ${quoteIdentifier(table)}`;

export const copyTableStatement = (table: CopyTableSpec, range: KeyRange): Statement => {
  const key = quoteIdentifier(table.key);
  return {
    text: `INSERT INTO ${quoteIdentifier(table.to)} SELECT * FROM ${quoteIdentifier(table.from)} WHERE $1 <= ${key} AND ${key} < $2`,
    values: [range.lo, range.hi]
  };
};

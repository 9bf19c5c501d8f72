import type { Partition } from "../../core/partition/partition";
import type { CopyTableSpec, TableSpec } from "../../core/tables/tableSpec";
import { StatementTimeoutError } from "../../core/work/timeout";
import type { KeyRange } from "../../core/work/workItem";
import { consoleLog, type Log } from "../../shared/logging/logger";
import type { PartitionLifecycleTarget } from "../../ports/PartitionLifecycleTarget";
import type { TableCopyTarget } from "../../ports/TableCopyTarget";
import type { TableSetupTarget } from "../../ports/TableSetupTarget";
import {
  attachStatement,
  buildIndexStatement,
  constrainStatement,
  copyRangeStatement,
  copyTableStatement,
  createParentStatements,
  createPartitionStatements,
  disableAutovacuumStatement,
  dropRangeCheckStatement,
  dropTableStatement,
  partitionTableName,
  resetAutovacuumStatement,
  resetStatementTimeout,
  statementTimeout,
  vacuumAnalyzeStatement,
  type Statement
} from "./partitionDdl";

export type PgQueryResultLike = {
  rowCount: number | null;
};

export interface PgClientLike {
  query(text: string, values?: unknown[]): Promise<PgQueryResultLike>;
  release(destroy?: boolean): void;
}

export interface PgPoolLike {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

// SQLSTATE raised when statement_timeout cancels a query.
const queryCanceled = "57014";

export const isQueryCanceled = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === queryCanceled;

const asStatementTimeout = (err: unknown, timeoutMs: number): unknown =>
  isQueryCanceled(err)
    ? new StatementTimeoutError({
        timeoutMs,
        message: err instanceof Error ? err.message : undefined,
        cause: err
      })
    : err;

const run = (client: PgClientLike, statement: string | Statement): Promise<PgQueryResultLike> =>
  typeof statement === "string" ? client.query(statement) : client.query(statement.text, statement.values);

/**
 * Runs the partition migration's statements against one Postgres database.
 * Every call checks out its own client, so calls from concurrent workers
 * never share a session.
 */
export class PostgresMigrationDatabase implements PartitionLifecycleTarget, TableSetupTarget, TableCopyTarget {
  private pool?: PgPoolLike;

  constructor(
    private readonly spec: TableSpec,
    private readonly createPool: () => PgPoolLike,
    private readonly log: Log = consoleLog
  ) {}

  get indexCount(): number {
    return this.spec.indexes.length;
  }

  get parentTable(): string {
    return this.spec.parent;
  }

  partitionTable(partition: Partition): string {
    return partitionTableName(this.spec, partition);
  }

  private getPool(): PgPoolLike {
    if (this.pool) return this.pool;
    this.pool = this.createPool();
    return this.pool;
  }

  /**
   * Checks out a client with the session's statement deadline set. A client
   * whose work failed is destroyed rather than handed back with the
   * deadline still in place. Once the work has resolved its result stands:
   * a failed reset only costs the client.
   */
  private async withClient<R>(timeoutMs: number, work: (client: PgClientLike) => Promise<R>): Promise<R> {
    const client = await this.getPool().connect();
    let result: R;
    try {
      await client.query(statementTimeout(timeoutMs));
      result = await work(client);
    } catch (err) {
      client.release(true);
      throw asStatementTimeout(err, timeoutMs);
    }

    try {
      await client.query(resetStatementTimeout);
      client.release();
    } catch (err) {
      client.release(true);
      this.log("warn", { event: "postgres.reset_failed", error: err });
    }
    return result;
  }

  private async inTransaction(client: PgClientLike, statements: Array<string | Statement>): Promise<void> {
    await client.query("BEGIN");
    try {
      for (const statement of statements) {
        await run(client, statement);
      }
      await client.query("COMMIT");
    } catch (err) {
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        this.log("warn", { event: "postgres.rollback_failed", error: rollbackErr });
      });
      throw err;
    }
  }

  private transaction(statements: Array<string | Statement>, timeoutMs: number): Promise<void> {
    return this.withClient(timeoutMs, (client) => this.inTransaction(client, statements));
  }

  private async execute(statement: string | Statement, timeoutMs: number): Promise<number> {
    const result = await this.withClient(timeoutMs, (client) => run(client, statement));
    return result.rowCount ?? 0;
  }

  async createParent(timeoutMs: number): Promise<void> {
    await this.transaction(createParentStatements(this.spec), timeoutMs);
  }

  async createPartition(partition: Partition, timeoutMs: number): Promise<void> {
    await this.transaction(createPartitionStatements(this.spec, partition), timeoutMs);
  }

  async dropTable(table: string, timeoutMs: number): Promise<void> {
    await this.execute(dropTableStatement(table), timeoutMs);
  }

  async disableAutovacuum(partition: Partition, timeoutMs: number): Promise<void> {
    await this.execute(disableAutovacuumStatement(this.partitionTable(partition)), timeoutMs);
  }

  copyRange(partition: Partition, range: KeyRange, timeoutMs: number): Promise<number> {
    return this.execute(copyRangeStatement(this.spec, partition, range), timeoutMs);
  }

  async constrain(partition: Partition, timeoutMs: number): Promise<void> {
    await this.transaction([constrainStatement(this.spec, partition)], timeoutMs);
  }

  async buildIndex(partition: Partition, index: number, timeoutMs: number): Promise<void> {
    await this.execute(buildIndexStatement(this.spec, partition, index), timeoutMs);
  }

  // Matching partition indexes are attached to the parent's along with the table.
  async attach(partition: Partition, timeoutMs: number): Promise<void> {
    await this.transaction([attachStatement(this.spec, partition)], timeoutMs);
  }

  async dropRangeCheck(partition: Partition, timeoutMs: number): Promise<void> {
    await this.execute(dropRangeCheckStatement(this.spec, partition), timeoutMs);
  }

  async resetAutovacuum(partition: Partition, timeoutMs: number): Promise<void> {
    await this.execute(resetAutovacuumStatement(this.partitionTable(partition)), timeoutMs);
  }

  // VACUUM cannot run inside a transaction block.
  async analyze(partition: Partition, timeoutMs: number): Promise<void> {
    await this.execute(vacuumAnalyzeStatement(this.partitionTable(partition)), timeoutMs);
  }

  copyRows(table: CopyTableSpec, range: KeyRange, timeoutMs: number): Promise<number> {
    return this.execute(copyTableStatement(table, range), timeoutMs);
  }

  async close(): Promise<void> {
    await this.pool?.end();
    this.pool = undefined;
  }
}

import { isMigrationCommand, migrationCommands, runMigration } from "../composition/root";

type ErrorContext = Partial<{
  pool: string;
  failed: number;
  cancelled: number;
  retryFile: string;
  path: string;
  index: number;
}>;

type CliErrorEnvelope = {
  event: "migrate.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const numericContextKeys = ["failed", "cancelled", "index"] as const;
const textContextKeys = ["pool", "retryFile", "path"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of numericContextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) {
      sanitizedContext[key] = raw;
    }
  }
  for (const key of textContextKeys) {
    const raw = value[key];
    if (typeof raw === "string" && raw !== "") {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "migrate.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeMigrateCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const [command] = argv;
    if (!isMigrationCommand(command)) {
      throw new Error(`Usage: migrate <${migrationCommands.join("|")}>. Received: ${command ?? "nothing"}`);
    }
    await runMigration(command);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeMigrateCli();
}

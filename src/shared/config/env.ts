export type DatabaseEnv = {
  DBNAME: string;
  DBHOST: string;
  DBPORT: number;
  DBUSER: string;
  DBPASS: string;
};

const readText = (env: NodeJS.ProcessEnv, name: string, fallback: string): string => {
  const raw = env[name];
  return raw == null || raw.trim() === "" ? fallback : raw;
};

const validatePort = (name: string, raw: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new Error(`${name}=${raw} is out of allowed range [1..65535]`);
  }
  return value;
};

/** Connection settings for the database being migrated, defaulting to a local server. */
export const loadEnv = (env: NodeJS.ProcessEnv = process.env): DatabaseEnv => ({
  DBNAME: readText(env, "DBNAME", "defaultdb"),
  DBHOST: readText(env, "DBHOST", "localhost"),
  DBPORT: validatePort("DBPORT", readText(env, "DBPORT", "5432")),
  DBUSER: readText(env, "DBUSER", "postgres"),
  DBPASS: readText(env, "DBPASS", "postgrespw")
});

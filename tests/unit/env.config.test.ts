import { loadEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("defaults to a local database", () => {
    expect(loadEnv({})).toEqual({
      DBNAME: "defaultdb",
      DBHOST: "localhost",
      DBPORT: 5432,
      DBUSER: "postgres",
      DBPASS: "postgrespw"
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    expect(
      loadEnv({ DBNAME: "migrations", DBHOST: "db.internal", DBPORT: "6543", DBUSER: "migrator", DBPASS: "test-secret", DBNAME_UNUSED: "x" })
    ).toEqual({
      DBNAME: "migrations",
      DBHOST: "db.internal",
      DBPORT: 6543,
      DBUSER: "migrator",
      DBPASS: "test-secret"
    });
    expect(loadEnv({ DBHOST: "   " }).DBHOST).toBe("localhost");
  });

  it.each(["0", "65536", "54.3", "pg"])("rejects DBPORT=%s", (port) => {
    expect(() => loadEnv({ DBPORT: port })).toThrow(`DBPORT=${port} is out of allowed range [1..65535]`);
  });
});

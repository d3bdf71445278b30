import { readFile } from "node:fs/promises";
import { PersistenceError, errorMessage } from "@salesharvest/shared";
import { connectClient, pgErrorCode, type SqlPool } from "./client.js";

export const SCHEMA_SQL_URL = new URL("../sql/schema.sql", import.meta.url);

export async function readSchemaSql() {
  return await readFile(SCHEMA_SQL_URL, "utf8");
}

/** Creates `sales_records` and its indexes when they do not exist yet. */
export async function ensureSalesSchema(pool: SqlPool) {
  const sql = await readSchemaSql();
  const client = await connectClient(pool);
  try {
    await client.query(sql);
  } catch (err) {
    throw new PersistenceError(`Schema bootstrap failed: ${errorMessage(err)}`, { cause: err, code: pgErrorCode(err) });
  } finally {
    client.release();
  }
}

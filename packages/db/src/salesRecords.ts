import { PersistenceError, errorMessage, type SalesRecord } from "@salesharvest/shared";
import { connectClient, pgErrorCode, type SqlPool } from "./client.js";

export type UpsertCounts = {
  inserted: number;
  updated: number;
};

export const UPSERT_SALES_RECORD_SQL = `
INSERT INTO sales_records (external_id, sale_date, customer, product, quantity, amount, ingested_at)
VALUES ($1, $2, $3, $4, $5, $6, now())
ON CONFLICT (external_id) DO UPDATE SET
  sale_date = EXCLUDED.sale_date,
  customer = EXCLUDED.customer,
  product = EXCLUDED.product,
  quantity = EXCLUDED.quantity,
  amount = EXCLUDED.amount,
  ingested_at = now()
RETURNING (xmax = 0) AS inserted
`.trim();

function upsertParams(record: SalesRecord): unknown[] {
  return [record.externalId, record.date, record.customer, record.product, record.quantity, record.amount.toFixed(2)];
}

/**
 * Upserts a batch by `external_id` inside one transaction: either every record of
 * the batch is written or none is. Re-running a batch leaves the table unchanged
 * apart from `ingested_at`.
 */
export async function upsertSalesBatch(pool: SqlPool, records: readonly SalesRecord[]): Promise<UpsertCounts> {
  if (records.length === 0) return { inserted: 0, updated: 0 };

  const client = await connectClient(pool);
  let broken: Error | undefined;
  try {
    await client.query("BEGIN");
    let inserted = 0;
    let updated = 0;
    for (const record of records) {
      const result = await client.query(UPSERT_SALES_RECORD_SQL, upsertParams(record));
      if (result.rows[0]?.inserted === true) inserted += 1;
      else updated += 1;
    }
    await client.query("COMMIT");
    return { inserted, updated };
  } catch (err) {
    let rollbackNote = "";
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      rollbackNote = ` (rollback failed: ${broken.message})`;
    }
    throw new PersistenceError(`Batch upsert of ${records.length} record(s) failed: ${errorMessage(err)}${rollbackNote}`, {
      cause: err,
      code: pgErrorCode(err)
    });
  } finally {
    client.release(broken);
  }
}

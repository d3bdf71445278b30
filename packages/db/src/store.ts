import type { SalesRecord } from "@salesharvest/shared";
import { createSqlPool, type SqlPool, type SqlPoolOptions } from "./client.js";
import { upsertSalesBatch, type UpsertCounts } from "./salesRecords.js";
import { ensureSalesSchema } from "./schema.js";

export type SalesStore = {
  upsertBatch(records: readonly SalesRecord[]): Promise<UpsertCounts>;
  ensureSchema(): Promise<void>;
  close(): Promise<void>;
};

export function createSalesStore(pool: SqlPool): SalesStore {
  let closed = false;
  return {
    upsertBatch: async (records) => await upsertSalesBatch(pool, records),
    ensureSchema: async () => {
      await ensureSalesSchema(pool);
    },
    close: async () => {
      if (closed) return;
      closed = true;
      await pool.end();
    }
  };
}

export function connectSalesStore(databaseUrl: string, options?: SqlPoolOptions): SalesStore {
  return createSalesStore(createSqlPool(databaseUrl, options));
}

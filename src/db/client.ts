import { Pool, type QueryResultRow } from "pg";
import { getConfig } from "../config.js";

let ledgerPool: Pool | null = null;
let warrantyPool: Pool | null = null;

/** Run ledger: sync_runs, sync_group_results, sync_run_logs. */
export function getPool(): Pool {
  if (ledgerPool) {
    return ledgerPool;
  }

  const config = getConfig();
  ledgerPool = new Pool({ connectionString: config.DATABASE_URL });
  return ledgerPool;
}

/** Read-only source of SKU rows; shares the ledger pool when no separate URL is configured. */
export function getWarrantyPool(): Pool {
  const config = getConfig();
  if (!config.WARRANTY_DATABASE_URL || config.WARRANTY_DATABASE_URL === config.DATABASE_URL) {
    return getPool();
  }
  if (!warrantyPool) {
    warrantyPool = new Pool({ connectionString: config.WARRANTY_DATABASE_URL });
  }
  return warrantyPool;
}

export async function closePool(): Promise<void> {
  const pools = [ledgerPool, warrantyPool].filter((pool): pool is Pool => pool !== null);
  ledgerPool = null;
  warrantyPool = null;
  await Promise.all(pools.map((pool) => pool.end()));
}

export async function query<T extends QueryResultRow>(
  text: string,
  values: unknown[] = [],
): Promise<T[]> {
  const result = await getPool().query<T>(text, values);
  return result.rows;
}

import { closePool } from "../db/client.js";
import { runMigrations } from "../db/migrate.js";
import { listSyncRuns } from "../sync/persist.js";
import { parseArgs, parsePositiveInt } from "../utils/cli.js";

async function main(): Promise<void> {
  const { flags } = parseArgs(process.argv.slice(2));
  const limit = parsePositiveInt(flags.limit, "limit", 20);

  await runMigrations();
  const runs = await listSyncRuns(limit);

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ limit, runCount: runs.length, runs }, null, 2));
}

main()
  .then(async () => {
    await closePool();
  })
  .catch(async (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Run list failed:", error);
    await closePool();
    process.exitCode = 1;
  });

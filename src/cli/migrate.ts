import { closePool } from "../db/client.js";
import { runMigrations } from "../db/migrate.js";

async function main(): Promise<void> {
  const applied = await runMigrations();
  // eslint-disable-next-line no-console
  console.log(applied.length > 0 ? `Applied migrations: ${applied.join(", ")}` : "Run ledger schema is up to date.");
}

main()
  .then(async () => {
    await closePool();
  })
  .catch(async (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Migration failed.", error);
    await closePool();
    process.exitCode = 1;
  });

import { closePool } from "../db/client.js";
import { runMigrations } from "../db/migrate.js";
import { getSyncRunResults } from "../sync/persist.js";
import { parseArgs, requireArg } from "../utils/cli.js";

async function main(): Promise<void> {
  const { flags, positionals } = parseArgs(process.argv.slice(2), ["failures-only"]);
  const runId = positionals[0] ?? requireArg(flags, "run");

  await runMigrations();
  const report = await getSyncRunResults(runId);
  if (!report) {
    throw new Error(`Sync run ${runId} was not found.`);
  }

  const results =
    flags["failures-only"] === true ? report.results.filter((result) => result.errorKind !== null) : report.results;

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ run: report.run, resultCount: results.length, results }, null, 2));
}

main()
  .then(async () => {
    await closePool();
  })
  .catch(async (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Run report failed:", error);
    await closePool();
    process.exitCode = 1;
  });

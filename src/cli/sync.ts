import path from "node:path";
import { closePool } from "../db/client.js";
import { runSync } from "../sync/run.js";
import type { SyncRunSummary } from "../types.js";
import { optionalArg, parseArgs } from "../utils/cli.js";

function printSummary(summary: SyncRunSummary): void {
  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        runId: summary.runId,
        runLabel: summary.runLabel,
        dryRun: summary.dryRun,
        dispatchMode: summary.dispatchMode,
        status: summary.status,
        groupCount: summary.groupCount,
        counts: summary.counts,
        failures: summary.failures,
        startedAt: summary.startedAt,
        finishedAt: summary.finishedAt,
      },
      null,
      2,
    ),
  );
}

async function main(): Promise<void> {
  const { flags, positionals } = parseArgs(process.argv.slice(2), ["all", "dry-run"]);
  const all = flags.all === true;
  if (all && positionals.length > 0) {
    throw new Error("Pass either group ids or --all, not both.");
  }
  if (!all && positionals.length === 0) {
    throw new Error("Usage: sync <group-id...> | --all [--dry-run] [--run-label <label>] [--media-manifest <path>]");
  }

  const manifest = optionalArg(flags, "media-manifest");
  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals) => {
    // eslint-disable-next-line no-console
    console.error(`Received ${signal}; finishing in-flight groups and cancelling the rest.`);
    controller.abort();
  };
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  try {
    const summary = await runSync({
      groupIds: positionals,
      all,
      dryRun: flags["dry-run"] === true,
      runLabel: optionalArg(flags, "run-label"),
      mediaManifestPath: manifest ? path.resolve(process.cwd(), manifest) : null,
      signal: controller.signal,
    });
    printSummary(summary);
    if (summary.status !== "completed") {
      process.exitCode = 1;
    }
  } finally {
    process.off("SIGINT", cancel);
    process.off("SIGTERM", cancel);
  }
}

main()
  .then(async () => {
    await closePool();
  })
  .catch(async (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Sync failed:", error);
    await closePool();
    process.exitCode = 1;
  });

import dotenv from "dotenv";
dotenv.config({ path: ".env.local" });
import { readFile } from "fs/promises";
import { createDefaultCatalog } from "@/lib/capabilities/registry";
import { loadDatasetFacts } from "@/lib/db/dataset-facts";
import { GuardedQueryExecutor } from "@/lib/db/executor";
import { PgSqlRunner } from "@/lib/db/pg-runner";
import { loadTemplateRegistry } from "@/lib/db/templates";
import { getServerEnv } from "@/lib/env/server";
import { pipelineConfigFromEnv, runTurn } from "@/lib/pipeline/run-turn";

// Usage: npm run run-plan -- <plan.json> ["question text"]
async function main() {
  const [planPath, question] = process.argv.slice(2);
  if (!planPath) {
    console.error("Usage: run-plan <plan.json> [question]");
    process.exitCode = 1;
    return;
  }

  const env = getServerEnv();
  if (!env.DATABASE_URL) {
    console.error("DATABASE_URL is not set (.env.local)");
    process.exitCode = 1;
    return;
  }

  const runner = new PgSqlRunner({ connectionString: env.DATABASE_URL, maxConnections: env.QUERY_CONCURRENCY });
  try {
    const startup = { timeoutMs: env.QUERY_TIMEOUT_MS };
    const [facts, registry] = await Promise.all([loadDatasetFacts(runner, startup), loadTemplateRegistry(runner, startup)]);
    const executor = new GuardedQueryExecutor({
      runner,
      registry,
      facts,
      maxRows: env.QUERY_MAX_ROWS,
      timeoutMs: env.QUERY_TIMEOUT_MS,
    });

    const plan: unknown = JSON.parse(await readFile(planPath, "utf8"));
    const { payload } = await runTurn(
      { plan, question },
      { catalog: createDefaultCatalog(), executor, facts, config: pipelineConfigFromEnv(env) }
    );
    console.log(JSON.stringify(payload, null, 2));
  } finally {
    await runner.close();
  }
}

main().catch((error) => {
  console.error("[run-plan] Failed:", error);
  process.exitCode = 1;
});

import fs from "node:fs";
import { loadConfig } from "./config.js";
import { applyMigrations, openDb } from "./db/db.js";
import { buildApp } from "./app.js";
import { buildScanDeps } from "./lib/pipeline.js";
import { startWorkerLoop } from "./worker/scan-worker.js";

const config = loadConfig(process.env);
fs.mkdirSync(config.SCRATCH_DIR, { recursive: true });

const db = openDb(config.SQLITE_PATH);
const migrations = applyMigrations(db, config.MIGRATIONS_DIR);
console.log(`Applied migrations count=${migrations.length} dir=${config.MIGRATIONS_DIR}`);
const deps = buildScanDeps(config, db);

if (config.VULNSCAN_ROLE === "worker" || config.VULNSCAN_ROLE === "all") {
  startWorkerLoop({ config, db, deps });
  console.log(`Scan worker loop started concurrency=${config.WORKER_CONCURRENCY} sandboxed=${deps.sandbox !== null}`);
}

if (config.VULNSCAN_ROLE === "api" || config.VULNSCAN_ROLE === "all") {
  const app = buildApp({ config, db, deps });
  app.listen(config.PORT, () => {
    console.log(`Vulnscan API listening on ${config.BASE_URL} schema_version=${deps.schema_version}`);
  });
}

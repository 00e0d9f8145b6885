import fs from "node:fs";
import { loadConfig } from "./config.js";
import { applyMigrations, openDb } from "./db/db.js";
import { buildScanDeps } from "./lib/pipeline.js";
import { startWorkerLoop } from "./worker/scan-worker.js";

const config = loadConfig(process.env);
fs.mkdirSync(config.SCRATCH_DIR, { recursive: true });

const db = openDb(config.SQLITE_PATH);
applyMigrations(db, config.MIGRATIONS_DIR);
const worker = startWorkerLoop({ config, db, deps: buildScanDeps(config, db) });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    console.log(`Scan worker stopping signal=${signal}`);
    worker.stop();
    void worker.stopped.then(() => db.close());
  });
}

console.log("Scan worker started");

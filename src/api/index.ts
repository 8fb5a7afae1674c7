import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { Decimal } from "decimal.js";
import { loadConfig } from "../config.js";
import { createDatabase } from "../storage/index.js";
import { createServices } from "../services/index.js";
import { createApp } from "./app.js";

const config = loadConfig();

if (config.DATABASE_PATH !== ":memory:") {
  mkdirSync(dirname(config.DATABASE_PATH), { recursive: true });
}

const db = createDatabase(config.DATABASE_PATH);
const services = createServices(db, {
  extremePercentThreshold: new Decimal(config.EXTREME_PERCENT_THRESHOLD),
  defaultStrategy: config.TRANSFER_STRATEGY,
});
const app = createApp(services);

app.listen(config.PORT, () => {
  console.log(`🌐 Trip ledger API running on http://localhost:${config.PORT}`);
  console.log(`🗄️  Database: ${config.DATABASE_PATH}, transfer strategy: ${config.TRANSFER_STRATEGY}`);
});

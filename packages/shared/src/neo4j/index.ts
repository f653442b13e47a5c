export {
  createDriver,
  healthCheck,
  closeDriver,
  toNumber,
} from "./driver.js";

export type { Driver, Session, HealthCheckResult } from "./driver.js";

export { ensureSchema, UNIQUE_CONSTRAINTS } from "./seed.js";
export type { SeedResult, SeedLogger } from "./seed.js";

export { Neo4jStore } from "./store.js";

/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createEventRoutes } from "./events.js";
export { createOracleRoutes } from "./oracles.js";
export { createVaultRoutes } from "./vault.js";
export { createAssetRoutes } from "./asset.js";

/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createClientRoutes } from "./clients.js";
export { createContractRoutes } from "./contracts.js";
export { createSlaRoutes } from "./slas.js";
export { createAlertRoutes } from "./alerts.js";
export { createEventRoutes } from "./events.js";

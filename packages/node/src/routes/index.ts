/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createLedgerRoutes } from "./ledger.js";
export { createTransferRoutes } from "./transfers.js";
export { createTransactionRoutes } from "./transactions.js";
export { createArchiveRoutes } from "./archive.js";

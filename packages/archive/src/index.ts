/**
 * @tokenledger/archive — Archive nodes for migrated ledger transactions.
 *
 * Provides:
 * - InMemoryArchive: for tests and development
 * - JsonlArchive: file-based, durable, crash-safe
 * - Provisioners that create archives against a fixed-cost budget
 */

export { InMemoryArchive } from "./in-memory-archive.js";
export { JsonlArchive } from "./jsonl-archive.js";
export type { JsonlArchiveOptions } from "./jsonl-archive.js";
export {
  InMemoryArchiveProvisioner,
  JsonlArchiveProvisioner,
  ProvisioningBudget,
} from "./provisioner.js";
export type {
  InMemoryProvisionerOptions,
  JsonlProvisionerOptions,
} from "./provisioner.js";
export type { ArchiveOptions, ArchiveErrorCode } from "./types.js";
export { ArchiveError, DEFAULT_MAX_MEMORY_BYTES, capacityFor } from "./types.js";

/**
 * Type barrel — re-exports all public types from @tokenledger/node.
 */

// DTOs
export {
  AmountSchema,
  AccountSchema,
  TransferSchema,
  MintSchema,
  BurnSchema,
  RangeQuerySchema,
  ArchiveRangeQuerySchema,
  TransactionIndexSchema,
  toMetadataDto,
  toTransactionsDto,
  toTransactionDtos,
  transferErrorDetails,
  transferErrorMessage,
} from "./dto.js";
export type {
  TransferDto,
  MintDto,
  BurnDto,
  RangeQuery,
  ArchiveRangeQuery,
  MetadataDto,
  TransactionsDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type {
  Role,
  Permission,
  AuthContext,
  ApiKeyRecord,
  JwtClaims,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";

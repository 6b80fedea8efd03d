/**
 * Type barrel — re-exports all public types from @navledger/node.
 */

// DTOs
export {
  UintSchema,
  AddressSchema,
  SecondsSchema,
  RoleSchema,
  PaginationQuerySchema,
  DeployOracleSchema,
  ReportNavSchema,
  OracleConfigSchema,
  RoleChangeSchema,
  RenounceRoleSchema,
  PreviewQuerySchema,
  DepositSchema,
  MintSchema,
  WithdrawSchema,
  RedeemSchema,
  TransferSchema,
  TransferFromSchema,
  ApproveSchema,
  RequestIdParamSchema,
  QueueWithdrawalSchema,
  AmountSchema,
  SecondsBodySchema,
  ExitFeeSchema,
  RecipientSchema,
  SweepFeesSchema,
  QueueOracleSchema,
  AssetApproveSchema,
  FaucetSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  DeployOracleDto,
  ReportNavDto,
  OracleConfigDto,
  RoleChangeDto,
  PreviewQuery,
  DepositDto,
  MintDto,
  WithdrawDto,
  RedeemDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { JwtClaimsSchema } from "./auth.js";
export type { AuthContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// Views
export { toOracleView, toSummaryView, toRequestView } from "./views.js";
export type { OracleView } from "./views.js";

// App env
export type { AppEnv } from "./api-contract.js";

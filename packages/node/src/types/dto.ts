/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts travel as decimal strings of base units and are parsed to
 * bigint here; route handlers never see a float.
 */

import { z } from "zod";
import { ROLES } from "@navledger/authority";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Non-negative integer in base units, as a decimal string. */
export const UintSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "Expected a decimal string of base units")
  .transform((value) => BigInt(value));

export const AddressSchema = z.string().min(1).max(128);

export const SecondsSchema = z.number().int().nonnegative();

export const RoleSchema = z.enum([ROLES.DEFAULT_ADMIN, ROLES.OPERATOR, ROLES.GUARDIAN, ROLES.REPORTER]);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Oracle DTOs
// =============================================================================

export const DeployOracleSchema = z.object({
  address: AddressSchema,
  maxStalenessSeconds: z.number().int().positive().optional(),
  maxMoveBps: z.number().int().nonnegative().optional(),
});

export type DeployOracleDto = z.infer<typeof DeployOracleSchema>;

export const ReportNavSchema = z.object({
  price: UintSchema,
  timestamp: SecondsSchema,
});

export type ReportNavDto = z.infer<typeof ReportNavSchema>;

export const OracleConfigSchema = z.object({
  maxStalenessSeconds: z.number().int(),
  maxMoveBps: z.number().int(),
});

export type OracleConfigDto = z.infer<typeof OracleConfigSchema>;

export const RoleChangeSchema = z.object({
  role: RoleSchema,
  account: AddressSchema,
});

export type RoleChangeDto = z.infer<typeof RoleChangeSchema>;

export const RenounceRoleSchema = z.object({
  role: RoleSchema,
});

// =============================================================================
// Vault DTOs
// =============================================================================

export const PreviewQuerySchema = z.object({
  op: z.enum(["deposit", "mint", "withdraw", "redeem", "toShares", "toAssets"]),
  amount: UintSchema,
});

export type PreviewQuery = z.infer<typeof PreviewQuerySchema>;

export const DepositSchema = z.object({
  assets: UintSchema,
  receiver: AddressSchema.optional(),
  referrer: AddressSchema.optional(),
  minShares: UintSchema.optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const MintSchema = z.object({
  shares: UintSchema,
  receiver: AddressSchema.optional(),
  referrer: AddressSchema.optional(),
  maxAssets: UintSchema.optional(),
});

export type MintDto = z.infer<typeof MintSchema>;

export const WithdrawSchema = z.object({
  assets: UintSchema,
  receiver: AddressSchema.optional(),
  owner: AddressSchema.optional(),
  maxShares: UintSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const RedeemSchema = z.object({
  shares: UintSchema,
  receiver: AddressSchema.optional(),
  owner: AddressSchema.optional(),
  minAssets: UintSchema.optional(),
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

export const TransferSchema = z.object({
  to: AddressSchema,
  amount: UintSchema,
});

export const TransferFromSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
  amount: UintSchema,
});

export const ApproveSchema = z.object({
  spender: AddressSchema,
  amount: UintSchema,
});

export const RequestIdParamSchema = z.coerce.number().int().positive();

export const QueueWithdrawalSchema = z.object({
  shares: UintSchema,
  receiver: AddressSchema.optional(),
});

export const AmountSchema = z.object({
  amount: UintSchema,
});

export const SecondsBodySchema = z.object({
  seconds: SecondsSchema,
});

export const ExitFeeSchema = z.object({
  bps: z.number().int(),
});

export const RecipientSchema = z.object({
  address: AddressSchema,
});

export const SweepFeesSchema = z.object({
  to: AddressSchema,
});

export const QueueOracleSchema = z.object({
  oracle: AddressSchema,
});

// =============================================================================
// Asset DTOs
// =============================================================================

export const AssetApproveSchema = z.object({
  spender: AddressSchema.optional(),
  amount: UintSchema,
});

export const FaucetSchema = z.object({
  to: AddressSchema.optional(),
  amount: UintSchema,
});

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

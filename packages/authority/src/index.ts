/**
 * @navledger/authority — Role-gated authority primitives.
 *
 * - AccessControl: principal → roles, admin-only grant/revoke
 * - ReentrancyGuard: one mutating call in flight per instance
 * - PauseSwitch: guardian kill switch
 * - evaluateTimelock: pure two-phase change evaluation
 */

export { ROLES, isRole, AuthorityError } from "./types.js";
export type { Role, AuthorityErrorCode } from "./types.js";

export { AccessControl } from "./access-control.js";
export type { RoleAssignment } from "./access-control.js";

export { ReentrancyGuard } from "./reentrancy-guard.js";
export { PauseSwitch } from "./pause-switch.js";

export { ORACLE_TIMELOCK_SECONDS, evaluateTimelock, readyAt } from "./timelock.js";
export type { PendingChange, TimelockDecision } from "./timelock.js";

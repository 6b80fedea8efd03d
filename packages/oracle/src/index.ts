/**
 * @navledger/oracle — NAV price feed.
 */

export { NavOracle, exceedsMove } from "./nav-oracle.js";
export type { NavOracleOptions } from "./nav-oracle.js";

export { OracleError } from "./types.js";
export type { NavSnapshot, OracleConfig, OracleErrorCode, PriceSource } from "./types.js";

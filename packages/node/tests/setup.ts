/**
 * Test helpers for @navledger/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import type { Hono } from "hono";
import { ManualClock } from "@navledger/types";
import { createApp } from "../src/app.js";
import type { CreateAppOptions } from "../src/app.js";
import { NavService } from "../src/services/nav-service.js";
import type { NavServiceConfig } from "../src/services/nav-service.js";
import type { AppEnv } from "../src/types/api-contract.js";

export const ADMIN = "0xad";
export const OPERATOR = "0x0e";
export const GUARDIAN = "0x6a";
export const REPORTER = "0x4e";
export const ALICE = "0xa11ce";
export const BOB = "0xb0b";

export const START = 1_700_000_000;
export const ONE = 10n ** 18n;

export const ORACLE = "0x0rac1e";
export const VAULT = "0xva017";
export const ASSET = "0xusdc";

export interface TestApp {
  readonly app: Hono<AppEnv>;
  readonly service: NavService;
  readonly clock: ManualClock;
}

export function testServiceConfig(clock: ManualClock, overrides: Partial<NavServiceConfig> = {}): NavServiceConfig {
  return {
    clock,
    admin: ADMIN,
    operator: OPERATOR,
    guardian: GUARDIAN,
    reporter: REPORTER,
    asset: { address: ASSET, name: "Test Dollar", symbol: "TUSD", decimals: 6 },
    oracle: { address: ORACLE, maxStalenessSeconds: 3600, maxMoveBps: 1000 },
    vault: {
      address: VAULT,
      name: "NAV Vault Share",
      symbol: "nvTUSD",
      maxAllowedStaleness: 300,
      epochSeconds: 3600,
      exitFeeBps: 100,
    },
    faucetEnabled: true,
    ...overrides,
  };
}

/**
 * Create a test app with default configuration.
 *
 * The clock is manual; the oracle starts unprimed.
 */
export function createTestApp(
  serviceOverrides: Partial<NavServiceConfig> = {},
  appOptions: Omit<CreateAppOptions, "service"> = {},
): TestApp {
  const clock = new ManualClock(START);
  const service = new NavService(testServiceConfig(clock, serviceOverrides));
  const app = createApp({ service, ...appOptions });
  return { app, service, clock };
}

/**
 * Report `price` at the current time and fund `holder` with `assets`,
 * approved to the vault.
 */
export function primeAndFund(t: TestApp, price: bigint, holder: string, assets: bigint): void {
  t.service.currentOracle().reportNav(REPORTER, price, t.clock.now());
  t.service.asset.mint(holder, assets);
  t.service.asset.approve(holder, t.service.vault.address, assets);
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export function asCaller(caller: string, path: string, method: string = "POST", body?: unknown): Request {
  return jsonRequest(path, method, body, { "X-Caller-Address": caller });
}

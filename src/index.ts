import "reflect-metadata";
import * as config from "#/config";
import type * as domain from "#/domain";
import { Ledger } from "#/ledger";
import type { Registry } from "#/registry";
import type * as store from "#/store";

export * as math from "#/math";
export * as errors from "#/errors";
export * as adaptiveCurve from "#/irm/adaptive_curve";
export * as fixedRate from "#/irm/fixed_rate";
export * as health from "#/ledger/health";
export * as balances from "#/ledger/balances";
export { type Config, configureLogging, loadConfig } from "#/config";
export { EMPTY_DATA, marketId, utilization, type Clock, type Id, type Market, type MarketParams, type Position } from "#/domain";
export type { IRateModel } from "#/irm/types";
export { Ledger, type LedgerOptions } from "#/ledger";
export { EventKind, type Amount, type AssetsAndShares, type CallbackReceiver, type EventListener, type LedgerEvent, type LiquidationAmount, type LiquidationResult } from "#/ledger/types";
export { FixedPriceOracle, type IOracle } from "#/oracle";
export { Registry } from "#/registry";
export { Journal } from "#/store";
export { MemoryToken, type IToken, type TransferHook } from "#/token";

/**
 * Builds a ledger from environment configuration. Collaborators sharing
 * `journal` (tokens, rate models) roll back together with the ledger.
 */
export function createLedger(registry: Registry, options: { env?: Record<string, string | undefined>; journal?: store.Journal; clock?: domain.Clock } = {}): Ledger {
    const cfg = config.loadConfig(options.env);
    config.configureLogging(cfg);

    return new Ledger({
        address: cfg.address,
        owner: cfg.owner,
        feeRecipient: cfg.feeRecipient,
        registry,
        journal: options.journal,
        clock: options.clock,
    });
}

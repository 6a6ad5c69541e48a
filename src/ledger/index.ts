import { Logger } from "@nestjs/common";
import * as viem from "viem";
import * as domain from "#/domain";
import * as errors from "#/errors";
import type * as irm from "#/irm/types";
import * as math from "#/math";
import type * as oracle from "#/oracle";
import type { Registry } from "#/registry";
import * as store from "#/store";
import { EventLog } from "./events";
import { CallGuard } from "./guard";
import * as health from "./health";
import * as interest from "./interest";
import * as types from "./types";

export type LedgerOptions = {
    // Account the ledger holds its funds under
    address: viem.Address;
    owner: viem.Address;
    feeRecipient?: viem.Address;
    registry: Registry;
    journal?: store.Journal;
    clock?: domain.Clock;
};

// Collaborators resolved once when the market is created
type Binding = {
    oracle: oracle.IOracle;
    irm: irm.IRateModel | null;
};

type Loaded = {
    id: domain.Id;
    params: domain.MarketParams;
    market: domain.Market;
    binding: Binding;
};

export class Ledger {
    public readonly address: viem.Address;
    public readonly journal: store.Journal;

    private readonly logger = new Logger(Ledger.name);
    private readonly store: store.LedgerStore;
    private readonly registry: Registry;
    private readonly clock: domain.Clock;
    private readonly guard = new CallGuard();
    private readonly events: EventLog;
    private readonly bindings: store.JournaledMap<domain.Id, Binding>;

    constructor(options: LedgerOptions) {
        this.address = viem.getAddress(options.address);
        this.journal = options.journal ?? new store.Journal();
        this.clock = options.clock ?? domain.systemClock;
        this.registry = options.registry;
        this.store = new store.LedgerStore(this.journal, viem.getAddress(options.owner), viem.getAddress(options.feeRecipient ?? viem.zeroAddress));
        this.events = new EventLog(this.clock);
        this.bindings = new store.JournaledMap(this.journal);
    }

    /// -----------------------------------------------
    /// -------------------- VIEWS --------------------
    /// -----------------------------------------------

    public owner(): viem.Address {
        return this.store.owner.get();
    }

    public feeRecipient(): viem.Address {
        return this.store.feeRecipient.get();
    }

    public market(id: domain.Id): domain.Market {
        const market = this.store.market(id);
        if (!market) {
            throw new errors.UnknownMarketError(id);
        }
        return market;
    }

    public marketIds(): domain.Id[] {
        return this.store.marketIds();
    }

    public position(id: domain.Id, account: viem.Address): domain.Position {
        return this.store.position(id, viem.getAddress(account));
    }

    public idToMarketParams(id: domain.Id): domain.MarketParams | undefined {
        return this.store.marketParams(id);
    }

    public isAuthorized(authorizer: viem.Address, authorized: viem.Address): boolean {
        return this.store.isAuthorized(viem.getAddress(authorizer), viem.getAddress(authorized));
    }

    public isIrmEnabled(irm: viem.Address): boolean {
        return this.store.isIrmEnabled(viem.getAddress(irm));
    }

    public isLltvEnabled(lltv: bigint): boolean {
        return this.store.isLltvEnabled(lltv);
    }

    /**
     * Market state with pending interest applied, without touching storage or
     * the rate model's state.
     */
    public expectedMarket(params: domain.MarketParams): domain.Market {
        return this.expectedAccrual(params).market;
    }

    // Pending accrual, including the fee shares it would mint
    public expectedAccrual(params: domain.MarketParams): interest.Accrual {
        const { id, market, binding } = this.load(params);
        const now = this.clock();
        if (now === market.lastUpdate || !binding.irm) {
            return { market, interest: 0n, feeShares: 0n };
        }
        const rate = binding.irm.borrowRateView(id, domain.utilization(market));
        return interest.accrueInterest(market, rate, now);
    }

    // Solvency of `account` against the current price and pending interest
    public isHealthy(params: domain.MarketParams, account: viem.Address): boolean {
        const { id, binding } = this.load(params);
        const position = this.store.position(id, viem.getAddress(account));
        if (position.borrowShares === 0n) {
            return true;
        }
        return health.isHealthy(this.expectedMarket(params), position, params.lltv, binding.oracle.price());
    }

    public subscribe(listener: types.EventListener): () => void {
        return this.events.subscribe(listener);
    }

    /// -----------------------------------------------
    /// -------------------- OWNER --------------------
    /// -----------------------------------------------

    public setOwner(sender: viem.Address, newOwner: viem.Address): void {
        this.execute("setOwner", () => {
            this.requireOwner(sender);
            const owner = viem.getAddress(newOwner);
            if (owner === this.store.owner.get()) {
                throw new errors.AlreadySetError();
            }

            this.store.owner.set(owner);
            this.events.emit({ kind: types.EventKind.SetOwner, newOwner: owner });
            this.logger.log(`Ownership transferred to ${owner}`);
        });
    }

    public enableIrm(sender: viem.Address, irmAddress: viem.Address): void {
        this.execute("enableIrm", () => {
            this.requireOwner(sender);
            const address = viem.getAddress(irmAddress);
            if (this.store.isIrmEnabled(address)) {
                throw new errors.AlreadySetError();
            }

            this.store.enableIrm(address);
            this.events.emit({ kind: types.EventKind.EnableIrm, irm: address });
        });
    }

    public enableLltv(sender: viem.Address, lltv: bigint): void {
        this.execute("enableLltv", () => {
            this.requireOwner(sender);
            if (this.store.isLltvEnabled(lltv)) {
                throw new errors.AlreadySetError();
            }
            if (lltv < 0n || lltv >= math.WAD) {
                throw new errors.MaxLltvExceededError();
            }

            this.store.enableLltv(lltv);
            this.events.emit({ kind: types.EventKind.EnableLltv, lltv });
        });
    }

    public setFee(sender: viem.Address, params: domain.MarketParams, newFee: bigint): void {
        this.execute("setFee", () => {
            this.requireOwner(sender);
            const loaded = this.load(params);
            if (newFee === loaded.market.fee) {
                throw new errors.AlreadySetError();
            }
            if (newFee < 0n || newFee > health.MAX_FEE) {
                throw new errors.MaxFeeExceededError();
            }

            // Interest accrued so far is charged at the previous fee
            const market = this.accrue(loaded);
            this.store.setMarket(loaded.id, { ...market, fee: newFee });
            this.events.emit({ kind: types.EventKind.SetFee, marketId: loaded.id, newFee });
        });
    }

    public setFeeRecipient(sender: viem.Address, newFeeRecipient: viem.Address): void {
        this.execute("setFeeRecipient", () => {
            this.requireOwner(sender);
            const recipient = viem.getAddress(newFeeRecipient);
            if (recipient === this.store.feeRecipient.get()) {
                throw new errors.AlreadySetError();
            }

            this.store.feeRecipient.set(recipient);
            this.events.emit({ kind: types.EventKind.SetFeeRecipient, newFeeRecipient: recipient });
        });
    }

    /// ----------------------------------------------------
    /// -------------------- MARKETS -----------------------
    /// ----------------------------------------------------

    public createMarket(sender: viem.Address, marketParams: domain.MarketParams): domain.Id {
        return this.execute("createMarket", () => {
            const params = normalizeParams(marketParams);
            const id = domain.marketId(params);

            if (this.store.market(id)) {
                throw new errors.AlreadyExistsError(id);
            }
            if (!this.store.isIrmEnabled(params.irm)) {
                throw new errors.UnsupportedRateModelError(params.irm);
            }
            if (!this.store.isLltvEnabled(params.lltv)) {
                throw new errors.UnsupportedLltvError(params.lltv);
            }

            const binding: Binding = {
                oracle: this.registry.oracle(params.oracle),
                irm: params.irm === viem.zeroAddress ? null : this.registry.rateModel(params.irm),
            };

            const market = domain.emptyMarket(this.clock());
            this.store.setMarket(id, market);
            this.store.setMarketParams(id, params);
            this.bindings.set(id, binding);

            this.events.emit({ kind: types.EventKind.CreateMarket, marketId: id, marketParams: params });
            this.logger.log(`Market ${id} created by ${viem.getAddress(sender)} (lltv ${params.lltv})`);

            // Starts the rate model's adaptive state at creation time
            binding.irm?.borrowRate(params, market);

            return id;
        });
    }

    public accrueInterest(_sender: viem.Address, params: domain.MarketParams): void {
        this.execute("accrueInterest", () => {
            this.accrue(this.load(params));
        });
    }

    /// ----------------------------------------------------------------
    /// -------------------- SUPPLY MANAGEMENT -------------------------
    /// ----------------------------------------------------------------

    public supply(
        sender: viem.Address,
        params: domain.MarketParams,
        amount: types.Amount,
        onBehalf: viem.Address,
        data: viem.Hex = domain.EMPTY_DATA,
    ): types.AssetsAndShares {
        return this.execute("supply", () => {
            const caller = viem.getAddress(sender);
            const loaded = this.load(params);
            const input = splitAmount(amount);
            const account = requireAddress(onBehalf);
            const market = this.accrue(loaded);

            // Rounded against the depositor
            const assets = input.byAssets ? input.assets : math.toAssetsUp(input.shares, market.totalSupplyAssets, market.totalSupplyShares);
            const shares = input.byAssets ? math.toSharesDown(input.assets, market.totalSupplyAssets, market.totalSupplyShares) : input.shares;
            requireNonZero(assets, shares);

            const position = this.store.position(loaded.id, account);
            this.store.setPosition(loaded.id, account, { ...position, supplyShares: position.supplyShares + shares });
            this.store.setMarket(loaded.id, {
                ...market,
                totalSupplyShares: market.totalSupplyShares + shares,
                totalSupplyAssets: market.totalSupplyAssets + assets,
            });

            this.events.emit({ kind: types.EventKind.Supply, marketId: loaded.id, caller, onBehalf: account, assets, shares });

            if (data !== domain.EMPTY_DATA) {
                this.callback(caller, "onSupply", assets, data);
            }
            this.registry.token(loaded.params.loanToken).transferFrom(this.address, caller, this.address, assets);

            return { assets, shares };
        });
    }

    public withdraw(sender: viem.Address, params: domain.MarketParams, amount: types.Amount, onBehalf: viem.Address, receiver: viem.Address): types.AssetsAndShares {
        return this.execute("withdraw", () => {
            const caller = viem.getAddress(sender);
            const loaded = this.load(params);
            const input = splitAmount(amount);
            const account = requireAddress(onBehalf);
            const to = requireAddress(receiver);
            this.requireAuthorized(caller, account);
            const market = this.accrue(loaded);

            // Rounded in favor of the remaining suppliers
            const assets = input.byAssets ? input.assets : math.toAssetsDown(input.shares, market.totalSupplyAssets, market.totalSupplyShares);
            const shares = input.byAssets ? math.toSharesUp(input.assets, market.totalSupplyAssets, market.totalSupplyShares) : input.shares;
            requireNonZero(assets, shares);

            const position = this.store.position(loaded.id, account);
            if (position.supplyShares < shares) {
                throw new errors.InsufficientPositionError("supplyShares");
            }

            const updated: domain.Market = {
                ...market,
                totalSupplyShares: market.totalSupplyShares - shares,
                totalSupplyAssets: market.totalSupplyAssets - assets,
            };
            requireLiquidity(updated);

            this.store.setPosition(loaded.id, account, { ...position, supplyShares: position.supplyShares - shares });
            this.store.setMarket(loaded.id, updated);

            this.events.emit({ kind: types.EventKind.Withdraw, marketId: loaded.id, caller, onBehalf: account, receiver: to, assets, shares });

            this.registry.token(loaded.params.loanToken).transfer(this.address, to, assets);

            return { assets, shares };
        });
    }

    /// ----------------------------------------------------------------
    /// -------------------- BORROW MANAGEMENT -------------------------
    /// ----------------------------------------------------------------

    public borrow(sender: viem.Address, params: domain.MarketParams, amount: types.Amount, onBehalf: viem.Address, receiver: viem.Address): types.AssetsAndShares {
        return this.execute("borrow", () => {
            const caller = viem.getAddress(sender);
            const loaded = this.load(params);
            const input = splitAmount(amount);
            const account = requireAddress(onBehalf);
            const to = requireAddress(receiver);
            this.requireAuthorized(caller, account);
            const market = this.accrue(loaded);

            // Rounded in favor of the pool
            const assets = input.byAssets ? input.assets : math.toAssetsDown(input.shares, market.totalBorrowAssets, market.totalBorrowShares);
            const shares = input.byAssets ? math.toSharesUp(input.assets, market.totalBorrowAssets, market.totalBorrowShares) : input.shares;
            requireNonZero(assets, shares);

            const position = this.store.position(loaded.id, account);
            const updatedPosition: domain.Position = { ...position, borrowShares: position.borrowShares + shares };
            const updated: domain.Market = {
                ...market,
                totalBorrowShares: market.totalBorrowShares + shares,
                totalBorrowAssets: market.totalBorrowAssets + assets,
            };

            requireLiquidity(updated);
            this.requireHealthy(loaded, updated, updatedPosition);

            this.store.setPosition(loaded.id, account, updatedPosition);
            this.store.setMarket(loaded.id, updated);

            this.events.emit({ kind: types.EventKind.Borrow, marketId: loaded.id, caller, onBehalf: account, receiver: to, assets, shares });

            this.registry.token(loaded.params.loanToken).transfer(this.address, to, assets);

            return { assets, shares };
        });
    }

    public repay(
        sender: viem.Address,
        params: domain.MarketParams,
        amount: types.Amount,
        onBehalf: viem.Address,
        data: viem.Hex = domain.EMPTY_DATA,
    ): types.AssetsAndShares {
        return this.execute("repay", () => {
            const caller = viem.getAddress(sender);
            const loaded = this.load(params);
            const input = splitAmount(amount);
            const account = requireAddress(onBehalf);
            const market = this.accrue(loaded);

            // Rounded against the payer
            const assets = input.byAssets ? input.assets : math.toAssetsUp(input.shares, market.totalBorrowAssets, market.totalBorrowShares);
            const shares = input.byAssets ? math.toSharesDown(input.assets, market.totalBorrowAssets, market.totalBorrowShares) : input.shares;
            requireNonZero(assets, shares);

            const position = this.store.position(loaded.id, account);
            if (position.borrowShares < shares) {
                throw new errors.InsufficientPositionError("borrowShares");
            }

            this.store.setPosition(loaded.id, account, { ...position, borrowShares: position.borrowShares - shares });
            this.store.setMarket(loaded.id, {
                ...market,
                totalBorrowShares: market.totalBorrowShares - shares,
                // The last repayer may pay one unit more than the total because of rounding
                totalBorrowAssets: math.zeroFloorSub(market.totalBorrowAssets, assets),
            });

            this.events.emit({ kind: types.EventKind.Repay, marketId: loaded.id, caller, onBehalf: account, assets, shares });

            if (data !== domain.EMPTY_DATA) {
                this.callback(caller, "onRepay", assets, data);
            }
            this.registry.token(loaded.params.loanToken).transferFrom(this.address, caller, this.address, assets);

            return { assets, shares };
        });
    }

    /// --------------------------------------------------------------------
    /// -------------------- COLLATERAL MANAGEMENT -------------------------
    /// --------------------------------------------------------------------

    public supplyCollateral(sender: viem.Address, params: domain.MarketParams, assets: bigint, onBehalf: viem.Address, data: viem.Hex = domain.EMPTY_DATA): void {
        this.execute("supplyCollateral", () => {
            const caller = viem.getAddress(sender);
            const loaded = this.load(params);
            requirePositive(assets);
            const account = requireAddress(onBehalf);
            this.accrue(loaded);

            const position = this.store.position(loaded.id, account);
            this.store.setPosition(loaded.id, account, { ...position, collateral: position.collateral + assets });

            this.events.emit({ kind: types.EventKind.SupplyCollateral, marketId: loaded.id, caller, onBehalf: account, assets });

            if (data !== domain.EMPTY_DATA) {
                this.callback(caller, "onSupplyCollateral", assets, data);
            }
            this.registry.token(loaded.params.collateralToken).transferFrom(this.address, caller, this.address, assets);
        });
    }

    public withdrawCollateral(sender: viem.Address, params: domain.MarketParams, assets: bigint, onBehalf: viem.Address, receiver: viem.Address): void {
        this.execute("withdrawCollateral", () => {
            const caller = viem.getAddress(sender);
            const loaded = this.load(params);
            requirePositive(assets);
            const account = requireAddress(onBehalf);
            const to = requireAddress(receiver);
            this.requireAuthorized(caller, account);
            const market = this.accrue(loaded);

            const position = this.store.position(loaded.id, account);
            if (position.collateral < assets) {
                throw new errors.InsufficientPositionError("collateral");
            }

            const updatedPosition: domain.Position = { ...position, collateral: position.collateral - assets };
            this.requireHealthy(loaded, market, updatedPosition);

            this.store.setPosition(loaded.id, account, updatedPosition);

            this.events.emit({ kind: types.EventKind.WithdrawCollateral, marketId: loaded.id, caller, onBehalf: account, receiver: to, assets });

            this.registry.token(loaded.params.collateralToken).transfer(this.address, to, assets);
        });
    }

    /// ---------------------------------------------------------
    /// -------------------- LIQUIDATION ------------------------
    /// ---------------------------------------------------------

    public liquidate(
        sender: viem.Address,
        params: domain.MarketParams,
        borrower: viem.Address,
        amount: types.LiquidationAmount,
        data: viem.Hex = domain.EMPTY_DATA,
    ): types.LiquidationResult {
        return this.execute("liquidate", () => {
            const caller = viem.getAddress(sender);
            const account = viem.getAddress(borrower);
            const loaded = this.load(params);
            const input = splitLiquidationAmount(amount);
            const market = this.accrue(loaded);

            const position = this.store.position(loaded.id, account);
            const collateralPrice = loaded.binding.oracle.price();
            if (health.isHealthy(market, position, loaded.params.lltv, collateralPrice)) {
                throw new errors.HealthyPositionError();
            }

            const incentiveFactor = health.liquidationIncentiveFactor(loaded.params.lltv);

            let seizedAssets: bigint;
            let repaidShares: bigint;
            if (input.bySeized) {
                seizedAssets = input.seizedAssets;
                const seizedAssetsQuoted = math.mulDivUp(seizedAssets, collateralPrice, math.ORACLE_PRICE_SCALE);
                repaidShares = math.toSharesUp(math.wDivUp(seizedAssetsQuoted, incentiveFactor), market.totalBorrowAssets, market.totalBorrowShares);
            } else {
                repaidShares = input.repaidShares;
                const repaidAssetsDown = math.toAssetsDown(repaidShares, market.totalBorrowAssets, market.totalBorrowShares);
                // Worthless collateral is seized in full so the remaining debt is realized as bad debt
                seizedAssets = collateralPrice === 0n ? position.collateral : math.mulDivDown(math.wMulDown(repaidAssetsDown, incentiveFactor), math.ORACLE_PRICE_SCALE, collateralPrice);
            }
            const repaidAssets = math.toAssetsUp(repaidShares, market.totalBorrowAssets, market.totalBorrowShares);
            requireNonZero(seizedAssets, repaidShares);

            if (position.borrowShares < repaidShares) {
                throw new errors.InsufficientPositionError("borrowShares");
            }
            if (position.collateral < seizedAssets) {
                throw new errors.InsufficientPositionError("collateral");
            }

            const updatedPosition: domain.Position = {
                ...position,
                borrowShares: position.borrowShares - repaidShares,
                collateral: position.collateral - seizedAssets,
            };
            const updated: domain.Market = {
                ...market,
                totalBorrowShares: market.totalBorrowShares - repaidShares,
                totalBorrowAssets: math.zeroFloorSub(market.totalBorrowAssets, repaidAssets),
            };

            // Debt left without collateral is written off against the suppliers
            let badDebtShares = 0n;
            let badDebtAssets = 0n;
            if (updatedPosition.collateral === 0n && updatedPosition.borrowShares > 0n) {
                badDebtShares = updatedPosition.borrowShares;
                badDebtAssets = math.min(updated.totalBorrowAssets, math.toAssetsUp(badDebtShares, updated.totalBorrowAssets, updated.totalBorrowShares));

                updated.totalBorrowAssets -= badDebtAssets;
                updated.totalSupplyAssets -= badDebtAssets;
                updated.totalBorrowShares -= badDebtShares;
                updatedPosition.borrowShares = 0n;

                this.logger.warn(`Bad debt of ${badDebtAssets} assets realized on market ${loaded.id} for ${account}`);
            }

            this.store.setPosition(loaded.id, account, updatedPosition);
            this.store.setMarket(loaded.id, updated);

            this.events.emit({
                kind: types.EventKind.Liquidate,
                marketId: loaded.id,
                caller,
                borrower: account,
                repaidAssets,
                repaidShares,
                seizedAssets,
                badDebtAssets,
                badDebtShares,
            });
            this.logger.log(`Liquidated ${account} on market ${loaded.id}: repaid ${repaidAssets}, seized ${seizedAssets}`);

            this.registry.token(loaded.params.collateralToken).transfer(this.address, caller, seizedAssets);

            if (data !== domain.EMPTY_DATA) {
                this.callback(caller, "onLiquidate", repaidAssets, data);
            }
            this.registry.token(loaded.params.loanToken).transferFrom(this.address, caller, this.address, repaidAssets);

            return { seizedAssets, repaidAssets, repaidShares, badDebtAssets, badDebtShares };
        });
    }

    /// --------------------------------------------------------
    /// -------------------- FLASH LOANS -----------------------
    /// --------------------------------------------------------

    public flashLoan(sender: viem.Address, tokenAddress: viem.Address, assets: bigint, data: viem.Hex = domain.EMPTY_DATA): void {
        this.execute("flashLoan", () => {
            const caller = viem.getAddress(sender);
            const address = viem.getAddress(tokenAddress);
            requirePositive(assets);
            const token = this.registry.token(address);

            token.transfer(this.address, caller, assets);

            this.events.emit({ kind: types.EventKind.FlashLoan, caller, token: address, assets });

            this.callback(caller, "onFlashLoan", assets, data);

            try {
                token.transferFrom(this.address, caller, this.address, assets);
            } catch (e) {
                throw new errors.UnrepaidError(e);
            }
        });
    }

    /// ----------------------------------------------------------
    /// -------------------- AUTHORIZATION -----------------------
    /// ----------------------------------------------------------

    public setAuthorization(sender: viem.Address, authorized: viem.Address, newIsAuthorized: boolean): void {
        this.execute("setAuthorization", () => {
            const authorizer = viem.getAddress(sender);
            const delegate = viem.getAddress(authorized);
            if (this.store.isAuthorized(authorizer, delegate) === newIsAuthorized) {
                throw new errors.AlreadySetError();
            }

            this.store.setAuthorization(authorizer, delegate, newIsAuthorized);
            this.events.emit({ kind: types.EventKind.SetAuthorization, caller: authorizer, authorizer, authorized: delegate, isAuthorized: newIsAuthorized });
        });
    }

    /// ----------------------------------------------------
    /// -------------------- INTERNAL ----------------------
    /// ----------------------------------------------------

    /**
     * Runs `body` as one atomic ledger call: guarded against re-entry, with every
     * store write and pending event rolled back if it throws.
     */
    private execute<T>(operation: string, body: () => T): T {
        return this.guard.run(operation, () => {
            const checkpoint = this.journal.begin();
            const mark = this.events.mark();
            let result: T;
            try {
                result = body();
            } catch (e) {
                this.journal.rollback(checkpoint);
                this.events.discard(mark);
                throw e;
            }
            this.journal.commit();
            if (this.guard.outermost) {
                this.events.flush();
            }
            return result;
        });
    }

    private load(marketParams: domain.MarketParams): Loaded {
        const params = normalizeParams(marketParams);
        const id = domain.marketId(params);
        const market = this.store.market(id);
        const binding = this.bindings.get(id);
        if (!market || !binding) {
            throw new errors.UnknownMarketError(id);
        }
        return { id, params, market, binding };
    }

    private accrue(loaded: Loaded): domain.Market {
        const { id, params, market, binding } = loaded;
        const now = this.clock();
        if (now === market.lastUpdate) {
            return market;
        }

        if (!binding.irm) {
            const idle = { ...market, lastUpdate: now };
            this.store.setMarket(id, idle);
            return idle;
        }

        const borrowRate = binding.irm.borrowRate(params, market);
        const accrual = interest.accrueInterest(market, borrowRate, now);

        if (accrual.feeShares > 0n) {
            const recipient = this.store.feeRecipient.get();
            const position = this.store.position(id, recipient);
            this.store.setPosition(id, recipient, { ...position, supplyShares: position.supplyShares + accrual.feeShares });
        }

        this.store.setMarket(id, accrual.market);
        this.events.emit({ kind: types.EventKind.AccrueInterest, marketId: id, prevBorrowRate: borrowRate, interest: accrual.interest, feeShares: accrual.feeShares });

        return accrual.market;
    }

    private requireHealthy(loaded: Loaded, market: domain.Market, position: domain.Position): void {
        if (position.borrowShares === 0n) {
            return;
        }
        const collateralPrice = loaded.binding.oracle.price();
        if (!health.isHealthy(market, position, loaded.params.lltv, collateralPrice)) {
            throw new errors.InsufficientCollateralError();
        }
    }

    private requireAuthorized(caller: viem.Address, onBehalf: viem.Address): void {
        if (caller !== onBehalf && !this.store.isAuthorized(onBehalf, caller)) {
            throw new errors.UnauthorizedError();
        }
    }

    private requireOwner(sender: viem.Address): void {
        if (viem.getAddress(sender) !== this.store.owner.get()) {
            throw new errors.NotOwnerError();
        }
    }

    private callback(caller: viem.Address, name: types.CallbackName, assets: bigint, data: viem.Hex): void {
        const receiver = this.registry.receiver(caller);
        const handler = receiver[name];
        if (!handler) {
            throw new errors.MissingCallbackError(name, caller);
        }
        this.guard.withCallbackWindow(() => handler.call(receiver, assets, data));
    }
}

function normalizeParams(params: domain.MarketParams): domain.MarketParams {
    return {
        loanToken: viem.getAddress(params.loanToken),
        collateralToken: viem.getAddress(params.collateralToken),
        oracle: viem.getAddress(params.oracle),
        irm: viem.getAddress(params.irm),
        lltv: params.lltv,
    };
}

function requireAddress(address: viem.Address): viem.Address {
    const normalized = viem.getAddress(address);
    if (normalized === viem.zeroAddress) {
        throw new errors.ZeroAddressError();
    }
    return normalized;
}

function splitAmount(amount: types.Amount): { byAssets: boolean; assets: bigint; shares: bigint } {
    const [assets, shares] = exactlyOne(amount.assets, amount.shares);
    return { byAssets: assets > 0n, assets, shares };
}

function splitLiquidationAmount(amount: types.LiquidationAmount): { bySeized: boolean; seizedAssets: bigint; repaidShares: bigint } {
    const [seizedAssets, repaidShares] = exactlyOne(amount.seizedAssets, amount.repaidShares);
    return { bySeized: seizedAssets > 0n, seizedAssets, repaidShares };
}

function exactlyOne(first: bigint | undefined, second: bigint | undefined): [bigint, bigint] {
    const a = first ?? 0n;
    const b = second ?? 0n;
    if (a < 0n || b < 0n || (a > 0n && b > 0n)) {
        throw new errors.InconsistentInputError();
    }
    if (a === 0n && b === 0n) {
        throw new errors.ZeroAmountError();
    }
    return [a, b];
}

function requirePositive(assets: bigint): void {
    if (assets < 0n) {
        throw new errors.InconsistentInputError();
    }
    if (assets === 0n) {
        throw new errors.ZeroAmountError();
    }
}

function requireNonZero(assets: bigint, shares: bigint): void {
    if (assets === 0n || shares === 0n) {
        throw new errors.ZeroAmountError();
    }
}

function requireLiquidity(market: domain.Market): void {
    if (market.totalBorrowAssets > market.totalSupplyAssets) {
        throw new errors.InsufficientLiquidityError();
    }
}

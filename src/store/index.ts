import * as viem from "viem";
import * as domain from "#/domain";
import { Journal, JournaledCell, JournaledMap } from "./journal";

export { Journal, JournaledCell, JournaledMap, type Checkpoint } from "./journal";

/**
 * Keyed repository holding every piece of ledger state. All containers share
 * one journal so a failed call can be rolled back as a whole.
 */
export class LedgerStore {
    public readonly owner: JournaledCell<viem.Address>;
    public readonly feeRecipient: JournaledCell<viem.Address>;

    private readonly markets: JournaledMap<domain.Id, domain.Market>;
    private readonly params: JournaledMap<domain.Id, domain.MarketParams>;
    private readonly positions: JournaledMap<string, domain.Position>;
    private readonly authorizations: JournaledMap<string, boolean>;
    private readonly enabledIrms: JournaledMap<viem.Address, true>;
    private readonly enabledLltvs: JournaledMap<bigint, true>;

    constructor(
        public readonly journal: Journal,
        owner: viem.Address,
        feeRecipient: viem.Address = viem.zeroAddress,
    ) {
        this.owner = new JournaledCell(journal, owner);
        this.feeRecipient = new JournaledCell(journal, feeRecipient);
        this.markets = new JournaledMap(journal);
        this.params = new JournaledMap(journal);
        this.positions = new JournaledMap(journal);
        this.authorizations = new JournaledMap(journal);
        this.enabledIrms = new JournaledMap(journal);
        this.enabledLltvs = new JournaledMap(journal);
    }

    public market(id: domain.Id): domain.Market | undefined {
        const market = this.markets.get(id);
        return market && { ...market };
    }

    public setMarket(id: domain.Id, market: domain.Market): void {
        this.markets.set(id, { ...market });
    }

    public marketIds(): domain.Id[] {
        return [...this.markets.keys()];
    }

    public marketParams(id: domain.Id): domain.MarketParams | undefined {
        return this.params.get(id);
    }

    public setMarketParams(id: domain.Id, params: domain.MarketParams): void {
        this.params.set(id, { ...params });
    }

    public position(id: domain.Id, account: viem.Address): domain.Position {
        return { ...(this.positions.get(positionKey(id, account)) ?? domain.emptyPosition()) };
    }

    public setPosition(id: domain.Id, account: viem.Address, position: domain.Position): void {
        this.positions.set(positionKey(id, account), { ...position });
    }

    public isAuthorized(authorizer: viem.Address, authorized: viem.Address): boolean {
        return this.authorizations.get(pairKey(authorizer, authorized)) ?? false;
    }

    public setAuthorization(authorizer: viem.Address, authorized: viem.Address, isAuthorized: boolean): void {
        this.authorizations.set(pairKey(authorizer, authorized), isAuthorized);
    }

    public isIrmEnabled(irm: viem.Address): boolean {
        return this.enabledIrms.has(irm);
    }

    public enableIrm(irm: viem.Address): void {
        this.enabledIrms.set(irm, true);
    }

    public isLltvEnabled(lltv: bigint): boolean {
        return this.enabledLltvs.has(lltv);
    }

    public enableLltv(lltv: bigint): void {
        this.enabledLltvs.set(lltv, true);
    }
}

function positionKey(id: domain.Id, account: viem.Address): string {
    return `${id}:${account}`;
}

function pairKey(authorizer: viem.Address, authorized: viem.Address): string {
    return `${authorizer}:${authorized}`;
}

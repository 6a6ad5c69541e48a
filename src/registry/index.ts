import * as viem from "viem";
import * as errors from "#/errors";
import type * as irm from "#/irm/types";
import type * as ledger from "#/ledger/types";
import type * as oracle from "#/oracle";
import type * as token from "#/token";

/**
 * In-process address space: resolves the addresses named in market params and
 * callers to the collaborators living at them.
 */
export class Registry {
    private readonly oracles = new Map<viem.Address, oracle.IOracle>();
    private readonly rateModels = new Map<viem.Address, irm.IRateModel>();
    private readonly tokens = new Map<viem.Address, token.IToken>();
    private readonly receivers = new Map<viem.Address, ledger.CallbackReceiver>();

    public registerOracle(address: viem.Address, instance: oracle.IOracle): this {
        this.oracles.set(viem.getAddress(address), instance);
        return this;
    }

    public registerRateModel(address: viem.Address, instance: irm.IRateModel): this {
        this.rateModels.set(viem.getAddress(address), instance);
        return this;
    }

    public registerToken(address: viem.Address, instance: token.IToken): this {
        this.tokens.set(viem.getAddress(address), instance);
        return this;
    }

    public registerReceiver(address: viem.Address, instance: ledger.CallbackReceiver): this {
        this.receivers.set(viem.getAddress(address), instance);
        return this;
    }

    public oracle(address: viem.Address): oracle.IOracle {
        return resolve(this.oracles, "oracle", address);
    }

    public rateModel(address: viem.Address): irm.IRateModel {
        return resolve(this.rateModels, "rate model", address);
    }

    public token(address: viem.Address): token.IToken {
        return resolve(this.tokens, "token", address);
    }

    public receiver(address: viem.Address): ledger.CallbackReceiver {
        return resolve(this.receivers, "callback receiver", address);
    }
}

function resolve<T>(entries: Map<viem.Address, T>, kind: string, address: viem.Address): T {
    const instance = entries.get(viem.getAddress(address));
    if (!instance) {
        throw new errors.UnknownContractError(kind, address);
    }
    return instance;
}

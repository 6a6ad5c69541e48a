import * as viem from "viem";
import * as errors from "#/errors";
import * as store from "#/store";

/**
 * Fungible-token transfer collaborator. Both transfers either fully succeed or
 * throw without side effects.
 */
export interface IToken {
    balanceOf: (account: viem.Address) => bigint;
    transfer: (sender: viem.Address, to: viem.Address, amount: bigint) => void;
    transferFrom: (spender: viem.Address, from: viem.Address, to: viem.Address, amount: bigint) => void;
}

// Invoked after balances move, like a receive hook on the token contract.
export type TransferHook = (from: viem.Address, to: viem.Address, amount: bigint) => void;

export class MemoryToken implements IToken {
    private readonly balances: store.JournaledMap<viem.Address, bigint>;
    private readonly allowances: store.JournaledMap<string, bigint>;
    private hook: TransferHook | undefined;

    constructor(journal: store.Journal) {
        this.balances = new store.JournaledMap(journal);
        this.allowances = new store.JournaledMap(journal);
    }

    public balanceOf(account: viem.Address): bigint {
        return this.balances.get(viem.getAddress(account)) ?? 0n;
    }

    public allowance(owner: viem.Address, spender: viem.Address): bigint {
        return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
    }

    public mint(to: viem.Address, amount: bigint): void {
        const account = viem.getAddress(to);
        this.balances.set(account, this.balanceOf(account) + amount);
    }

    public approve(owner: viem.Address, spender: viem.Address, amount: bigint): void {
        this.allowances.set(allowanceKey(owner, spender), amount);
    }

    public setHook(hook: TransferHook | undefined): void {
        this.hook = hook;
    }

    public transfer(sender: viem.Address, to: viem.Address, amount: bigint): void {
        this.move(sender, to, amount);
    }

    public transferFrom(spender: viem.Address, from: viem.Address, to: viem.Address, amount: bigint): void {
        const allowed = this.allowance(from, spender);
        if (allowed < amount) {
            throw new errors.InsufficientAllowanceError(from, spender);
        }
        this.move(from, to, amount, () => {
            if (allowed !== viem.maxUint256) {
                this.allowances.set(allowanceKey(from, spender), allowed - amount);
            }
        });
    }

    private move(from: viem.Address, to: viem.Address, amount: bigint, beforeWrite?: () => void): void {
        const source = viem.getAddress(from);
        const destination = viem.getAddress(to);

        const balance = this.balanceOf(source);
        if (balance < amount) {
            throw new errors.InsufficientBalanceError(source);
        }

        beforeWrite?.();
        this.balances.set(source, balance - amount);
        this.balances.set(destination, this.balanceOf(destination) + amount);

        this.hook?.(source, destination, amount);
    }
}

function allowanceKey(owner: viem.Address, spender: viem.Address): string {
    return `${viem.getAddress(owner)}:${viem.getAddress(spender)}`;
}

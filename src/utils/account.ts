import config from '../config.js';
import logger from '../logger.js';
import { TransferCollaborator } from '../staking/staking-interfaces.js';

/**
 * In-process balance table for the staked asset, including the pool account.
 * Implements the transfer collaborator the ledger drives.
 */
export class BalanceBook implements TransferCollaborator {
    private readonly balances = new Map<string, bigint>();

    constructor(
        readonly poolAccount: string = config.poolAccount,
        readonly symbol: string = config.stakingTokenSymbol
    ) {}

    balanceOf(accountId: string): bigint {
        return this.balances.get(accountId) ?? 0n;
    }

    poolBalance(): bigint {
        return this.balanceOf(this.poolAccount);
    }

    /**
     * Adds (or with a negative amount removes) funds. Refuses to take a balance below zero.
     */
    adjustBalance(accountId: string, amount: bigint): boolean {
        const currentBalance = this.balanceOf(accountId);
        const newBalance = currentBalance + amount;
        if (newBalance < 0n) {
            logger.warn(`[account] Insufficient balance for ${accountId}: ${currentBalance} + ${amount} = ${newBalance}`);
            return false;
        }
        this.balances.set(accountId, newBalance);
        logger.trace(`[account] Updated balance for ${accountId}: ${this.symbol} ${currentBalance} -> ${newBalance}`);
        return true;
    }

    async pullFrom(account: string, amount: bigint): Promise<boolean> {
        return this.move(account, this.poolAccount, amount);
    }

    async pushTo(account: string, amount: bigint): Promise<boolean> {
        return this.move(this.poolAccount, account, amount);
    }

    entries(): Array<[string, bigint]> {
        return [...this.balances.entries()];
    }

    load(entries: Iterable<[string, bigint]>): void {
        this.balances.clear();
        for (const [account, balance] of entries) {
            this.balances.set(account, balance);
        }
    }

    private move(from: string, to: string, amount: bigint): boolean {
        if (amount <= 0n) {
            logger.warn(`[account] Refusing to move non-positive amount ${amount} from ${from} to ${to}.`);
            return false;
        }
        if (!this.adjustBalance(from, -amount)) {
            return false;
        }
        this.adjustBalance(to, amount);
        return true;
    }
}

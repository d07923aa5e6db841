import { manualClock, ManualClock } from '../src/clock.js';
import config from '../src/config.js';
import { createStakingNode, StakingNode } from '../src/index.js';
import { isStakingError, StakingErrorKind } from '../src/staking/staking-errors.js';
import { BalanceBook } from '../src/utils/account.js';
import { LedgerStore } from '../src/ledgerStore.js';

export const OPERATOR = 'ledger-admin';
export const DAY = config.secondsPerDay;
export const START = 1_700_000_000;

export type TestNode = StakingNode & { clock: ManualClock };

/**
 * Fresh node with the default schedules, alice and bob funded, and some reward float in the pool.
 */
export async function setupNode(opts: { poolFloat?: bigint; store?: LedgerStore } = {}): Promise<TestNode> {
    const clock = manualClock(START);
    const balances = new BalanceBook('pool');
    balances.adjustBalance('alice', 1_000_000n);
    balances.adjustBalance('bob', 50_000n);
    balances.adjustBalance('pool', opts.poolFloat ?? 10_000n);
    const node = await createStakingNode({
        clock,
        operator: OPERATOR,
        balances,
        store: opts.store,
        seedDefaultSchedules: true,
    });
    return { ...node, clock };
}

/**
 * Matcher for assert.throws / assert.rejects.
 */
export function stakingError(kind: StakingErrorKind): (err: unknown) => boolean {
    return (err: unknown) => isStakingError(err, kind);
}

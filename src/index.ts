import { systemClock } from './clock.js';
import config from './config.js';
import { LedgerStore, ledgerCollections } from './ledgerStore.js';
import logger from './logger.js';
import mongo from './mongo.js';
import settings from './settings.js';
import { OperatorGate } from './staking/access-control.js';
import { LedgerState } from './staking/ledger-state.js';
import { ScheduleRegistry } from './staking/schedule-registry.js';
import { StakeLedger } from './staking/stake-ledger.js';
import { AccessControl, Clock } from './staking/staking-interfaces.js';
import { TransactionProcessor } from './transactions/index.js';
import { BalanceBook } from './utils/account.js';
import { formatTokenAmount } from './utils/bigint.js';

export interface StakingNodeOptions {
    clock?: Clock;
    gate?: AccessControl;
    operator?: string;
    balances?: BalanceBook;
    store?: LedgerStore;
    seedDefaultSchedules?: boolean;
}

export interface StakingNode {
    state: LedgerState;
    registry: ScheduleRegistry;
    ledger: StakeLedger;
    balances: BalanceBook;
    processor: TransactionProcessor;
    flush: () => Promise<void>;
}

/**
 * Wires state, catalog, ledger, balances and the transaction processor together.
 * With a store, existing state is loaded first and every committed transaction is flushed.
 */
export async function createStakingNode(options: StakingNodeOptions = {}): Promise<StakingNode> {
    const clock = options.clock ?? systemClock;
    const gate = options.gate ?? new OperatorGate(options.operator ?? settings.operatorAccount);
    const balances = options.balances ?? new BalanceBook(settings.poolAccount);
    const store = options.store;

    const state = new LedgerState();
    if (store) {
        const loaded = await store.load();
        state.restore(loaded.tables);
        balances.load(loaded.balances);
    }

    const registry = new ScheduleRegistry(state, gate, clock);
    const ledger = new StakeLedger(state, registry, balances, clock);

    const flush = async (): Promise<void> => {
        if (store) {
            await store.flush(state.tables, balances.entries());
        }
    };

    if (options.seedDefaultSchedules ?? settings.seedDefaultSchedules) {
        await registry.initialize();
        await flush();
    }

    const processor = new TransactionProcessor({ ledger, registry }, flush);

    logger.info(
        `[node] ${settings.nodeName} (${config.ledgerName}) ready: ${registry.size} schedule(s), ${ledger.activeParticipantCount()} active stake(s), ${formatTokenAmount(ledger.poolTotal())} ${config.stakingTokenSymbol} locked.`
    );
    return { state, registry, ledger, balances, processor, flush };
}

/**
 * Connects to MongoDB with the configured settings and starts a node backed by it.
 */
export async function startMongoStakingNode(options: Omit<StakingNodeOptions, 'store'> = {}): Promise<StakingNode> {
    const db = await mongo.init();
    return createStakingNode({ ...options, store: new LedgerStore(ledgerCollections(db)) });
}

export { systemClock, manualClock } from './clock.js';
export type { ManualClock } from './clock.js';
export { LedgerStore, ledgerCollections } from './ledgerStore.js';
export { mongo } from './mongo.js';
export { OperatorGate } from './staking/access-control.js';
export { LedgerState, inactiveRecord } from './staking/ledger-state.js';
export { accruedReward, dailyRate, elapsedDays, maxReward } from './staking/reward-accrual.js';
export { ScheduleRegistry } from './staking/schedule-registry.js';
export { StakeLedger } from './staking/stake-ledger.js';
export { StakingError, isStakingError } from './staking/staking-errors.js';
export type { StakingErrorKind } from './staking/staking-errors.js';
export type * from './staking/staking-interfaces.js';
export { TransactionProcessor } from './transactions/index.js';
export type { Transaction, TransactionResult } from './transactions/index.js';
export { TransactionType } from './transactions/types.js';
export { BalanceBook } from './utils/account.js';

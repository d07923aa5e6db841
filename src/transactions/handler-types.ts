import logger from '../logger.js';
import { ScheduleRegistry } from '../staking/schedule-registry.js';
import { StakeLedger } from '../staking/stake-ledger.js';
import { EmptyData } from './types.js';

export interface StakingContext {
    ledger: StakeLedger;
    registry: ScheduleRegistry;
}

export type TransactionOutput = Record<string, string | number | boolean>;

export interface TransactionHandler<T> {
    validate: (data: unknown, sender: string) => data is T;
    process: (data: T, sender: string, ctx: StakingContext) => Promise<TransactionOutput>;
}

/**
 * Payload check for transactions that carry no fields (unstake, claim).
 */
export function isEmptyData(data: unknown, tag: string, sender: string): data is EmptyData {
    if (data === undefined || data === null) {
        return true;
    }
    if (typeof data !== 'object' || Object.keys(data).length > 0) {
        logger.warn(`[${tag}] Unexpected payload from ${sender}: ${typeof data === 'object' ? Object.keys(data).join(', ') : typeof data}`);
        return false;
    }
    return true;
}

import logger from '../../logger.js';
import validate from '../../validation/index.js';
import { StakingContext, TransactionOutput } from '../handler-types.js';
import { RestakeData } from '../types.js';

export function validateTx(data: unknown, sender: string): data is RestakeData {
    if (typeof data !== 'object' || data === null || !('scheduleIndex' in data)) {
        logger.warn(`[restake] Invalid data from ${sender}: Missing required field scheduleIndex.`);
        return false;
    }
    if (!validate.integer(data.scheduleIndex, true, false)) {
        logger.warn(`[restake] scheduleIndex must be a non-negative integer, got ${String(data.scheduleIndex)}.`);
        return false;
    }
    return true;
}

export async function processTx(data: RestakeData, sender: string, ctx: StakingContext): Promise<TransactionOutput> {
    const record = await ctx.ledger.restake(sender, data.scheduleIndex);
    return {
        principal: record.principal.toString(),
        scheduleIndex: record.scheduleIndex,
        startTime: record.startTime,
        maturityTime: record.maturityTime,
    };
}

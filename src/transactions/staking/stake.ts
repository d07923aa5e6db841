import config from '../../config.js';
import logger from '../../logger.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { StakingContext, TransactionOutput } from '../handler-types.js';
import { StakeData } from '../types.js';

export function validateTx(data: unknown, sender: string): data is StakeData {
    if (typeof data !== 'object' || data === null || !('amount' in data) || !('scheduleIndex' in data)) {
        logger.warn('[stake] Invalid data: Missing required fields (amount, scheduleIndex).');
        return false;
    }
    if (!validate.bigint(data.amount, false, false, toBigInt(1))) {
        logger.warn(`[stake] amount must be a positive integer amount, got ${String(data.amount)} from ${sender}.`);
        return false;
    }
    if (!validate.integer(data.scheduleIndex, true, false)) {
        logger.warn(`[stake] scheduleIndex must be a non-negative integer, got ${String(data.scheduleIndex)}.`);
        return false;
    }
    return true;
}

export async function processTx(data: StakeData, sender: string, ctx: StakingContext): Promise<TransactionOutput> {
    const record = await ctx.ledger.stake(sender, toBigInt(data.amount), data.scheduleIndex);
    logger.debug(`[stake] ${sender} locked ${record.principal} ${config.stakingTokenSymbol} until ${record.maturityTime}.`);
    return {
        principal: record.principal.toString(),
        scheduleIndex: record.scheduleIndex,
        startTime: record.startTime,
        maturityTime: record.maturityTime,
    };
}

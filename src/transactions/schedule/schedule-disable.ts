import logger from '../../logger.js';
import validate from '../../validation/index.js';
import { StakingContext, TransactionOutput } from '../handler-types.js';
import { ScheduleDisableData } from '../types.js';

export function validateTx(data: unknown, sender: string): data is ScheduleDisableData {
    if (typeof data !== 'object' || data === null || !('index' in data) || !validate.integer(data.index, true, false)) {
        logger.warn(`[schedule-disable] Invalid data from ${sender}: index must be a non-negative integer.`);
        return false;
    }
    return true;
}

export async function processTx(data: ScheduleDisableData, sender: string, ctx: StakingContext): Promise<TransactionOutput> {
    await ctx.registry.disable(sender, data.index);
    return { index: data.index, enabled: false };
}

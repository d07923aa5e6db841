import config from '../../config.js';
import logger from '../../logger.js';
import validate from '../../validation/index.js';
import { StakingContext, TransactionOutput } from '../handler-types.js';
import { ScheduleUpsertData } from '../types.js';

export function validateTx(data: unknown, sender: string): data is ScheduleUpsertData {
    if (typeof data !== 'object' || data === null || !('lockDays' in data) || !('percentage' in data)) {
        logger.warn(`[schedule-upsert] Invalid data from ${sender}: Missing required fields (lockDays, percentage).`);
        return false;
    }
    if (!validate.integer(data.lockDays, false, false, config.maxLockDays)) {
        logger.warn(`[schedule-upsert] lockDays must be an integer in 1..${config.maxLockDays}, got ${String(data.lockDays)}.`);
        return false;
    }
    if (!validate.integer(data.percentage, true, false, config.maxPercentage)) {
        logger.warn(`[schedule-upsert] percentage must be an integer in 0..${config.maxPercentage}, got ${String(data.percentage)}.`);
        return false;
    }
    return true;
}

export async function processTx(data: ScheduleUpsertData, sender: string, ctx: StakingContext): Promise<TransactionOutput> {
    const index = await ctx.registry.upsert(sender, data.lockDays, data.percentage);
    const schedule = ctx.registry.get(index);
    return {
        index,
        lockDays: schedule.lockDays,
        lockSeconds: schedule.lockSeconds,
        percentage: schedule.percentage,
        enabled: schedule.enabled,
    };
}

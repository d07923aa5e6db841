import config from '../config.js';
import { StakingError } from './staking-errors.js';
import { StakeRecord } from './staking-interfaces.js';

const SECONDS_PER_DAY = config.secondsPerDay;
const PERCENT_DENOMINATOR = BigInt(config.percentDenominator);

/**
 * Reward paid per full elapsed day.
 *
 * The percentage cut is truncated to whole units before it is split across the lock days.
 */
export function dailyRate(principal: bigint, lockDays: number, percentage: number): bigint {
    if (!Number.isSafeInteger(lockDays) || lockDays <= 0) {
        throw new StakingError('InvalidSchedule', `lockDays must be a positive integer, got ${lockDays}`);
    }
    const cut = (principal * BigInt(percentage)) / PERCENT_DENOMINATOR;
    return cut / BigInt(lockDays);
}

/**
 * Most a record can pay over its full lock: one daily rate per lock day.
 */
export function maxReward(principal: bigint, lockDays: number, percentage: number): bigint {
    return dailyRate(principal, lockDays, percentage) * BigInt(lockDays);
}

/**
 * Whole days elapsed since the last claim. Sub-day remainders stay behind `lastClaimTime`.
 */
export function elapsedDays(lastClaimTime: number, now: number): number {
    return Math.max(0, Math.floor((now - lastClaimTime) / SECONDS_PER_DAY));
}

/**
 * Reward accrued on an active, not yet matured record since its last claim.
 */
export function accruedReward(record: StakeRecord, now: number): bigint {
    if (!record.isActive) {
        throw new StakingError('NotStaking', 'Record is not active');
    }
    if (now >= record.maturityTime) {
        throw new StakingError('LockMatured', `Lock matured at ${record.maturityTime}`);
    }
    const days = elapsedDays(record.lastClaimTime, now);
    return BigInt(days) * dailyRate(record.principal, record.lockDays, record.percentage);
}

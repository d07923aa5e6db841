import config from '../config.js';
import logger from '../logger.js';
import { toBigInt } from '../utils/bigint.js';
import { logLedgerEvent } from '../utils/event-logger.js';
import { inactiveRecord, LedgerState } from './ledger-state.js';
import { activeParticipantCount, appendToRoster, participantCount, poolTotal } from './membership.js';
import { accruedReward, dailyRate } from './reward-accrual.js';
import { ScheduleRegistry } from './schedule-registry.js';
import { StakingError, StakingErrorKind } from './staking-errors.js';
import { Clock, StakeRecord, TransferCollaborator } from './staking-interfaces.js';

const MAX_AMOUNT = toBigInt(config.maxValue);

/**
 * Per-account stake state machine: Inactive -> stake -> Active -> unstake -> Inactive,
 * with restake and claimReward looping on Active.
 *
 * Every operation writes its state first and calls the transfer collaborator last, inside
 * one atomic unit. A failed transfer rolls the whole operation back.
 */
export class StakeLedger {
    constructor(
        private readonly state: LedgerState,
        private readonly registry: ScheduleRegistry,
        private readonly transfer: TransferCollaborator,
        private readonly clock: Clock
    ) {}

    async stake(account: string, amount: bigint, scheduleIndex: number): Promise<StakeRecord> {
        return this.state.atomic('stake', async () => {
            const now = this.clock.now();
            const { tables } = this.state;

            if (tables.records[account]?.isActive) {
                throw this.reject('AlreadyStaking', `${account} already has an active stake`);
            }
            if (amount <= 0n || amount > MAX_AMOUNT) {
                throw this.reject('InvalidAmount', `Stake amount must be in 1..${config.maxValue}, got ${amount}`);
            }
            const schedule = this.registry.requireEnabled(scheduleIndex);

            const record: StakeRecord = {
                principal: amount,
                startTime: now,
                maturityTime: now + schedule.lockSeconds,
                lockSeconds: schedule.lockSeconds,
                lockDays: schedule.lockDays,
                percentage: schedule.percentage,
                scheduleIndex,
                totalClaimed: 0n,
                lastClaimTime: now,
                isActive: true,
            };
            tables.records[account] = record;
            appendToRoster(tables, account);
            logLedgerEvent(tables, 'stake', 'stake', account, now, {
                amount: amount.toString(),
                scheduleIndex,
                maturityTime: record.maturityTime,
            });

            await this.transferOrAbort('pullFrom', account, amount);
            logger.info(`[stake-ledger] ${account} staked ${amount} ${config.stakingTokenSymbol} on schedule #${scheduleIndex} until ${record.maturityTime}.`);
            return { ...record };
        });
    }

    async unstake(account: string): Promise<bigint> {
        return this.state.atomic('unstake', async () => {
            const now = this.clock.now();
            const { tables } = this.state;
            const record = this.requireActive(account);
            if (now < record.maturityTime) {
                throw this.reject('LockNotMatured', `${account} is locked until ${record.maturityTime}, now ${now}`);
            }

            const principal = record.principal;
            tables.records[account] = inactiveRecord();
            logLedgerEvent(tables, 'stake', 'unstake', account, now, { amount: principal.toString() });

            await this.transferOrAbort('pushTo', account, principal);
            logger.info(`[stake-ledger] ${account} unstaked ${principal} ${config.stakingTokenSymbol}.`);
            return principal;
        });
    }

    /**
     * Re-locks a matured principal in place on a (possibly different) schedule. No value moves.
     */
    async restake(account: string, scheduleIndex: number): Promise<StakeRecord> {
        return this.state.atomic('restake', () => {
            const now = this.clock.now();
            const record = this.requireActive(account);
            if (now < record.maturityTime) {
                throw this.reject('LockNotMatured', `${account} is locked until ${record.maturityTime}, now ${now}`);
            }
            const schedule = this.registry.requireEnabled(scheduleIndex);

            record.startTime = now;
            record.maturityTime = now + schedule.lockSeconds;
            record.lockSeconds = schedule.lockSeconds;
            record.lockDays = schedule.lockDays;
            record.percentage = schedule.percentage;
            record.scheduleIndex = scheduleIndex;
            record.totalClaimed = 0n;
            record.lastClaimTime = now;
            logLedgerEvent(this.state.tables, 'stake', 'restake', account, now, {
                principal: record.principal.toString(),
                scheduleIndex,
                maturityTime: record.maturityTime,
            });

            logger.info(`[stake-ledger] ${account} restaked ${record.principal} on schedule #${scheduleIndex} until ${record.maturityTime}.`);
            return { ...record };
        });
    }

    /**
     * Pays out whole days accrued since the last claim. Only possible before maturity.
     */
    async claimReward(account: string): Promise<bigint> {
        return this.state.atomic('claim_reward', async () => {
            const now = this.clock.now();
            const record = this.requireActive(account);
            if (now >= record.maturityTime) {
                throw this.reject('LockMatured', `${account}'s lock matured at ${record.maturityTime}; unstake or restake instead`);
            }
            const reward = accruedReward(record, now);
            if (reward === 0n) {
                throw this.reject('NoRewardAvailable', `No full day has elapsed for ${account} since ${record.lastClaimTime}`);
            }

            record.totalClaimed += reward;
            record.lastClaimTime = now;
            logLedgerEvent(this.state.tables, 'stake', 'claim_reward', account, now, {
                reward: reward.toString(),
                totalClaimed: record.totalClaimed.toString(),
            });

            await this.transferOrAbort('pushTo', account, reward);
            logger.info(`[stake-ledger] ${account} claimed ${reward} ${config.stakingTokenSymbol} (total ${record.totalClaimed}).`);
            return reward;
        });
    }

    getStake(account: string): StakeRecord {
        return this.state.record(account);
    }

    /**
     * Reward the account could claim right now.
     */
    pendingReward(account: string): bigint {
        return accruedReward(this.state.record(account), this.clock.now());
    }

    estimateDailyRate(principal: bigint, scheduleIndex: number): bigint {
        if (principal < 0n) {
            throw new StakingError('InvalidAmount', `Principal must not be negative, got ${principal}`);
        }
        const schedule = this.registry.get(scheduleIndex);
        return dailyRate(principal, schedule.lockDays, schedule.percentage);
    }

    participantCount(): number {
        return participantCount(this.state.tables);
    }

    activeParticipantCount(): number {
        return activeParticipantCount(this.state.tables);
    }

    poolTotal(): bigint {
        return poolTotal(this.state.tables);
    }

    private requireActive(account: string): StakeRecord {
        const record = this.state.tables.records[account];
        if (!record?.isActive) {
            throw this.reject('NotStaking', `${account} has no active stake`);
        }
        return record;
    }

    private reject(kind: StakingErrorKind, message: string): StakingError {
        logger.warn(`[stake-ledger] ${kind}: ${message}`);
        return new StakingError(kind, message);
    }

    private async transferOrAbort(direction: 'pullFrom' | 'pushTo', account: string, amount: bigint): Promise<void> {
        let ok: boolean;
        try {
            ok = await this.transfer[direction](account, amount);
        } catch (err) {
            const reason = err instanceof StakingError ? `${err.kind}: ${err.message}` : err instanceof Error ? err.message : String(err);
            logger.warn(`[stake-ledger] TransferFailed: ${direction} ${amount} for ${account} threw ${reason}`);
            throw new StakingError('TransferFailed', `${direction} ${amount} for ${account} threw: ${reason}`, { cause: err });
        }
        if (!ok) {
            throw this.reject('TransferFailed', `${direction} ${amount} for ${account} was refused`);
        }
    }
}

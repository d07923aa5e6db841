import config from '../config.js';
import logger from '../logger.js';
import { logLedgerEvent } from '../utils/event-logger.js';
import { LedgerState } from './ledger-state.js';
import { StakingError } from './staking-errors.js';
import { AccessControl, Clock, RewardSchedule, ScheduleSeed } from './staking-interfaces.js';

export function lockSecondsFor(lockDays: number): number {
    return lockDays * config.secondsPerDay;
}

function checkScheduleParams(lockDays: number, percentage: number): void {
    if (!Number.isSafeInteger(lockDays) || lockDays <= 0 || lockDays > config.maxLockDays) {
        throw new StakingError('InvalidSchedule', `lockDays must be an integer in 1..${config.maxLockDays}, got ${lockDays}`);
    }
    if (!Number.isSafeInteger(percentage) || percentage < 0 || percentage > config.maxPercentage) {
        throw new StakingError('InvalidSchedule', `percentage must be an integer in 0..${config.maxPercentage}, got ${percentage}`);
    }
}

/**
 * Append-only catalog of reward schedules. An entry's index is its permanent identity:
 * entries are never removed or reordered, only disabled.
 */
export class ScheduleRegistry {
    constructor(
        private readonly state: LedgerState,
        private readonly gate: AccessControl,
        private readonly clock: Clock
    ) {}

    /**
     * Seeds the default schedules into an empty catalog. A populated catalog is left alone.
     */
    async initialize(seeds: ReadonlyArray<ScheduleSeed> = config.defaultSchedules): Promise<void> {
        await this.state.atomic('schedule_initialize', () => {
            const { schedules } = this.state.tables;
            if (schedules.length > 0) {
                logger.debug(`[schedule-registry] Catalog already holds ${schedules.length} schedule(s), skipping seed.`);
                return;
            }
            for (const seed of seeds) {
                checkScheduleParams(seed.lockDays, seed.percentage);
                schedules.push({
                    lockDays: seed.lockDays,
                    lockSeconds: lockSecondsFor(seed.lockDays),
                    percentage: seed.percentage,
                    enabled: true,
                });
            }
            logger.info(`[schedule-registry] Seeded ${seeds.length} default schedule(s).`);
        });
    }

    /**
     * Updates the percentage of the first entry with matching `lockDays`, disabled entries included,
     * or appends a new enabled entry. Resolves to the index that was touched.
     */
    async upsert(caller: string, lockDays: number, percentage: number): Promise<number> {
        return this.state.atomic('schedule_upsert', () => {
            this.gate.authorize(caller, 'schedule_upsert');
            checkScheduleParams(lockDays, percentage);

            const { schedules } = this.state.tables;
            const now = this.clock.now();
            const existing = schedules.findIndex(s => s.lockDays === lockDays);
            if (existing !== -1) {
                const previous = schedules[existing].percentage;
                schedules[existing].percentage = percentage;
                logLedgerEvent(this.state.tables, 'schedule', 'update', caller, now, {
                    index: existing,
                    lockDays,
                    percentage,
                    previousPercentage: previous,
                });
                logger.info(`[schedule-registry] Schedule #${existing} (${lockDays}d) percentage ${previous} -> ${percentage}.`);
                return existing;
            }

            schedules.push({ lockDays, lockSeconds: lockSecondsFor(lockDays), percentage, enabled: true });
            const index = schedules.length - 1;
            logLedgerEvent(this.state.tables, 'schedule', 'create', caller, now, { index, lockDays, percentage });
            logger.info(`[schedule-registry] Schedule #${index} added: ${lockDays}d at ${percentage}%.`);
            return index;
        });
    }

    async disable(caller: string, index: number): Promise<void> {
        await this.state.atomic('schedule_disable', () => {
            this.gate.authorize(caller, 'schedule_disable');
            const { schedules } = this.state.tables;
            if (!Number.isSafeInteger(index) || index < 0 || index >= schedules.length) {
                throw new StakingError('InvalidState', `Schedule index ${index} is out of bounds (catalog size ${schedules.length})`);
            }
            if (!schedules[index].enabled) {
                throw new StakingError('InvalidState', `Schedule #${index} is already disabled`);
            }
            schedules[index].enabled = false;
            logLedgerEvent(this.state.tables, 'schedule', 'disable', caller, this.clock.now(), { index });
            logger.info(`[schedule-registry] Schedule #${index} disabled.`);
        });
    }

    get(index: number): Readonly<RewardSchedule> {
        const { schedules } = this.state.tables;
        if (!Number.isSafeInteger(index) || index < 0 || index >= schedules.length) {
            throw new StakingError('IndexOutOfRange', `Schedule index ${index} is out of bounds (catalog size ${schedules.length})`);
        }
        return Object.freeze({ ...schedules[index] });
    }

    /**
     * Lookup used by stake and restake: the entry must exist and be enabled.
     */
    requireEnabled(index: number): Readonly<RewardSchedule> {
        const schedule = this.get(index);
        if (!schedule.enabled) {
            throw new StakingError('ScheduleDisabled', `Schedule #${index} is disabled`);
        }
        return schedule;
    }

    list(): RewardSchedule[] {
        return this.state.tables.schedules.map(s => ({ ...s }));
    }

    get size(): number {
        return this.state.tables.schedules.length;
    }
}

import cloneDeep from 'clone-deep';
import logger from '../logger.js';
import { StakingError } from './staking-errors.js';
import { LedgerTables, StakeRecord } from './staking-interfaces.js';

export function emptyTables(): LedgerTables {
    return { schedules: [], records: {}, roster: [], events: [] };
}

/**
 * Sentinel read for accounts without a live record. Unstaking writes this back explicitly.
 */
export function inactiveRecord(): StakeRecord {
    return {
        principal: 0n,
        startTime: 0,
        maturityTime: 0,
        lockSeconds: 0,
        lockDays: 0,
        percentage: 0,
        scheduleIndex: 0,
        totalClaimed: 0n,
        lastClaimTime: 0,
        isActive: false,
    };
}

/**
 * Owner of the schedule catalog, record table, roster and event log.
 *
 * Mutations go through `atomic`, which copies the catalog and the record table up front and
 * puts the copies back if the operation throws; the append-only roster and event log are
 * truncated to their earlier length instead. Only one operation may be in flight at a time; a second
 * one (including a re-entrant call from a transfer collaborator) is rejected.
 */
export class LedgerState {
    readonly tables: LedgerTables;
    private inFlight: string | null = null;

    constructor(tables: LedgerTables = emptyTables()) {
        this.tables = tables;
    }

    async atomic<T>(label: string, operation: () => T | Promise<T>): Promise<T> {
        if (this.inFlight !== null) {
            throw new StakingError('OperationInProgress', `${label} rejected while ${this.inFlight} is in flight`);
        }
        this.inFlight = label;
        const schedules = cloneDeep(this.tables.schedules);
        const records = cloneDeep(this.tables.records);
        const rosterLength = this.tables.roster.length;
        const eventsLength = this.tables.events.length;
        try {
            return await operation();
        } catch (err) {
            Object.assign(this.tables, { schedules, records });
            // roster and events are append-only
            this.tables.roster.length = rosterLength;
            this.tables.events.length = eventsLength;
            logger.debug(`[ledger-state] Rolled back ${label}: ${err instanceof Error ? err.message : String(err)}`);
            throw err;
        } finally {
            this.inFlight = null;
        }
    }

    /**
     * Replaces every table with the given contents, e.g. after loading from the store.
     */
    restore(tables: LedgerTables): void {
        if (this.inFlight !== null) {
            throw new StakingError('OperationInProgress', `restore rejected while ${this.inFlight} is in flight`);
        }
        Object.assign(this.tables, cloneDeep(tables));
    }

    record(account: string): StakeRecord {
        const record = this.tables.records[account];
        return record ? { ...record } : inactiveRecord();
    }
}

import { AnyBulkWriteOperation, BulkWriteOptions, Db, Document } from 'mongodb';
import config from './config.js';
import logger from './logger.js';
import { emptyTables } from './staking/ledger-state.js';
import { LedgerEvent, LedgerTables, StakeRecord } from './staking/staking-interfaces.js';
import { toBigInt, toDbString } from './utils/bigint.js';

export type ScheduleDoc = {
    _id: number; // catalog index
    lockDays: number;
    lockSeconds: number;
    percentage: number;
    enabled: boolean;
};

export type StakeDoc = {
    _id: string; // account
    principal: string; // padded
    startTime: number;
    maturityTime: number;
    lockSeconds: number;
    lockDays: number;
    percentage: number;
    scheduleIndex: number;
    totalClaimed: string; // padded
    lastClaimTime: number;
    isActive: boolean;
};

export type RosterDoc = {
    _id: number; // position in the log
    account: string;
};

export type EventDoc = {
    _id: string;
    seq: number;
    category: LedgerEvent['category'];
    action: string;
    actor: string;
    timestamp: number;
    data: LedgerEvent['data'];
};

export type AccountDoc = {
    _id: string;
    name: string;
    balances: Record<string, string>; // Store as padded strings
};

/**
 * The part of a driver collection the store uses.
 */
export interface StoreCollection<T extends Document> {
    find(filter: Record<string, never>): { toArray(): Promise<T[]> };
    bulkWrite(operations: AnyBulkWriteOperation<T>[], options?: BulkWriteOptions): Promise<unknown>;
}

export interface LedgerCollections {
    schedules: StoreCollection<ScheduleDoc>;
    stakes: StoreCollection<StakeDoc>;
    roster: StoreCollection<RosterDoc>;
    events: StoreCollection<EventDoc>;
    accounts: StoreCollection<AccountDoc>;
}

export function ledgerCollections(db: Db): LedgerCollections {
    return {
        schedules: db.collection<ScheduleDoc>('schedules'),
        stakes: db.collection<StakeDoc>('stakes'),
        roster: db.collection<RosterDoc>('roster'),
        events: db.collection<EventDoc>('events'),
        accounts: db.collection<AccountDoc>('accounts'),
    };
}

export interface LoadedLedger {
    tables: LedgerTables;
    balances: Array<[string, bigint]>;
}

function toStakeRecord(doc: StakeDoc): StakeRecord {
    return {
        principal: toBigInt(doc.principal),
        startTime: doc.startTime,
        maturityTime: doc.maturityTime,
        lockSeconds: doc.lockSeconds,
        lockDays: doc.lockDays,
        percentage: doc.percentage,
        scheduleIndex: doc.scheduleIndex,
        totalClaimed: toBigInt(doc.totalClaimed),
        lastClaimTime: doc.lastClaimTime,
        isActive: doc.isActive,
    };
}

/**
 * Persists the ledger tables and balances to MongoDB.
 *
 * The catalog and the record table are written in full on every flush (upserts keyed by index and
 * account). Roster and event log are append-only, so only entries added since the last flush go out;
 * each of the two advances on its own, and its upserts can be replayed after a partial failure.
 */
export class LedgerStore {
    private persistedRoster = 0;
    private persistedEvents = 0;

    constructor(
        private readonly collections: LedgerCollections,
        private readonly symbol: string = config.stakingTokenSymbol
    ) {}

    async load(): Promise<LoadedLedger> {
        const [schedules, stakes, roster, events, accounts] = await Promise.all([
            this.collections.schedules.find({}).toArray(),
            this.collections.stakes.find({}).toArray(),
            this.collections.roster.find({}).toArray(),
            this.collections.events.find({}).toArray(),
            this.collections.accounts.find({}).toArray(),
        ]);

        const tables = emptyTables();
        for (const doc of [...schedules].sort((a, b) => a._id - b._id)) {
            if (doc._id !== tables.schedules.length) {
                throw new Error(`[ledger-store] Schedule catalog has a gap at index ${tables.schedules.length}`);
            }
            tables.schedules.push({
                lockDays: doc.lockDays,
                lockSeconds: doc.lockSeconds,
                percentage: doc.percentage,
                enabled: doc.enabled,
            });
        }
        for (const doc of stakes) {
            tables.records[doc._id] = toStakeRecord(doc);
        }
        tables.roster = [...roster].sort((a, b) => a._id - b._id).map(doc => doc.account);
        tables.events = [...events]
            .sort((a, b) => a.seq - b.seq)
            .map(({ _id, category, action, actor, timestamp, data }) => ({ _id, category, action, actor, timestamp, data }));

        const balances: Array<[string, bigint]> = [];
        for (const doc of accounts) {
            const raw = doc.balances?.[this.symbol];
            if (raw !== undefined) {
                balances.push([doc.name, toBigInt(raw)]);
            }
        }

        this.persistedRoster = tables.roster.length;
        this.persistedEvents = tables.events.length;
        logger.info(
            `[ledger-store] Loaded ${tables.schedules.length} schedule(s), ${stakes.length} stake record(s), ${tables.roster.length} roster entries, ${balances.length} balance(s).`
        );
        return { tables, balances };
    }

    async flush(tables: LedgerTables, balances: Array<[string, bigint]>): Promise<void> {
        const scheduleOps: AnyBulkWriteOperation<ScheduleDoc>[] = tables.schedules.map((s, index) => ({
            replaceOne: {
                filter: { _id: index },
                replacement: { lockDays: s.lockDays, lockSeconds: s.lockSeconds, percentage: s.percentage, enabled: s.enabled },
                upsert: true,
            },
        }));

        const stakeOps: AnyBulkWriteOperation<StakeDoc>[] = Object.entries(tables.records).map(([account, r]) => ({
            replaceOne: {
                filter: { _id: account },
                replacement: {
                    principal: toDbString(r.principal),
                    startTime: r.startTime,
                    maturityTime: r.maturityTime,
                    lockSeconds: r.lockSeconds,
                    lockDays: r.lockDays,
                    percentage: r.percentage,
                    scheduleIndex: r.scheduleIndex,
                    totalClaimed: toDbString(r.totalClaimed),
                    lastClaimTime: r.lastClaimTime,
                    isActive: r.isActive,
                },
                upsert: true,
            },
        }));

        const rosterTarget = tables.roster.length;
        const rosterOps: AnyBulkWriteOperation<RosterDoc>[] = tables.roster.slice(this.persistedRoster).map((account, i) => ({
            replaceOne: { filter: { _id: this.persistedRoster + i }, replacement: { account }, upsert: true },
        }));

        const eventTarget = tables.events.length;
        const eventOps: AnyBulkWriteOperation<EventDoc>[] = tables.events.slice(this.persistedEvents).map(({ _id, ...event }, i) => ({
            replaceOne: { filter: { _id }, replacement: { ...event, seq: this.persistedEvents + i }, upsert: true },
        }));

        // Per-token field update, other balances in the document stay as they are
        const accountOps: AnyBulkWriteOperation<AccountDoc>[] = balances.map(([name, balance]) => {
            const fields: Document = { name, [`balances.${this.symbol}`]: toDbString(balance) };
            return { updateOne: { filter: { _id: name }, update: { $set: fields }, upsert: true } };
        });

        const writes: Promise<unknown>[] = [];
        if (scheduleOps.length > 0) writes.push(this.collections.schedules.bulkWrite(scheduleOps, { ordered: false }));
        if (stakeOps.length > 0) writes.push(this.collections.stakes.bulkWrite(stakeOps, { ordered: false }));
        if (rosterOps.length > 0) {
            writes.push(
                this.collections.roster.bulkWrite(rosterOps, { ordered: true }).then(() => {
                    this.persistedRoster = Math.max(this.persistedRoster, rosterTarget);
                })
            );
        }
        if (eventOps.length > 0) {
            writes.push(
                this.collections.events.bulkWrite(eventOps, { ordered: true }).then(() => {
                    this.persistedEvents = Math.max(this.persistedEvents, eventTarget);
                })
            );
        }
        if (accountOps.length > 0) writes.push(this.collections.accounts.bulkWrite(accountOps, { ordered: false }));

        const outcomes = await Promise.allSettled(writes);
        const failed = outcomes.filter((o): o is PromiseRejectedResult => o.status === 'rejected');
        if (failed.length > 0) {
            logger.error(`[ledger-store] ${failed.length} of ${outcomes.length} collection write(s) failed; the next flush retries them.`);
            throw failed[0].reason;
        }
        logger.debug(
            `[ledger-store] Flushed ${scheduleOps.length} schedule(s), ${stakeOps.length} stake(s), ${rosterOps.length} roster entries, ${eventOps.length} event(s), ${accountOps.length} account(s).`
        );
    }
}

export default LedgerStore;

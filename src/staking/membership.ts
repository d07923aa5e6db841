import { LedgerTables } from './staking-interfaces.js';

/**
 * The roster is a log, not a set: an account that unstakes and stakes again appears twice.
 */
export function appendToRoster(tables: LedgerTables, account: string): void {
    tables.roster.push(account);
}

/** Historical count: every stake ever recorded in the roster. */
export function participantCount(tables: LedgerTables): number {
    return tables.roster.length;
}

/** Live count: accounts holding an active record right now. */
export function activeParticipantCount(tables: LedgerTables): number {
    return Object.values(tables.records).filter(r => r.isActive).length;
}

/**
 * Principal currently locked, read from each distinct roster account's current record.
 */
export function poolTotal(tables: LedgerTables): bigint {
    let total = 0n;
    for (const account of new Set(tables.roster)) {
        const record = tables.records[account];
        if (record?.isActive) {
            total += record.principal;
        }
    }
    return total;
}

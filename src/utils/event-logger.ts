import logger from '../logger.js';
import { LedgerEvent, LedgerTables } from '../staking/staking-interfaces.js';
import crypto from 'crypto';

const EVENT_ID_LENGTH = 24;

/**
 * Hex id derived from the event fields and its position in the log.
 */
export function eventId(category: LedgerEvent['category'], action: string, actor: string, timestamp: number, sequence: number): string {
    const joined = [category, action, actor, timestamp, sequence].join('|');
    return crypto.createHash('sha256').update(joined).digest('hex').substring(0, EVENT_ID_LENGTH);
}

/**
 * Appends an event to the ledger's event log. The log is part of the ledger tables,
 * so an event written inside an atomic unit disappears again if the unit rolls back.
 */
export function logLedgerEvent(
    tables: LedgerTables,
    category: LedgerEvent['category'],
    action: string,
    actor: string,
    timestamp: number,
    data: LedgerEvent['data']
): LedgerEvent {
    const sequence = tables.events.length;
    const event: LedgerEvent = {
        _id: eventId(category, action, actor, timestamp, sequence),
        category,
        action,
        actor,
        timestamp,
        data,
    };
    tables.events.push(event);
    logger.debug(`[event-logger] Event logged: Category: ${category}, Action: ${action}, Actor: ${actor}, EventID: ${event._id}`);
    return event;
}

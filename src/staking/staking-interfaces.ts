// Staking interfaces. Amounts are bigint minor units, times are integer seconds.

export interface ScheduleSeed {
    lockDays: number;
    percentage: number;
}

export interface RewardSchedule extends ScheduleSeed {
    lockSeconds: number; // always lockDays * secondsPerDay
    enabled: boolean;
}

export interface StakeRecord {
    principal: bigint;
    startTime: number;
    maturityTime: number;
    lockSeconds: number;
    lockDays: number;
    percentage: number;
    scheduleIndex: number; // catalog entry the parameters were copied from
    totalClaimed: bigint;
    lastClaimTime: number;
    isActive: boolean;
}

/**
 * Event document appended for every committed ledger mutation.
 */
export interface LedgerEvent {
    _id: string;
    category: 'stake' | 'schedule';
    action: string;
    actor: string;
    timestamp: number;
    data: Record<string, string | number | boolean>;
}

/**
 * The tables owned by the ledger. Everything here is covered by the atomic snapshot.
 */
export interface LedgerTables {
    schedules: RewardSchedule[];
    records: Record<string, StakeRecord>;
    roster: string[];
    events: LedgerEvent[];
}

export interface Clock {
    now(): number;
}

/**
 * Moves balances between an account and the pool. Resolves false when the collaborator refuses.
 */
export interface TransferCollaborator {
    pullFrom(account: string, amount: bigint): Promise<boolean>;
    pushTo(account: string, amount: bigint): Promise<boolean>;
}

export type OperatorAction = 'schedule_upsert' | 'schedule_disable';

export interface AccessControl {
    authorize(caller: string, action: OperatorAction): void;
}

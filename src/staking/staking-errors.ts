export type StakingErrorKind =
    | 'AlreadyStaking'
    | 'InvalidAmount'
    | 'IndexOutOfRange'
    | 'ScheduleDisabled'
    | 'InvalidSchedule'
    | 'InvalidState'
    | 'NotStaking'
    | 'LockNotMatured'
    | 'LockMatured'
    | 'NoRewardAvailable'
    | 'Unauthorized'
    | 'TransferFailed'
    | 'OperationInProgress';

/**
 * Raised for every rejected ledger or catalog operation. `kind` is the discriminant callers switch on.
 */
export class StakingError extends Error {
    constructor(
        public readonly kind: StakingErrorKind,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'StakingError';
    }
}

export function isStakingError(err: unknown, kind?: StakingErrorKind): err is StakingError {
    return err instanceof StakingError && (kind === undefined || err.kind === kind);
}

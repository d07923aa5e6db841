import logger from '../logger.js';
import { StakingError } from './staking-errors.js';
import { AccessControl, OperatorAction } from './staking-interfaces.js';

/**
 * Single privileged operator identity. Every catalog mutation passes through `authorize`.
 */
export class OperatorGate implements AccessControl {
    constructor(private readonly operator: string) {}

    authorize(caller: string, action: OperatorAction): void {
        if (caller !== this.operator) {
            logger.warn(`[access-control] ${caller} is not allowed to perform ${action}.`);
            throw new StakingError('Unauthorized', `${caller} is not the ledger operator`);
        }
    }
}

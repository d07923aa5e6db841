import logger from '../logger.js';
import { ProcessingQueue } from '../processingQueue.js';
import { StakingError, StakingErrorKind } from '../staking/staking-errors.js';
import validate from '../validation/index.js';
import { StakingContext, TransactionHandler, TransactionOutput } from './handler-types.js';
import * as scheduleDisable from './schedule/schedule-disable.js';
import * as scheduleUpsert from './schedule/schedule-upsert.js';
import * as claimReward from './staking/claim-reward.js';
import * as restake from './staking/restake.js';
import * as stake from './staking/stake.js';
import * as unstake from './staking/unstake.js';
import { TransactionDataMap, TransactionType, transactions } from './types.js';

// Define the base transaction interface
export interface Transaction {
    id: string; // Unique transaction ID
    type: number;
    sender: string;
    data?: unknown;
}

export type TransactionErrorKind = StakingErrorKind | 'InvalidTransaction';

export type TransactionResult =
    | { ok: true; id: string; type: TransactionType; output: TransactionOutput }
    | { ok: false; id: string; type: number; error: TransactionErrorKind; message: string };

type HandlerMap = { [K in TransactionType]: TransactionHandler<TransactionDataMap[K]> };

const transactionHandlers: HandlerMap = {
    [TransactionType.STAKE]: { validate: stake.validateTx, process: stake.processTx },
    [TransactionType.UNSTAKE]: { validate: unstake.validateTx, process: unstake.processTx },
    [TransactionType.RESTAKE]: { validate: restake.validateTx, process: restake.processTx },
    [TransactionType.CLAIM_REWARD]: { validate: claimReward.validateTx, process: claimReward.processTx },
    [TransactionType.SCHEDULE_UPSERT]: { validate: scheduleUpsert.validateTx, process: scheduleUpsert.processTx },
    [TransactionType.SCHEDULE_DISABLE]: { validate: scheduleDisable.validateTx, process: scheduleDisable.processTx },
};

export function isTransactionType(value: unknown): value is TransactionType {
    return typeof value === 'number' && Object.prototype.hasOwnProperty.call(transactions, value);
}

async function dispatch<K extends TransactionType>(type: K, tx: Transaction, ctx: StakingContext): Promise<TransactionOutput | null> {
    const handler: TransactionHandler<TransactionDataMap[K]> = transactionHandlers[type];
    if (!handler.validate(tx.data, tx.sender)) {
        return null;
    }
    return handler.process(tx.data, tx.sender, ctx);
}

/**
 * Host boundary for the ledger. Submitted transactions are validated and then executed
 * strictly one after another; ledger rejections come back as failed results.
 * A failing commit hook is logged and does not change the result of an applied transaction.
 */
export class TransactionProcessor {
    private readonly queue = new ProcessingQueue();

    constructor(
        private readonly ctx: StakingContext,
        private readonly onCommit?: (tx: Transaction) => Promise<void>
    ) {}

    submit(tx: Transaction): Promise<TransactionResult> {
        return this.queue.run(() => this.execute(tx));
    }

    get pending(): number {
        return this.queue.length;
    }

    private async execute(tx: Transaction): Promise<TransactionResult> {
        if (!isTransactionType(tx.type)) {
            logger.warn(`[transactions] Unknown transaction type ${tx.type} in ${tx.id}.`);
            return { ok: false, id: tx.id, type: tx.type, error: 'InvalidTransaction', message: `Unknown transaction type ${tx.type}` };
        }
        const name = transactions[tx.type];
        if (!validate.account(tx.sender)) {
            logger.warn(`[transactions] Invalid sender '${tx.sender}' for ${name} ${tx.id}.`);
            return { ok: false, id: tx.id, type: tx.type, error: 'InvalidTransaction', message: `Invalid sender '${tx.sender}'` };
        }

        let output: TransactionOutput | null;
        try {
            output = await dispatch(tx.type, tx, this.ctx);
        } catch (err) {
            if (err instanceof StakingError) {
                logger.warn(`[transactions] ${name} ${tx.id} by ${tx.sender} rejected: ${err.kind}: ${err.message}`);
                return { ok: false, id: tx.id, type: tx.type, error: err.kind, message: err.message };
            }
            logger.error(`[transactions] Error processing ${name} ${tx.id} by ${tx.sender}: ${err}`);
            throw err;
        }
        if (output === null) {
            return { ok: false, id: tx.id, type: tx.type, error: 'InvalidTransaction', message: `Invalid ${name} payload` };
        }

        if (this.onCommit) {
            try {
                await this.onCommit(tx);
            } catch (err) {
                // The ledger has already applied the transaction; the next commit writes it out again
                logger.fatal(`[transactions] Persisting ${name} ${tx.id} failed: ${err instanceof Error ? err.message : String(err)}`);
            }
        }
        logger.debug(`[transactions] ${name} ${tx.id} by ${tx.sender} committed.`);
        return { ok: true, id: tx.id, type: tx.type, output };
    }
}

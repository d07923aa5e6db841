import assert from 'node:assert/strict';
import { beforeEach, describe, it } from 'node:test';
import { ManualClock, manualClock } from '../src/clock.js';
import { OperatorGate } from '../src/staking/access-control.js';
import { inactiveRecord, LedgerState } from '../src/staking/ledger-state.js';
import { ScheduleRegistry } from '../src/staking/schedule-registry.js';
import { StakeLedger } from '../src/staking/stake-ledger.js';
import { isStakingError, StakingError } from '../src/staking/staking-errors.js';
import { TransferCollaborator } from '../src/staking/staking-interfaces.js';
import { DAY, OPERATOR, setupNode, stakingError, START, TestNode } from './helpers.js';

const LOCK_90 = 90 * DAY;
const LOCK_180 = 180 * DAY;

describe('StakeLedger', () => {
    let node: TestNode;

    beforeEach(async () => {
        node = await setupNode();
    });

    describe('stake', () => {
        it('opens an active record snapshotted from the schedule', async () => {
            const record = await node.ledger.stake('alice', 1000n, 0);
            assert.deepEqual(record, {
                principal: 1000n,
                startTime: START,
                maturityTime: START + LOCK_90,
                lockSeconds: LOCK_90,
                lockDays: 90,
                percentage: 10,
                scheduleIndex: 0,
                totalClaimed: 0n,
                lastClaimTime: START,
                isActive: true,
            });
            assert.deepEqual(node.ledger.getStake('alice'), record);
            assert.equal(node.balances.balanceOf('alice'), 999_000n);
            assert.equal(node.balances.poolBalance(), 11_000n);
            assert.equal(node.ledger.participantCount(), 1);
            assert.equal(node.ledger.poolTotal(), 1000n);
        });

        it('logs a stake event', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            const [event] = node.state.tables.events;
            assert.equal(event.category, 'stake');
            assert.equal(event.action, 'stake');
            assert.equal(event.actor, 'alice');
            assert.equal(event.timestamp, START);
            assert.deepEqual(event.data, { amount: '1000', scheduleIndex: 0, maturityTime: START + LOCK_90 });
        });

        it('rejects a second stake before any other check', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            await assert.rejects(node.ledger.stake('alice', 500n, 1), stakingError('AlreadyStaking'));
            await assert.rejects(node.ledger.stake('alice', 0n, 99), stakingError('AlreadyStaking'));
            assert.equal(node.balances.balanceOf('alice'), 999_000n);
            assert.equal(node.ledger.participantCount(), 1);
        });

        it('rejects non-positive amounts', async () => {
            await assert.rejects(node.ledger.stake('alice', 0n, 0), stakingError('InvalidAmount'));
            await assert.rejects(node.ledger.stake('alice', -5n, 0), stakingError('InvalidAmount'));
            assert.equal(node.ledger.participantCount(), 0);
            assert.equal(node.ledger.getStake('alice').isActive, false);
        });

        it('rejects unknown and disabled schedules', async () => {
            await assert.rejects(node.ledger.stake('alice', 1000n, 3), stakingError('IndexOutOfRange'));
            await node.registry.disable(OPERATOR, 1);
            await assert.rejects(node.ledger.stake('alice', 1000n, 1), stakingError('ScheduleDisabled'));
            assert.equal(node.balances.balanceOf('alice'), 1_000_000n);
        });

        it('keeps the schedule terms it was opened with', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            await node.registry.upsert(OPERATOR, 90, 50);
            node.clock.advance(2 * DAY);
            assert.equal(node.ledger.getStake('alice').percentage, 10);
            assert.equal(node.ledger.pendingReward('alice'), 2n);
        });

        it('rolls back when the account cannot fund the stake', async () => {
            await assert.rejects(node.ledger.stake('carol', 500n, 0), stakingError('TransferFailed'));
            assert.deepEqual(node.ledger.getStake('carol'), inactiveRecord());
            assert.equal(node.ledger.participantCount(), 0);
            assert.equal(node.state.tables.events.length, 0);
            assert.equal(node.balances.poolBalance(), 10_000n);
        });
    });

    describe('claimReward', () => {
        it('pays whole days since the last claim', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(2 * DAY);
            assert.equal(node.ledger.pendingReward('alice'), 2n);

            const reward = await node.ledger.claimReward('alice');
            assert.equal(reward, 2n);
            assert.equal(node.balances.balanceOf('alice'), 999_002n);
            const record = node.ledger.getStake('alice');
            assert.equal(record.totalClaimed, 2n);
            assert.equal(record.lastClaimTime, START + 2 * DAY);
            assert.equal(node.ledger.pendingReward('alice'), 0n);
        });

        it('carries a sub-day remainder only up to the claim time', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(DAY + DAY / 2);
            assert.equal(await node.ledger.claimReward('alice'), 1n);
            node.clock.advance(DAY / 2);
            assert.equal(node.ledger.pendingReward('alice'), 0n);
            await assert.rejects(node.ledger.claimReward('alice'), stakingError('NoRewardAvailable'));
        });

        it('rejects a claim before the first full day', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(DAY - 1);
            await assert.rejects(node.ledger.claimReward('alice'), stakingError('NoRewardAvailable'));
        });

        it('rejects a claim at or after maturity', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(LOCK_90);
            await assert.rejects(node.ledger.claimReward('alice'), stakingError('LockMatured'));
            assert.throws(() => node.ledger.pendingReward('alice'), stakingError('LockMatured'));
        });

        it('rejects a claim without an active stake', async () => {
            await assert.rejects(node.ledger.claimReward('alice'), stakingError('NotStaking'));
            assert.throws(() => node.ledger.pendingReward('alice'), stakingError('NotStaking'));
        });

        it('never pays more than the full-lock reward', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(LOCK_90 - 1);
            assert.equal(await node.ledger.claimReward('alice'), 89n);
            assert.ok(node.ledger.getStake('alice').totalClaimed <= 90n);
        });
    });

    describe('unstake', () => {
        it('is refused before maturity', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(LOCK_90 - 1);
            await assert.rejects(node.ledger.unstake('alice'), stakingError('LockNotMatured'));
            assert.equal(node.ledger.getStake('alice').isActive, true);
        });

        it('returns the principal at maturity and clears the record', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(LOCK_90);
            assert.equal(await node.ledger.unstake('alice'), 1000n);
            assert.equal(node.balances.balanceOf('alice'), 1_000_000n);
            assert.equal(node.balances.poolBalance(), 10_000n);
            assert.deepEqual(node.ledger.getStake('alice'), inactiveRecord());
            assert.deepEqual(node.ledger.getStake('alice'), node.ledger.getStake('nobody'));
            assert.equal(node.ledger.poolTotal(), 0n);
            assert.equal(node.ledger.participantCount(), 1);
        });

        it('is refused without an active stake', async () => {
            await assert.rejects(node.ledger.unstake('alice'), stakingError('NotStaking'));
        });

        it('allows staking again afterwards', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(LOCK_90);
            await node.ledger.unstake('alice');
            const record = await node.ledger.stake('alice', 2000n, 1);
            assert.equal(record.principal, 2000n);
            assert.equal(record.maturityTime, START + LOCK_90 + LOCK_180);
            assert.equal(node.ledger.participantCount(), 2);
        });
    });

    describe('restake', () => {
        it('re-locks the same principal on a new schedule without moving funds', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(3 * DAY);
            await node.ledger.claimReward('alice');
            node.clock.set(START + LOCK_90 + 100);

            const record = await node.ledger.restake('alice', 1);
            const now = START + LOCK_90 + 100;
            assert.deepEqual(record, {
                principal: 1000n,
                startTime: now,
                maturityTime: now + LOCK_180,
                lockSeconds: LOCK_180,
                lockDays: 180,
                percentage: 20,
                scheduleIndex: 1,
                totalClaimed: 0n,
                lastClaimTime: now,
                isActive: true,
            });
            assert.equal(node.balances.balanceOf('alice'), 999_003n);
            assert.equal(node.ledger.participantCount(), 1);
            assert.equal(node.ledger.poolTotal(), 1000n);
        });

        it('is refused before maturity', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(DAY);
            await assert.rejects(node.ledger.restake('alice', 0), stakingError('LockNotMatured'));
        });

        it('is refused after unstake', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            node.clock.advance(LOCK_90);
            await node.ledger.unstake('alice');
            await assert.rejects(node.ledger.restake('alice', 0), stakingError('NotStaking'));
        });

        it('is refused onto a disabled schedule and leaves the record as it was', async () => {
            await node.ledger.stake('alice', 1000n, 0);
            await node.registry.disable(OPERATOR, 2);
            node.clock.advance(LOCK_90);
            await assert.rejects(node.ledger.restake('alice', 2), stakingError('ScheduleDisabled'));
            assert.equal(node.ledger.getStake('alice').maturityTime, START + LOCK_90);
        });
    });

    describe('estimateDailyRate', () => {
        it('computes from the catalog entry, disabled or not', async () => {
            assert.equal(node.ledger.estimateDailyRate(1000n, 0), 1n);
            assert.equal(node.ledger.estimateDailyRate(100_000n, 2), 111n);
            await node.registry.disable(OPERATOR, 2);
            assert.equal(node.ledger.estimateDailyRate(100_000n, 2), 111n);
        });

        it('rejects a negative principal and unknown schedules', () => {
            assert.throws(() => node.ledger.estimateDailyRate(-1n, 0), stakingError('InvalidAmount'));
            assert.throws(() => node.ledger.estimateDailyRate(1000n, 5), stakingError('IndexOutOfRange'));
        });
    });
});

class ScriptedTransfer implements TransferCollaborator {
    pushes = 0;
    allowPush = true;
    onPush: (() => Promise<void>) | null = null;
    throwOnPush: Error | null = null;

    async pullFrom(): Promise<boolean> {
        return true;
    }

    async pushTo(): Promise<boolean> {
        this.pushes++;
        if (this.throwOnPush) throw this.throwOnPush;
        if (this.onPush) await this.onPush();
        return this.allowPush;
    }
}

describe('StakeLedger with a misbehaving collaborator', () => {
    let transfer: ScriptedTransfer;
    let ledger: StakeLedger;
    let clock: ManualClock;

    beforeEach(async () => {
        const state = new LedgerState();
        clock = manualClock(START);
        const registry = new ScheduleRegistry(state, new OperatorGate(OPERATOR), clock);
        await registry.initialize();
        transfer = new ScriptedTransfer();
        ledger = new StakeLedger(state, registry, transfer, clock);
        await ledger.stake('alice', 1000n, 0);
    });

    it('rolls a claim back when the payout is refused', async () => {
        clock.advance(2 * DAY);
        transfer.allowPush = false;
        await assert.rejects(ledger.claimReward('alice'), stakingError('TransferFailed'));
        const record = ledger.getStake('alice');
        assert.equal(record.totalClaimed, 0n);
        assert.equal(record.lastClaimTime, START);
        assert.equal(ledger.pendingReward('alice'), 2n);
    });

    it('keeps the stake active when the principal cannot be returned', async () => {
        clock.advance(LOCK_90);
        transfer.allowPush = false;
        await assert.rejects(ledger.unstake('alice'), stakingError('TransferFailed'));
        assert.equal(ledger.getStake('alice').isActive, true);
        assert.equal(ledger.poolTotal(), 1000n);
    });

    it('wraps a thrown collaborator error with its cause', async () => {
        clock.advance(LOCK_90);
        const boom = new Error('ledger offline');
        transfer.throwOnPush = boom;
        await assert.rejects(ledger.unstake('alice'), (err: unknown) => {
            assert.ok(isStakingError(err, 'TransferFailed'));
            assert.equal(err.cause, boom);
            return true;
        });
        assert.equal(ledger.getStake('alice').isActive, true);
    });

    it('reports a ledger error thrown by the collaborator as a failed transfer', async () => {
        clock.advance(LOCK_90);
        transfer.throwOnPush = new StakingError('OperationInProgress', 'nested unstake');
        await assert.rejects(ledger.unstake('alice'), (err: unknown) => {
            assert.ok(isStakingError(err, 'TransferFailed'));
            assert.ok(isStakingError(err.cause, 'OperationInProgress'));
            return true;
        });
        assert.equal(ledger.getStake('alice').isActive, true);
    });

    it('refuses a re-entrant call made during a transfer', async () => {
        clock.advance(LOCK_90);
        const seen: { err: unknown } = { err: null };
        transfer.onPush = async () => {
            try {
                await ledger.unstake('alice');
            } catch (err) {
                seen.err = err;
            }
        };
        assert.equal(await ledger.unstake('alice'), 1000n);
        assert.ok(isStakingError(seen.err, 'OperationInProgress'));
        assert.equal(transfer.pushes, 1);
        assert.equal(ledger.getStake('alice').isActive, false);
    });
});

describe('LedgerState.atomic', () => {
    it('puts records and schedules back and cuts the logs to their earlier length', async () => {
        const state = new LedgerState();
        state.tables.records.alice = { ...inactiveRecord(), principal: 1n, isActive: true };
        state.tables.roster.push('alice');
        state.tables.events.push({ _id: 'e0', category: 'stake', action: 'stake', actor: 'alice', timestamp: START, data: {} });
        const { roster, events } = state.tables;

        await assert.rejects(
            state.atomic('test', () => {
                state.tables.records.alice.principal = 9n;
                state.tables.records.bob = { ...inactiveRecord(), principal: 5n, isActive: true };
                state.tables.schedules.push({ lockDays: 1, lockSeconds: DAY, percentage: 1, enabled: true });
                state.tables.roster.push('bob');
                state.tables.events.push({ _id: 'e1', category: 'stake', action: 'stake', actor: 'bob', timestamp: START, data: {} });
                throw new Error('abort');
            }),
            /abort/
        );

        assert.deepEqual(state.tables.records, { alice: { ...inactiveRecord(), principal: 1n, isActive: true } });
        assert.deepEqual(state.tables.schedules, []);
        assert.deepEqual(state.tables.roster, ['alice']);
        assert.deepEqual(
            state.tables.events.map(e => e._id),
            ['e0']
        );
        assert.equal(state.tables.roster, roster);
        assert.equal(state.tables.events, events);
    });

    it('rejects an operation started while another is in flight', async () => {
        const state = new LedgerState();
        const outer = state.atomic('outer', async () => {
            await assert.rejects(state.atomic('inner', () => 1), stakingError('OperationInProgress'));
            return 2;
        });
        assert.equal(await outer, 2);
        assert.equal(await state.atomic('after', () => 3), 3);
    });
});

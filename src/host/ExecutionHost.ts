/**
 * Execution Host
 *
 * In-process stand-in for the ledger VM the pool would run on:
 * - operations run one at a time, to completion, synchronously
 * - call value is moved to the callee BEFORE the handler runs
 * - a handler that throws leaves every registered ledger as it found it
 *
 * Nested execute() calls (recipient hooks re-entering during a push) take
 * their own snapshot and roll back only themselves unless the error
 * propagates outward.
 */

import { NativeLedger } from '../ledger/NativeLedger.js';
import type { Journaled } from '../ledger/types.js';
import { InvalidAmountError } from '../pool/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Host');

export interface CallContext {
    sender: string;
    /** Base currency attached to the call, already credited to the callee */
    value: bigint;
}

type Checkpoint = () => void;

export class ExecutionHost {
    private readonly native: NativeLedger;
    private readonly journals: Array<() => Checkpoint> = [];
    private depth: number = 0;

    constructor(native: NativeLedger) {
        this.native = native;
        this.register(native);
    }

    /**
     * Put a ledger under the host's rollback
     */
    register<S>(ledger: Journaled<S>): void {
        this.journals.push(() => {
            const state = ledger.snapshot();
            return () => ledger.restore(state);
        });
    }

    getDepth(): number {
        return this.depth;
    }

    execute<T>(sender: string, callee: string, value: bigint, handler: (ctx: CallContext) => T): T {
        if (value < 0n) {
            throw new InvalidAmountError('Call value', value, 'must not be negative');
        }

        const checkpoints = this.journals.map(capture => capture());
        this.depth++;

        try {
            this.native.move(sender, callee, value);
            return handler({ sender, value });
        } catch (error) {
            for (const rollback of checkpoints) {
                rollback();
            }
            log.debug(`Reverted call from ${sender} at depth ${this.depth}: ${error instanceof Error ? error.message : 'Unknown error'}`);
            throw error;
        } finally {
            this.depth--;
        }
    }
}

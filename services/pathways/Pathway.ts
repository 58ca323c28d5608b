/**
 * services/pathways/Pathway.ts
 *
 * Shared plumbing for pathways: an ordered list of tagged steps run against
 * one MetaboliteStore, with unit-level rollback. A pathway keeps no state
 * between `perform` calls.
 */

import { getDefaultReporter, type Reporter } from '../reporting/Reporter';
import { describeError, ReactionError, type PathwayError, type PathwayName } from '../metabolism/errors';
import type { MetaboliteStore } from '../metabolism/MetaboliteStore';
import { assertTimeStep, type Reaction, type ReactionOutcome } from '../kinetics/Reaction';

export interface PathwayStep {
    label: string;
    reaction: Reaction;
}

export interface PathwayOptions {
    timeStep?: number;
    reporter?: Reporter;
}

export abstract class Pathway<TResult> {
    abstract readonly name: PathwayName;

    readonly timeStep: number;
    protected readonly reporter: Reporter;

    protected constructor(defaultTimeStep: number, options: PathwayOptions = {}) {
        this.timeStep = options.timeStep ?? defaultTimeStep;
        assertTimeStep(this.timeStep);
        this.reporter = options.reporter ?? getDefaultReporter();
    }

    abstract perform(store: MetaboliteStore, amount: number): TResult;

    /** Build the pathway-specific error. */
    protected abstract failure(message: string, cause?: unknown): PathwayError;

    /** Tag used for this pathway's log lines. */
    protected abstract readonly source: string;

    /**
     * Whole units to process. Fractional input is floored; anything below one
     * unit is rejected.
     */
    protected wholeUnits(amount: number, what: string): number {
        const units = Math.floor(amount);
        if (!Number.isFinite(units) || units <= 0) {
            throw this.failure(`The number of ${what} units must be positive.`);
        }
        return units;
    }

    /** Run one step for at most `extent` units. ReactionErrors become pathway errors. */
    protected runStep(store: MetaboliteStore, step: PathwayStep, extent?: number): ReactionOutcome {
        try {
            return step.reaction.run(store, this.timeStep, { extent, reporter: this.reporter });
        } catch (error) {
            if (error instanceof ReactionError) {
                throw this.failure(`Step '${step.label}' failed: ${error.message}`, error);
            }
            throw error;
        }
    }

    protected runSteps(store: MetaboliteStore, steps: readonly PathwayStep[], extent?: number): ReactionOutcome[] {
        return steps.map((step) => this.runStep(store, step, extent));
    }

    /**
     * Run `work` for one unit. If it throws, the store is returned to the
     * quantities it held when the unit started and the error is rethrown.
     */
    protected withinUnit<T>(store: MetaboliteStore, unitLabel: string, work: () => T): T {
        const checkpoint = store.snapshot();
        try {
            return work();
        } catch (error) {
            store.restore(checkpoint);
            this.reporter.logError(this.source, `${unitLabel} rolled back: ${describeError(error)}`);
            throw error;
        }
    }
}

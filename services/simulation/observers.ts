/**
 * Checks run by the SimulationController after every tick. An observer
 * returns the problems it found; an empty list means all is well.
 */

import { CONSERVATION_TOLERANCE } from '../../constants';
import { adenineTotals } from '../metabolism/energyAccounting';
import { describeError, QuantityError } from '../metabolism/errors';
import type { MetaboliteStore } from '../metabolism/MetaboliteStore';
import type { Cell } from '../organelles/Cell';

export interface SimulationObserver {
    readonly name: string;
    observe(cell: Cell, time: number): string[];
    /** Forget anything remembered from earlier ticks. */
    reset?(): void;
}

function compartments(cell: Cell): Array<[string, MetaboliteStore]> {
    return [
        [cell.cytoplasm.name, cell.cytoplasm.metabolites],
        [cell.mitochondrion.name, cell.mitochondrion.metabolites],
    ];
}

/** Every pool inside [minQuantity, maxQuantity]. */
export class BoundsObserver implements SimulationObserver {
    readonly name = 'bounds';

    observe(cell: Cell): string[] {
        const issues: string[] = [];
        for (const [label, store] of compartments(cell)) {
            try {
                store.validateAll();
            } catch (error) {
                if (!(error instanceof QuantityError)) throw error;
                issues.push(`${label}: ${describeError(error)}`);
            }
        }
        return issues;
    }
}

/**
 * ATP + ADP + AMP summed over the whole cell, unchanged since the first
 * observation. ADP import and ATP export move nucleotides between the
 * compartments, so only the cell-wide total is conserved.
 */
export class AdenineBalanceObserver implements SimulationObserver {
    readonly name = 'adenine_balance';

    private baseline: number | undefined;

    constructor(private readonly tolerance = CONSERVATION_TOLERANCE) {}

    observe(cell: Cell): string[] {
        let total = 0;
        for (const [, store] of compartments(cell)) total += adenineTotals(store).total;

        if (this.baseline === undefined) {
            this.baseline = total;
            return [];
        }
        if (Math.abs(total - this.baseline) > this.tolerance) {
            return [`Cell: adenine nucleotide total drifted from ${this.baseline} to ${total}`];
        }
        return [];
    }

    reset(): void {
        this.baseline = undefined;
    }
}

export function defaultObservers(): SimulationObserver[] {
    return [new BoundsObserver(), new AdenineBalanceObserver()];
}

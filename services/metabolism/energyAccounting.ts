/**
 * Conservation bookkeeping: adenine nucleotide totals, energy state and the
 * compensating ATP/ADP redistribution applied when the adenine pool drifts.
 */

import { CONSERVATION_TOLERANCE } from '../../constants';
import type { Reporter } from '../reporting/Reporter';
import type { MetaboliteStore } from './MetaboliteStore';

export interface AdenineTotals {
    atp: number;
    adp: number;
    amp: number;
    total: number;
}

export interface AdenineCorrection {
    /** final total - initial total, before correction */
    drift: number;
    /** amount removed from ATP (negative when added) */
    atpAdjustment: number;
    /** amount removed from ADP (negative when added) */
    adpAdjustment: number;
}

export function adenineTotals(store: MetaboliteStore): AdenineTotals {
    const atp = store.quantity('atp');
    const adp = store.quantity('adp');
    const amp = store.quantity('amp');
    return { atp, adp, amp, total: atp + adp + amp };
}

/** (ATP + ½ADP) / (ATP + ADP + AMP); 0 for an empty pool. */
export function adenylateEnergyCharge(totals: AdenineTotals): number {
    return totals.total === 0 ? 0 : (totals.atp + 0.5 * totals.adp) / totals.total;
}

export function energyState(store: MetaboliteStore): number {
    return store.totalEnergy;
}

export function isConserved(before: number, after: number, tolerance = CONSERVATION_TOLERANCE): boolean {
    return Math.abs(after - before) <= tolerance;
}

/**
 * Restore the adenine total recorded in `before`. The drift is taken out of
 * the ATP gained since `before` first and the rest out of ADP, in one batch.
 * Returns null when the pool is within tolerance.
 */
export function rebalanceAdenineNucleotides(
    store: MetaboliteStore,
    before: AdenineTotals,
    reporter: Reporter,
    source = 'Conservation',
): AdenineCorrection | null {
    const after = adenineTotals(store);
    const drift = after.total - before.total;
    if (isConserved(before.total, after.total)) return null;

    reporter.logWarning(
        source,
        `Adenine nucleotide imbalance detected. Initial: ${before.total}, Final: ${after.total}`,
    );

    const atpAdjustment = Math.min(drift, after.atp - before.atp);
    const adpAdjustment = drift - atpAdjustment;
    store.changeQuantities({ atp: -atpAdjustment, adp: -adpAdjustment });

    reporter.logWarning(
        source,
        `Adjusted ATP by ${-atpAdjustment} and ADP by ${-adpAdjustment} to maintain adenine nucleotide balance`,
    );
    return { drift, atpAdjustment, adpAdjustment };
}

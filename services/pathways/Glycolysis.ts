/**
 * services/pathways/Glycolysis.ts
 *
 * Glucose → 2 pyruvate in the cytoplasm.
 *
 *   investment (per glucose): hexokinase, phosphoglucose isomerase,
 *       phosphofructokinase, aldolase, triose-phosphate isomerase
 *   yield (per G3P, 2 per glucose): GAPDH, phosphoglycerate kinase,
 *       phosphoglycerate mutase, enolase, pyruvate kinase
 *
 * Each step is asked for exactly one unit of extent; the reaction engine
 * lowers that when kinetics or a pool is limiting. One glucose unit (its
 * investment steps and both of its G3P units) is the rollback unit: a failure
 * anywhere in it restores the store to where that glucose started. Glucose
 * units already completed stay.
 */

import { G3P_PER_GLUCOSE, GLYCOLYSIS_TIME_STEP } from '../../constants';
import {
    adenineTotals,
    isConserved,
    rebalanceAdenineNucleotides,
    type AdenineCorrection,
} from '../metabolism/energyAccounting';
import { GlycolysisError, type PathwayName } from '../metabolism/errors';
import type { MetaboliteStore } from '../metabolism/MetaboliteStore';
import { createGlycolysisReactions, type GlycolysisReactions } from './catalog/reactions';
import { Pathway, type PathwayOptions, type PathwayStep } from './Pathway';

export interface GlycolysisOptions extends PathwayOptions {
    /** Apply the compensating ATP/ADP adjustment when the adenine pool drifts (default true). */
    correctAdenineDrift?: boolean;
    /** Convert the pyruvate of this call to lactate at the end of the pass. */
    anaerobic?: boolean;
    /** NAD⁺ level below which lactate dehydrogenase runs ahead of GAPDH. */
    nadRegenerationThreshold?: number;
    reactions?: GlycolysisReactions;
}

export interface GlycolysisResult {
    /** ATP after - ATP before, after any adenine correction */
    netAtp: number;
    /** Total pyruvate kinase extent */
    pyruvate: number;
    /** Total GAPDH extent */
    nadh: number;
    /** Total lactate dehydrogenase extent */
    lactate: number;
    adenineCorrection: AdenineCorrection | null;
}

export interface YieldTally {
    pyruvate: number;
    nadh: number;
    lactate: number;
}

export class Glycolysis extends Pathway<GlycolysisResult> {
    readonly name: PathwayName = 'glycolysis';
    readonly reactions: GlycolysisReactions;
    protected readonly source = 'Glycolysis';

    private readonly correctAdenineDrift: boolean;
    private readonly anaerobic: boolean;
    private readonly nadRegenerationThreshold: number;
    private readonly investmentSteps: readonly PathwayStep[];
    private readonly yieldSteps: readonly PathwayStep[];

    constructor(options: GlycolysisOptions = {}) {
        super(GLYCOLYSIS_TIME_STEP, options);
        this.reactions = options.reactions ?? createGlycolysisReactions();
        this.correctAdenineDrift = options.correctAdenineDrift ?? true;
        this.anaerobic = options.anaerobic ?? false;
        this.nadRegenerationThreshold = options.nadRegenerationThreshold ?? 1;

        const r = this.reactions;
        this.investmentSteps = [
            { label: 'hexokinase', reaction: r.hexokinase },
            { label: 'phosphoglucose_isomerase', reaction: r.phosphoglucoseIsomerase },
            { label: 'phosphofructokinase', reaction: r.phosphofructokinase },
            { label: 'aldolase', reaction: r.aldolase },
            { label: 'triose_phosphate_isomerase', reaction: r.triosePhosphateIsomerase },
        ];
        this.yieldSteps = [
            { label: 'glyceraldehyde_3_phosphate_dehydrogenase', reaction: r.glyceraldehyde3PhosphateDehydrogenase },
            { label: 'phosphoglycerate_kinase', reaction: r.phosphoglycerateKinase },
            { label: 'phosphoglycerate_mutase', reaction: r.phosphoglycerateMutase },
            { label: 'enolase', reaction: r.enolase },
            { label: 'pyruvate_kinase', reaction: r.pyruvateKinase },
        ];
    }

    perform(store: MetaboliteStore, glucoseUnits: number): GlycolysisResult {
        const units = this.wholeUnits(glucoseUnits, 'glucose');
        this.reporter.logEvent(this.source, `Starting glycolysis with ${units} glucose units`);

        const before = adenineTotals(store);
        this.reporter.logDebug(
            this.source,
            `Initial ATP: ${before.atp}, Initial ADP: ${before.adp}, Initial AMP: ${before.amp}`,
        );

        const tally: YieldTally = { pyruvate: 0, nadh: 0, lactate: 0 };
        for (let i = 0; i < units; i++) {
            this.reporter.logDebug(this.source, `Processing glucose unit ${i + 1} of ${units}`);
            const unit = this.withinUnit(store, `Glucose unit ${i + 1}`, () => {
                this.investmentPhase(store, 1);
                return this.yieldPhase(store, G3P_PER_GLUCOSE);
            });
            tally.pyruvate += unit.pyruvate;
            tally.nadh += unit.nadh;
            tally.lactate += unit.lactate;
        }

        if (this.anaerobic && tally.pyruvate > 0) {
            tally.lactate += this.regenerateNad(store, tally.pyruvate);
        }

        let adenineCorrection: AdenineCorrection | null = null;
        if (this.correctAdenineDrift) {
            adenineCorrection = rebalanceAdenineNucleotides(store, before, this.reporter, this.source);
        } else {
            const after = adenineTotals(store);
            if (!isConserved(before.total, after.total)) {
                this.reporter.logWarning(
                    this.source,
                    `Adenine nucleotide imbalance left uncorrected. Initial: ${before.total}, Final: ${after.total}`,
                );
            }
        }

        const netAtp = store.quantity('atp') - before.atp;
        this.reporter.logEvent(
            this.source,
            `Glycolysis completed. Net ATP: ${netAtp}, pyruvate: ${tally.pyruvate}, NADH: ${tally.nadh}`,
        );
        return { netAtp, ...tally, adenineCorrection };
    }

    /** Steps 1-5, once per glucose unit. No rollback of its own. */
    investmentPhase(store: MetaboliteStore, glucoseUnits: number): void {
        const initialAtp = store.quantity('atp');
        for (let i = 0; i < glucoseUnits; i++) {
            this.runSteps(store, this.investmentSteps, 1);
        }
        this.reporter.logDebug(
            this.source,
            `ATP consumed in investment phase: ${initialAtp - store.quantity('atp')}`,
        );
    }

    /** Steps 6-10, once per G3P unit. No rollback of its own. */
    yieldPhase(store: MetaboliteStore, g3pUnits: number): YieldTally {
        const tally: YieldTally = { pyruvate: 0, nadh: 0, lactate: 0 };
        const initialAtp = store.quantity('atp');

        for (let i = 0; i < g3pUnits; i++) {
            this.reporter.logDebug(this.source, `Processing G3P unit ${i + 1} of ${g3pUnits}`);
            if (this.needsNadRegeneration(store)) {
                tally.lactate += this.regenerateNad(store, 1);
            }
            const outcomes = this.runSteps(store, this.yieldSteps, 1);
            tally.nadh += outcomes[0].rate;
            tally.pyruvate += outcomes[outcomes.length - 1].rate;
        }

        this.reporter.logDebug(this.source, `ATP produced in yield phase: ${store.quantity('atp') - initialAtp}`);
        return tally;
    }

    /**
     * Lactate dehydrogenase: pyruvate + NADH → lactate + NAD⁺.
     * Returns the extent converted.
     */
    regenerateNad(store: MetaboliteStore, extent: number): number {
        const outcome = this.runStep(store, { label: 'lactate_dehydrogenase', reaction: this.reactions.lactateDehydrogenase }, extent);
        if (outcome.rate > 0) {
            this.reporter.logDebug(this.source, `Regenerated ${outcome.rate} NAD+ via lactate dehydrogenase`);
        }
        return outcome.rate;
    }

    protected failure(message: string, cause?: unknown): GlycolysisError {
        return new GlycolysisError(message, { cause });
    }

    private needsNadRegeneration(store: MetaboliteStore): boolean {
        return (
            store.quantity('nad') < this.nadRegenerationThreshold &&
            (store.find('nadh')?.quantity ?? 0) > 0 &&
            (store.find('pyruvate')?.quantity ?? 0) > 0
        );
    }
}

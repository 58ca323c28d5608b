/**
 * services/pathways/KrebsCycle.ts
 *
 * Citric acid cycle in the mitochondrial matrix. One turn oxidises one
 * acetyl-CoA and regenerates the oxaloacetate it started from:
 *
 *   acetyl-CoA → 2 CO₂ + 3 NADH + FADH₂ + GTP
 */

import { CONSERVATION_TOLERANCE, KREBS_TIME_STEP } from '../../constants';
import { adenineTotals, energyState } from '../metabolism/energyAccounting';
import { KrebsCycleError, type PathwayName } from '../metabolism/errors';
import type { MetaboliteStore } from '../metabolism/MetaboliteStore';
import { createKrebsCycleReactions, type KrebsCycleReactions } from './catalog/reactions';
import { Pathway, type PathwayOptions, type PathwayStep } from './Pathway';

export interface KrebsCycleOptions extends PathwayOptions {
    reactions?: KrebsCycleReactions;
}

export interface KrebsTurn {
    co2: number;
    nadh: number;
    fadh2: number;
    gtp: number;
}

export interface KrebsCycleResult extends KrebsTurn {
    /** Store energy after - before */
    energyDelta: number;
    /** ATP + ADP + AMP after - before */
    adenineDelta: number;
}

export class KrebsCycle extends Pathway<KrebsCycleResult> {
    readonly name: PathwayName = 'krebs_cycle';
    readonly reactions: KrebsCycleReactions;
    protected readonly source = 'KrebsCycle';

    private readonly steps: readonly PathwayStep[];

    constructor(options: KrebsCycleOptions = {}) {
        super(KREBS_TIME_STEP, options);
        this.reactions = options.reactions ?? createKrebsCycleReactions();
        const r = this.reactions;
        this.steps = [
            { label: 'citrate_synthase', reaction: r.citrateSynthase },
            { label: 'aconitase', reaction: r.aconitase },
            { label: 'isocitrate_dehydrogenase', reaction: r.isocitrateDehydrogenase },
            { label: 'alpha_ketoglutarate_dehydrogenase', reaction: r.alphaKetoglutarateDehydrogenase },
            { label: 'succinyl_coa_synthetase', reaction: r.succinylCoaSynthetase },
            { label: 'succinate_dehydrogenase', reaction: r.succinateDehydrogenase },
            { label: 'fumarase', reaction: r.fumarase },
            { label: 'malate_dehydrogenase', reaction: r.malateDehydrogenase },
        ];
    }

    perform(store: MetaboliteStore, acetylCoaUnits: number): KrebsCycleResult {
        const units = this.wholeUnits(acetylCoaUnits, 'acetyl-CoA');
        const initialEnergy = energyState(store);
        const initialAdenine = adenineTotals(store).total;

        const total: KrebsTurn = { co2: 0, nadh: 0, fadh2: 0, gtp: 0 };
        for (let i = 0; i < units; i++) {
            const turn = this.withinUnit(store, `Krebs turn ${i + 1}`, () => this.turn(store));
            total.co2 += turn.co2;
            total.nadh += turn.nadh;
            total.fadh2 += turn.fadh2;
            total.gtp += turn.gtp;
        }
        this.reporter.logEvent(this.source, `Krebs Cycle completed. Produced ${total.co2} CO2.`);

        const energyDelta = energyState(store) - initialEnergy;
        if (Math.abs(energyDelta) > CONSERVATION_TOLERANCE) {
            this.reporter.logWarning(this.source, `Energy not conserved in Krebs Cycle. Difference: ${energyDelta}`);
        }
        const adenineDelta = adenineTotals(store).total - initialAdenine;
        if (Math.abs(adenineDelta) > CONSERVATION_TOLERANCE) {
            this.reporter.logWarning(
                this.source,
                `Adenine nucleotides not conserved in Krebs Cycle. Difference: ${adenineDelta}`,
            );
        }
        return { ...total, energyDelta, adenineDelta };
    }

    /** One complete turn; returns the CO₂ released. */
    cycle(store: MetaboliteStore): number {
        return this.withinUnit(store, 'Krebs turn', () => this.turn(store)).co2;
    }

    protected failure(message: string, cause?: unknown): KrebsCycleError {
        return new KrebsCycleError(message, { cause });
    }

    private turn(store: MetaboliteStore): KrebsTurn {
        const extents = new Map<string, number>();
        for (const step of this.steps) {
            extents.set(step.label, this.runStep(store, step, 1).rate);
        }
        const extent = (label: string) => extents.get(label) ?? 0;

        const co2 = extent('isocitrate_dehydrogenase') + extent('alpha_ketoglutarate_dehydrogenase');
        this.reporter.logDebug(this.source, `Turn released ${co2} CO2`);
        return {
            co2,
            nadh: co2 + extent('malate_dehydrogenase'),
            fadh2: extent('succinate_dehydrogenase'),
            gtp: extent('succinyl_coa_synthetase'),
        };
    }
}

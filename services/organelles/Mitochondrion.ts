/**
 * services/organelles/Mitochondrion.ts
 *
 * Matrix pools plus the pathways that run on them: pyruvate oxidation, the
 * Krebs cycle and oxidative phosphorylation.
 *
 * Calcium buffering: while matrix calcium is above the threshold, the
 * calcium-sensitive dehydrogenases (pyruvate, isocitrate and
 * α-ketoglutarate dehydrogenase) run at `calciumBoostFactor` × activity.
 */

import mitochondrionSeedData from '../../data/mitochondrion.json';
import { CALCIUM_BOOST_FACTOR, CALCIUM_THRESHOLD } from '../../constants';
import type { Enzyme } from '../kinetics/Enzyme';
import { getDefaultReporter, type Reporter } from '../reporting/Reporter';
import type { MetaboliteStore } from '../metabolism/MetaboliteStore';
import { parseSeeds, seedQuantities, storeFromSeeds, type SeedCollection } from '../metabolism/seeds';
import { KrebsCycle, type KrebsCycleResult } from '../pathways/KrebsCycle';
import {
    OxidativePhosphorylation,
    type OxidativePhosphorylationOptions,
    type OxidativePhosphorylationResult,
} from '../pathways/OxidativePhosphorylation';
import { PyruvateOxidation, type PyruvateOxidationResult } from '../pathways/PyruvateOxidation';

export const MITOCHONDRION_SEEDS: SeedCollection = parseSeeds(mitochondrionSeedData, 'data/mitochondrion.json');

export interface MitochondrionOptions {
    reporter?: Reporter;
    seeds?: SeedCollection;
    calciumThreshold?: number;
    calciumBoostFactor?: number;
    oxidativePhosphorylation?: Omit<OxidativePhosphorylationOptions, 'reporter'>;
}

export interface RespirationResult {
    pyruvateOxidation: PyruvateOxidationResult | null;
    krebsCycle: KrebsCycleResult | null;
    oxidativePhosphorylation: OxidativePhosphorylationResult;
}

export class Mitochondrion {
    readonly name = 'Mitochondrion';
    readonly metabolites: MetaboliteStore;
    readonly pyruvateOxidation: PyruvateOxidation;
    readonly krebsCycle: KrebsCycle;
    readonly oxidativePhosphorylation: OxidativePhosphorylation;
    readonly calciumThreshold: number;
    readonly calciumBoostFactor: number;

    private readonly seeds: SeedCollection;
    private readonly reporter: Reporter;
    private readonly calciumSensitive: readonly Enzyme[];

    constructor(options: MitochondrionOptions = {}) {
        this.reporter = options.reporter ?? getDefaultReporter();
        this.seeds = options.seeds ?? MITOCHONDRION_SEEDS;
        this.calciumThreshold = options.calciumThreshold ?? CALCIUM_THRESHOLD;
        this.calciumBoostFactor = options.calciumBoostFactor ?? CALCIUM_BOOST_FACTOR;
        this.metabolites = storeFromSeeds(this.seeds, { reporter: this.reporter });

        this.pyruvateOxidation = new PyruvateOxidation({ reporter: this.reporter });
        this.krebsCycle = new KrebsCycle({ reporter: this.reporter });
        this.oxidativePhosphorylation = new OxidativePhosphorylation({
            ...options.oxidativePhosphorylation,
            reporter: this.reporter,
        });
        this.calciumSensitive = [
            this.pyruvateOxidation.step.reaction.enzyme,
            this.krebsCycle.reactions.isocitrateDehydrogenase.enzyme,
            this.krebsCycle.reactions.alphaKetoglutarateDehydrogenase.enzyme,
        ];
        this.updateCalciumBoost();
    }

    get calcium(): number {
        return this.metabolites.find('calcium')?.quantity ?? 0;
    }

    get calciumBoosted(): boolean {
        return this.calcium > this.calciumThreshold;
    }

    /** Take up calcium (clamped to the pool max). Returns the amount buffered. */
    bufferCalcium(amount: number): number {
        if (!(amount >= 0)) throw new RangeError(`Calcium amount must be non-negative. Got: ${amount}`);
        const buffered = this.metabolites.get('calcium').fill(amount);
        this.updateCalciumBoost();
        return buffered;
    }

    /** Release up to `amount` calcium. Returns the amount released. */
    releaseCalcium(amount: number): number {
        if (!(amount >= 0)) throw new RangeError(`Calcium amount must be non-negative. Got: ${amount}`);
        const released = Math.min(amount, this.calcium);
        this.metabolites.consume({ calcium: released });
        this.updateCalciumBoost();
        return released;
    }

    /**
     * Oxidise whole pyruvate units, turn the Krebs cycle once per whole
     * acetyl-CoA and run `updates` rounds of oxidative phosphorylation.
     */
    respire(pyruvateUnits: number, updates = 1): RespirationResult {
        const pyruvateOxidation =
            Math.floor(pyruvateUnits) >= 1 ? this.pyruvateOxidation.perform(this.metabolites, pyruvateUnits) : null;

        const acetylCoa = Math.floor(this.metabolites.quantity('acetyl_coa'));
        const krebsCycle = acetylCoa >= 1 ? this.krebsCycle.perform(this.metabolites, acetylCoa) : null;

        const oxidativePhosphorylation = this.oxidativePhosphorylation.perform(this.metabolites, updates);
        return { pyruvateOxidation, krebsCycle, oxidativePhosphorylation };
    }

    /** Pools back to their seed quantities; activities follow the seeded calcium. */
    reset(): void {
        this.metabolites.restore(seedQuantities(this.seeds));
        this.updateCalciumBoost();
        this.reporter.logDebug(this.name, 'Reset to seed quantities');
    }

    private updateCalciumBoost(): void {
        const activity = this.calciumBoosted ? this.calciumBoostFactor : 1;
        for (const enzyme of this.calciumSensitive) {
            if (enzyme.activity !== activity) {
                enzyme.setActivity(activity);
                this.reporter.logDebug(this.name, `${enzyme.name} activity set to ${activity}`);
            }
        }
    }
}

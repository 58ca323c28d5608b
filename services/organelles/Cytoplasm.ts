/**
 * Cytosolic compartment: its metabolite pools and the glycolysis that runs
 * on them.
 */

import cytoplasmSeedData from '../../data/cytoplasm.json';
import { getDefaultReporter, type Reporter } from '../reporting/Reporter';
import type { MetaboliteStore } from '../metabolism/MetaboliteStore';
import { parseSeeds, seedQuantities, storeFromSeeds, type SeedCollection } from '../metabolism/seeds';
import { Glycolysis, type GlycolysisOptions, type GlycolysisResult } from '../pathways/Glycolysis';

export const CYTOPLASM_SEEDS: SeedCollection = parseSeeds(cytoplasmSeedData, 'data/cytoplasm.json');

export interface CytoplasmOptions {
    reporter?: Reporter;
    seeds?: SeedCollection;
    glycolysis?: Omit<GlycolysisOptions, 'reporter'>;
}

export class Cytoplasm {
    readonly name = 'Cytoplasm';
    readonly metabolites: MetaboliteStore;
    readonly glycolysis: Glycolysis;

    private readonly seeds: SeedCollection;
    private readonly reporter: Reporter;

    constructor(options: CytoplasmOptions = {}) {
        this.reporter = options.reporter ?? getDefaultReporter();
        this.seeds = options.seeds ?? CYTOPLASM_SEEDS;
        this.metabolites = storeFromSeeds(this.seeds, { reporter: this.reporter });
        this.glycolysis = new Glycolysis({ ...options.glycolysis, reporter: this.reporter });
    }

    addGlucose(amount: number): void {
        this.metabolites.produce({ glucose: amount });
    }

    performGlycolysis(glucoseUnits: number): GlycolysisResult {
        return this.glycolysis.perform(this.metabolites, glucoseUnits);
    }

    /** Pools back to their seed quantities, enzyme activities back to 1. */
    reset(): void {
        this.metabolites.restore(seedQuantities(this.seeds));
        for (const reaction of Object.values(this.glycolysis.reactions)) {
            reaction.enzyme.setActivity(1);
        }
        this.reporter.logDebug(this.name, 'Reset to seed quantities');
    }
}

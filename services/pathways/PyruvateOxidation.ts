/**
 * Pyruvate + NAD⁺ + CoA → acetyl-CoA + NADH + CO₂ (pyruvate dehydrogenase),
 * one unit at a time in the mitochondrial matrix.
 */

import { KREBS_TIME_STEP } from '../../constants';
import { PyruvateOxidationError, type PathwayName } from '../metabolism/errors';
import type { MetaboliteStore } from '../metabolism/MetaboliteStore';
import type { Reaction } from '../kinetics/Reaction';
import { createPyruvateOxidationReaction } from './catalog/reactions';
import { Pathway, type PathwayOptions, type PathwayStep } from './Pathway';

export interface PyruvateOxidationOptions extends PathwayOptions {
    reaction?: Reaction;
}

export interface PyruvateOxidationResult {
    acetylCoa: number;
    nadh: number;
    co2: number;
}

export class PyruvateOxidation extends Pathway<PyruvateOxidationResult> {
    readonly name: PathwayName = 'pyruvate_oxidation';
    readonly step: PathwayStep;
    protected readonly source = 'PyruvateOxidation';

    constructor(options: PyruvateOxidationOptions = {}) {
        super(KREBS_TIME_STEP, options);
        this.step = { label: 'pyruvate_dehydrogenase', reaction: options.reaction ?? createPyruvateOxidationReaction() };
    }

    perform(store: MetaboliteStore, pyruvateUnits: number): PyruvateOxidationResult {
        const units = this.wholeUnits(pyruvateUnits, 'pyruvate');
        let converted = 0;
        for (let i = 0; i < units; i++) {
            converted += this.withinUnit(store, `Pyruvate unit ${i + 1}`, () => this.runStep(store, this.step, 1).rate);
        }
        this.reporter.logEvent(this.source, `Oxidised ${converted} pyruvate to acetyl-CoA`);
        return { acetylCoa: converted, nadh: converted, co2: converted };
    }

    protected failure(message: string, cause?: unknown): PyruvateOxidationError {
        return new PyruvateOxidationError(message, { cause });
    }
}

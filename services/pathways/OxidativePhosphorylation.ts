/**
 * services/pathways/OxidativePhosphorylation.ts
 *
 * Electron transport chain, proton leak and ATP synthase on the
 * mitochondrial store. The gradient is the `proton_gradient` pool.
 *
 * Per update:
 *   Complex I    NADH + Q        → NAD⁺ + QH₂          4 H⁺ per NADH
 *   Complex II   FADH₂ + Q       → FAD + QH₂           no pumping
 *   Complex III  QH₂ + 2 cyt c   → Q + 2 cyt c(red)    4 H⁺
 *   Complex IV   2 cyt c(red) + ½ O₂ → 2 cyt c + H₂O   2 H⁺
 *   leak         logistic in the gradient
 *   ATP synthase ADP + Pi        → ATP                 protonsPerAtp H⁺ per ATP
 *
 * Every complex is bounded by its reactant pools, a per-update turnover and
 * the gradient headroom.
 */

import {
    COMPLEX_TURNOVER_PER_UPDATE,
    LEAK_MIDPOINT,
    LEAK_RATE,
    LEAK_STEEPNESS,
    MAX_PROTON_GRADIENT,
    OXIDATIVE_PHOSPHORYLATION_TIME_STEP,
    PROTONS_PER_ATP,
    PROTONS_PER_FADH2,
    PROTONS_PER_NADH,
    PROTONS_PER_OXYGEN_REDUCTION,
    PROTONS_PER_UBIQUINOL,
} from '../../constants';
import { describeError, MetaboliteError, OxidativePhosphorylationError, type PathwayName } from '../metabolism/errors';
import type { MetaboliteStore, StoreExchange } from '../metabolism/MetaboliteStore';
import { Pathway, type PathwayOptions } from './Pathway';

export type RemainderPolicy = 'retain' | 'discard';

export interface ProtonLeakParameters {
    leakRate: number;
    steepness: number;
    midpoint: number;
}

export const DEFAULT_LEAK: ProtonLeakParameters = {
    leakRate: LEAK_RATE,
    steepness: LEAK_STEEPNESS,
    midpoint: LEAK_MIDPOINT,
};

export interface OxidativePhosphorylationOptions extends PathwayOptions {
    /** What happens to protons left over after ATP synthesis (default 'retain'). */
    remainderPolicy?: RemainderPolicy;
    protonsPerAtp?: number;
    maxProtonGradient?: number;
    turnover?: number;
    leak?: Partial<ProtonLeakParameters>;
}

export interface ElectronTransportResult {
    complexI: number;
    complexII: number;
    complexIII: number;
    complexIV: number;
    protonsPumped: number;
}

export interface AtpSynthesisResult {
    atp: number;
    protonsUsed: number;
    protonsDiscarded: number;
}

export interface OxidativePhosphorylationResult {
    atp: number;
    nadhOxidized: number;
    fadh2Oxidized: number;
    oxygenConsumed: number;
    protonsPumped: number;
    protonsLeaked: number;
    protonsDiscarded: number;
    /** Gradient at the end of the call */
    protonGradient: number;
}

const GRADIENT = 'proton_gradient';

/**
 * Protons leaking back across the inner membrane at gradient g:
 *   leakRate / (1 + exp(-steepness × (g - midpoint)))
 * Zero for an empty gradient, never negative, non-decreasing in g.
 */
export function calculateProtonLeak(gradient: number, parameters: ProtonLeakParameters = DEFAULT_LEAK): number {
    if (!(gradient > 0)) return 0;
    const { leakRate, steepness, midpoint } = parameters;
    return Math.max(0, leakRate / (1 + Math.exp(-steepness * (gradient - midpoint))));
}

export class OxidativePhosphorylation extends Pathway<OxidativePhosphorylationResult> {
    readonly name: PathwayName = 'oxidative_phosphorylation';
    readonly remainderPolicy: RemainderPolicy;
    protected readonly source = 'OxidativePhosphorylation';

    private readonly protonsPerAtp: number;
    private readonly maxProtonGradient: number;
    private readonly turnover: number;
    private readonly leak: ProtonLeakParameters;

    constructor(options: OxidativePhosphorylationOptions = {}) {
        super(OXIDATIVE_PHOSPHORYLATION_TIME_STEP, options);
        this.remainderPolicy = options.remainderPolicy ?? 'retain';
        this.protonsPerAtp = options.protonsPerAtp ?? PROTONS_PER_ATP;
        this.maxProtonGradient = options.maxProtonGradient ?? MAX_PROTON_GRADIENT;
        this.turnover = options.turnover ?? COMPLEX_TURNOVER_PER_UPDATE;
        this.leak = { ...DEFAULT_LEAK, ...options.leak };
        if (!(this.protonsPerAtp > 0)) throw new RangeError('protonsPerAtp must be positive');
        if (!(this.turnover >= 0)) throw new RangeError('turnover must be non-negative');
    }

    perform(store: MetaboliteStore, updates = 1): OxidativePhosphorylationResult {
        const count = this.wholeUnits(updates, 'update');
        const result: OxidativePhosphorylationResult = {
            atp: 0,
            nadhOxidized: 0,
            fadh2Oxidized: 0,
            oxygenConsumed: 0,
            protonsPumped: 0,
            protonsLeaked: 0,
            protonsDiscarded: 0,
            protonGradient: 0,
        };

        for (let i = 0; i < count; i++) {
            this.withinUnit(store, `Update ${i + 1}`, () => {
                const etc = this.electronTransportChain(store);
                const leaked = this.leakProtons(store);
                const synthesis = this.synthesizeAtp(store);

                result.nadhOxidized += etc.complexI;
                result.fadh2Oxidized += etc.complexII;
                result.oxygenConsumed += etc.complexIV * 0.5;
                result.protonsPumped += etc.protonsPumped;
                result.protonsLeaked += leaked;
                result.atp += synthesis.atp;
                result.protonsDiscarded += synthesis.protonsDiscarded;
            });
        }

        result.protonGradient = store.quantity(GRADIENT);
        this.reporter.logEvent(
            this.source,
            `Produced ${result.atp} ATP. Remaining proton gradient: ${result.protonGradient}`,
        );
        return result;
    }

    /** Run complexes I-IV once; each returns the electron pairs it moved. */
    electronTransportChain(store: MetaboliteStore): ElectronTransportResult {
        const turnover = this.turnover * this.timeStep;

        const complexI = Math.min(
            turnover,
            store.quantity('nadh'),
            store.quantity('ubiquinone'),
            this.headroom(store) / PROTONS_PER_NADH,
        );
        this.exchange(store, 'Complex I', {
            consume: { nadh: complexI, ubiquinone: complexI },
            produce: { nad: complexI, ubiquinol: complexI, [GRADIENT]: complexI * PROTONS_PER_NADH },
        }, complexI);

        const complexII = Math.min(turnover, store.quantity('fadh2'), store.quantity('ubiquinone'));
        this.exchange(store, 'Complex II', {
            consume: { fadh2: complexII, ubiquinone: complexII },
            produce: { fad: complexII, ubiquinol: complexII, [GRADIENT]: complexII * PROTONS_PER_FADH2 },
        }, complexII);

        const complexIII = Math.min(
            turnover,
            store.quantity('ubiquinol'),
            store.quantity('cytochrome_c_oxidized') / 2,
            this.headroom(store) / PROTONS_PER_UBIQUINOL,
        );
        this.exchange(store, 'Complex III', {
            consume: { ubiquinol: complexIII, cytochrome_c_oxidized: 2 * complexIII },
            produce: {
                ubiquinone: complexIII,
                cytochrome_c_reduced: 2 * complexIII,
                [GRADIENT]: complexIII * PROTONS_PER_UBIQUINOL,
            },
        }, complexIII);

        const complexIV = Math.min(
            turnover,
            store.quantity('cytochrome_c_reduced') / 2,
            store.quantity('oxygen') / 0.5,
            this.headroom(store) / PROTONS_PER_OXYGEN_REDUCTION,
        );
        this.exchange(store, 'Complex IV', {
            consume: { cytochrome_c_reduced: 2 * complexIV, oxygen: 0.5 * complexIV },
            produce: {
                cytochrome_c_oxidized: 2 * complexIV,
                water: complexIV,
                [GRADIENT]: complexIV * PROTONS_PER_OXYGEN_REDUCTION,
            },
        }, complexIV);

        const protonsPumped =
            complexI * PROTONS_PER_NADH +
            complexII * PROTONS_PER_FADH2 +
            complexIII * PROTONS_PER_UBIQUINOL +
            complexIV * PROTONS_PER_OXYGEN_REDUCTION;
        this.reporter.logDebug(this.source, `Proton gradient after ETC: ${store.quantity(GRADIENT)}`);
        return { complexI, complexII, complexIII, complexIV, protonsPumped };
    }

    /** Returns the protons lost. */
    leakProtons(store: MetaboliteStore): number {
        const gradient = store.quantity(GRADIENT);
        const leaked = Math.min(gradient, calculateProtonLeak(gradient, this.leak) * this.timeStep);
        this.exchange(store, 'Proton leak', { consume: { [GRADIENT]: leaked } }, leaked);
        this.reporter.logDebug(this.source, `Protons leaked: ${leaked}`);
        return leaked;
    }

    /**
     * ATP synthase: whole ATP units bounded by the gradient, ADP, Pi and the
     * ATP headroom. The remainder policy decides what happens to the rest.
     */
    synthesizeAtp(store: MetaboliteStore): AtpSynthesisResult {
        const gradient = store.quantity(GRADIENT);
        const atp = Math.floor(
            Math.min(gradient / this.protonsPerAtp, store.quantity('adp'), store.quantity('pi'), store.get('atp').capacity),
        );
        const protonsUsed = atp * this.protonsPerAtp;
        const remaining = gradient - protonsUsed;
        const protonsDiscarded = this.remainderPolicy === 'discard' ? remaining - (remaining % this.protonsPerAtp) : 0;

        this.exchange(store, 'ATP synthase', {
            consume: { adp: atp, pi: atp, [GRADIENT]: protonsUsed + protonsDiscarded },
            produce: { atp },
        }, atp + protonsDiscarded);
        if (protonsDiscarded > 0) {
            this.reporter.logDebug(this.source, `Discarded ${protonsDiscarded} protons after ATP synthesis`);
        }
        return { atp, protonsUsed, protonsDiscarded };
    }

    protected failure(message: string, cause?: unknown): OxidativePhosphorylationError {
        return new OxidativePhosphorylationError(message, { cause });
    }

    private headroom(store: MetaboliteStore): number {
        const gradient = store.get(GRADIENT);
        return Math.max(0, Math.min(gradient.capacity, this.maxProtonGradient - gradient.quantity));
    }

    private exchange(store: MetaboliteStore, label: string, batch: StoreExchange, extent: number): void {
        if (!(extent > 0)) return;
        try {
            store.apply(batch);
        } catch (error) {
            if (error instanceof MetaboliteError) {
                throw this.failure(`${label} failed: ${describeError(error)}`, error);
            }
            throw error;
        }
    }
}

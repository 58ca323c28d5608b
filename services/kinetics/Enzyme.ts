/**
 * services/kinetics/Enzyme.ts
 *
 * Rate laws for enzyme-catalysed steps.
 *
 * Michaelis-Menten (default):
 *   Km_eff   = Km   × Π (1 + [I]/Ki)          competitive inhibitors
 *   Vmax_eff = Vmax × activity × Π (1 + [A]/Ka)
 *   v        = Vmax_eff × S / (Km_eff + S)
 *
 * Hill (when a cooperativity exponent is configured):
 *   v = allostericRegulation(Vmax × activity) × Sⁿ / (Kⁿ + Sⁿ)
 *
 * With a per-substrate Km map the saturation terms of all substrates are
 * multiplied together.
 */

export type Concentrations = Readonly<Record<string, number>>;

export interface EnzymeDefinition {
    name: string;
    /** Maximum rate (k_cat × [E]) */
    vmax: number;
    /** A single Km, or one per substrate */
    km: number | Readonly<Record<string, number>>;
    /** species -> Ki */
    inhibitors?: Readonly<Record<string, number>>;
    /** species -> Ka */
    activators?: Readonly<Record<string, number>>;
    hillCoefficient?: number;
    activity?: number;
}

export function michaelisMenten(vmax: number, km: number, substrate: number): number {
    if (substrate <= 0) return 0;
    return (vmax * substrate) / (km + substrate);
}

export function hillEquation(vmax: number, k: number, substrate: number, n: number): number {
    if (substrate <= 0) return 0;
    const sn = Math.pow(substrate, n);
    return (vmax * sn) / (Math.pow(k, n) + sn);
}

/**
 * Independent (non-competitive) inhibition and activation factors:
 *   base × Π 1/(1 + [I]/Ki) × Π (1 + [A]/Ka)
 */
export function allostericRegulation(
    baseActivity: number,
    levels: Concentrations,
    inhibitors: Readonly<Record<string, number>> = {},
    activators: Readonly<Record<string, number>> = {},
): number {
    let activity = baseActivity;
    for (const [species, ki] of Object.entries(inhibitors)) {
        activity *= 1 / (1 + (levels[species] ?? 0) / ki);
    }
    for (const [species, ka] of Object.entries(activators)) {
        activity *= 1 + (levels[species] ?? 0) / ka;
    }
    return activity;
}

function lowerKeys(record: Readonly<Record<string, number>> | undefined, label: string, owner: string): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [key, value] of Object.entries(record ?? {})) {
        if (!(value > 0)) throw new RangeError(`Enzyme ${owner}: ${label} for ${key} must be positive`);
        out[key.toLowerCase()] = value;
    }
    return out;
}

export class Enzyme {
    readonly name: string;
    readonly vmax: number;
    readonly km: number | Readonly<Record<string, number>>;
    readonly inhibitors: Readonly<Record<string, number>>;
    readonly activators: Readonly<Record<string, number>>;
    readonly hillCoefficient?: number;

    private _activity: number;

    constructor(definition: EnzymeDefinition) {
        const { name, vmax, km, hillCoefficient, activity = 1 } = definition;
        if (!(vmax >= 0)) throw new RangeError(`Enzyme ${name}: vmax must be non-negative`);
        if (hillCoefficient !== undefined && !(hillCoefficient > 0)) {
            throw new RangeError(`Enzyme ${name}: hill coefficient must be positive`);
        }
        if (!(activity >= 0)) throw new RangeError(`Enzyme ${name}: activity must be non-negative`);

        this.name = name;
        this.vmax = vmax;
        if (typeof km === 'number') {
            if (!(km > 0)) throw new RangeError(`Enzyme ${name}: Km must be positive`);
            this.km = km;
        } else {
            this.km = Object.freeze(lowerKeys(km, 'Km', name));
        }
        this.inhibitors = Object.freeze(lowerKeys(definition.inhibitors, 'Ki', name));
        this.activators = Object.freeze(lowerKeys(definition.activators, 'Ka', name));
        this.hillCoefficient = hillCoefficient;
        this._activity = activity;
    }

    get activity(): number {
        return this._activity;
    }

    /** Feedback hook: the only mutable part of an enzyme. */
    setActivity(activity: number): void {
        if (!(activity >= 0) || !Number.isFinite(activity)) {
            throw new RangeError(`Enzyme ${this.name}: activity must be a non-negative number`);
        }
        this._activity = activity;
    }

    /** Species whose concentration the rate law reads as substrates. */
    get substrates(): string[] {
        return typeof this.km === 'number' ? [] : Object.keys(this.km);
    }

    /** Species that regulate the enzyme. */
    get regulators(): string[] {
        return [...new Set([...Object.keys(this.inhibitors), ...Object.keys(this.activators)])];
    }

    /** Km for one substrate (or the single Km). */
    kmFor(substrate?: string): number {
        if (typeof this.km === 'number') return this.km;
        const key = substrate?.toLowerCase();
        const value = key !== undefined ? this.km[key] : undefined;
        if (value !== undefined) return value;
        const first = Object.values(this.km)[0];
        if (first === undefined) throw new RangeError(`Enzyme ${this.name} has no Km`);
        return first;
    }

    /**
     * Single-substrate rate at concentration S, regulated by `levels`.
     */
    calculateRate(substrateConcentration: number, levels: Concentrations = {}, substrate?: string): number {
        const km = this.kmFor(substrate);
        if (this.hillCoefficient !== undefined) {
            const vmax = allostericRegulation(this.vmax * this._activity, levels, this.inhibitors, this.activators);
            return hillEquation(vmax, km, substrateConcentration, this.hillCoefficient);
        }
        return michaelisMenten(this.effectiveVmax(levels), this.effectiveKm(km, levels), substrateConcentration);
    }

    /**
     * Rate from a full concentration snapshot. A Km map contributes one
     * saturation term per substrate; a single Km reads `primarySubstrate`.
     */
    rate(levels: Concentrations, primarySubstrate?: string): number {
        if (typeof this.km === 'number') {
            const substrate = primarySubstrate?.toLowerCase();
            if (substrate === undefined) return 0;
            return this.calculateRate(levels[substrate] ?? 0, levels, substrate);
        }

        const entries = Object.entries(this.km);
        if (this.hillCoefficient !== undefined) {
            const n = this.hillCoefficient;
            let rate = allostericRegulation(this.vmax * this._activity, levels, this.inhibitors, this.activators);
            for (const [substrate, km] of entries) rate = hillEquation(rate, km, levels[substrate] ?? 0, n);
            return rate;
        }

        let rate = this.effectiveVmax(levels);
        for (const [substrate, km] of entries) {
            rate = michaelisMenten(rate, this.effectiveKm(km, levels), levels[substrate] ?? 0);
        }
        return rate;
    }

    private effectiveKm(km: number, levels: Concentrations): number {
        let effective = km;
        for (const [species, ki] of Object.entries(this.inhibitors)) {
            effective *= 1 + (levels[species] ?? 0) / ki;
        }
        return effective;
    }

    private effectiveVmax(levels: Concentrations): number {
        let effective = this.vmax * this._activity;
        for (const [species, ka] of Object.entries(this.activators)) {
            effective *= 1 + (levels[species] ?? 0) / ka;
        }
        return effective;
    }
}

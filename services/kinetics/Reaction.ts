/**
 * services/kinetics/Reaction.ts
 *
 * Binds an Enzyme to a stoichiometric consume/produce map and runs it
 * against a MetaboliteStore.
 *
 * Throughput is the minimum of the candidate limiting factors:
 *   reaction_rate     enzyme rate × time step
 *   <species>         quantity / coefficient, for every consumed species
 *   requested_extent  optional cap supplied by the caller (whole pathway units)
 * so a reaction can never drive a pool below zero. Every factor equal to
 * the minimum is reported as binding.
 */

import { getDefaultReporter, type Reporter } from '../reporting/Reporter';
import { describeError, ReactionError } from '../metabolism/errors';
import type { MetaboliteStore } from '../metabolism/MetaboliteStore';
import type { Concentrations, Enzyme } from './Enzyme';

export type Stoichiometry = Readonly<Record<string, number>>;

export interface ReactionDefinition {
    name: string;
    enzyme: Enzyme;
    consume: Stoichiometry;
    produce: Stoichiometry;
}

export interface ExecuteOptions {
    /** Upper bound on the extent of this call, in reaction units. */
    extent?: number;
    reporter?: Reporter;
}

export interface LimitingFactor {
    name: string;
    value: number;
}

export interface ReactionOutcome {
    reaction: string;
    /** Enzyme rate before any limit is applied */
    nominalRate: number;
    /** Actual extent of this call */
    rate: number;
    limitingFactors: LimitingFactor[];
    binding: string[];
    consumed: Record<string, number>;
    produced: Record<string, number>;
}

export const REACTION_RATE_FACTOR = 'reaction_rate';
export const REQUESTED_EXTENT_FACTOR = 'requested_extent';

function normalizeStoichiometry(map: Stoichiometry, reaction: string): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [species, coefficient] of Object.entries(map)) {
        if (!Number.isFinite(coefficient) || coefficient < 0) {
            throw new RangeError(`Reaction ${reaction}: coefficient for ${species} must be non-negative`);
        }
        out[species.toLowerCase()] = coefficient;
    }
    return out;
}

/**
 * How many whole reaction units the pools can support: min(quantity / coefficient).
 * Infinity when nothing is consumed.
 */
export function stoichiometricLimit(store: MetaboliteStore, consume: Stoichiometry): number {
    let limit = Infinity;
    for (const [species, coefficient] of Object.entries(consume)) {
        if (coefficient > 0) limit = Math.min(limit, store.quantity(species) / coefficient);
    }
    return limit;
}

export function assertTimeStep(timeStep: number): void {
    if (!Number.isFinite(timeStep) || timeStep < 0) {
        throw new RangeError(`Time step cannot be negative. Got: ${timeStep}`);
    }
}

export class Reaction {
    readonly name: string;
    readonly enzyme: Enzyme;
    readonly consume: Readonly<Record<string, number>>;
    readonly produce: Readonly<Record<string, number>>;

    constructor({ name, enzyme, consume, produce }: ReactionDefinition) {
        this.name = name;
        this.enzyme = enzyme;
        this.consume = Object.freeze(normalizeStoichiometry(consume, name));
        this.produce = Object.freeze(normalizeStoichiometry(produce, name));
    }

    /** Run the reaction and return the actual rate. */
    execute(store: MetaboliteStore, timeStep = 1.0, options: ExecuteOptions = {}): number {
        return this.run(store, timeStep, options).rate;
    }

    /** Run the reaction and return the full outcome. */
    run(store: MetaboliteStore, timeStep = 1.0, options: ExecuteOptions = {}): ReactionOutcome {
        const reporter = options.reporter ?? getDefaultReporter();
        const outcome = this.evaluate(store, timeStep, options);

        reporter.logDebug('Reaction', `'${this.name}': initial reaction rate ${outcome.nominalRate.toFixed(6)}`);
        for (const factor of outcome.limitingFactors) {
            reporter.logDebug('Reaction', `'${this.name}':   - ${factor.name}: ${factor.value.toFixed(6)}`);
        }
        reporter.logDebug(
            'Reaction',
            `'${this.name}': rate limited by ${outcome.binding.join(', ')}. Actual rate: ${outcome.rate.toFixed(6)}`,
        );

        if (outcome.rate > 0) {
            try {
                store.apply({ consume: outcome.consumed, produce: outcome.produced });
            } catch (error) {
                throw new ReactionError(this.name, describeError(error), { cause: error });
            }
        }

        reporter.logEvent(
            'Reaction',
            `Executed '${this.name}' with rate ${outcome.rate.toFixed(4)}. ` +
                `Consumed: ${formatAmounts(outcome.consumed)}. Produced: ${formatAmounts(outcome.produced)}`,
        );
        return outcome;
    }

    /** Work out the outcome of a call without touching the store. */
    evaluate(store: MetaboliteStore, timeStep = 1.0, options: ExecuteOptions = {}): ReactionOutcome {
        assertTimeStep(timeStep);
        if (options.extent !== undefined && !(options.extent >= 0)) {
            throw new RangeError(`Reaction ${this.name}: requested extent must be non-negative`);
        }

        const levels = this.snapshot(store);
        const primarySubstrate = Object.keys(this.consume)[0];
        const nominalRate = this.enzyme.rate(levels, primarySubstrate);

        const limitingFactors: LimitingFactor[] = [{ name: REACTION_RATE_FACTOR, value: nominalRate * timeStep }];
        for (const [species, coefficient] of Object.entries(this.consume)) {
            if (coefficient > 0) limitingFactors.push({ name: species, value: (levels[species] ?? 0) / coefficient });
        }
        if (options.extent !== undefined) {
            limitingFactors.push({ name: REQUESTED_EXTENT_FACTOR, value: options.extent });
        }

        const rate = Math.max(0, Math.min(...limitingFactors.map((f) => f.value)));
        const binding = limitingFactors.filter((f) => f.value === rate).map((f) => f.name);

        const consumed: Record<string, number> = {};
        for (const [species, coefficient] of Object.entries(this.consume)) {
            // Never ask for more than the snapshot holds (guards float round-off at the bound).
            consumed[species] = Math.min(coefficient * rate, levels[species] ?? 0);
        }
        const produced: Record<string, number> = {};
        for (const [species, coefficient] of Object.entries(this.produce)) {
            produced[species] = coefficient * rate;
        }

        return { reaction: this.name, nominalRate, rate, limitingFactors, binding, consumed, produced };
    }

    private snapshot(store: MetaboliteStore): Concentrations {
        const levels: Record<string, number> = {};
        try {
            for (const species of new Set([...Object.keys(this.consume), ...this.enzyme.substrates])) {
                levels[species] = store.quantity(species);
            }
        } catch (error) {
            throw new ReactionError(this.name, describeError(error), { cause: error });
        }
        for (const regulator of this.enzyme.regulators) {
            if (!(regulator in levels)) levels[regulator] = store.find(regulator)?.quantity ?? 0;
        }
        return levels;
    }
}

function formatAmounts(amounts: Readonly<Record<string, number>>): string {
    const parts = Object.entries(amounts).map(([species, amount]) => `${species}: ${amount.toFixed(4)}`);
    return parts.length > 0 ? parts.join(', ') : 'nothing';
}

/**
 * services/metabolism/MetaboliteStore.ts
 *
 * Registry of the metabolite pools of one compartment, keyed by lower-cased
 * name. All mutation goes through bounded entry points: `changeQuantity` for
 * a single pool and `apply` (and its `consume` / `produce` shorthands) for a
 * batch that is checked as a whole before anything is written.
 */

import { getDefaultReporter, type Reporter } from '../reporting/Reporter';
import { InsufficientMetaboliteError, QuantityError, UnknownMetaboliteError } from './errors';
import { Metabolite, normalizeName, type MetaboliteOptions } from './Metabolite';

export type Amounts = Readonly<Record<string, number>>;

export interface StoreExchange {
    consume?: Amounts;
    produce?: Amounts;
}

export type StateAttribute =
    | 'quantity'
    | 'energy'
    | 'minQuantity'
    | 'maxQuantity'
    | 'percentageFilled'
    | 'unit'
    | 'type'
    | 'label';

export type MetaboliteStateView = Partial<Record<StateAttribute, number | string>>;

export interface MetaboliteStoreOptions {
    reporter?: Reporter;
}

const DEFAULT_POOL = { quantity: 0, maxQuantity: 100 } as const;

export class MetaboliteStore implements Iterable<Metabolite> {
    static readonly DEFAULT_STATE_ATTRIBUTES: readonly StateAttribute[] = ['quantity', 'energy'];

    private readonly data = new Map<string, Metabolite>();
    private readonly reporter: Reporter;

    constructor(options: MetaboliteStoreOptions = {}) {
        this.reporter = options.reporter ?? getDefaultReporter();
    }

    // -------------------------------------------------------------------------
    // Registration
    // -------------------------------------------------------------------------

    /**
     * Add a pool, or top up an existing one by `quantity` (clamped to its max).
     */
    register(name: string, quantity: number, maxQuantity: number, options: MetaboliteOptions = {}): Metabolite {
        if (!Number.isFinite(quantity) || quantity < 0) {
            throw new RangeError(`Quantity must be non-negative. Got: ${quantity}`);
        }
        if (quantity > maxQuantity) {
            throw new RangeError(`Initial quantity ${quantity} exceeds max quantity ${maxQuantity}.`);
        }

        const key = normalizeName(name);
        const existing = this.data.get(key);
        if (existing) {
            existing.fill(quantity);
            return existing;
        }

        const metabolite = new Metabolite(name, quantity, maxQuantity, options);
        this.data.set(key, metabolite);
        return metabolite;
    }

    /** Register several pools given as `{ name: [quantity, maxQuantity] }`. */
    registerMany(records: Readonly<Record<string, readonly [number, number]>>, options: MetaboliteOptions = {}): void {
        for (const [name, [quantity, maxQuantity]] of Object.entries(records)) {
            this.register(name, quantity, maxQuantity, options);
        }
    }

    /**
     * Explicit opt-in to auto-creation. Everything else throws on unknown names.
     */
    getOrRegisterDefault(name: string, defaults: { quantity: number; maxQuantity: number } = DEFAULT_POOL): Metabolite {
        const existing = this.find(name);
        if (existing) return existing;
        this.reporter.logWarning(
            'MetaboliteStore',
            `Metabolite '${name}' was not found. Created with quantity ${defaults.quantity}, max ${defaults.maxQuantity}.`,
        );
        return this.register(name, defaults.quantity, defaults.maxQuantity);
    }

    // -------------------------------------------------------------------------
    // Lookup
    // -------------------------------------------------------------------------

    has(name: string): boolean {
        return this.data.has(normalizeName(name));
    }

    find(name: string): Metabolite | undefined {
        return this.data.get(normalizeName(name));
    }

    get(name: string): Metabolite {
        const metabolite = this.find(name);
        if (!metabolite) throw new UnknownMetaboliteError(name);
        return metabolite;
    }

    quantity(name: string): number {
        return this.get(name).quantity;
    }

    isAvailable(name: string, amount: number): boolean {
        return this.get(name).quantity >= amount;
    }

    // -------------------------------------------------------------------------
    // Mutation
    // -------------------------------------------------------------------------

    changeQuantity(name: string, delta: number): void {
        this.get(name).adjust(delta);
    }

    consume(amounts: Amounts): void {
        this.apply({ consume: amounts });
    }

    produce(amounts: Amounts): void {
        this.apply({ produce: amounts });
    }

    /**
     * Atomic exchange: every name is resolved, every consumption is checked for
     * availability and every net change is checked against the pool bounds
     * before the first write. Change listeners fire once the batch is done.
     */
    apply({ consume = {}, produce = {} }: StoreExchange): void {
        const deltas = new Map<Metabolite, number>();
        const consumed: Array<[Metabolite, number]> = [];

        const collect = (amounts: Amounts, sign: 1 | -1) => {
            for (const [name, amount] of Object.entries(amounts)) {
                if (!Number.isFinite(amount) || amount < 0) {
                    throw new RangeError(`Amount for ${name} must be a non-negative number. Got: ${amount}`);
                }
                const metabolite = this.get(name);
                if (sign < 0) consumed.push([metabolite, amount]);
                deltas.set(metabolite, (deltas.get(metabolite) ?? 0) + sign * amount);
            }
        };
        collect(consume, -1);
        collect(produce, 1);

        for (const [metabolite, amount] of consumed) {
            if (metabolite.quantity < amount) {
                throw new InsufficientMetaboliteError(metabolite.name, amount, metabolite.quantity);
            }
        }
        for (const [metabolite, delta] of deltas) {
            if (!metabolite.canAdjust(delta)) {
                throw new QuantityError(
                    metabolite.name,
                    metabolite.quantity + delta,
                    metabolite.minQuantity,
                    metabolite.maxQuantity,
                );
            }
        }

        const previous: Array<[Metabolite, number]> = [];
        for (const [metabolite, delta] of deltas) {
            if (delta === 0) continue;
            previous.push([metabolite, metabolite.adjust(delta, { notify: false })]);
        }
        for (const [metabolite, before] of previous) {
            metabolite.notify(before);
        }
    }

    /** Every pool back to its minimum quantity. */
    reset(): void {
        for (const metabolite of this.data.values()) {
            metabolite.reset();
        }
    }

    snapshot(): Record<string, number> {
        return this.quantities;
    }

    /** Signed deltas applied as one atomic batch. */
    changeQuantities(deltas: Amounts): void {
        const consume: Record<string, number> = {};
        const produce: Record<string, number> = {};
        for (const [name, delta] of Object.entries(deltas)) {
            if (delta < 0) consume[name] = -delta;
            else produce[name] = delta;
        }
        this.apply({ consume, produce });
    }

    /** Return the named pools to a snapshot through one bounded batch. */
    restore(snapshot: Readonly<Record<string, number>>): void {
        const deltas: Record<string, number> = {};
        for (const [name, target] of Object.entries(snapshot)) {
            deltas[name] = target - this.quantity(name);
        }
        this.changeQuantities(deltas);
    }

    validateAll(): void {
        for (const m of this.data.values()) {
            if (m.quantity < m.minQuantity || m.quantity > m.maxQuantity) {
                throw new QuantityError(m.name, m.quantity, m.minQuantity, m.maxQuantity);
            }
        }
    }

    // -------------------------------------------------------------------------
    // Views
    // -------------------------------------------------------------------------

    get quantities(): Record<string, number> {
        const out: Record<string, number> = {};
        for (const [name, m] of this.data) out[name] = m.quantity;
        return out;
    }

    get energies(): Record<string, number> {
        const out: Record<string, number> = {};
        for (const [name, m] of this.data) out[name] = m.energy;
        return out;
    }

    get totalEnergy(): number {
        let total = 0;
        for (const m of this.data.values()) total += m.energy;
        return total;
    }

    get names(): string[] {
        return Array.from(this.data.keys());
    }

    get size(): number {
        return this.data.size;
    }

    state(attributes: readonly StateAttribute[] = MetaboliteStore.DEFAULT_STATE_ATTRIBUTES): Record<string, MetaboliteStateView> {
        const out: Record<string, MetaboliteStateView> = {};
        for (const [name, m] of this.data) {
            const view: MetaboliteStateView = {};
            for (const attribute of attributes) view[attribute] = m[attribute];
            out[name] = view;
        }
        return out;
    }

    [Symbol.iterator](): Iterator<Metabolite> {
        return this.data.values();
    }
}

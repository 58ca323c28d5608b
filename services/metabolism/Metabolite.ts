/**
 * services/metabolism/Metabolite.ts
 *
 * A single bounded pool of a chemical species. The quantity always stays in
 * [minQuantity, maxQuantity]; mutations that would leave that range throw
 * instead of clamping.
 */

import { DEFAULT_FREE_ENERGY, FREE_ENERGIES } from '../../constants';
import { MetaboliteLockError, QuantityError } from './errors';

export type MetaboliteMetadata = Record<string, unknown>;

export type MetaboliteChangeListener = (metabolite: Metabolite, previousQuantity: number) => void;

export interface MetaboliteOptions {
    minQuantity?: number;
    unit?: string;
    type?: string;
    metadata?: MetaboliteMetadata;
    onChange?: MetaboliteChangeListener;
}

export interface MetaboliteState {
    name: string;
    label: string;
    type: string;
    quantity: number;
    maxQuantity: number;
    minQuantity: number;
    unit: string;
    metadata: MetaboliteMetadata;
}

export function normalizeName(name: string): string {
    return name.trim().toLowerCase();
}

export function freeEnergyOf(name: string): number {
    return FREE_ENERGIES[normalizeName(name)] ?? DEFAULT_FREE_ENERGY;
}

export class Metabolite {
    readonly name: string;
    readonly label: string;
    readonly type: string;
    readonly minQuantity: number;
    readonly maxQuantity: number;
    readonly unit: string;
    readonly metadata: MetaboliteMetadata;
    onChange?: MetaboliteChangeListener;

    private _quantity: number;
    // Set while update() computes, checks and writes the next quantity.
    private updating = false;

    constructor(name: string, quantity: number, maxQuantity: number, options: MetaboliteOptions = {}) {
        const minQuantity = options.minQuantity ?? 0;
        if (!Number.isFinite(quantity) || !Number.isFinite(maxQuantity) || !Number.isFinite(minQuantity)) {
            throw new RangeError(`Metabolite ${name} needs finite quantities`);
        }
        if (minQuantity > maxQuantity) {
            throw new RangeError(`Metabolite ${name}: min quantity ${minQuantity} exceeds max quantity ${maxQuantity}`);
        }
        if (quantity < minQuantity || quantity > maxQuantity) {
            throw new QuantityError(normalizeName(name), quantity, minQuantity, maxQuantity);
        }

        this.name = normalizeName(name);
        this.label = name;
        this.type = options.type ?? 'default';
        this._quantity = quantity;
        this.minQuantity = minQuantity;
        this.maxQuantity = maxQuantity;
        this.unit = options.unit ?? 'mM';
        this.metadata = options.metadata ?? {};
        this.onChange = options.onChange;
    }

    get quantity(): number {
        return this._quantity;
    }

    get energy(): number {
        return freeEnergyOf(this.name) * this._quantity;
    }

    get percentageFilled(): number {
        return this.maxQuantity === 0 ? 0 : (this._quantity / this.maxQuantity) * 100;
    }

    /** Headroom left before the pool is full. */
    get capacity(): number {
        return this.maxQuantity - this._quantity;
    }

    canAdjust(amount: number): boolean {
        const next = this._quantity + amount;
        return next >= this.minQuantity && next <= this.maxQuantity;
    }

    /**
     * Add `amount` (negative to remove). Returns the previous quantity.
     * Pass `notify: false` to let a batch caller raise the change event itself.
     */
    adjust(amount: number, { notify = true }: { notify?: boolean } = {}): number {
        if (!Number.isFinite(amount)) {
            throw new RangeError(`Cannot adjust ${this.name} by ${amount}`);
        }
        return this.update((quantity) => quantity + amount, { notify });
    }

    /**
     * Set the quantity to `compute(current)` after a bounds check. `compute`
     * runs under the pool's lock: touching this metabolite's quantity from
     * inside it throws MetaboliteLockError and leaves the quantity as it was.
     * Returns the previous quantity.
     */
    update(compute: (quantity: number) => number, { notify = true }: { notify?: boolean } = {}): number {
        const previous = this.criticalSection(() => {
            const before = this._quantity;
            const next = compute(before);
            if (!Number.isFinite(next)) {
                throw new RangeError(`Cannot set ${this.name} to ${next}`);
            }
            if (next < this.minQuantity || next > this.maxQuantity) {
                throw new QuantityError(this.name, next, this.minQuantity, this.maxQuantity);
            }
            this._quantity = next;
            return before;
        });
        if (notify) this.notify(previous);
        return previous;
    }

    /**
     * Register-time top-up: adds as much of `amount` as fits and returns what
     * was actually added.
     */
    fill(amount: number): number {
        const added = Math.max(0, Math.min(amount, this.capacity));
        if (added > 0) this.adjust(added);
        return added;
    }

    reset(): void {
        this.update(() => this.minQuantity);
    }

    notify(previousQuantity: number): void {
        if (this.onChange && previousQuantity !== this._quantity) {
            this.onChange(this, previousQuantity);
        }
    }

    toJSON(): MetaboliteState {
        return {
            name: this.name,
            label: this.label,
            type: this.type,
            quantity: this._quantity,
            maxQuantity: this.maxQuantity,
            minQuantity: this.minQuantity,
            unit: this.unit,
            metadata: this.metadata,
        };
    }

    static fromJSON(state: MetaboliteState): Metabolite {
        return new Metabolite(state.label, state.quantity, state.maxQuantity, {
            minQuantity: state.minQuantity,
            unit: state.unit,
            type: state.type,
            metadata: state.metadata,
        });
    }

    toString(): string {
        return `Metabolite(name='${this.name}', quantity=${this._quantity}, maxQuantity=${this.maxQuantity}, unit='${this.unit}', type='${this.type}')`;
    }

    private criticalSection<T>(body: () => T): T {
        if (this.updating) throw new MetaboliteLockError(this.name);
        this.updating = true;
        try {
            return body();
        } finally {
            this.updating = false;
        }
    }
}

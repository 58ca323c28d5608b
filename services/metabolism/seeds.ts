/**
 * Metabolite seed records: the initial quantity and bounds of each pool of a
 * compartment, validated with zod before they reach a MetaboliteStore.
 *
 * Record shape (one entry per species):
 *   { "quantity": 100, "meta": { "concentration": { "range": { "max": 1000 } }, "unit": "mM" } }
 * A missing max falls back to the quantity itself.
 */

import { z } from 'zod';
import { MetaboliteStore, type MetaboliteStoreOptions } from './MetaboliteStore';

const rangeSchema = z
    .object({
        min: z.number().nonnegative().optional(),
        max: z.number().nonnegative().optional(),
    })
    .default({});

const metaSchema = z
    .object({
        concentration: z.object({ range: rangeSchema }).default({}),
        unit: z.string().min(1).optional(),
        type: z.string().min(1).optional(),
    })
    .passthrough()
    .default({});

export const metaboliteSeedSchema = z.object({
    quantity: z.number().nonnegative().default(0),
    meta: metaSchema,
});

export const seedCollectionSchema = z.record(z.string().min(1), metaboliteSeedSchema);

export type MetaboliteSeed = z.infer<typeof metaboliteSeedSchema>;
export type SeedCollection = z.infer<typeof seedCollectionSchema>;

export class SeedValidationError extends Error {
    constructor(source: string, issues: string[]) {
        super(`Invalid metabolite seeds in ${source}:\n  - ${issues.join('\n  - ')}`);
        this.name = 'SeedValidationError';
    }
}

export function parseSeeds(input: unknown, source = 'seed data'): SeedCollection {
    const result = seedCollectionSchema.safeParse(input);
    if (!result.success) {
        throw new SeedValidationError(
            source,
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
    }
    return result.data;
}

/** Register every seed in `store` (existing pools are topped up). */
export function registerSeeds(store: MetaboliteStore, seeds: SeedCollection): MetaboliteStore {
    for (const [name, seed] of Object.entries(seeds)) {
        const { min, max } = seed.meta.concentration.range;
        const { concentration, unit, type, ...rest } = seed.meta;
        store.register(name, seed.quantity, max ?? seed.quantity, {
            minQuantity: min,
            unit,
            type,
            metadata: { ...rest, concentration },
        });
    }
    return store;
}

export function storeFromSeeds(seeds: SeedCollection, options: MetaboliteStoreOptions = {}): MetaboliteStore {
    return registerSeeds(new MetaboliteStore(options), seeds);
}

/** Seed quantity of every pool, in the shape `MetaboliteStore.restore` takes. */
export function seedQuantities(seeds: SeedCollection): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [name, seed] of Object.entries(seeds)) out[name] = seed.quantity;
    return out;
}

import { describe, it, expect, beforeEach } from 'vitest';
import { KrebsCycleError, PyruvateOxidationError, UnknownMetaboliteError } from '../../services/metabolism/errors';
import { MetaboliteStore } from '../../services/metabolism/MetaboliteStore';
import { KrebsCycle } from '../../services/pathways/KrebsCycle';
import { PyruvateOxidation } from '../../services/pathways/PyruvateOxidation';
import { MemoryReporter } from '../../services/reporting/Reporter';

function matrix(reporter: MemoryReporter, levels: Record<string, number> = {}, skip: string[] = []) {
    const store = new MetaboliteStore({ reporter });
    const initial: Record<string, number> = {
        acetyl_coa: 1,
        oxaloacetate: 1,
        coa: 0,
        citrate: 0,
        isocitrate: 0,
        alpha_ketoglutarate: 0,
        succinyl_coa: 0,
        succinate: 0,
        fumarate: 0,
        malate: 0,
        nad: 10,
        nadh: 0,
        fad: 5,
        fadh2: 0,
        gdp: 5,
        gtp: 0,
        pi: 10,
        co2: 0,
        atp: 10,
        adp: 10,
        amp: 0,
        pyruvate: 0,
        ...levels,
    };
    for (const [name, quantity] of Object.entries(initial)) {
        if (!skip.includes(name)) store.register(name, quantity, 100);
    }
    return store;
}

describe('KrebsCycle', () => {
    let reporter: MemoryReporter;

    beforeEach(() => {
        reporter = new MemoryReporter();
    });

    it('releases 2 CO2 per turn and regenerates oxaloacetate', () => {
        const store = matrix(reporter);
        expect(new KrebsCycle({ reporter }).cycle(store)).toBe(2);

        expect(store.quantity('co2')).toBe(2);
        expect(store.quantity('nadh')).toBe(3);
        expect(store.quantity('nad')).toBe(7);
        expect(store.quantity('fadh2')).toBe(1);
        expect(store.quantity('gtp')).toBe(1);
        expect(store.quantity('oxaloacetate')).toBe(1);
        expect(store.quantity('acetyl_coa')).toBe(0);
        expect(store.quantity('coa')).toBe(1);
    });

    it('reports the products and the energy change of a run', () => {
        const store = matrix(reporter);
        const result = new KrebsCycle({ reporter }).perform(store, 1);

        expect(result).toMatchObject({ co2: 2, nadh: 3, fadh2: 1, gtp: 1, adenineDelta: 0 });
        // -31 (acetyl-CoA) + 3×158 (NADH) + 105 (FADH2) + 50 (GTP) + 2 (CO2)
        // - 3 (NAD) - 1 (FAD) - 1 (GDP) - 1 (Pi) + 1 (CoA)
        expect(result.energyDelta).toBeCloseTo(595, 9);
        expect(reporter.messages('warn')).toEqual(['Energy not conserved in Krebs Cycle. Difference: 595']);
    });

    it('turns once per acetyl-CoA', () => {
        const store = matrix(reporter, { acetyl_coa: 2 });
        expect(new KrebsCycle({ reporter }).perform(store, 2).co2).toBe(4);
        expect(store.quantity('oxaloacetate')).toBe(1);
    });

    it('rejects fewer than one unit', () => {
        expect(() => new KrebsCycle({ reporter }).perform(matrix(reporter), 0)).toThrow(KrebsCycleError);
    });

    it('fails with a KrebsCycleError when a species is missing', () => {
        const store = matrix(reporter, {}, ['oxaloacetate']);
        let caught: unknown;
        try {
            new KrebsCycle({ reporter }).perform(store, 1);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(KrebsCycleError);
        expect(caught instanceof KrebsCycleError && caught.pathway).toBe('krebs_cycle');
        expect(caught instanceof Error && caught.message).toBe(
            "Step 'citrate_synthase' failed: Reaction 'Citrate Synthase' failed: Unknown metabolite: oxaloacetate",
        );
        expect(store.quantity('acetyl_coa')).toBe(1);
    });
});

describe('PyruvateOxidation', () => {
    it('converts pyruvate to acetyl-CoA one unit at a time', () => {
        const reporter = new MemoryReporter();
        const store = matrix(reporter, { pyruvate: 2, acetyl_coa: 0, coa: 5 });
        const result = new PyruvateOxidation({ reporter }).perform(store, 2);

        expect(result).toEqual({ acetylCoa: 2, nadh: 2, co2: 2 });
        expect(store.quantity('pyruvate')).toBe(0);
        expect(store.quantity('acetyl_coa')).toBe(2);
        expect(store.quantity('coa')).toBe(3);
        expect(store.quantity('nad')).toBe(8);
    });

    it('rejects fewer than one unit', () => {
        const reporter = new MemoryReporter();
        expect(() => new PyruvateOxidation({ reporter }).perform(matrix(reporter), 0.4)).toThrow(
            PyruvateOxidationError,
        );
    });

    it('wraps a missing species in a PyruvateOxidationError', () => {
        const reporter = new MemoryReporter();
        const store = matrix(reporter, { pyruvate: 1 }, ['coa']);
        let caught: unknown;
        try {
            new PyruvateOxidation({ reporter }).perform(store, 1);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(PyruvateOxidationError);
        expect(caught instanceof Error && caught.cause instanceof Error && caught.cause.cause).toBeInstanceOf(
            UnknownMetaboliteError,
        );
    });
});

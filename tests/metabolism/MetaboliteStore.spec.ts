import { describe, it, expect, beforeEach } from 'vitest';
import { MetaboliteStore } from '../../services/metabolism/MetaboliteStore';
import {
    InsufficientMetaboliteError,
    QuantityError,
    UnknownMetaboliteError,
} from '../../services/metabolism/errors';
import { MemoryReporter } from '../../services/reporting/Reporter';

describe('MetaboliteStore', () => {
    let reporter: MemoryReporter;
    let store: MetaboliteStore;

    beforeEach(() => {
        reporter = new MemoryReporter();
        store = new MetaboliteStore({ reporter });
        store.register('ATP', 10, 100);
        store.register('ADP', 2, 10);
    });

    describe('register', () => {
        it('looks names up case-insensitively', () => {
            expect(store.quantity('atp')).toBe(10);
            expect(store.quantity('Atp')).toBe(10);
            expect(store.has('adp')).toBe(true);
            expect(store.names).toEqual(['atp', 'adp']);
        });

        it('tops up an existing pool, clamped to its max', () => {
            store.register('adp', 9, 10);
            expect(store.quantity('adp')).toBe(10);
            expect(store.size).toBe(2);
        });

        it('rejects negative or oversize quantities', () => {
            expect(() => store.register('nad', -1, 10)).toThrow(RangeError);
            expect(() => store.register('nad', 11, 10)).toThrow(RangeError);
            expect(store.has('nad')).toBe(false);
        });

        it('registers several pools at once', () => {
            store.registerMany({ nad: [5, 20], nadh: [0, 20] });
            expect(store.quantities).toEqual({ atp: 10, adp: 2, nad: 5, nadh: 0 });
        });
    });

    describe('lookup', () => {
        it('throws for unknown names', () => {
            expect(() => store.isAvailable('glucose', 1)).toThrow(UnknownMetaboliteError);
            expect(() => store.quantity('glucose')).toThrow('Unknown metabolite: glucose');
            expect(store.find('glucose')).toBeUndefined();
        });

        it('checks availability', () => {
            expect(store.isAvailable('atp', 10)).toBe(true);
            expect(store.isAvailable('atp', 10.5)).toBe(false);
        });

        it('only auto-creates through getOrRegisterDefault, with a warning', () => {
            const lactate = store.getOrRegisterDefault('lactate');
            expect(lactate.quantity).toBe(0);
            expect(lactate.maxQuantity).toBe(100);
            expect(reporter.messages('warn')).toEqual([
                "Metabolite 'lactate' was not found. Created with quantity 0, max 100.",
            ]);
        });
    });

    describe('batches', () => {
        it('consumes nothing when any part of the batch is short', () => {
            expect(() => store.consume({ atp: 5, adp: 3 })).toThrow(InsufficientMetaboliteError);
            expect(store.quantity('atp')).toBe(10);
            expect(store.quantity('adp')).toBe(2);
        });

        it('produces nothing when any part of the batch would overflow', () => {
            expect(() => store.produce({ atp: 5, adp: 9 })).toThrow(QuantityError);
            expect(store.quantity('atp')).toBe(10);
            expect(store.quantity('adp')).toBe(2);
        });

        it('produces nothing when a name is unknown', () => {
            expect(() => store.produce({ atp: 1, glucose: 1 })).toThrow(UnknownMetaboliteError);
            expect(store.quantity('atp')).toBe(10);
        });

        it('applies consume and produce as one exchange', () => {
            store.apply({ consume: { atp: 10 }, produce: { atp: 5, adp: 3 } });
            expect(store.quantity('atp')).toBe(5);
            expect(store.quantity('adp')).toBe(5);
        });

        it('rejects negative amounts', () => {
            expect(() => store.consume({ atp: -1 })).toThrow(RangeError);
        });

        it('notifies listeners after the whole batch is applied', () => {
            const seen: number[] = [];
            store.register('gtp', 10, 100, { onChange: () => seen.push(store.quantity('adp')) });
            store.apply({ consume: { gtp: 1 }, produce: { adp: 1 } });
            expect(seen).toEqual([3]);
        });
    });

    it('changeQuantity enforces bounds', () => {
        store.changeQuantity('atp', -4);
        expect(store.quantity('atp')).toBe(6);
        expect(() => store.changeQuantity('adp', 9)).toThrow(QuantityError);
    });

    it('reset sets every pool to its minimum', () => {
        store.register('nad', 5, 10, { minQuantity: 1 });
        store.reset();
        expect(store.quantities).toEqual({ atp: 0, adp: 0, nad: 1 });
    });

    it('restores a snapshot', () => {
        const snapshot = store.snapshot();
        store.apply({ consume: { atp: 3 }, produce: { adp: 3 } });
        store.restore(snapshot);
        expect(store.quantities).toEqual({ atp: 10, adp: 2 });
    });

    it('reports state and energy', () => {
        expect(store.state()).toEqual({
            atp: { quantity: 10, energy: 500 },
            adp: { quantity: 2, energy: 60 },
        });
        expect(store.state(['maxQuantity', 'unit'])).toEqual({
            atp: { maxQuantity: 100, unit: 'mM' },
            adp: { maxQuantity: 10, unit: 'mM' },
        });
        expect(store.totalEnergy).toBe(560);
        expect(store.energies).toEqual({ atp: 500, adp: 60 });
    });

    it('is iterable', () => {
        expect([...store].map((m) => m.name)).toEqual(['atp', 'adp']);
    });
});

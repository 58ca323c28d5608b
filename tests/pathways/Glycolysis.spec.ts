import { describe, it, expect, beforeEach } from 'vitest';
import { Enzyme } from '../../services/kinetics/Enzyme';
import { Reaction } from '../../services/kinetics/Reaction';
import { adenineTotals } from '../../services/metabolism/energyAccounting';
import { GlycolysisError, ReactionError } from '../../services/metabolism/errors';
import { MetaboliteStore } from '../../services/metabolism/MetaboliteStore';
import { createGlycolysisReactions } from '../../services/pathways/catalog/reactions';
import { Glycolysis } from '../../services/pathways/Glycolysis';
import { MemoryReporter } from '../../services/reporting/Reporter';

const INTERMEDIATES = [
    'glucose_6_phosphate',
    'fructose_6_phosphate',
    'fructose_1_6_bisphosphate',
    'dihydroxyacetone_phosphate',
    'glyceraldehyde_3_phosphate',
    'bisphosphoglycerate_1_3',
    'phosphoglycerate_3',
    'phosphoglycerate_2',
    'phosphoenolpyruvate',
];

function cytosol(reporter: MemoryReporter, levels: Record<string, number> = {}, maxima: Record<string, number> = {}) {
    const store = new MetaboliteStore({ reporter });
    const initial: Record<string, number> = {
        glucose: 1,
        atp: 10,
        adp: 10,
        amp: 0,
        nad: 10,
        nadh: 0,
        pi: 10,
        pyruvate: 0,
        lactate: 0,
        ...Object.fromEntries(INTERMEDIATES.map((name) => [name, 0])),
        ...levels,
    };
    for (const [name, quantity] of Object.entries(initial)) {
        store.register(name, quantity, maxima[name] ?? 100);
    }
    return store;
}

describe('Glycolysis', () => {
    let reporter: MemoryReporter;

    beforeEach(() => {
        reporter = new MemoryReporter();
    });

    it('yields 2 ATP and 2 pyruvate per glucose', () => {
        const store = cytosol(reporter);
        const result = new Glycolysis({ reporter }).perform(store, 1);

        expect(result).toEqual({ netAtp: 2, pyruvate: 2, nadh: 2, lactate: 0, adenineCorrection: null });
        expect(store.quantity('glucose')).toBe(0);
        expect(store.quantity('atp')).toBe(12);
        expect(store.quantity('adp')).toBe(8);
        expect(store.quantity('nad')).toBe(8);
        expect(store.quantity('pi')).toBe(8);
        for (const name of INTERMEDIATES) expect(store.quantity(name)).toBe(0);
    });

    it('doubles the yield for two glucose', () => {
        const store = cytosol(reporter, { glucose: 2 });
        const result = new Glycolysis({ reporter }).perform(store, 2);
        expect(result.netAtp).toBe(4);
        expect(result.pyruvate).toBe(4);
        expect(store.quantity('pyruvate')).toBe(4);
    });

    it('conserves the adenine nucleotide pool', () => {
        const store = cytosol(reporter, { glucose: 3, amp: 2 });
        const before = adenineTotals(store).total;
        new Glycolysis({ reporter }).perform(store, 3);
        expect(adenineTotals(store).total).toBe(before);
        expect(reporter.messages('warn')).toEqual([]);
    });

    it('floors fractional glucose units', () => {
        const store = cytosol(reporter, { glucose: 3 });
        const result = new Glycolysis({ reporter }).perform(store, 2.7);
        expect(result.pyruvate).toBe(4);
        expect(store.quantity('glucose')).toBe(1);
    });

    it('rejects fewer than one glucose unit', () => {
        const glycolysis = new Glycolysis({ reporter });
        const store = cytosol(reporter);
        expect(() => glycolysis.perform(store, 0)).toThrow(GlycolysisError);
        expect(() => glycolysis.perform(store, 0.5)).toThrow('The number of glucose units must be positive.');
    });

    it('regenerates NAD+ through lactate dehydrogenase when NAD+ runs short', () => {
        const store = cytosol(reporter, { nad: 1 });
        const result = new Glycolysis({ reporter }).perform(store, 1);

        expect(result).toEqual({ netAtp: 2, pyruvate: 2, nadh: 2, lactate: 1, adenineCorrection: null });
        expect(store.quantity('pyruvate')).toBe(1);
        expect(store.quantity('lactate')).toBe(1);
        expect(store.quantity('nad')).toBe(0);
        expect(store.quantity('nadh')).toBe(1);
    });

    it('converts the pyruvate to lactate when anaerobic', () => {
        const store = cytosol(reporter);
        const result = new Glycolysis({ reporter, anaerobic: true }).perform(store, 1);

        expect(result.lactate).toBe(2);
        expect(store.quantity('pyruvate')).toBe(0);
        expect(store.quantity('lactate')).toBe(2);
        expect(store.quantity('nad')).toBe(10);
        expect(store.quantity('nadh')).toBe(0);
    });

    it('restores the whole glucose unit when its second G3P fails', () => {
        const store = cytosol(reporter, {}, { pyruvate: 1 });
        const before = store.snapshot();
        const glycolysis = new Glycolysis({ reporter });

        let caught: unknown;
        try {
            glycolysis.perform(store, 1);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(GlycolysisError);
        expect(caught instanceof GlycolysisError && caught.cause).toBeInstanceOf(ReactionError);
        expect(caught instanceof Error && caught.message).toBe(
            "Step 'pyruvate_kinase' failed: Reaction 'Pyruvate Kinase' failed: " +
                'Cannot exceed max quantity for pyruvate. Attempted to set pyruvate to 2, but max is 1.',
        );
        expect(store.snapshot()).toEqual(before);
        expect(store.quantity('glucose')).toBe(1);
        expect(store.quantity('glyceraldehyde_3_phosphate')).toBe(0);
        expect(reporter.messages('error')[0]).toMatch(/^Glucose unit 1 rolled back: /);
    });

    it('keeps completed glucose units when a later one fails', () => {
        const store = cytosol(reporter, { glucose: 2 }, { pyruvate: 3 });
        expect(() => new Glycolysis({ reporter }).perform(store, 2)).toThrow(GlycolysisError);

        expect(store.quantity('glucose')).toBe(1);
        expect(store.quantity('pyruvate')).toBe(2);
        expect(store.quantity('atp')).toBe(12);
        expect(store.quantity('adp')).toBe(8);
        expect(store.quantity('nad')).toBe(8);
        for (const name of INTERMEDIATES) expect(store.quantity(name)).toBe(0);
        expect(reporter.messages('error')[0]).toMatch(/^Glucose unit 2 rolled back: /);
    });

    describe('adenine drift', () => {
        // pyruvate kinase that makes ATP without consuming ADP
        const leakyReactions = () => ({
            ...createGlycolysisReactions(),
            pyruvateKinase: new Reaction({
                name: 'Leaky Pyruvate Kinase',
                enzyme: new Enzyme({ name: 'Leaky Pyruvate Kinase', vmax: 100, km: 0.1 }),
                consume: { phosphoenolpyruvate: 1 },
                produce: { pyruvate: 1, atp: 1 },
            }),
        });

        it('is corrected by taking the excess out of ATP', () => {
            const store = cytosol(reporter);
            const result = new Glycolysis({ reporter, reactions: leakyReactions() }).perform(store, 1);

            expect(result.adenineCorrection).toEqual({ drift: 2, atpAdjustment: 2, adpAdjustment: 0 });
            expect(result.netAtp).toBe(0);
            expect(store.quantity('atp')).toBe(10);
            expect(store.quantity('adp')).toBe(10);
            expect(reporter.messages('warn')).toEqual([
                'Adenine nucleotide imbalance detected. Initial: 20, Final: 22',
                'Adjusted ATP by -2 and ADP by 0 to maintain adenine nucleotide balance',
            ]);
        });

        it('is only reported when correction is disabled', () => {
            const store = cytosol(reporter);
            const result = new Glycolysis({
                reporter,
                reactions: leakyReactions(),
                correctAdenineDrift: false,
            }).perform(store, 1);

            expect(result.adenineCorrection).toBeNull();
            expect(result.netAtp).toBe(2);
            expect(store.quantity('atp')).toBe(12);
            expect(reporter.messages('warn')).toEqual([
                'Adenine nucleotide imbalance left uncorrected. Initial: 20, Final: 22',
            ]);
        });
    });
});

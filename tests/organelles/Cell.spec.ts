import { describe, it, expect, beforeEach } from 'vitest';
import { Cell } from '../../services/organelles/Cell';
import { Cytoplasm } from '../../services/organelles/Cytoplasm';
import { Mitochondrion } from '../../services/organelles/Mitochondrion';
import { MemoryReporter } from '../../services/reporting/Reporter';

describe('Cytoplasm', () => {
    it('runs glycolysis on its seeded pools and resets to them', () => {
        const cytoplasm = new Cytoplasm({ reporter: new MemoryReporter() });
        expect(cytoplasm.metabolites.quantity('atp')).toBe(100);
        expect(cytoplasm.metabolites.quantity('glucose')).toBe(0);

        cytoplasm.addGlucose(2);
        const result = cytoplasm.performGlycolysis(2);
        expect(result.netAtp).toBe(4);
        expect(result.pyruvate).toBe(4);
        expect(cytoplasm.metabolites.quantity('nad')).toBe(6);

        cytoplasm.glycolysis.reactions.phosphofructokinase.enzyme.setActivity(1.5);
        cytoplasm.reset();
        expect(cytoplasm.metabolites.quantity('atp')).toBe(100);
        expect(cytoplasm.metabolites.quantity('pyruvate')).toBe(0);
        expect(cytoplasm.metabolites.quantity('nadh')).toBe(0);
        expect(cytoplasm.glycolysis.reactions.phosphofructokinase.enzyme.activity).toBe(1);
    });
});

describe('Mitochondrion', () => {
    let mitochondrion: Mitochondrion;

    beforeEach(() => {
        mitochondrion = new Mitochondrion({ reporter: new MemoryReporter() });
    });

    const idhActivity = (m: Mitochondrion) => m.krebsCycle.reactions.isocitrateDehydrogenase.enzyme.activity;

    it('boosts the calcium-sensitive dehydrogenases above the threshold', () => {
        expect(mitochondrion.calcium).toBe(100);
        expect(mitochondrion.calciumBoosted).toBe(false);
        expect(idhActivity(mitochondrion)).toBe(1);

        expect(mitochondrion.bufferCalcium(750)).toBe(750);
        expect(mitochondrion.calciumBoosted).toBe(true);
        expect(idhActivity(mitochondrion)).toBe(1.2);
        expect(mitochondrion.pyruvateOxidation.step.reaction.enzyme.activity).toBe(1.2);
        expect(mitochondrion.krebsCycle.reactions.alphaKetoglutarateDehydrogenase.enzyme.activity).toBe(1.2);
        expect(mitochondrion.krebsCycle.reactions.citrateSynthase.enzyme.activity).toBe(1);

        expect(mitochondrion.releaseCalcium(100)).toBe(100);
        expect(mitochondrion.calcium).toBe(750);
        expect(idhActivity(mitochondrion)).toBe(1);
    });

    it('clamps buffered calcium to the pool max', () => {
        expect(mitochondrion.bufferCalcium(5000)).toBe(1900);
        expect(mitochondrion.calcium).toBe(2000);
    });

    it('keeps enzyme activity per instance', () => {
        const other = new Mitochondrion({ reporter: new MemoryReporter() });
        mitochondrion.bufferCalcium(750);
        expect(idhActivity(other)).toBe(1);
    });

    it('resets pools and activity from the seeds', () => {
        mitochondrion.bufferCalcium(750);
        mitochondrion.metabolites.produce({ pyruvate: 3 });
        mitochondrion.reset();
        expect(mitochondrion.calcium).toBe(100);
        expect(mitochondrion.metabolites.quantity('pyruvate')).toBe(0);
        expect(idhActivity(mitochondrion)).toBe(1);
    });

    it('respires pyruvate through the Krebs cycle into ATP', () => {
        mitochondrion.metabolites.produce({ pyruvate: 2 });
        const result = mitochondrion.respire(2);

        expect(result.pyruvateOxidation).toEqual({ acetylCoa: 2, nadh: 2, co2: 2 });
        expect(result.krebsCycle?.co2).toBe(4);
        expect(result.oxidativePhosphorylation.atp).toBe(2);
        expect(mitochondrion.metabolites.quantity('co2')).toBe(6);
        expect(mitochondrion.metabolites.quantity('atp')).toBe(102);
    });

    it('skips oxidation and the Krebs cycle without whole units', () => {
        const result = mitochondrion.respire(0.5);
        expect(result.pyruvateOxidation).toBeNull();
        expect(result.krebsCycle).toBeNull();
        expect(result.oxidativePhosphorylation.atp).toBe(0);
    });
});

describe('Cell', () => {
    let cell: Cell;

    beforeEach(() => {
        cell = new Cell({ reporter: new MemoryReporter() });
    });

    it('transfers pyruvate into the mitochondrion', () => {
        cell.cytoplasm.metabolites.produce({ pyruvate: 3 });
        expect(cell.transferPyruvate(1)).toBe(1);
        expect(cell.transferPyruvate()).toBe(2);
        expect(cell.transferPyruvate()).toBe(0);
        expect(cell.cytoplasm.metabolites.quantity('pyruvate')).toBe(0);
        expect(cell.mitochondrion.metabolites.quantity('pyruvate')).toBe(3);
    });

    it('shuttles NADH at the configured efficiency', () => {
        cell.cytoplasm.metabolites.produce({ nadh: 3 });
        expect(cell.shuttleNadh()).toBeCloseTo(2.01, 12);
        expect(cell.cytoplasm.metabolites.quantity('nadh')).toBe(0);
        expect(cell.cytoplasm.metabolites.quantity('nad')).toBe(13);
        expect(cell.mitochondrion.metabolites.quantity('nadh')).toBeCloseTo(2.01, 12);
        expect(cell.mitochondrion.metabolites.quantity('nad')).toBeCloseTo(7.99, 12);
    });

    it('caps the shuttle at the requested amount', () => {
        cell.cytoplasm.metabolites.produce({ nadh: 10 });
        expect(cell.shuttleNadh(1)).toBeCloseTo(0.67, 12);
        expect(cell.cytoplasm.metabolites.quantity('nadh')).toBe(9);
    });

    const adenineTotal = (c: Cell) =>
        ['atp', 'adp', 'amp'].reduce(
            (sum, id) => sum + c.cytoplasm.metabolites.quantity(id) + c.mitochondrion.metabolites.quantity(id),
            0,
        );

    it('imports cytosolic ADP when matrix ADP runs low', () => {
        expect(cell.importAdp()).toBe(0);

        cell.mitochondrion.metabolites.consume({ adp: 45 });
        expect(cell.importAdp()).toBe(50);
        expect(cell.cytoplasm.metabolites.quantity('adp')).toBe(0);
        expect(cell.mitochondrion.metabolites.quantity('adp')).toBe(55);
        expect(adenineTotal(cell)).toBe(320);
    });

    it('imports no more ADP than the cytoplasm holds', () => {
        cell.mitochondrion.metabolites.consume({ adp: 45 });
        cell.cytoplasm.metabolites.consume({ adp: 48 });
        expect(cell.importAdp()).toBe(2);
        expect(cell.mitochondrion.metabolites.quantity('adp')).toBe(7);
        expect(cell.importAdp()).toBe(0);
    });

    it('exports matrix ATP above the mitochondrial ceiling', () => {
        expect(cell.exportAtp()).toBe(0);

        cell.mitochondrion.metabolites.produce({ atp: 5 });
        expect(cell.exportAtp()).toBe(5);
        expect(cell.mitochondrion.metabolites.quantity('atp')).toBe(100);
        expect(cell.cytoplasm.metabolites.quantity('atp')).toBe(105);
        expect(cell.exportAtp()).toBe(0);
        expect(adenineTotal(cell)).toBe(325);
    });

    it('stops exporting ATP at the cytoplasmic ceiling', () => {
        cell.cytoplasm.metabolites.produce({ atp: 398 });
        cell.mitochondrion.metabolites.produce({ atp: 10 });
        expect(cell.exportAtp()).toBe(2);
        expect(cell.cytoplasm.metabolites.quantity('atp')).toBe(500);
        expect(cell.mitochondrion.metabolites.quantity('atp')).toBe(108);
    });

    it('rejects an impossible shuttle efficiency', () => {
        expect(() => new Cell({ reporter: new MemoryReporter(), shuttleEfficiency: 1.5 })).toThrow(RangeError);
    });

    it('resets both compartments', () => {
        cell.cytoplasm.metabolites.produce({ pyruvate: 3 });
        cell.transferPyruvate();
        cell.reset();
        expect(cell.cytoplasm.metabolites.quantity('pyruvate')).toBe(0);
        expect(cell.mitochondrion.metabolites.quantity('pyruvate')).toBe(0);
    });
});

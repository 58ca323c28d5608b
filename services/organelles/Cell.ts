/**
 * A cell: one cytoplasm and one mitochondrion, plus the transport between
 * them (pyruvate carrier, NADH shuttle, ADP import and ATP export).
 */

import {
    ADP_IMPORT_LIMIT,
    MAX_CYTOPLASMIC_ATP,
    MAX_MITOCHONDRIAL_ATP,
    MITOCHONDRIAL_ADP_THRESHOLD,
    NADH_SHUTTLE_RATE,
    SHUTTLE_EFFICIENCY,
} from '../../constants';
import { getDefaultReporter, type Reporter } from '../reporting/Reporter';
import { Cytoplasm, type CytoplasmOptions } from './Cytoplasm';
import { Mitochondrion, type MitochondrionOptions } from './Mitochondrion';

export interface CellOptions {
    reporter?: Reporter;
    cytoplasm?: Omit<CytoplasmOptions, 'reporter'>;
    mitochondrion?: Omit<MitochondrionOptions, 'reporter'>;
    shuttleEfficiency?: number;
}

export class Cell {
    readonly cytoplasm: Cytoplasm;
    readonly mitochondrion: Mitochondrion;
    readonly shuttleEfficiency: number;

    private readonly reporter: Reporter;

    constructor(options: CellOptions = {}) {
        this.reporter = options.reporter ?? getDefaultReporter();
        this.cytoplasm = new Cytoplasm({ ...options.cytoplasm, reporter: this.reporter });
        this.mitochondrion = new Mitochondrion({ ...options.mitochondrion, reporter: this.reporter });
        this.shuttleEfficiency = options.shuttleEfficiency ?? SHUTTLE_EFFICIENCY;
        if (!(this.shuttleEfficiency > 0 && this.shuttleEfficiency <= 1)) {
            throw new RangeError(`Shuttle efficiency must be in (0, 1]. Got: ${this.shuttleEfficiency}`);
        }
    }

    /**
     * Move cytosolic pyruvate into the matrix, as much as asked for (default
     * all of it) and the matrix pool can hold. Returns the amount moved.
     */
    transferPyruvate(amount?: number): number {
        const source = this.cytoplasm.metabolites.get('pyruvate');
        const target = this.mitochondrion.metabolites.get('pyruvate');
        const moved = Math.min(amount ?? source.quantity, source.quantity, target.capacity);
        if (!(moved > 0)) return 0;

        this.cytoplasm.metabolites.consume({ pyruvate: moved });
        this.mitochondrion.metabolites.produce({ pyruvate: moved });
        this.reporter.logDebug('Cell', `Transferred ${moved} pyruvate to the mitochondrion`);
        return moved;
    }

    /**
     * Reoxidise cytosolic NADH and reduce matrix NAD⁺ at `shuttleEfficiency`
     * NADH per cytosolic NADH. Returns the matrix NADH gained.
     */
    shuttleNadh(amount = NADH_SHUTTLE_RATE): number {
        const cyto = this.cytoplasm.metabolites;
        const mito = this.mitochondrion.metabolites;
        const efficiency = this.shuttleEfficiency;

        const moved = Math.min(
            amount,
            cyto.quantity('nadh'),
            cyto.get('nad').capacity,
            mito.quantity('nad') / efficiency,
            mito.get('nadh').capacity / efficiency,
        );
        if (!(moved > 0)) return 0;

        const delivered = Math.min(moved * efficiency, mito.quantity('nad'), mito.get('nadh').capacity);
        cyto.apply({ consume: { nadh: moved }, produce: { nad: moved } });
        mito.apply({ consume: { nad: delivered }, produce: { nadh: delivered } });
        this.reporter.logDebug('Cell', `Shuttled ${moved} NADH, ${delivered} reached the matrix`);
        return delivered;
    }

    /**
     * Move cytosolic ADP into the matrix once matrix ADP drops below
     * `threshold`, at most `limit` per call. Returns the amount moved.
     */
    importAdp(threshold = MITOCHONDRIAL_ADP_THRESHOLD, limit = ADP_IMPORT_LIMIT): number {
        const cyto = this.cytoplasm.metabolites;
        const mito = this.mitochondrion.metabolites;
        if (mito.quantity('adp') >= threshold) return 0;

        const moved = Math.min(limit, cyto.quantity('adp'), mito.get('adp').capacity);
        if (!(moved > 0)) return 0;

        cyto.consume({ adp: moved });
        mito.produce({ adp: moved });
        this.reporter.logWarning('Cell', `Low ADP in mitochondrion. Imported ${moved} ADP from the cytoplasm`);
        return moved;
    }

    /**
     * Move matrix ATP above `mitochondrialMax` out to the cytoplasm, keeping
     * cytosolic ATP at or below `cytoplasmicMax`. Returns the amount moved.
     */
    exportAtp(mitochondrialMax = MAX_MITOCHONDRIAL_ATP, cytoplasmicMax = MAX_CYTOPLASMIC_ATP): number {
        const cyto = this.cytoplasm.metabolites;
        const mito = this.mitochondrion.metabolites;
        const atp = cyto.get('atp');

        const moved = Math.min(
            Math.max(0, mito.quantity('atp') - mitochondrialMax),
            cytoplasmicMax - atp.quantity,
            atp.capacity,
        );
        if (!(moved > 0)) return 0;

        mito.consume({ atp: moved });
        cyto.produce({ atp: moved });
        this.reporter.logDebug('Cell', `Exported ${moved} ATP to the cytoplasm`);
        return moved;
    }

    reset(): void {
        this.cytoplasm.reset();
        this.mitochondrion.reset();
    }
}

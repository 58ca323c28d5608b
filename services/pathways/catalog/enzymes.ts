/**
 * Enzyme catalog.
 *
 * Every call returns fresh instances so each compartment owns the enzymes it
 * regulates (activity changes never leak between organelles). Constants are
 * illustrative, not measured.
 */

import { Enzyme } from '../../kinetics/Enzyme';

export interface GlycolysisEnzymes {
    hexokinase: Enzyme;
    phosphoglucoseIsomerase: Enzyme;
    phosphofructokinase: Enzyme;
    aldolase: Enzyme;
    triosePhosphateIsomerase: Enzyme;
    glyceraldehyde3PhosphateDehydrogenase: Enzyme;
    phosphoglycerateKinase: Enzyme;
    phosphoglycerateMutase: Enzyme;
    enolase: Enzyme;
    pyruvateKinase: Enzyme;
    lactateDehydrogenase: Enzyme;
}

export interface KrebsCycleEnzymes {
    citrateSynthase: Enzyme;
    aconitase: Enzyme;
    isocitrateDehydrogenase: Enzyme;
    alphaKetoglutarateDehydrogenase: Enzyme;
    succinylCoaSynthetase: Enzyme;
    succinateDehydrogenase: Enzyme;
    fumarase: Enzyme;
    malateDehydrogenase: Enzyme;
}

export function createGlycolysisEnzymes(): GlycolysisEnzymes {
    return {
        hexokinase: new Enzyme({
            name: 'Hexokinase',
            vmax: 100,
            km: { glucose: 0.1, atp: 0.1 },
            // product inhibition by glucose-6-phosphate
            inhibitors: { glucose_6_phosphate: 100 },
        }),
        phosphoglucoseIsomerase: new Enzyme({
            name: 'Phosphoglucose Isomerase',
            vmax: 100,
            km: 0.1,
        }),
        phosphofructokinase: new Enzyme({
            name: 'Phosphofructokinase',
            vmax: 100,
            km: { fructose_6_phosphate: 0.1, atp: 0.1 },
            inhibitors: { atp: 500, citrate: 100 },
            activators: { amp: 10 },
        }),
        aldolase: new Enzyme({ name: 'Aldolase', vmax: 100, km: 0.1 }),
        triosePhosphateIsomerase: new Enzyme({ name: 'Triose Phosphate Isomerase', vmax: 100, km: 0.1 }),
        glyceraldehyde3PhosphateDehydrogenase: new Enzyme({
            name: 'Glyceraldehyde 3-Phosphate Dehydrogenase',
            vmax: 100,
            km: { glyceraldehyde_3_phosphate: 0.1, nad: 0.1 },
        }),
        phosphoglycerateKinase: new Enzyme({
            name: 'Phosphoglycerate Kinase',
            vmax: 100,
            km: { bisphosphoglycerate_1_3: 0.1, adp: 0.1 },
        }),
        phosphoglycerateMutase: new Enzyme({ name: 'Phosphoglycerate Mutase', vmax: 100, km: 0.1 }),
        enolase: new Enzyme({ name: 'Enolase', vmax: 100, km: 0.1 }),
        pyruvateKinase: new Enzyme({
            name: 'Pyruvate Kinase',
            vmax: 100,
            km: { phosphoenolpyruvate: 0.1, adp: 0.1 },
            inhibitors: { atp: 500 },
            activators: { fructose_1_6_bisphosphate: 10 },
        }),
        lactateDehydrogenase: new Enzyme({
            name: 'Lactate Dehydrogenase',
            vmax: 100,
            km: { pyruvate: 0.1, nadh: 0.1 },
        }),
    };
}

export function createKrebsCycleEnzymes(): KrebsCycleEnzymes {
    return {
        citrateSynthase: new Enzyme({
            name: 'Citrate Synthase',
            vmax: 100,
            km: { acetyl_coa: 0.1, oxaloacetate: 0.1 },
        }),
        aconitase: new Enzyme({ name: 'Aconitase', vmax: 100, km: 0.1 }),
        isocitrateDehydrogenase: new Enzyme({
            name: 'Isocitrate Dehydrogenase',
            vmax: 50,
            km: { isocitrate: 0.5 },
            hillCoefficient: 2,
            inhibitors: { atp: 50 },
            activators: { adp: 100 },
        }),
        alphaKetoglutarateDehydrogenase: new Enzyme({
            name: 'Alpha-Ketoglutarate Dehydrogenase',
            vmax: 100,
            km: { alpha_ketoglutarate: 0.5 },
            inhibitors: { atp: 100, nadh: 100, succinyl_coa: 10 },
        }),
        succinylCoaSynthetase: new Enzyme({
            name: 'Succinyl-CoA Synthetase',
            vmax: 100,
            km: { succinyl_coa: 0.1, gdp: 0.1 },
        }),
        succinateDehydrogenase: new Enzyme({
            name: 'Succinate Dehydrogenase',
            vmax: 100,
            km: { succinate: 0.1, fad: 0.1 },
        }),
        fumarase: new Enzyme({ name: 'Fumarase', vmax: 100, km: 0.1 }),
        malateDehydrogenase: new Enzyme({
            name: 'Malate Dehydrogenase',
            vmax: 100,
            km: { malate: 0.1, nad: 0.1 },
        }),
    };
}

export function createPyruvateDehydrogenase(): Enzyme {
    return new Enzyme({
        name: 'Pyruvate Dehydrogenase',
        vmax: 100,
        km: { pyruvate: 0.1, nad: 0.1, coa: 0.1 },
        inhibitors: { acetyl_coa: 100, nadh: 100 },
    });
}

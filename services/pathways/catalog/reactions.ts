/**
 * Reaction catalog: stoichiometry of the glycolytic, pyruvate oxidation and
 * Krebs cycle steps, bound to freshly created enzymes.
 */

import { Reaction } from '../../kinetics/Reaction';
import {
    createGlycolysisEnzymes,
    createKrebsCycleEnzymes,
    createPyruvateDehydrogenase,
    type GlycolysisEnzymes,
    type KrebsCycleEnzymes,
} from './enzymes';

export type GlycolysisReactions = { readonly [K in keyof GlycolysisEnzymes]: Reaction };
export type KrebsCycleReactions = { readonly [K in keyof KrebsCycleEnzymes]: Reaction };

export function createGlycolysisReactions(enzymes: GlycolysisEnzymes = createGlycolysisEnzymes()): GlycolysisReactions {
    return {
        hexokinase: new Reaction({
            name: 'Hexokinase',
            enzyme: enzymes.hexokinase,
            consume: { glucose: 1, atp: 1 },
            produce: { glucose_6_phosphate: 1, adp: 1 },
        }),
        phosphoglucoseIsomerase: new Reaction({
            name: 'Phosphoglucose Isomerase',
            enzyme: enzymes.phosphoglucoseIsomerase,
            consume: { glucose_6_phosphate: 1 },
            produce: { fructose_6_phosphate: 1 },
        }),
        phosphofructokinase: new Reaction({
            name: 'Phosphofructokinase',
            enzyme: enzymes.phosphofructokinase,
            consume: { fructose_6_phosphate: 1, atp: 1 },
            produce: { fructose_1_6_bisphosphate: 1, adp: 1 },
        }),
        aldolase: new Reaction({
            name: 'Aldolase',
            enzyme: enzymes.aldolase,
            consume: { fructose_1_6_bisphosphate: 1 },
            produce: { dihydroxyacetone_phosphate: 1, glyceraldehyde_3_phosphate: 1 },
        }),
        triosePhosphateIsomerase: new Reaction({
            name: 'Triose Phosphate Isomerase',
            enzyme: enzymes.triosePhosphateIsomerase,
            consume: { dihydroxyacetone_phosphate: 1 },
            produce: { glyceraldehyde_3_phosphate: 1 },
        }),
        glyceraldehyde3PhosphateDehydrogenase: new Reaction({
            name: 'Glyceraldehyde 3-Phosphate Dehydrogenase',
            enzyme: enzymes.glyceraldehyde3PhosphateDehydrogenase,
            consume: { glyceraldehyde_3_phosphate: 1, nad: 1, pi: 1 },
            produce: { bisphosphoglycerate_1_3: 1, nadh: 1 },
        }),
        phosphoglycerateKinase: new Reaction({
            name: 'Phosphoglycerate Kinase',
            enzyme: enzymes.phosphoglycerateKinase,
            consume: { bisphosphoglycerate_1_3: 1, adp: 1 },
            produce: { phosphoglycerate_3: 1, atp: 1 },
        }),
        phosphoglycerateMutase: new Reaction({
            name: 'Phosphoglycerate Mutase',
            enzyme: enzymes.phosphoglycerateMutase,
            consume: { phosphoglycerate_3: 1 },
            produce: { phosphoglycerate_2: 1 },
        }),
        enolase: new Reaction({
            name: 'Enolase',
            enzyme: enzymes.enolase,
            consume: { phosphoglycerate_2: 1 },
            produce: { phosphoenolpyruvate: 1 },
        }),
        pyruvateKinase: new Reaction({
            name: 'Pyruvate Kinase',
            enzyme: enzymes.pyruvateKinase,
            consume: { phosphoenolpyruvate: 1, adp: 1 },
            produce: { pyruvate: 1, atp: 1 },
        }),
        lactateDehydrogenase: new Reaction({
            name: 'Lactate Dehydrogenase',
            enzyme: enzymes.lactateDehydrogenase,
            consume: { pyruvate: 1, nadh: 1 },
            produce: { lactate: 1, nad: 1 },
        }),
    };
}

export function createPyruvateOxidationReaction(enzyme = createPyruvateDehydrogenase()): Reaction {
    return new Reaction({
        name: 'Pyruvate Dehydrogenase',
        enzyme,
        consume: { pyruvate: 1, nad: 1, coa: 1 },
        produce: { acetyl_coa: 1, nadh: 1, co2: 1 },
    });
}

export function createKrebsCycleReactions(enzymes: KrebsCycleEnzymes = createKrebsCycleEnzymes()): KrebsCycleReactions {
    return {
        citrateSynthase: new Reaction({
            name: 'Citrate Synthase',
            enzyme: enzymes.citrateSynthase,
            consume: { acetyl_coa: 1, oxaloacetate: 1 },
            produce: { citrate: 1, coa: 1 },
        }),
        aconitase: new Reaction({
            name: 'Aconitase',
            enzyme: enzymes.aconitase,
            consume: { citrate: 1 },
            produce: { isocitrate: 1 },
        }),
        isocitrateDehydrogenase: new Reaction({
            name: 'Isocitrate Dehydrogenase',
            enzyme: enzymes.isocitrateDehydrogenase,
            consume: { isocitrate: 1, nad: 1 },
            produce: { alpha_ketoglutarate: 1, nadh: 1, co2: 1 },
        }),
        alphaKetoglutarateDehydrogenase: new Reaction({
            name: 'Alpha-Ketoglutarate Dehydrogenase',
            enzyme: enzymes.alphaKetoglutarateDehydrogenase,
            consume: { alpha_ketoglutarate: 1, nad: 1, coa: 1 },
            produce: { succinyl_coa: 1, nadh: 1, co2: 1 },
        }),
        succinylCoaSynthetase: new Reaction({
            name: 'Succinyl-CoA Synthetase',
            enzyme: enzymes.succinylCoaSynthetase,
            consume: { succinyl_coa: 1, gdp: 1, pi: 1 },
            produce: { succinate: 1, gtp: 1, coa: 1 },
        }),
        succinateDehydrogenase: new Reaction({
            name: 'Succinate Dehydrogenase',
            enzyme: enzymes.succinateDehydrogenase,
            consume: { succinate: 1, fad: 1 },
            produce: { fumarate: 1, fadh2: 1 },
        }),
        fumarase: new Reaction({
            name: 'Fumarase',
            enzyme: enzymes.fumarase,
            consume: { fumarate: 1 },
            produce: { malate: 1 },
        }),
        malateDehydrogenase: new Reaction({
            name: 'Malate Dehydrogenase',
            enzyme: enzymes.malateDehydrogenase,
            consume: { malate: 1, nad: 1 },
            produce: { oxaloacetate: 1, nadh: 1 },
        }),
    };
}

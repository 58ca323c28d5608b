// Tunables shared by the pathways, organelles and the simulation controller.

// Conservation checks
export const CONSERVATION_TOLERANCE = 1e-6;

// Standard free energies (kJ/mol-ish units, illustrative), keyed by lower-cased species name.
// Species without an entry count with a coefficient of 1.
export const FREE_ENERGIES: Readonly<Record<string, number>> = {
  atp: 50,
  adp: 30,
  amp: 10,
  gtp: 50,
  nadh: 158,
  fadh2: 105,
  acetyl_coa: 31,
  proton_gradient: 5,
  glucose: 686,
  glucose_6_phosphate: 916,
  fructose_6_phosphate: 916,
  fructose_1_6_bisphosphate: 1146,
  glyceraldehyde_3_phosphate: 573,
  bisphosphoglycerate_1_3: 803,
  phosphoglycerate_3: 573,
  phosphoglycerate_2: 573,
  phosphoenolpyruvate: 803,
  pyruvate: 343,
};

export const DEFAULT_FREE_ENERGY = 1;

// Glycolysis
export const GLYCOLYSIS_TIME_STEP = 1;
export const G3P_PER_GLUCOSE = 2;

// Krebs cycle
export const KREBS_TIME_STEP = 1;

// Mitochondrion
export const CALCIUM_THRESHOLD = 800;
export const CALCIUM_BOOST_FACTOR = 1.2;
export const MAX_PROTON_GRADIENT = 200;
export const LEAK_RATE = 0.1;
export const LEAK_STEEPNESS = 0.1;
export const LEAK_MIDPOINT = 150;

// Electron transport chain
export const PROTONS_PER_NADH = 4;
export const PROTONS_PER_FADH2 = 0;
export const PROTONS_PER_UBIQUINOL = 4;
export const PROTONS_PER_OXYGEN_REDUCTION = 2;
export const PROTONS_PER_ATP = 4;
export const COMPLEX_TURNOVER_PER_UPDATE = 1;
export const OXIDATIVE_PHOSPHORYLATION_TIME_STEP = 1;

// NADH shuttle (glycerol-phosphate / malate-aspartate blend)
export const SHUTTLE_EFFICIENCY = 0.67;
export const NADH_SHUTTLE_RATE = 5;

// Adenine nucleotide exchange across the inner membrane
export const MITOCHONDRIAL_ADP_THRESHOLD = 10;
export const ADP_IMPORT_LIMIT = 50;
export const MAX_MITOCHONDRIAL_ATP = 100;
export const MAX_CYTOPLASMIC_ATP = 500;

// Simulation
export const TIME_STEP = 0.1;
export const MAX_SIMULATION_TIME = 20;
export const ADP_ACTIVATION_SCALE = 500;

/**
 * services/simulation/SimulationController.ts
 *
 * Drives a Cell tick by tick until the glucose it was given has been through
 * glycolysis or the simulated time runs out.
 *
 * One tick:
 *   1. glycolysis of one glucose unit in the cytoplasm
 *   2. ADP import into the matrix when matrix ADP runs low
 *   3. ADP feedback on phosphofructokinase (activity = 1 + ADP / scale)
 *   4. pyruvate transfer and NADH shuttle into the mitochondrion
 *   5. respiration (pyruvate oxidation, Krebs cycle, oxidative phosphorylation)
 *   6. export of excess matrix ATP to the cytoplasm
 *   7. observers
 *
 * Store errors and non-glycolytic pathway errors skip the rest of the tick.
 * A GlycolysisError stops the run, and so does a glucose unit that yields
 * less than its full pyruvate (a stalled yield phase, e.g. no cytosolic ADP).
 */

import { ADP_ACTIVATION_SCALE, CONSERVATION_TOLERANCE, G3P_PER_GLUCOSE } from '../../constants';
import { loadConfig } from '../../config';
import { describeError, GlycolysisError, MetaboliteError, PathwayError } from '../metabolism/errors';
import type { Cell } from '../organelles/Cell';
import { getDefaultReporter, type Reporter } from '../reporting/Reporter';
import { defaultObservers, type SimulationObserver } from './observers';

export type StopReason = 'completed' | 'time_limit' | 'glycolysis_error' | 'stalled';

export interface SimulationOptions {
    reporter?: Reporter;
    timeStep?: number;
    maxSimulationTime?: number;
    observers?: SimulationObserver[];
    /** Oxidative phosphorylation rounds per tick */
    respirationUpdates?: number;
}

export interface SimulationIssue {
    time: number;
    source: string;
    message: string;
}

export interface CompartmentAtp {
    cytoplasm: number;
    mitochondrion: number;
    total: number;
}

export interface SimulationResults {
    simulationTime: number;
    ticks: number;
    /** Glucose units that made it to pyruvate; fractional when a unit stalled */
    glucoseProcessed: number;
    stoppedBy: StopReason;
    glycolysisAtp: number;
    oxidativeAtp: number;
    pyruvateTransferred: number;
    nadhShuttled: number;
    adpImported: number;
    atpExported: number;
    co2Released: number;
    atp: CompartmentAtp;
    errors: SimulationIssue[];
    observations: SimulationIssue[];
}

type Totals = Pick<
    SimulationResults,
    | 'glucoseProcessed'
    | 'glycolysisAtp'
    | 'oxidativeAtp'
    | 'pyruvateTransferred'
    | 'nadhShuttled'
    | 'adpImported'
    | 'atpExported'
    | 'co2Released'
>;

export class SimulationController {
    readonly timeStep: number;
    readonly maxSimulationTime: number;

    private readonly reporter: Reporter;
    private readonly observers: SimulationObserver[];
    private readonly respirationUpdates: number;
    private time = 0;

    constructor(private readonly cell: Cell, options: SimulationOptions = {}) {
        const needsConfig = options.timeStep === undefined || options.maxSimulationTime === undefined;
        const config = needsConfig ? loadConfig() : undefined;
        this.timeStep = options.timeStep ?? config?.timeStep ?? 0;
        this.maxSimulationTime = options.maxSimulationTime ?? config?.maxSimulationTime ?? 0;
        if (!(this.timeStep > 0)) throw new RangeError(`Time step must be positive. Got: ${this.timeStep}`);
        if (!(this.maxSimulationTime > 0)) {
            throw new RangeError(`Max simulation time must be positive. Got: ${this.maxSimulationTime}`);
        }
        this.reporter = options.reporter ?? getDefaultReporter();
        this.observers = options.observers ?? defaultObservers();
        this.respirationUpdates = options.respirationUpdates ?? 1;
    }

    get simulationTime(): number {
        return this.time;
    }

    run(glucose: number): SimulationResults {
        if (!(glucose >= 0)) throw new RangeError(`Glucose must be non-negative. Got: ${glucose}`);
        const cytoplasm = this.cell.cytoplasm;
        if (glucose > 0) cytoplasm.addGlucose(glucose);
        this.reporter.logEvent('Simulation', `Starting simulation with ${glucose} glucose`);

        const totals: Totals = {
            glucoseProcessed: 0,
            glycolysisAtp: 0,
            oxidativeAtp: 0,
            pyruvateTransferred: 0,
            nadhShuttled: 0,
            adpImported: 0,
            atpExported: 0,
            co2Released: 0,
        };
        const errors: SimulationIssue[] = [];
        const observations: SimulationIssue[] = [];
        let ticks = 0;
        let stoppedBy: StopReason = 'completed';

        for (const observer of this.observers) observer.observe(this.cell, this.time);

        while (cytoplasm.metabolites.quantity('glucose') >= 1) {
            if (this.time >= this.maxSimulationTime) {
                stoppedBy = 'time_limit';
                this.reporter.logWarning('Simulation', `Reached max simulation time (${this.maxSimulationTime})`);
                break;
            }

            try {
                if (!this.tick(totals)) {
                    stoppedBy = 'stalled';
                    break;
                }
            } catch (error) {
                if (error instanceof GlycolysisError) {
                    errors.push({ time: this.time, source: error.name, message: error.message });
                    this.reporter.logError('Simulation', `Stopping: ${error.message}`);
                    stoppedBy = 'glycolysis_error';
                    break;
                }
                if (error instanceof MetaboliteError || error instanceof PathwayError) {
                    errors.push({ time: this.time, source: error.name, message: error.message });
                    this.reporter.logWarning('Simulation', `Skipping rest of step: ${describeError(error)}`);
                } else {
                    throw error;
                }
            } finally {
                this.time += this.timeStep;
                ticks++;
            }

            for (const observer of this.observers) {
                for (const message of observer.observe(this.cell, this.time)) {
                    observations.push({ time: this.time, source: observer.name, message });
                    this.reporter.logWarning('Simulation', `[${observer.name}] ${message}`);
                }
            }
        }

        const atp = this.atpLevels();
        this.reporter.logEvent(
            'Simulation',
            `Finished after ${ticks} ticks (${stoppedBy}). Total ATP: ${atp.total}`,
        );
        return { simulationTime: this.time, ticks, stoppedBy, ...totals, atp, errors, observations };
    }

    /** Clock, cell and observers back to their starting state. */
    reset(): void {
        this.time = 0;
        this.cell.reset();
        for (const observer of this.observers) observer.reset?.();
    }

    /** Returns false when the glucose unit of this tick did not fully reach pyruvate. */
    private tick(totals: Totals): boolean {
        const { cytoplasm, mitochondrion } = this.cell;

        const glycolysis = cytoplasm.performGlycolysis(1);
        totals.glucoseProcessed += glycolysis.pyruvate / G3P_PER_GLUCOSE;
        totals.glycolysisAtp += glycolysis.netAtp;
        if (glycolysis.pyruvate < G3P_PER_GLUCOSE - CONSERVATION_TOLERANCE) {
            this.reporter.logWarning(
                'Simulation',
                `Glycolysis stalled: one glucose unit gave ${glycolysis.pyruvate} pyruvate ` +
                    `(cytosolic ADP: ${cytoplasm.metabolites.quantity('adp')})`,
            );
            return false;
        }

        totals.adpImported += this.cell.importAdp();

        const adp = cytoplasm.metabolites.quantity('adp');
        cytoplasm.glycolysis.reactions.phosphofructokinase.enzyme.setActivity(1 + adp / ADP_ACTIVATION_SCALE);

        totals.pyruvateTransferred += this.cell.transferPyruvate();
        totals.nadhShuttled += this.cell.shuttleNadh();

        const respiration = mitochondrion.respire(mitochondrion.metabolites.quantity('pyruvate'), this.respirationUpdates);
        totals.oxidativeAtp += respiration.oxidativePhosphorylation.atp;
        totals.co2Released += (respiration.pyruvateOxidation?.co2 ?? 0) + (respiration.krebsCycle?.co2 ?? 0);

        totals.atpExported += this.cell.exportAtp();
        return true;
    }

    private atpLevels(): CompartmentAtp {
        const cytoplasm = this.cell.cytoplasm.metabolites.quantity('atp');
        const mitochondrion = this.cell.mitochondrion.metabolites.quantity('atp');
        return { cytoplasm, mitochondrion, total: cytoplasm + mitochondrion };
    }
}

import { loadConfig } from '../config';
import { Cell } from '../services/organelles/Cell';
import { ConsoleReporter } from '../services/reporting/Reporter';
import { SimulationController } from '../services/simulation/SimulationController';

// Usage: npm run simulate -- [glucose] [--anaerobic]
function main() {
    const args = process.argv.slice(2);
    const glucose = Number(args.find((a) => !a.startsWith('--')) ?? 5);
    const anaerobic = args.includes('--anaerobic');
    if (!Number.isFinite(glucose) || glucose < 0) {
        console.error(`Invalid glucose amount: ${args[0]}`);
        process.exit(1);
    }

    const config = loadConfig();
    const reporter = new ConsoleReporter(config.logLevel);
    const cell = new Cell({ reporter, cytoplasm: { glycolysis: { anaerobic } } });
    const controller = new SimulationController(cell, {
        reporter,
        timeStep: config.timeStep,
        maxSimulationTime: config.maxSimulationTime,
    });

    console.log(`Running simulation with ${glucose} glucose${anaerobic ? ' (anaerobic)' : ''}...`);
    const results = controller.run(glucose);

    console.log('\n=== Results ===');
    console.log(`Stopped by:            ${results.stoppedBy}`);
    console.log(`Simulated time:        ${results.simulationTime.toFixed(2)} s over ${results.ticks} ticks`);
    console.log(`Glucose processed:     ${results.glucoseProcessed}`);
    console.log(`ATP from glycolysis:   ${results.glycolysisAtp}`);
    console.log(`ATP from ox. phos.:    ${results.oxidativeAtp}`);
    console.log(`Pyruvate transferred:  ${results.pyruvateTransferred}`);
    console.log(`NADH shuttled:         ${results.nadhShuttled.toFixed(2)}`);
    console.log(`ADP imported:          ${results.adpImported.toFixed(2)}`);
    console.log(`ATP exported:          ${results.atpExported.toFixed(2)}`);
    console.log(`CO2 released:          ${results.co2Released.toFixed(2)}`);
    console.log(`ATP (cyto / mito):     ${results.atp.cytoplasm} / ${results.atp.mitochondrion}`);

    if (results.errors.length > 0) {
        console.log(`\n${results.errors.length} step error(s):`);
        for (const e of results.errors) console.log(`  t=${e.time.toFixed(2)} ${e.source}: ${e.message}`);
    }
    if (results.observations.length > 0) {
        console.log(`\n${results.observations.length} observer warning(s):`);
        for (const o of results.observations) console.log(`  t=${o.time.toFixed(2)} [${o.source}] ${o.message}`);
    }
}

main();

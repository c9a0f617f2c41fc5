/**
 * tsasim — ternary systolic accelerator simulator
 *
 * Usage:
 *   npx tsx tsasim.ts <config.json> [program.tasm] [options]
 *
 * A program given on the command line replaces the config's `program`.
 *
 * Options:
 *   --json      Print the run report as JSON
 *   --quiet     Only print the halt line and errors
 *   --disasm    Print the program listing before running
 */
import { readFileSync } from 'fs';
import { Accelerator } from './src/core/accelerator';
import { AnalyticPhysicsValidator } from './src/core/physics';
import { disassemble } from './src/core/disassembler';
import { SimulatorError } from './src/core/errors';
import { assemble } from './src/core/assembler/assembler';
import type { RunReport } from './src/core/types';

// ---- Argument parsing ----

const args = process.argv.slice(2);
const flags = new Set(args.filter(a => a.startsWith('--')));
const files = args.filter(a => !a.startsWith('--'));

if (files.length === 0) {
  console.error('tsasim — ternary systolic accelerator simulator');
  console.error('');
  console.error('Usage: tsasim <config.json> [program.tasm] [options]');
  console.error('');
  console.error('Options:');
  console.error('  --json      Print the run report as JSON');
  console.error('  --quiet     Only print the halt line and errors');
  console.error('  --disasm    Print the program listing before running');
  process.exit(1);
}

const jsonOut = flags.has('--json');
const quiet = flags.has('--quiet');
const disasm = flags.has('--disasm');

function readText(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch {
    console.error(`Error: cannot read file '${path}'`);
    process.exit(1);
  }
}

const configPath = files[0];
let config: Record<string, unknown>;
try {
  const parsed: unknown = JSON.parse(readText(configPath));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    console.error(`Error: '${configPath}' must contain a JSON object`);
    process.exit(1);
  }
  config = { ...parsed };
} catch (e) {
  console.error(`Error: '${configPath}' is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
}

if (files.length > 1) config.program = readText(files[1]);

// ---- Run ----

let report: RunReport;
try {
  const accelerator = await Accelerator.create(config, new AnalyticPhysicsValidator());

  if (disasm && !jsonOut) {
    const source = accelerator.config.program;
    const listing = typeof source === 'string' ? assemble(source).program : source;
    console.log('  \x1b[1mProgram:\x1b[0m');
    for (const line of disassemble(listing)) console.log(`    ${line}`);
    console.log('');
  }

  report = accelerator.run();
} catch (e) {
  if (e instanceof SimulatorError) {
    console.error(`\x1b[31m✗ ${configPath}: ${e.name}\x1b[0m`);
    console.error(`  ${e.message}`);
    process.exit(2);
  }
  throw e;
}

// ---- JSON output mode ----

if (jsonOut) {
  console.log(JSON.stringify(report, null, 2));
  process.exit(report.timingViolations.length > 0 ? 3 : 0);
}

// ---- Summary ----

const haltColor = report.haltReason === 'halt' || report.haltReason === 'end-of-program' ? '32' : '33';
console.log(`\x1b[${haltColor}m■ ${report.haltReason}\x1b[0m after ${report.totalCycles} cycles, ` +
  `${report.instructionsRetired} instructions, ${report.timeUnits} time units`);

if (quiet) process.exit(report.timingViolations.length > 0 ? 3 : 0);

console.log('');
console.log('  \x1b[1mRegisters:\x1b[0m');
for (const r of report.registers) {
  console.log(`    ${r.name.padEnd(4)} T${r.tier}  ${r.value.padStart(12)}  ${r.trits}`);
}

console.log('');
console.log('  \x1b[1mMemory tiers:\x1b[0m');
for (const t of report.tiers) {
  console.log(`    T${t.tier}  ${t.occupied}/${t.capacity} slots, latency ${t.latency}`);
}
console.log(`    spills: ${report.spills}`);

if (report.data.length > 0) {
  console.log('');
  console.log('  \x1b[1mData memory:\x1b[0m');
  for (const d of report.data) {
    console.log(`    [${d.addr.toString().padStart(3)}] ${d.value.padStart(12)}  ${d.trits}`);
  }
}

console.log('');
console.log('  \x1b[1mLanes:\x1b[0m');
for (const l of report.lanes) {
  const state = l.enabled ? '' : '  \x1b[2m(disabled)\x1b[0m';
  console.log(`    lane ${l.laneId}: ${l.vectors} vectors, ${l.macs} MACs, ` +
    `${l.macsPerCycle.toFixed(2)} MAC/cycle${state}`);
}
console.log(`    effective channels: ${report.effectiveChannels}`);
const peak = report.theoretical;
console.log(`    peak: ${peak.macsPerCycle} MAC/cycle at ${peak.clockMhz.toFixed(0)} MHz = ${peak.gops.toFixed(1)} GOPS`);

console.log('');
const { predictions, mispredictions } = report.branches;
console.log(`  Branches: ${predictions} predicted, ${mispredictions} mispredicted`);
const pct = (report.skew.skew * 100).toFixed(2);
console.log(`  Clock skew: ${pct}% over ${report.skew.nPEs} PEs (limit ${(report.skew.threshold * 100).toFixed(2)}%)`);
if (report.logDomain.enabled) {
  console.log(`  Log-domain ADD/SUB cycles: ${report.logDomain.addSubCycles} → ${report.logDomain.effectiveAddSubCycles}`);
}

for (const o of report.overflows) {
  const where = o.source === 'lane' ? `lane ${o.laneId} PE(${o.row},${o.col})` : `@${o.pc} ${o.mnemonic}`;
  console.log(`  \x1b[33m! ${o.kind}\x1b[0m at cycle ${o.cycle}: ${where}`);
}

for (const v of report.timingViolations) {
  console.error(`\x1b[31m✗ timing: skew ${(v.skew * 100).toFixed(2)}% (${v.skewPs.toFixed(0)} ps of ${v.periodPs} ps) ` +
    `exceeds ${(v.threshold * 100).toFixed(2)}% for ${v.nPEs} PEs\x1b[0m`);
}
process.exit(report.timingViolations.length > 0 ? 3 : 0);

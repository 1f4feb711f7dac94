#!/usr/bin/env node
import { SimulationError, PipelineDeadlockError, CycleLimitError } from '@ooo-sim/core';
import { parseFlags, parseCount, loadConfigFile, loadProgramFile, resolveConfig, runProgram, writeReport, ReportWriteError, type RunOutcome } from './lib.js';

function printUsage() {
  console.log(`Usage:
  ooo-sim run <program.txt> [--config cfg.json] [--out report.txt]
     [--arch-regs N] [--phys-regs N] [--rob N] [--width N] [--lsq N]
     [--issue-policy station-order|oldest-first] [--max-cycles N]
     [--trace] [--dump-state] [--dump-at C1,C2,...]

 Program lines: <ALU|LOAD|STORE> <src1> <src2> <dst>   (-1 = no register)

 Examples:
   ooo-sim run prog.txt --width 2 --out tmp/prog.out
   ooo-sim run prog.txt --config cfg.json --trace --dump-at 5,6
`);
}

function parseDumpAt(val: string | undefined): Set<number> | undefined {
  if (val === undefined) return undefined;
  return new Set(val.split(',').filter(s => s.trim().length > 0).map(s => parseCount('dump-at', s)));
}

async function runRun(args: string[]) {
  const { positional, opts } = parseFlags(args);
  const file = positional[0];
  if (!file) {
    console.error('run requires a program file path');
    process.exit(1);
  }
  const fileCfg = opts['config'] ? loadConfigFile(opts['config']) : {};
  const config = resolveConfig(fileCfg, opts);
  const program = loadProgramFile(file);

  const dumpAt = opts['dump-state'] ? 'all' as const : parseDumpAt(opts['dump-at']);
  let outcome: RunOutcome;
  try {
    outcome = runProgram(program, config, {
      trace: opts['trace'] ? line => console.error(line) : undefined,
      dump: (cycle, state) => console.error(`--- state after cycle ${cycle} ---\n${state}\n`),
      dumpAt,
    });
  } catch (e) {
    if (e instanceof PipelineDeadlockError || e instanceof CycleLimitError) {
      console.error(`${e.name}: ${e.message}\n${e.dump}`);
      process.exit(2);
    }
    throw e;
  }

  const out = opts['out'];
  if (out) writeReport(out, outcome.report);
  else for (const line of outcome.report) console.log(line);

  const { stats } = outcome;
  console.log(JSON.stringify({
    program: file,
    config: outcome.cpu.config,
    instructions: outcome.cpu.instructions.length,
    cycles: stats.cycles,
    ipc: Number(stats.ipc.toFixed(4)),
    dispatchStalls: stats.dispatchStalls,
    report: out ?? null,
  }, null, 2));
}

async function main() {
  const argv = process.argv.slice(2);
  const cmd = argv[0];
  if (!cmd || cmd === 'help' || cmd === '-h' || cmd === '--help') {
    printUsage();
    return;
  }
  if (cmd === 'run') {
    await runRun(argv.slice(1));
    return;
  }
  printUsage();
  process.exitCode = 1;
}

main().catch((err) => {
  if (err instanceof ReportWriteError || err instanceof SimulationError) {
    console.error(`${err.name}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});

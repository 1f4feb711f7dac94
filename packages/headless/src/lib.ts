import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import {
  CPU, type CPUConfig, type CPUStats, ConfigError, DEFAULT_CONFIG, type ProgramInstruction, type StationSpec, type StationType,
  formatReport, formatTraceLine, isIssuePolicy, parseProgram,
} from '@ooo-sim/core';

export class ReportWriteError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`cannot write report to ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'ReportWriteError';
  }
}

// Non-negative decimal or 0x-hex integer; `flag` names the option in the error.
export function parseCount(flag: string, val: string): number {
  const s = val.trim();
  let n = NaN;
  if (/^0x[0-9a-f]+$/i.test(s)) n = parseInt(s.slice(2), 16);
  else if (/^\d+$/.test(s)) n = Number(s);
  if (!Number.isSafeInteger(n)) throw new ConfigError(`--${flag} expects a non-negative integer (got '${val}')`);
  return n;
}

function countFlag(opts: Record<string, string>, flag: string, def: number): number {
  const val = opts[flag];
  return val === undefined ? def : parseCount(flag, val);
}

// `--key value` pairs; a flag with no value reads as '1'.
export function parseFlags(args: readonly string[]): { positional: string[]; opts: Record<string, string> } {
  const positional: string[] = [];
  const opts: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const a = args[i]!;
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = (i + 1 < args.length) ? args[i + 1] : undefined;
      const val = (next && !next.startsWith('--')) ? args[++i]! : '1';
      opts[key] = val;
    } else {
      positional.push(a);
    }
  }
  return { positional, opts };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isStationType(v: unknown): v is StationType {
  return v === 'ALU' || v === 'LOAD' || v === 'STORE';
}

function intField(obj: Record<string, unknown>, key: string): number | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'number' || !Number.isInteger(v)) throw new ConfigError(`config field '${key}' must be an integer`);
  return v;
}

export function parseConfigJson(text: string): Partial<CPUConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`config is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isRecord(raw)) throw new ConfigError('config must be a JSON object');
  const out: Partial<CPUConfig> = {};
  const numArchRegs = intField(raw, 'numArchRegs');
  if (numArchRegs !== undefined) out.numArchRegs = numArchRegs;
  const numPhysRegs = intField(raw, 'numPhysRegs');
  if (numPhysRegs !== undefined) out.numPhysRegs = numPhysRegs;
  const robEntries = intField(raw, 'robEntries');
  if (robEntries !== undefined) out.robEntries = robEntries;
  const width = intField(raw, 'width');
  if (width !== undefined) out.width = width;
  const numLSQEntries = intField(raw, 'numLSQEntries');
  if (numLSQEntries !== undefined) out.numLSQEntries = numLSQEntries;
  const maxCycles = intField(raw, 'maxCycles');
  if (maxCycles !== undefined) out.maxCycles = maxCycles;
  const policy = raw['issuePolicy'];
  if (policy !== undefined) {
    if (typeof policy !== 'string' || !isIssuePolicy(policy)) throw new ConfigError(`unknown issue policy '${String(policy)}'`);
    out.issuePolicy = policy;
  }
  const stations = raw['stations'];
  if (stations !== undefined) {
    if (!Array.isArray(stations)) throw new ConfigError("config field 'stations' must be an array");
    out.stations = stations.map((s: unknown, i): StationSpec => {
      const type = isRecord(s) ? s['type'] : undefined;
      if (!isRecord(s) || !isStationType(type)) throw new ConfigError(`stations[${i}] needs a type of ALU, LOAD or STORE`);
      const execTime = intField(s, 'execTime');
      if (execTime === undefined) throw new ConfigError(`stations[${i}] needs an integer execTime`);
      const spec: StationSpec = { type, execTime };
      const name = s['name'];
      if (typeof name === 'string') spec.name = name;
      return spec;
    });
  }
  return out;
}

// Defaults, then the config file, then command-line flags.
export function resolveConfig(file: Partial<CPUConfig>, opts: Record<string, string>): CPUConfig {
  const base: CPUConfig = { ...DEFAULT_CONFIG, maxCycles: undefined, ...file };
  const cfg: CPUConfig = {
    ...base,
    numArchRegs: countFlag(opts, 'arch-regs', base.numArchRegs),
    numPhysRegs: countFlag(opts, 'phys-regs', base.numPhysRegs),
    robEntries: countFlag(opts, 'rob', base.robEntries),
    width: countFlag(opts, 'width', base.width),
    numLSQEntries: countFlag(opts, 'lsq', base.numLSQEntries),
  };
  const policy = opts['issue-policy'];
  if (policy !== undefined) {
    if (!isIssuePolicy(policy)) throw new ConfigError(`unknown issue policy '${policy}'`);
    cfg.issuePolicy = policy;
  }
  const maxCycles = opts['max-cycles'];
  if (maxCycles !== undefined) cfg.maxCycles = parseCount('max-cycles', maxCycles);
  return cfg;
}

export function loadConfigFile(filePath: string): Partial<CPUConfig> {
  return parseConfigJson(readFileSync(filePath, 'utf8'));
}

export function loadProgramFile(filePath: string): ProgramInstruction[] {
  return parseProgram(readFileSync(filePath, 'utf8'));
}

// Not retried: a report that cannot be written ends the run.
export function writeReport(filePath: string, lines: readonly string[]): void {
  try {
    const dir = path.dirname(filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    writeFileSync(filePath, lines.map(l => `${l}\n`).join(''));
  } catch (e) {
    throw new ReportWriteError(filePath, e);
  }
}

export type RunOptions = {
  trace?: (line: string) => void;
  dump?: (cycle: number, state: string) => void;
  dumpAt?: ReadonlySet<number> | 'all';
};

export type RunOutcome = {
  cpu: CPU;
  stats: CPUStats;
  report: string[];
};

export function runProgram(program: readonly ProgramInstruction[], config: CPUConfig, opts: RunOptions = {}): RunOutcome {
  const cpu = new CPU(config);
  cpu.loadProgram(program);
  const { trace, dump, dumpAt } = opts;
  if (trace) cpu.onTrace = ev => trace(formatTraceLine(ev));
  if (dump && dumpAt) {
    cpu.onCycleEnd = c => {
      if (dumpAt === 'all' || dumpAt.has(c.cycle)) dump(c.cycle, c.dumpState());
    };
  }
  const stats = cpu.simulate();
  return { cpu, stats, report: formatReport(cpu.instructions) };
}

import type { StationType } from './instruction.js';
import { ConfigError } from './exceptions.js';

export type StationSpec = {
  type: StationType;
  execTime: number;
  name?: string;
};

export type IssuePolicy = 'station-order' | 'oldest-first';

export type CPUConfig = {
  numArchRegs: number;
  numPhysRegs: number;
  robEntries: number;
  width: number; // max instructions per stage per cycle
  numLSQEntries: number; // carried for completeness; no stage consults it
  stations?: readonly StationSpec[];
  issuePolicy?: IssuePolicy;
  maxCycles?: number;
};

export type ResolvedCPUConfig = Required<Omit<CPUConfig, 'maxCycles'>> & { maxCycles: number | null };

export const DEFAULT_STATIONS: readonly StationSpec[] = [
  { type: 'ALU', execTime: 1 },
  { type: 'ALU', execTime: 1 },
  { type: 'LOAD', execTime: 2 },
  { type: 'STORE', execTime: 2 },
];

export const DEFAULT_CONFIG: ResolvedCPUConfig = {
  numArchRegs: 32,
  numPhysRegs: 64,
  robEntries: 16,
  width: 2,
  numLSQEntries: 8,
  stations: DEFAULT_STATIONS,
  issuePolicy: 'station-order',
  maxCycles: null,
};

const ISSUE_POLICIES: readonly IssuePolicy[] = ['station-order', 'oldest-first'];

export function isIssuePolicy(v: string): v is IssuePolicy {
  return (ISSUE_POLICIES as readonly string[]).includes(v);
}

function positiveInt(name: string, v: number): void {
  if (!Number.isInteger(v) || v < 1) throw new ConfigError(`${name} must be a positive integer (got ${v})`);
}

export function validateConfig(cfg: CPUConfig): ResolvedCPUConfig {
  positiveInt('numArchRegs', cfg.numArchRegs);
  positiveInt('numPhysRegs', cfg.numPhysRegs);
  positiveInt('robEntries', cfg.robEntries);
  positiveInt('width', cfg.width);
  if (!Number.isInteger(cfg.numLSQEntries) || cfg.numLSQEntries < 0) {
    throw new ConfigError(`numLSQEntries must be a non-negative integer (got ${cfg.numLSQEntries})`);
  }
  if (cfg.numPhysRegs < cfg.numArchRegs) {
    throw new ConfigError(`numPhysRegs (${cfg.numPhysRegs}) must be at least numArchRegs (${cfg.numArchRegs})`);
  }
  const stations = cfg.stations ?? DEFAULT_STATIONS;
  const latencyByType = new Map<StationType, number>();
  for (const s of stations) {
    positiveInt(`${s.type} station latency`, s.execTime);
    const seen = latencyByType.get(s.type);
    if (seen !== undefined && seen !== s.execTime) {
      throw new ConfigError(`${s.type} stations disagree on latency (${seen} vs ${s.execTime})`);
    }
    latencyByType.set(s.type, s.execTime);
  }
  const issuePolicy = cfg.issuePolicy ?? 'station-order';
  if (!isIssuePolicy(issuePolicy)) throw new ConfigError(`unknown issue policy '${String(issuePolicy)}'`);
  if (cfg.maxCycles !== undefined) positiveInt('maxCycles', cfg.maxCycles);
  return {
    numArchRegs: cfg.numArchRegs,
    numPhysRegs: cfg.numPhysRegs,
    robEntries: cfg.robEntries,
    width: cfg.width,
    numLSQEntries: cfg.numLSQEntries,
    stations,
    issuePolicy,
    maxCycles: cfg.maxCycles ?? null,
  };
}

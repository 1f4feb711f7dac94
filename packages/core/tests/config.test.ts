import { describe, it, expect } from 'vitest';
import { CPU } from '../src/cpu/cpu.js';
import { DEFAULT_STATIONS, type CPUConfig, isIssuePolicy, validateConfig } from '../src/cpu/config.js';
import { ConfigError } from '../src/cpu/exceptions.js';
import { smallConfig } from './helpers/programs.js';

describe('validateConfig', () => {
  it('fills in stations, policy and an unlimited cycle budget', () => {
    const cfg = validateConfig(smallConfig());
    expect(cfg.stations).toBe(DEFAULT_STATIONS);
    expect(cfg.issuePolicy).toBe('station-order');
    expect(cfg.maxCycles).toBeNull();
  });

  it('rejects non-positive sizes', () => {
    expect(() => validateConfig(smallConfig({ width: 0 }))).toThrow('width must be a positive integer (got 0)');
    expect(() => validateConfig(smallConfig({ robEntries: 1.5 }))).toThrow(ConfigError);
    expect(() => validateConfig(smallConfig({ numLSQEntries: -1 }))).toThrow(ConfigError);
    expect(() => validateConfig(smallConfig({ maxCycles: 0 }))).toThrow(ConfigError);
  });

  it('accepts an empty load/store queue', () => {
    expect(validateConfig(smallConfig({ numLSQEntries: 0 })).numLSQEntries).toBe(0);
  });

  it('needs at least one physical register per architectural register', () => {
    expect(() => validateConfig(smallConfig({ numPhysRegs: 3 })))
      .toThrow('numPhysRegs (3) must be at least numArchRegs (4)');
  });

  it('requires stations of one type to share a latency', () => {
    const stations = [{ type: 'ALU', execTime: 1 }, { type: 'ALU', execTime: 2 }] as const;
    expect(() => validateConfig(smallConfig({ stations }))).toThrow('ALU stations disagree on latency (1 vs 2)');
    expect(() => validateConfig(smallConfig({ stations: [{ type: 'LOAD', execTime: 0 }] }))).toThrow(ConfigError);
  });

  it('rejects an issue policy it does not know', () => {
    const cfg: CPUConfig = JSON.parse('{"numArchRegs":4,"numPhysRegs":8,"robEntries":4,"width":1,"numLSQEntries":0,"issuePolicy":"random"}');
    expect(() => validateConfig(cfg)).toThrow("unknown issue policy 'random'");
    expect(isIssuePolicy('oldest-first')).toBe(true);
  });
});

describe('CPU construction', () => {
  it('names stations per type in configuration order', () => {
    const cpu = new CPU(smallConfig());
    expect(cpu.stations.map(rs => rs.name)).toEqual(['ALU0', 'ALU1', 'LOAD0', 'STORE0']);
    expect(cpu.stations.map(rs => rs.toString())).toEqual([
      'ALU0(ALU, 1) free',
      'ALU1(ALU, 1) free',
      'LOAD0(LOAD, 2) free',
      'STORE0(STORE, 2) free',
    ]);
  });

  it('keeps explicit station names', () => {
    const cpu = new CPU(smallConfig({ stations: [{ type: 'ALU', execTime: 1, name: 'int' }] }));
    expect(cpu.stations[0]?.name).toBe('int');
  });

  it('bounds every stage queue by the pipeline width', () => {
    const cpu = new CPU(smallConfig({ width: 3 }));
    expect(cpu.decodeQueue.capacity).toBe(3);
    expect(cpu.dispatchQueue.capacity).toBe(3);
    expect(cpu.executeQueue.capacity).toBe(3);
    expect(cpu.completeQueue.capacity).toBe(3);
  });

  it('starts from the identity mapping', () => {
    const cpu = new CPU(smallConfig());
    expect(cpu.mapTable.toString()).toBe('Mapping Table : [r0->p0+, r1->p1+, r2->p2+, r3->p3+]');
    expect(cpu.registerAccounting()).toEqual({ free: 4, mapped: 4, inFlightOld: 0, pendingRelease: 0, total: 8 });
  });
});

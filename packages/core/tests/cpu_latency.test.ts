import { describe, it, expect } from 'vitest';
import { alu, build, load, store, runReport, smallConfig } from './helpers/programs.js';
import { formatReport } from '../src/report/timing_report.js';

describe('execution latency and completion order', () => {
  it('holds a load in the complete queue for the LOAD station latency', () => {
    const { cpu, report } = runReport([load(0, 1)], smallConfig({ width: 1 }));
    expect(report).toEqual(['0 1 2 3 4 6 7']);
    expect(cpu.instructions[0]?.execTime).toBe(2);
    expect(cpu.stats.cycles).toBe(8);
  });

  it('completes a store without touching the rename state', () => {
    const { cpu, report } = runReport([store(0, 1)], smallConfig({ width: 1 }));
    expect(report).toEqual(['0 1 2 3 4 6 7']);
    expect(cpu.freeList.toArray()).toEqual([4, 5, 6, 7]);
    expect(cpu.archMapTable.mappedRegisters()).toEqual([0, 1, 2, 3]);
    expect(cpu.registerAccounting().pendingRelease).toBe(0);
  });

  it('lets a younger ALU op complete first but retires both in program order', () => {
    const { report } = runReport([load(0, 1), alu(0, 0, 2)], smallConfig({ width: 2 }));
    expect(report).toEqual([
      '0 1 2 3 4 6 7',
      '0 1 2 3 4 5 7',
    ]);
  });

  it('frees the station at execute so the next op can dispatch into it', () => {
    // One ALU station: I1 dispatches in the cycle I0 starts executing.
    const cfg = smallConfig({ width: 1, stations: [{ type: 'ALU', execTime: 1 }] });
    const { report } = runReport([alu(0, 0, 1), alu(0, 0, 2)], cfg);
    expect(report).toEqual([
      '0 1 2 3 4 5 6',
      '1 2 4 5 6 7 8',
    ]);
  });

  it('stalls execute while a load fills the complete queue', () => {
    const cpu = build([load(0, 1), alu(0, 0, 2), alu(0, 0, 3)], smallConfig({ width: 1 }));
    let maxOccupancy = 0;
    cpu.onCycleEnd = c => {
      maxOccupancy = Math.max(maxOccupancy, c.completeQueue.size);
    };
    cpu.simulate();
    expect(formatReport(cpu.instructions)).toEqual([
      '0 1 2 3 4 6 7',
      '1 2 3 4 6 7 8',
      '2 3 4 6 7 8 9',
    ]);
    expect(maxOccupancy).toBe(1);
    expect(cpu.stats.cycles).toBe(10);
  });
});

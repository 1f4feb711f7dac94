import { describe, it, expect } from 'vitest';
import { MapTable } from '../src/rename/map_table.js';
import { PhysicalRegister } from '../src/rename/physical_register.js';
import { publishReady, type ReadinessListener } from '../src/rename/broadcast.js';
import { PipelineInvariantError } from '../src/cpu/exceptions.js';

describe('MapTable', () => {
  it('starts as the identity mapping with every register ready', () => {
    const mt = new MapTable('Mapping Table', 2, 4);
    const r1 = mt.getMapping(1);
    expect(r1.regNum).toBe(1);
    expect(r1.ready).toBe(true);
    expect(mt.isReady(3)).toBe(false);
    expect(mt.toString()).toBe('Mapping Table : [r0->p0+, r1->p1+]');
  });

  it('returns snapshots that do not follow later ready-bit updates', () => {
    const mt = new MapTable('m', 4, 8);
    mt.setMapping(1, new PhysicalRegister(5, false));
    const snap = mt.getMapping(1);
    expect(snap.regNum).toBe(5);
    expect(snap.ready).toBe(false);

    mt.setReadyBit(5);
    expect(snap.ready).toBe(false);
    expect(mt.getMapping(1).ready).toBe(true);
  });

  it('takes the ready flag of the register being installed', () => {
    const mt = new MapTable('arch', 4, 8);
    mt.setMapping(2, new PhysicalRegister(6, true));
    expect(mt.isReady(6)).toBe(true);
    expect(mt.mappedRegisters()).toEqual([0, 1, 6, 3]);
  });

  it('rejects registers outside its ranges', () => {
    const mt = new MapTable('m', 4, 8);
    expect(() => mt.getMapping(4)).toThrow(PipelineInvariantError);
    expect(() => mt.getMapping(-1)).toThrow(PipelineInvariantError);
    expect(() => mt.setReadyBit(8)).toThrow(PipelineInvariantError);
  });

  it('receives completion broadcasts alongside other listeners', () => {
    const mt = new MapTable('m', 4, 8);
    mt.setMapping(3, new PhysicalRegister(7, false));
    const seen: number[] = [];
    const probe: ReadinessListener = { onRegisterReady: r => { seen.push(r); } };
    publishReady([mt, probe], 7);
    expect(mt.getMapping(3).ready).toBe(true);
    expect(seen).toEqual([7]);
  });
});

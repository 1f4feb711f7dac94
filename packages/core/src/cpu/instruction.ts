import { PhysicalRegister, NO_REG } from '../rename/physical_register.js';
import { PipelineInvariantError } from './exceptions.js';

export type OpKind = 'ALU' | 'LOAD' | 'STORE';
export type StationType = OpKind;

export const STAGES = ['fetch', 'decode', 'dispatch', 'issue', 'execute', 'complete', 'retire'] as const;
export type Stage = typeof STAGES[number];

export type StageTimes = Record<Stage, number | null>;

export function stationTypeFor(kind: OpKind): StationType {
  switch (kind) {
    case 'ALU': return 'ALU';
    case 'LOAD': return 'LOAD';
    case 'STORE': return 'STORE';
  }
}

export class Instruction {
  srcPhysReg1 = PhysicalRegister.none();
  srcPhysReg2 = PhysicalRegister.none();
  dstPhysReg = PhysicalRegister.none();
  renamed = false;
  execTime = 0;
  // Index into the CPU's reservation-station list; set between dispatch and execute only.
  stationIndex: number | null = null;

  readonly timing: StageTimes = {
    fetch: null, decode: null, dispatch: null, issue: null, execute: null, complete: null, retire: null,
  };

  constructor(
    public readonly seq: number,
    public readonly kind: OpKind,
    public readonly srcOp1: number = NO_REG,
    public readonly srcOp2: number = NO_REG,
    public readonly dstOp: number = NO_REG,
  ) {}

  get stationType(): StationType {
    return stationTypeFor(this.kind);
  }

  hasDestination(): boolean {
    return this.dstOp !== NO_REG;
  }

  get issued(): boolean { return this.timing.issue !== null; }
  get completed(): boolean { return this.timing.complete !== null; }
  get retired(): boolean { return this.timing.retire !== null; }

  stamp(stage: Stage, cycle: number): void {
    if (this.timing[stage] !== null) {
      throw new PipelineInvariantError(`I${this.seq}: ${stage} cycle already set to ${this.timing[stage]}`);
    }
    this.timing[stage] = cycle;
  }

  // Ready means every present source operand has been produced.
  sourcesReady(): boolean {
    if (this.srcOp1 !== NO_REG && !this.srcPhysReg1.ready) return false;
    if (this.srcOp2 !== NO_REG && !this.srcPhysReg2.ready) return false;
    return true;
  }

  markSourceReady(regNum: number): void {
    if (this.srcOp1 !== NO_REG && this.srcPhysReg1.regNum === regNum) this.srcPhysReg1.ready = true;
    if (this.srcOp2 !== NO_REG && this.srcPhysReg2.regNum === regNum) this.srcPhysReg2.ready = true;
  }

  private operand(arch: number, phys: PhysicalRegister): string | null {
    if (arch === NO_REG) return null;
    return this.renamed ? `r${arch}(${phys.toString()})` : `r${arch}`;
  }

  toString(): string {
    const srcs = [this.operand(this.srcOp1, this.srcPhysReg1), this.operand(this.srcOp2, this.srcPhysReg2)]
      .filter((s): s is string => s !== null);
    const dst = this.operand(this.dstOp, this.dstPhysReg) ?? '-';
    return `I${this.seq} ${this.kind} ${srcs.length ? srcs.join(', ') : '-'} -> ${dst}`;
  }
}

import { PhysicalRegister } from './physical_register.js';
import { PipelineInvariantError } from '../cpu/exceptions.js';

// Pool of unmapped physical registers. Registers 0..numArchRegs-1 start out
// mapped by the map tables, so only the remainder is free at reset.
export class FreeList {
  private regs: number[] = [];
  private readonly members = new Set<number>();

  constructor(public readonly numArchRegs: number, public readonly numPhysRegs: number) {
    for (let r = numArchRegs; r < numPhysRegs; r++) {
      this.regs.push(r);
      this.members.add(r);
    }
  }

  get size(): number {
    return this.regs.length;
  }

  hasRegister(): boolean {
    return this.regs.length > 0;
  }

  has(regNum: number): boolean {
    return this.members.has(regNum);
  }

  // Handed out oldest-freed first; a popped register holds no result yet.
  popRegister(): PhysicalRegister {
    const r = this.regs.shift();
    if (r === undefined) throw new PipelineInvariantError('free list is empty');
    this.members.delete(r);
    return new PhysicalRegister(r, false);
  }

  addRegister(reg: PhysicalRegister): void {
    if (reg.isNone()) throw new PipelineInvariantError('cannot free the NONE register');
    const r = reg.regNum;
    if (r < 0 || r >= this.numPhysRegs) throw new PipelineInvariantError(`physical register p${r} out of range`);
    if (this.members.has(r)) throw new PipelineInvariantError(`physical register p${r} freed twice`);
    this.regs.push(r);
    this.members.add(r);
  }

  toArray(): number[] {
    return [...this.regs];
  }

  toString(): string {
    return `Free List : [${this.regs.map(r => `p${r}`).join(', ')}]`;
  }
}

import { PhysicalRegister } from './physical_register.js';
import type { ReadinessListener } from './broadcast.js';
import { PipelineInvariantError } from '../cpu/exceptions.js';

// Architectural -> physical mapping plus one ready bit per physical register.
// Used twice by the CPU: the speculative table (dispatch/complete) and the
// committed architectural table (retire only).
export class MapTable implements ReadinessListener {
  private readonly mapping: Int32Array;
  private readonly readyBits: Uint8Array;

  constructor(public readonly name: string, public readonly numArchRegs: number, public readonly numPhysRegs: number) {
    this.mapping = new Int32Array(numArchRegs);
    this.readyBits = new Uint8Array(numPhysRegs);
    for (let i = 0; i < numArchRegs; i++) {
      this.mapping[i] = i;
      this.readyBits[i] = 1;
    }
  }

  private checkArch(arch: number): void {
    if (!Number.isInteger(arch) || arch < 0 || arch >= this.numArchRegs) {
      throw new PipelineInvariantError(`${this.name}: architectural register r${arch} out of range`);
    }
  }

  private checkPhys(phys: number): void {
    if (!Number.isInteger(phys) || phys < 0 || phys >= this.numPhysRegs) {
      throw new PipelineInvariantError(`${this.name}: physical register p${phys} out of range`);
    }
  }

  // Snapshot: the returned register does not follow later ready-bit updates.
  getMapping(arch: number): PhysicalRegister {
    this.checkArch(arch);
    const phys = this.mapping[arch] ?? 0;
    return new PhysicalRegister(phys, this.isReady(phys));
  }

  setMapping(arch: number, reg: PhysicalRegister): void {
    this.checkArch(arch);
    this.checkPhys(reg.regNum);
    this.mapping[arch] = reg.regNum;
    this.readyBits[reg.regNum] = reg.ready ? 1 : 0;
  }

  setReadyBit(phys: number): void {
    this.checkPhys(phys);
    this.readyBits[phys] = 1;
  }

  isReady(phys: number): boolean {
    return (this.readyBits[phys] ?? 0) !== 0;
  }

  onRegisterReady(regNum: number): void {
    this.setReadyBit(regNum);
  }

  mappedRegisters(): number[] {
    return Array.from(this.mapping);
  }

  toString(): string {
    const parts: string[] = [];
    for (let i = 0; i < this.numArchRegs; i++) {
      const p = this.mapping[i] ?? 0;
      parts.push(`r${i}->p${p}${this.isReady(p) ? '+' : '-'}`);
    }
    return `${this.name} : [${parts.join(', ')}]`;
  }
}

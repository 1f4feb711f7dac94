import type { Instruction, StationType } from '../cpu/instruction.js';
import type { ReadinessListener } from '../rename/broadcast.js';
import { PipelineInvariantError } from '../cpu/exceptions.js';

export class ReservationStation implements ReadinessListener {
  busy = false;
  private inst: Instruction | null = null;

  constructor(public readonly name: string, public readonly type: StationType, public readonly execTime: number) {}

  getInst(): Instruction | null {
    return this.inst;
  }

  allocate(inst: Instruction): void {
    if (this.busy) throw new PipelineInvariantError(`${this.name} is already holding I${this.inst?.seq}`);
    this.busy = true;
    this.inst = inst;
  }

  // Released at execute; latency is then modelled by the complete queue.
  free(): void {
    this.busy = false;
    this.inst = null;
  }

  isReadyToExecute(): boolean {
    return this.busy && this.inst !== null && this.inst.sourcesReady();
  }

  onRegisterReady(regNum: number): void {
    if (this.busy && this.inst) this.inst.markSourceReady(regNum);
  }

  toString(): string {
    return `${this.name}(${this.type}, ${this.execTime}) ${this.busy && this.inst ? this.inst.toString() : 'free'}`;
  }
}

import type { Instruction } from '../cpu/instruction.js';
import type { PhysicalRegister } from '../rename/physical_register.js';
import { PipelineInvariantError } from '../cpu/exceptions.js';

export type ROBEntry = {
  readonly inst: Instruction;
  readonly T: PhysicalRegister; // newly allocated destination (NONE for stores)
  readonly Told: PhysicalRegister; // previous mapping of the destination, released at retire
};

// Fixed-capacity circular buffer; entries leave strictly in insertion order.
export class ReorderBuffer {
  private readonly slots: Array<ROBEntry | null>;
  private head = 0;
  private tail = 0;
  private count = 0;

  constructor(public readonly capacity: number) {
    this.slots = new Array<ROBEntry | null>(capacity).fill(null);
  }

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  hasFreeEntry(): boolean {
    return this.count < this.capacity;
  }

  addInstruction(inst: Instruction, T: PhysicalRegister, Told: PhysicalRegister): ROBEntry {
    if (this.isFull()) throw new PipelineInvariantError('reorder buffer is full');
    const entry: ROBEntry = { inst, T: T.copy(), Told: Told.copy() };
    this.slots[this.tail] = entry;
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
    return entry;
  }

  getHead(): ROBEntry | null {
    if (this.count === 0) return null;
    return this.slots[this.head] ?? null;
  }

  retireHeadInstruction(): ROBEntry {
    const entry = this.getHead();
    if (!entry) throw new PipelineInvariantError('reorder buffer is empty');
    this.slots[this.head] = null;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return entry;
  }

  // Head to tail, i.e. program order.
  entries(): ROBEntry[] {
    const out: ROBEntry[] = [];
    for (let i = 0; i < this.count; i++) {
      const e = this.slots[(this.head + i) % this.capacity];
      if (e) out.push(e);
    }
    return out;
  }

  toString(): string {
    const lines = this.entries().map(e => `\t${e.inst.toString()} T=${e.T.toString()} Told=${e.Told.toString()}`);
    return `ROB (${this.count}/${this.capacity}) head=${this.head} tail=${this.tail} : [\n${lines.join('\n')}${lines.length ? '\n' : ''}]`;
  }
}

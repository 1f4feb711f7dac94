import type { Instruction } from '../cpu/instruction.js';

// Bounded FIFO between two pipeline stages. A rejected push means the
// producing stage stalls for the rest of the cycle.
export class StageQueue {
  private items: Instruction[] = [];

  constructor(public readonly name: string, public readonly capacity: number) {}

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  push(inst: Instruction): boolean {
    if (this.isFull()) return false;
    this.items.push(inst);
    return true;
  }

  front(): Instruction | null {
    return this.items[0] ?? null;
  }

  pop(): Instruction | null {
    return this.items.shift() ?? null;
  }

  // Keeps entries matching `keep` (order preserved) and returns the rest.
  retain(keep: (inst: Instruction) => boolean): Instruction[] {
    const kept: Instruction[] = [];
    const removed: Instruction[] = [];
    for (const inst of this.items) (keep(inst) ? kept : removed).push(inst);
    this.items = kept;
    return removed;
  }

  toArray(): Instruction[] {
    return [...this.items];
  }

  toString(): string {
    return `${this.name} (${this.items.length}/${this.capacity}) : [${this.items.map(i => `I${i.seq}`).join(', ')}]`;
  }
}

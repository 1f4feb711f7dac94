import { type Instruction, STAGES } from '../cpu/instruction.js';
import type { TraceEvent } from '../cpu/cpu.js';

export const UNSET_CYCLE = -1;

// One line per instruction in program order:
// fetch decode dispatch issue execute complete retire (-1 where never reached)
export function formatReportLine(inst: Instruction): string {
  return STAGES.map(s => inst.timing[s] ?? UNSET_CYCLE).join(' ');
}

export function formatReport(instructions: readonly Instruction[]): string[] {
  return [...instructions].sort((a, b) => a.seq - b.seq).map(formatReportLine);
}

export function formatTraceLine(ev: TraceEvent): string {
  const head = `Cycle #${ev.cycle}: ${ev.stage.padEnd(8)}\t`;
  if (ev.before !== undefined) return `${head}${ev.before} ->\t${ev.text}`;
  return head + ev.text;
}

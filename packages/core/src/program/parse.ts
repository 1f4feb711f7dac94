import type { OpKind } from '../cpu/instruction.js';
import type { ProgramInstruction } from '../cpu/cpu.js';
import { ProgramError } from '../cpu/exceptions.js';
import { NO_REG } from '../rename/physical_register.js';

const KIND_ALIASES: Record<string, OpKind> = {
  ALU: 'ALU', A: 'ALU', '0': 'ALU',
  LOAD: 'LOAD', L: 'LOAD', '1': 'LOAD',
  STORE: 'STORE', S: 'STORE', '2': 'STORE',
};

export function parseOpKind(token: string): OpKind | null {
  return KIND_ALIASES[token.toUpperCase()] ?? null;
}

function parseRegister(token: string, line: number): number {
  const t = token.toLowerCase();
  if (t === '-1' || t === '-' || t === 'none') return NO_REG;
  const digits = t.startsWith('r') ? t.slice(1) : t;
  if (!/^\d+$/.test(digits)) throw new ProgramError(`bad register '${token}'`, line);
  return Number(digits);
}

// Format per line: <kind> <src1> <src2> <dst>, fields split on whitespace or commas.
// '#' starts a comment; blank lines are ignored.
export function parseProgram(text: string): ProgramInstruction[] {
  const out: ProgramInstruction[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const raw = lines[i] ?? '';
    const hash = raw.indexOf('#');
    const body = (hash >= 0 ? raw.slice(0, hash) : raw).trim();
    if (!body) continue;
    const parts = body.split(/[\s,]+/).filter(p => p.length > 0);
    if (parts.length !== 4) throw new ProgramError(`expected 4 fields, got ${parts.length}`, lineNo);
    const [kindTok, s1, s2, d] = parts as [string, string, string, string];
    const kind = parseOpKind(kindTok);
    if (!kind) throw new ProgramError(`unknown operation '${kindTok}'`, lineNo);
    out.push({ kind, src1: parseRegister(s1, lineNo), src2: parseRegister(s2, lineNo), dst: parseRegister(d, lineNo) });
  }
  return out;
}

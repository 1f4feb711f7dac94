import { describe, it, expect } from 'vitest';
import { parseOpKind, parseProgram } from '../src/program/parse.js';
import { ProgramError } from '../src/cpu/exceptions.js';

describe('parseProgram', () => {
  it('reads kinds, registers and comments', () => {
    const text = [
      '# tiny program',
      'ALU r0 r0 r1',
      '',
      'load 1, -1, 2   # trailing comment',
      'S 2 1 -',
      '2 -1 -1 none',
    ].join('\n');
    expect(parseProgram(text)).toEqual([
      { kind: 'ALU', src1: 0, src2: 0, dst: 1 },
      { kind: 'LOAD', src1: 1, src2: -1, dst: 2 },
      { kind: 'STORE', src1: 2, src2: 1, dst: -1 },
      { kind: 'STORE', src1: -1, src2: -1, dst: -1 },
    ]);
  });

  it('accepts CRLF line endings', () => {
    expect(parseProgram('A 0 0 1\r\nL 1 -1 2\r\n')).toHaveLength(2);
  });

  it('reports the offending line', () => {
    expect(() => parseProgram('ALU 0 0')).toThrow('line 1: expected 4 fields, got 3');
    expect(() => parseProgram('ALU 0 0 1\nMUL 0 0 1')).toThrow("line 2: unknown operation 'MUL'");
    try {
      parseProgram('\nALU x0 0 1');
    } catch (e) {
      expect(e).toBeInstanceOf(ProgramError);
      if (e instanceof ProgramError) {
        expect(e.line).toBe(2);
        expect(e.message).toBe("line 2: bad register 'x0'");
      }
      return;
    }
    throw new Error('expected a ProgramError');
  });
});

describe('parseOpKind', () => {
  it('takes names, initials and numeric codes', () => {
    expect(['alu', 'L', '2', 'Store'].map(parseOpKind)).toEqual(['ALU', 'LOAD', 'STORE', 'STORE']);
    expect(parseOpKind('MUL')).toBeNull();
  });
});

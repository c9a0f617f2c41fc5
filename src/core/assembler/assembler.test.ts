import { describe, it, expect } from 'vitest';
import { assemble } from './assembler';
import { tokenize, parseNumber, TokenType } from './tokenizer';
import { decodeProgram } from '../decoder';

describe('tokenizer', () => {
  it('parses signed decimal, hex and binary literals', () => {
    expect(parseNumber('42')).toBe(42);
    expect(parseNumber('-0x1F')).toBe(-31);
    expect(parseNumber('+0b101')).toBe(5);
    expect(parseNumber('-0')).toBe(0);
    expect(parseNumber('12a')).toBeNull();
  });

  it('classifies labels, mnemonics, registers and ternary literals', () => {
    const tokens = tokenize('loop: br3 a, 0t+0- ; trailing comment');
    expect(tokens.map(t => t.type)).toEqual([
      TokenType.LABEL_DEF, TokenType.MNEMONIC, TokenType.IDENT,
      TokenType.COMMA, TokenType.TERNARY, TokenType.NEWLINE, TokenType.EOF,
    ]);
    expect(tokens.map(t => t.value).slice(0, 5)).toEqual(['loop', 'BR3', 'a', ',', '+0-']);
    expect(tokens[2].col).toBe(11);
  });
});

describe('assemble', () => {
  it('assembles a small program with data and labels', () => {
    const { program, labels, data, errors } = assemble([
      '; sum two words',
      '.data 0 5',
      '.data 1 0t+-',
      'start:  LD1 a, 0',
      '        LD1 B, 1',
      '        add A, B, ACC   # lower case mnemonic',
      '        ST1 ACC, 2',
      '        JMP end',
      'end:    HALT',
    ].join('\n'));
    expect(errors).toEqual([]);
    expect(program).toEqual([
      [[0, 1, 0], 'A', 0],
      [[0, 1, 0], 'B', 1],
      [[1, 0, 0], 'A', 'B', 'ACC'],
      [[1, -1, 0], 'ACC', 2],
      [[0, 0, 1], 5],
      [[0, 0, -1]],
    ]);
    expect([...labels]).toEqual([['start', 0], ['end', 5]]);
    expect(data).toEqual({ '0': 5, '1': '+-' });
  });

  it('resolves forward references in BR3', () => {
    const { program, errors } = assemble('BR3 ACC, n, z, p\nn: NOP\nz: NOP\np: HALT');
    expect(errors).toEqual([]);
    expect(program[0]).toEqual([[1, 1, 1], 'ACC', 1, 2, 3]);
  });

  it('produces programs the decoder accepts', () => {
    const { program } = assemble('LDI R0, 0t+0\nWLOAD 1, R0\nSTREAM 1, 0\nDRAIN 1, 4\nHALT');
    const decoded = decodeProgram(program, { rows: 3, cols: 3, laneCount: 1, dataWords: 16, wordTrits: 9 });
    expect(decoded.map(i => i.op)).toEqual(['LDI', 'WLOAD', 'STREAM', 'DRAIN', 'HALT']);
  });

  it('reports errors with their position', () => {
    expect(assemble('FOO A').errors).toEqual([{ line: 1, col: 1, message: 'Unknown mnemonic: FOO' }]);
    expect(assemble('x: NOP\nx: HALT').errors).toEqual([{ line: 2, col: 1, message: 'Duplicate label: x' }]);
    expect(assemble('JMP nowhere').errors).toEqual([{ line: 1, col: 5, message: 'Unresolved label: nowhere' }]);
    expect(assemble('ADD A, B').errors).toEqual([{ line: 1, col: 1, message: 'ADD expects 3 operand(s), got 2' }]);
    expect(assemble('LDI 5, A').errors).toEqual([
      { line: 1, col: 5, message: 'LDI: operand 1 must be reg, got 5' },
      { line: 1, col: 8, message: 'LDI: operand 2 must be imm, got A' },
    ]);
  });

  it('checks operand separators', () => {
    expect(assemble('MOV A B').errors).toEqual([{ line: 1, col: 7, message: 'Expected "," before B' }]);
    expect(assemble('NEG A, B,').errors).toEqual([{ line: 1, col: 9, message: 'Trailing ","' }]);
  });

  it('rejects malformed .data lines', () => {
    expect(assemble('.data 3').errors).toEqual([{ line: 1, col: 1, message: '.data expects an address and a value' }]);
    expect(assemble('.word 1').errors).toEqual([{ line: 1, col: 1, message: 'Unknown directive: .word' }]);
  });
});

/**
 * Assembler for .tasm source.
 *
 *   ; comment
 *   .data 0 12          ; data memory word
 *   loop:  LD1 A, 0
 *          BR3 A, neg, zero, pos
 *
 * One instruction per line, comma-separated operands. Labels resolve to
 * program addresses and may be used before they are defined. Immediates
 * take decimal, 0x, 0b or 0t (balanced-ternary, e.g. 0t+0-) literals.
 */
import { tokenize, TokenType } from './tokenizer';
import { OPCODE_BY_MNEMONIC, OperandKind, isRegisterName } from '../constants';
import type { Token } from './tokenizer';
import type { EncodedField, EncodedInstruction } from '../decoder';

export interface AssembleError {
  line: number;
  col: number;
  message: string;
}

export interface AssembledProgram {
  program: EncodedInstruction[];
  labels: Map<string, number>;
  /** Data memory initialisers from .data directives */
  data: Record<string, number | string>;
  errors: AssembleError[];
}

interface ForwardRef {
  name: string;
  instr: number;
  field: number;
  token: Token;
}

function splitLines(tokens: Token[]): Token[][] {
  const lines: Token[][] = [];
  let current: Token[] = [];
  for (const t of tokens) {
    if (t.type === TokenType.NEWLINE || t.type === TokenType.EOF) {
      if (current.length > 0) lines.push(current);
      current = [];
    } else {
      current.push(t);
    }
  }
  return lines;
}

/** Operand groups separated by commas; each group must be a single token. */
function splitOperands(tokens: Token[], errors: AssembleError[]): Token[] {
  const out: Token[] = [];
  let expectOperand = true;
  for (const t of tokens) {
    if (t.type === TokenType.COMMA) {
      if (expectOperand) errors.push({ line: t.line, col: t.col, message: 'Missing operand before ","' });
      expectOperand = true;
      continue;
    }
    if (!expectOperand) {
      errors.push({ line: t.line, col: t.col, message: `Expected "," before ${t.value}` });
    }
    out.push(t);
    expectOperand = false;
  }
  const last = tokens[tokens.length - 1];
  if (last !== undefined && last.type === TokenType.COMMA) {
    errors.push({ line: last.line, col: last.col, message: 'Trailing ","' });
  }
  return out;
}

export function assemble(source: string): AssembledProgram {
  const errors: AssembleError[] = [];
  const labels = new Map<string, number>();
  const program: EncodedInstruction[] = [];
  const data: Record<string, number | string> = {};
  const forwardRefs: ForwardRef[] = [];

  for (const line of splitLines(tokenize(source))) {
    let i = 0;
    while (i < line.length && line[i].type === TokenType.LABEL_DEF) {
      const label = line[i];
      if (labels.has(label.value)) {
        errors.push({ line: label.line, col: label.col, message: `Duplicate label: ${label.value}` });
      } else {
        labels.set(label.value, program.length);
      }
      i++;
    }
    if (i >= line.length) continue;

    const head = line[i];
    const rest = line.slice(i + 1);

    // Directive arguments are whitespace separated
    if (head.type === TokenType.DIRECTIVE) {
      const operands = rest.filter(t => t.type !== TokenType.COMMA);
      if (head.value !== '.data') {
        errors.push({ line: head.line, col: head.col, message: `Unknown directive: ${head.value}` });
        continue;
      }
      const [addr, value] = operands;
      if (operands.length !== 2 || addr.numValue === undefined || addr.numValue < 0) {
        errors.push({ line: head.line, col: head.col, message: '.data expects an address and a value' });
        continue;
      }
      if (value.type === TokenType.TERNARY) data[String(addr.numValue)] = value.value;
      else if (value.numValue !== undefined) data[String(addr.numValue)] = value.numValue;
      else errors.push({ line: value.line, col: value.col, message: `Invalid data value: ${value.value}` });
      continue;
    }

    if (head.type !== TokenType.MNEMONIC) {
      errors.push({ line: head.line, col: head.col, message: `Unknown mnemonic: ${head.value}` });
      continue;
    }

    const operands = splitOperands(rest, errors);
    const info = OPCODE_BY_MNEMONIC.get(head.value);
    if (info === undefined) continue;
    if (operands.length !== info.operands.length) {
      errors.push({
        line: head.line,
        col: head.col,
        message: `${info.mnemonic} expects ${info.operands.length} operand(s), got ${operands.length}`,
      });
      continue;
    }

    const fields: EncodedField[] = [];
    operands.forEach((tok, k) => {
      const kind = info.operands[k];
      const bad = (): void => {
        errors.push({ line: tok.line, col: tok.col, message: `${info.mnemonic}: operand ${k + 1} must be ${kind}, got ${tok.value}` });
        fields.push(0);
      };
      switch (kind) {
        case OperandKind.REG: {
          const name = tok.value.toUpperCase();
          if (tok.type === TokenType.IDENT && isRegisterName(name)) fields.push(name);
          else bad();
          break;
        }
        case OperandKind.ADDR:
          if (tok.type === TokenType.NUMBER && tok.numValue !== undefined) {
            fields.push(tok.numValue);
          } else if (tok.type === TokenType.IDENT) {
            forwardRefs.push({ name: tok.value, instr: program.length, field: k, token: tok });
            fields.push(0);
          } else {
            bad();
          }
          break;
        case OperandKind.IMM:
          if (tok.type === TokenType.TERNARY) fields.push(tok.value);
          else if (tok.type === TokenType.NUMBER && tok.numValue !== undefined) fields.push(tok.numValue);
          else bad();
          break;
        case OperandKind.DATA:
        case OperandKind.LANE:
          if (tok.type === TokenType.NUMBER && tok.numValue !== undefined) fields.push(tok.numValue);
          else bad();
          break;
      }
    });
    program.push([[...info.opcode], ...fields]);
  }

  // Resolve label references
  for (const ref of forwardRefs) {
    const addr = labels.get(ref.name);
    if (addr === undefined) {
      errors.push({ line: ref.token.line, col: ref.token.col, message: `Unresolved label: ${ref.name}` });
      continue;
    }
    const [opcode, ...fields] = program[ref.instr];
    fields[ref.field] = addr;
    program[ref.instr] = [opcode, ...fields];
  }

  return { program, labels, data, errors };
}

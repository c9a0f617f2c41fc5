import { OPCODE_BY_INDEX, OperandKind, formatOpcode, opcodeIndex } from './constants';
import { isTrit } from './word';
import type { OpcodeInfo } from './constants';
import type { EncodedInstruction } from './decoder';

function lookup(raw: readonly number[]): OpcodeInfo | undefined {
  if (raw.length !== 3) return undefined;
  const [t2, t1, t0] = raw;
  if (!isTrit(t2) || !isTrit(t1) || !isTrit(t0)) return undefined;
  return OPCODE_BY_INDEX.get(opcodeIndex([t2, t1, t0]));
}

/**
 * Render one encoded instruction as assembler text. Program addresses go
 * through `label` when given. Unknown opcodes come out as a `.word` line
 * so a listing never hides them.
 */
export function disassembleInstruction(
  raw: EncodedInstruction,
  label: (addr: number) => string = addr => String(addr),
): string {
  const [opTrits, ...fields] = raw;
  const info = lookup(opTrits);
  if (info === undefined) return `.word ${formatOpcode(opTrits)} ${fields.join(', ')}`.trimEnd();
  const operands = fields.map((f, k) => {
    const kind = info.operands[k];
    if (kind === OperandKind.ADDR && typeof f === 'number') return label(f);
    if (kind === OperandKind.IMM && typeof f === 'string') return `0t${f}`;
    return String(f);
  });
  return operands.length > 0 ? `${info.mnemonic} ${operands.join(', ')}` : info.mnemonic;
}

/** Full listing with `L<addr>:` labels on every jump and branch target. */
export function disassemble(program: readonly EncodedInstruction[]): string[] {
  const targets = new Set<number>();
  for (const [opTrits, ...fields] of program) {
    const info = lookup(opTrits);
    if (info === undefined) continue;
    fields.forEach((f, k) => {
      if (info.operands[k] === OperandKind.ADDR && typeof f === 'number') targets.add(f);
    });
  }
  const label = (addr: number): string => `L${addr}`;
  const lines: string[] = [];
  program.forEach((raw, pc) => {
    if (targets.has(pc)) lines.push(`${label(pc)}:`);
    lines.push(`  ${disassembleInstruction(raw, label)}`);
  });
  if (targets.has(program.length)) lines.push(`${label(program.length)}:`);
  return lines;
}

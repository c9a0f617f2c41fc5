import { OPCODE_BY_MNEMONIC } from '../constants';

export const TokenType = {
  MNEMONIC: 0,
  NUMBER: 1,
  TERNARY: 2,      // 0t+0- literal
  LABEL_DEF: 3,    // name:
  IDENT: 4,        // register or label reference
  DIRECTIVE: 5,    // .data
  COMMA: 6,
  NEWLINE: 7,
  EOF: 8,
} as const;
export type TokenType = typeof TokenType[keyof typeof TokenType];

export interface Token {
  type: TokenType;
  value: string;
  numValue?: number;
  line: number;
  col: number;
}

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const lines = source.split(/\r?\n/);

  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    const line = lines[lineNum];
    let col = 0;

    while (col < line.length) {
      const ch = line[col];
      if (/\s/.test(ch)) {
        col++;
        continue;
      }
      // Line comment
      if (ch === ';' || ch === '#') break;

      if (ch === ',') {
        tokens.push({ type: TokenType.COMMA, value: ',', line: lineNum + 1, col: col + 1 });
        col++;
        continue;
      }

      const start = col;
      while (col < line.length && !/[\s,;#]/.test(line[col])) col++;
      tokens.push(classifyToken(line.substring(start, col), lineNum + 1, start + 1));
    }
    tokens.push({ type: TokenType.NEWLINE, value: '\n', line: lineNum + 1, col: line.length + 1 });
  }

  tokens.push({ type: TokenType.EOF, value: '', line: lines.length, col: 0 });
  return tokens;
}

function classifyToken(word: string, line: number, col: number): Token {
  if (word.endsWith(':') && IDENT_RE.test(word.slice(0, -1))) {
    return { type: TokenType.LABEL_DEF, value: word.slice(0, -1), line, col };
  }
  if (word.startsWith('.')) {
    return { type: TokenType.DIRECTIVE, value: word.toLowerCase(), line, col };
  }
  if (OPCODE_BY_MNEMONIC.has(word.toUpperCase())) {
    return { type: TokenType.MNEMONIC, value: word.toUpperCase(), line, col };
  }
  if (/^0[tT][+0-]+$/.test(word)) {
    return { type: TokenType.TERNARY, value: word.substring(2), line, col };
  }
  const num = parseNumber(word);
  if (num !== null) {
    return { type: TokenType.NUMBER, value: word, numValue: num, line, col };
  }
  return { type: TokenType.IDENT, value: word, line, col };
}

export function parseNumber(word: string): number | null {
  const negative = word.startsWith('-');
  const body = negative || word.startsWith('+') ? word.substring(1) : word;
  let val: number;
  if (/^0[xX][0-9a-fA-F]+$/.test(body)) val = parseInt(body.substring(2), 16);
  else if (/^0[bB][01]+$/.test(body)) val = parseInt(body.substring(2), 2);
  else if (/^[0-9]+$/.test(body)) val = parseInt(body, 10);
  else return null;
  return negative && val !== 0 ? -val : val;
}

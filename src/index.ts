export * from './core/types';
export * from './core/errors';
export * from './core/constants';
export * from './core/word';
export * from './core/sfg';
export * from './core/codec';
export * from './core/clock';
export * from './core/skew';
export * from './core/memory';
export * from './core/registers';
export * from './core/data-memory';
export * from './core/systolic';
export * from './core/lanes';
export * from './core/physics';
export * from './core/predictor';
export * from './core/decoder';
export * from './core/sequencer';
export * from './core/config';
export * from './core/accelerator';
export * from './core/disassembler';
export { assemble } from './core/assembler/assembler';
export type { AssembledProgram, AssembleError } from './core/assembler/assembler';

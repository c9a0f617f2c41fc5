/**
 * Error taxonomy. Configuration and decode errors abort a run before any
 * cycle is charged; state errors are program or driver bugs. Arithmetic
 * overflow and timing violations are not exceptions: they are collected
 * into the run report.
 */
export class SimulatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends SimulatorError {
  readonly issues: readonly string[];
  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class DecodeError extends SimulatorError {
  readonly pc: number | null;
  constructor(message: string, pc: number | null = null) {
    super(pc !== null ? `@${pc}: ${message}` : message);
    this.pc = pc;
  }
}

export class StateError extends SimulatorError {}

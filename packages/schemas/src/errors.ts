/**
 * Error taxonomy shared by every package. Action validation failures and
 * object transition failures are modeled outcomes, not errors, and have no
 * class here.
 */

export class StructuralInvariantError extends Error {
  readonly code = "STRUCTURAL_INVARIANT";
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`World tree invariant violated: ${violations.join("; ")}`);
    this.name = "StructuralInvariantError";
    this.violations = violations;
  }
}

export class ReplayMismatchError extends Error {
  readonly code = "REPLAY_MISMATCH";
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(line !== undefined ? `${message} (line ${line})` : message);
    this.name = "ReplayMismatchError";
    this.line = line;
  }
}

export class MemoryLogError extends Error {
  readonly code = "MEMORY_LOG";
  readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`);
    this.name = "MemoryLogError";
    this.line = line;
  }
}

export class WorldDefinitionError extends Error {
  readonly code = "WORLD_DEFINITION";
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid world definition: ${errors.join(", ")}`);
    this.name = "WorldDefinitionError";
    this.errors = errors;
  }
}

export class KernelHaltedError extends Error {
  readonly code = "KERNEL_HALTED";
  readonly tick: number;

  constructor(tick: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Simulation halted at tick ${tick}: ${reason}`, { cause });
    this.name = "KernelHaltedError";
    this.tick = tick;
  }
}

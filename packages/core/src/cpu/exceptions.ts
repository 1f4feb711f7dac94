export type SimulationErrorCode = 'InvalidConfig' | 'InvalidProgram' | 'Deadlock' | 'CycleLimit' | 'Invariant';

export class SimulationError extends Error {
  constructor(public readonly code: SimulationErrorCode, message: string) {
    super(message);
    this.name = 'SimulationError';
  }
}

export class ConfigError extends SimulationError {
  constructor(message: string) {
    super('InvalidConfig', message);
    this.name = 'ConfigError';
  }
}

export class ProgramError extends SimulationError {
  // line is 1-based when the instruction came from program text
  constructor(message: string, public readonly line: number | null = null) {
    super('InvalidProgram', line === null ? message : `line ${line}: ${message}`);
    this.name = 'ProgramError';
  }
}

export class PipelineDeadlockError extends SimulationError {
  constructor(public readonly cycle: number, public readonly dump: string) {
    super('Deadlock', `no pipeline progress at cycle ${cycle}`);
    this.name = 'PipelineDeadlockError';
  }
}

export class CycleLimitError extends SimulationError {
  constructor(public readonly limit: number, public readonly dump: string) {
    super('CycleLimit', `simulation exceeded ${limit} cycles`);
    this.name = 'CycleLimitError';
  }
}

export class PipelineInvariantError extends SimulationError {
  constructor(message: string) {
    super('Invariant', message);
    this.name = 'PipelineInvariantError';
  }
}

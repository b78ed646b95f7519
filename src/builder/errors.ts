export type BuildStage = 'configuration' | 'provisioning' | 'transfer' | 'execution';

export abstract class BuildEngineError extends Error {
  abstract readonly stage: BuildStage;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Unknown project type. Raised before any environment exists.
export class ConfigurationError extends BuildEngineError {
  readonly stage = 'configuration';
}

export class ProvisioningError extends BuildEngineError {
  readonly stage = 'provisioning';
}

export class TransferError extends BuildEngineError {
  readonly stage = 'transfer';
}

// The command could not be launched. A non-zero exit is a result, not this.
export class ExecutionError extends BuildEngineError {
  readonly stage = 'execution';
}

export class ScoringError extends Error {
  constructor(
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = "ScoringError";
    Object.setPrototypeOf(this, ScoringError.prototype);
  }
}

/**
 * A feature record failed validation. `index` and `field` point at the
 * offending record and value.
 */
export class InvalidInputError extends ScoringError {
  constructor(
    public index: number,
    public walletId: string,
    public field: string,
    reason: string,
  ) {
    super(
      "INVALID_INPUT",
      `Invalid feature record #${index} (${walletId}): ${field} ${reason}`,
    );
    this.name = "InvalidInputError";
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

export class EmptyBatchError extends ScoringError {
  constructor() {
    super("EMPTY_BATCH", "Cannot score an empty batch of feature records");
    this.name = "EmptyBatchError";
    Object.setPrototypeOf(this, EmptyBatchError.prototype);
  }
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

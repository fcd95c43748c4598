export class AssignmentForgeError extends Error {
  constructor(
    message: string,
    public readonly internalDetails?: string,
  ) {
    super(message);
    this.name = 'AssignmentForgeError';
    Object.setPrototypeOf(this, AssignmentForgeError.prototype);
  }
}

export class ConfigurationError extends AssignmentForgeError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

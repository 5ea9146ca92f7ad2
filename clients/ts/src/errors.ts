/**
 * Raised when an index template placeholder has no value
 */
export class TemplateError extends Error {
  constructor(
    public readonly template: string,
    public readonly field: string
  ) {
    super(`Missing value for placeholder '${field}' in index template '${template}'`);
    this.name = 'TemplateError';
  }
}

/**
 * Raised when reading a field the document does not have
 */
export class MissingAttributeError extends Error {
  constructor(
    public readonly modelName: string,
    public readonly attribute: string
  ) {
    super(`'${modelName}' object has no attribute '${attribute}'`);
    this.name = 'MissingAttributeError';
  }
}

/**
 * Raised when a manager is used before it is bound to a model class
 */
export class UnboundManagerError extends Error {
  constructor() {
    super('Manager is not bound to a model class');
    this.name = 'UnboundManagerError';
  }
}

/**
 * Raised for invalid environment configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

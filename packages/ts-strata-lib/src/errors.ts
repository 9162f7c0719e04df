/**
 * Thrown when a descriptor or criterion is wired with a missing or
 * conflicting argument. Raised eagerly at construction time.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Thrown when a stored property does not hold the storage kind its attribute
 * declares, e.g. a text blob where a 64-bit integer is expected.
 */
export class DomainViolationError extends Error {
  readonly modelName: string;
  readonly attributeName: string;
  readonly actualKind: string;

  constructor(
    modelName: string,
    attributeName: string,
    expectedKind: string,
    actualKind: string,
  ) {
    super(
      `Property "${attributeName}" of ${modelName} holds ${actualKind}, expected ${expectedKind}`,
    );
    this.name = "DomainViolationError";
    this.modelName = modelName;
    this.attributeName = attributeName;
    this.actualKind = actualKind;
  }
}

/**
 * Error thrown when configuration cannot be found or parsed
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Throws an {@link InvalidArgumentError} when `value` is null or undefined.
 */
export function requireArgument<T>(
  value: T | null | undefined,
  parameterName: string,
): T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(`The ${parameterName} parameter is null.`);
  }
  return value;
}

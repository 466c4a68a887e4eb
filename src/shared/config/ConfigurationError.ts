/**
 * Raised at startup when required configuration is missing.
 * The process must not continue past this error.
 */
export class ConfigurationError extends Error {
  public readonly code = 'CONFIGURATION_ERROR';
  public readonly variable: string;

  public constructor(message: string, variable: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.variable = variable;
  }
}

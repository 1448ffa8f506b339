/**
 * Raised when the client is constructed with missing or invalid settings
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

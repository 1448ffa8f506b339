/**
 * Raised when the token endpoint answers 2xx with something other than a token
 */
export class TokenResponseError extends Error {
  constructor(
    message: string,
    public readonly content?: string,
  ) {
    super(message);
    this.name = "TokenResponseError";
  }
}

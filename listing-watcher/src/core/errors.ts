/**
 * The source transport could not be bootstrapped (cookies, token, browser)
 */
export class SessionError extends Error {
  constructor(
    message: string,
    readonly cause?: unknown
  ) {
    super(message);
    this.name = "SessionError";
  }
}

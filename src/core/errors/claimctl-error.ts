// SPDX-License-Identifier: Apache-2.0

export class ClaimctlError extends Error {
  public readonly statusCode?: number;

  /**
   * Create a custom error object
   *
   * error metadata will include the `cause`
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    public override cause?: unknown,
    public meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = ClaimctlError.statusCodeOf(cause);
    Error.captureStackTrace(this, this.constructor);
    if (cause instanceof Error) {
      this.stack = `${this.stack ?? ''}\nCaused by: ${cause.stack ?? cause.message}`;
    }
  }

  private static statusCodeOf(cause: unknown): number | undefined {
    if (typeof cause === 'object' && cause !== null && 'statusCode' in cause && typeof cause.statusCode === 'number') {
      return cause.statusCode;
    }
    return undefined;
  }
}

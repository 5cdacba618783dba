/**
 * The API answered with `status: false` or without a `data` payload.
 */
export class CaudenaApiError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly envelope: unknown
  ) {
    super(message);
    this.name = 'CaudenaApiError';
  }
}

export class InvalidSecretError extends Error {
  constructor(reason: string) {
    super(`Failed to decode CAUDENA_SECRET: ${reason}`);
    this.name = 'InvalidSecretError';
  }
}

export class InvalidTokenRequestError extends Error {
  constructor(
    readonly requested: number,
    readonly capacity: number,
  ) {
    super(
      `Requested ${requested} tokens but the bucket capacity is ${capacity}`,
    );
    this.name = 'InvalidTokenRequestError';
  }
}

export class UpstreamUnavailableError extends Error {
  constructor(
    readonly rateKey: string,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `${rateKey} unavailable after ${attempts} attempt(s): ${describeError(lastError)}`,
    );
    this.name = 'UpstreamUnavailableError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

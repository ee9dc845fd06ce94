/**
 * Domain errors raised by the estimation pipeline.
 *
 * The controller translates these into HTTP exceptions; nothing below the
 * controller knows about status codes.
 */

export class InvalidGeometryInputError extends Error {
  constructor(message = 'Either hfov_deg or both fx and cx must be provided') {
    super(message);
    this.name = 'InvalidGeometryInputError';
  }
}

export class GeodesicNonConvergenceError extends Error {
  constructor(readonly iterations: number) {
    super(`Geodesic projection did not converge after ${iterations} iterations`);
    this.name = 'GeodesicNonConvergenceError';
  }
}

export class PipelineTimeoutError extends Error {
  constructor(readonly deadlineMs: number) {
    super(`Pipeline timed out after ${deadlineMs}ms`);
    this.name = 'PipelineTimeoutError';
  }
}

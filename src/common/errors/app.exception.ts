import { HttpException } from "@nestjs/common";
import { describeFailure, type Failure, failureStatus, type Outcome } from "./failure";

/**
 * Carries a {@link Failure} from a controller to the global exception filter.
 *
 * The HTTP status follows the failure kind, and the failure itself is kept
 * intact so the filter can hand it to the error mapper without re-parsing
 * the response body.
 */
export class AppException extends HttpException {
  constructor(public readonly failure: Failure) {
    super(
      describeFailure(failure),
      failureStatus(failure),
      failure.kind === "unclassified" ? { cause: failure.cause } : undefined,
    );
  }

  getFailure(): Failure {
    return this.failure;
  }
}

/**
 * Returns the success value of an outcome, or throws its failure as an AppException.
 */
export function unwrapOutcome<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw new AppException(outcome.failure);
  }
  return outcome.value;
}

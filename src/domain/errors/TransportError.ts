/**
 * TransportError
 *
 * Thrown when a greeting could not be delivered to one recipient, including:
 * - Rejected or invalid recipient addresses
 * - Timeouts and connection failures of the delivery channel
 *
 * Recoverable: the event is counted as failed and the batch continues with the
 * next recipient.
 */
export class TransportError extends Error {
  public constructor(
    message: string,
    public readonly recipient: string
  ) {
    super(message);
    this.name = 'TransportError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransportError);
    }
  }
}

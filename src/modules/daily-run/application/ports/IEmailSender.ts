/**
 * Result of one delivery attempt
 */
export type DeliveryOutcome = { delivered: true } | { delivered: false; reason: string };

/**
 * IEmailSender Port Interface
 *
 * Delivers a rendered card to one recipient. SMTP and webmail transports live
 * outside this repository; the daily run works without any sender.
 *
 * Implementations report a refused delivery as `{ delivered: false }`. A
 * thrown error is treated as a TransportError for that one recipient; other
 * recipients are still attempted.
 *
 * Delivery is at-least-once: running the same day twice sends twice.
 */
export interface IEmailSender {
  send(recipientAddress: string, subject: string, imageBytes: Buffer): Promise<DeliveryOutcome>;
}

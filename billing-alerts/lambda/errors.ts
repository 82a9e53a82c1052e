/**
 * The webhook endpoint answered with something other than 200, or could
 * not be reached. Carries no request details: the URL path is a credential.
 */
export class WebhookDeliveryError extends Error {
  /** HTTP status, absent when no response arrived */
  public readonly status?: number;
  public readonly code?: string;

  constructor(status?: number, code?: string) {
    super(
      status !== undefined
        ? `Webhook failed with status ${status}`
        : `Webhook request failed: ${code ?? 'no response'}`,
    );
    this.name = 'WebhookDeliveryError';
    this.status = status;
    this.code = code;
  }
}

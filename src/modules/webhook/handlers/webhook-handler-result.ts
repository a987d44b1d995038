/** What a handler did with an event. Cached per event id, so it stays plain JSON. */
export interface WebhookHandlerResult {
  handled: boolean;
  outcome: string;
  orderId?: string;
}

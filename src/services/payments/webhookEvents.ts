type JsonRecord = Record<string, unknown>;

interface EventEnvelope {
  /** Provider event id (evt_...); empty when the payload carried none */
  eventId: string;
  rawType: string;
}

export interface PaymentSucceededEvent extends EventEnvelope {
  kind: 'payment_succeeded';
  paymentReference: string;
  orderId: string | null;
}

export interface PaymentFailedEvent extends EventEnvelope {
  kind: 'payment_failed';
  paymentReference: string;
  orderId: string | null;
  failureMessage: string | null;
}

export interface SessionCompletedEvent extends EventEnvelope {
  kind: 'session_completed';
  sessionId: string;
  paymentStatus: string | null;
  paymentReference: string | null;
  orderId: string | null;
}

export interface SessionExpiredEvent extends EventEnvelope {
  kind: 'session_expired';
  sessionId: string;
  orderId: string | null;
}

export interface UnhandledEvent extends EventEnvelope {
  kind: 'unhandled';
}

export type WebhookEvent =
  | PaymentSucceededEvent
  | PaymentFailedEvent
  | SessionCompletedEvent
  | SessionExpiredEvent
  | UnhandledEvent;

export type WebhookEventKind = WebhookEvent['kind'];

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: JsonRecord, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/** Expandable references arrive either as an id or as the embedded object. */
function referenceField(record: JsonRecord, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string' && value.length > 0) return value;
  if (isRecord(value)) return stringField(value, 'id');
  return null;
}

function metadataOrderId(object: JsonRecord): string | null {
  const metadata = object.metadata;
  return isRecord(metadata) ? stringField(metadata, 'order_id') : null;
}

function failureMessage(object: JsonRecord): string | null {
  const lastError = object.last_payment_error;
  return isRecord(lastError) ? stringField(lastError, 'message') : null;
}

/**
 * Turn a verified provider payload into a WebhookEvent. Unknown types, and
 * known types whose object lacks its id, come back as `unhandled`.
 */
export function parseWebhookEvent(payload: unknown): WebhookEvent {
  if (!isRecord(payload)) {
    return { kind: 'unhandled', eventId: '', rawType: 'unknown' };
  }

  const envelope: EventEnvelope = {
    eventId: stringField(payload, 'id') ?? '',
    rawType: stringField(payload, 'type') ?? 'unknown',
  };

  const data = payload.data;
  const inner = isRecord(data) ? data.object : undefined;
  const object = isRecord(inner) ? inner : null;
  if (!object) {
    return { kind: 'unhandled', ...envelope };
  }

  const objectId = stringField(object, 'id');
  if (!objectId) {
    return { kind: 'unhandled', ...envelope };
  }

  switch (envelope.rawType) {
    case 'payment_intent.succeeded':
      return {
        kind: 'payment_succeeded',
        ...envelope,
        paymentReference: objectId,
        orderId: metadataOrderId(object),
      };

    case 'payment_intent.payment_failed':
      return {
        kind: 'payment_failed',
        ...envelope,
        paymentReference: objectId,
        orderId: metadataOrderId(object),
        failureMessage: failureMessage(object),
      };

    case 'checkout.session.completed':
    case 'checkout.session.async_payment_succeeded':
      return {
        kind: 'session_completed',
        ...envelope,
        sessionId: objectId,
        paymentStatus: stringField(object, 'payment_status'),
        paymentReference: referenceField(object, 'payment_intent'),
        orderId: metadataOrderId(object),
      };

    case 'checkout.session.expired':
      return {
        kind: 'session_expired',
        ...envelope,
        sessionId: objectId,
        orderId: metadataOrderId(object),
      };

    default:
      return { kind: 'unhandled', ...envelope };
  }
}

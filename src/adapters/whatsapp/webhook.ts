import { z } from 'zod';
import { MediaRef } from '../../shared/types';
import { normalizePhone } from '../../shared/validation';

// ============================================================================
// Payload Schema (Cloud API webhook, field "messages")
// ============================================================================

const mediaSchema = z.object({
  id: z.string(),
  mime_type: z.string().optional(),
  caption: z.string().optional(),
});

const messageSchema = z.object({
  from: z.string(),
  id: z.string(),
  timestamp: z.string(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
  image: mediaSchema.optional(),
  audio: mediaSchema.optional(),
  video: mediaSchema.optional(),
  document: mediaSchema.optional(),
  button: z.object({ text: z.string() }).optional(),
  interactive: z
    .object({
      button_reply: z.object({ id: z.string(), title: z.string() }).optional(),
      list_reply: z.object({ id: z.string(), title: z.string() }).optional(),
    })
    .optional(),
});

export const webhookPayloadSchema = z.object({
  object: z.string(),
  entry: z.array(
    z.object({
      id: z.string().optional(),
      changes: z.array(
        z.object({
          field: z.string(),
          value: z.object({
            messaging_product: z.string().optional(),
            contacts: z
              .array(z.object({ wa_id: z.string(), profile: z.object({ name: z.string() }).optional() }))
              .optional(),
            messages: z.array(messageSchema).optional(),
            statuses: z.array(z.unknown()).optional(),
          }),
        })
      ),
    })
  ),
});

export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;
type WebhookMessage = z.infer<typeof messageSchema>;

export interface InboundMessage {
  messageId: string;
  phone: string;
  text: string;
  contactName?: string;
  attachments: MediaRef[];
  timestamp: string;
}

// ============================================================================
// Parsing
// ============================================================================

const MEDIA_TYPES = ['image', 'audio', 'video', 'document'] as const;

function extractContent(message: WebhookMessage): { text: string; attachments: MediaRef[] } {
  const attachments: MediaRef[] = [];
  let text = message.text?.body ?? message.button?.text ?? '';

  const reply = message.interactive?.button_reply ?? message.interactive?.list_reply;
  if (reply) {
    text = reply.title;
  }

  for (const type of MEDIA_TYPES) {
    const media = message[type];
    if (!media) continue;
    attachments.push({
      id: media.id,
      type,
      ...(media.mime_type ? { mimeType: media.mime_type } : {}),
      ...(media.caption ? { caption: media.caption } : {}),
    });
    // WhatsApp carries the typed text of a media message as its caption
    if (!text && media.caption) {
      text = media.caption;
    }
  }

  return { text, attachments };
}

function toIsoTimestamp(unixSeconds: string): string {
  const seconds = Number(unixSeconds);
  return Number.isFinite(seconds) ? new Date(seconds * 1000).toISOString() : new Date().toISOString();
}

/**
 * Flatten a webhook payload into inbound messages. Delivery receipts
 * (`statuses`) and senders with unusable phone numbers are dropped.
 */
export function parseInboundMessages(payload: WebhookPayload): InboundMessage[] {
  const result: InboundMessage[] = [];

  for (const entry of payload.entry) {
    for (const change of entry.changes) {
      if (change.field !== 'messages' || !change.value.messages) continue;

      const contacts = change.value.contacts ?? [];

      for (const message of change.value.messages) {
        const phone = normalizePhone(message.from);
        if (!phone) continue;

        const contact = contacts.find((c) => c.wa_id === message.from);
        const { text, attachments } = extractContent(message);
        const contactName = contact?.profile?.name;

        result.push({
          messageId: message.id,
          phone,
          text,
          attachments,
          timestamp: toIsoTimestamp(message.timestamp),
          ...(contactName ? { contactName } : {}),
        });
      }
    }
  }

  return result;
}

/**
 * Hub verification handshake. Returns the challenge to echo, or null.
 */
export function verifySubscription(
  mode: string | undefined,
  token: string | undefined,
  challenge: string | undefined,
  verifyToken: string
): string | null {
  if (mode === 'subscribe' && token === verifyToken && challenge) {
    return challenge;
  }
  return null;
}

/**
 * Wire protocol between the control UI and the gateway: one JSON object per
 * WebSocket frame, tagged by `type`.
 */

import { z } from 'zod';
import { errorMessage } from './logger.js';
import type { PageInfo } from './types.js';

const coordinate = z.number().finite().default(0);
const button = z.enum(['left', 'right', 'middle']).default('left');
// bounds and integrality are the controller's to refuse
const pageIndex = z.number().finite().default(0);

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('mouse_move'), x: coordinate, y: coordinate }),
  z.object({ type: z.literal('mouse_click'), x: coordinate, y: coordinate, button }),
  z.object({ type: z.literal('mouse_down'), x: coordinate, y: coordinate, button }),
  z.object({ type: z.literal('mouse_up'), x: coordinate, y: coordinate, button }),
  z.object({ type: z.literal('mouse_wheel'), deltaX: coordinate, deltaY: coordinate }),
  z.object({ type: z.literal('key_press'), key: z.string().optional() }),
  z.object({ type: z.literal('key_type'), text: z.string().default('') }),
  z.object({ type: z.literal('navigate'), url: z.string().default('') }),
  z.object({ type: z.literal('go_back') }),
  z.object({ type: z.literal('go_forward') }),
  z.object({ type: z.literal('refresh') }),
  z.object({ type: z.literal('get_pages') }),
  z.object({ type: z.literal('switch_page'), page_index: pageIndex }),
  z.object({ type: z.literal('close_page'), page_index: pageIndex }),
  z.object({ type: z.literal('add_tab') }),
  z.object({ type: z.literal('refresh_pages') }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ClientMessageType = ClientMessage['type'];

const KNOWN_TYPES: ReadonlySet<string> = new Set(
  ClientMessageSchema.options.map((option) => option.shape.type.value),
);

const EnvelopeSchema = z.object({ type: z.string() });

export type DecodeResult =
  | { ok: true; message: ClientMessage }
  | { ok: false; kind: 'malformed'; error: string }
  | { ok: false; kind: 'unknown_type'; type: string };

/**
 * Decode one text frame. Never throws: bad JSON, a missing tag or badly typed
 * fields come back as `malformed`, an unrecognised tag as `unknown_type`.
 */
export function decodeClientMessage(raw: string): DecodeResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return { ok: false, kind: 'malformed', error: `Invalid JSON: ${errorMessage(err)}` };
  }

  const envelope = EnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    return { ok: false, kind: 'malformed', error: 'Message is not an object with a string "type"' };
  }
  if (!KNOWN_TYPES.has(envelope.data.type)) {
    return { ok: false, kind: 'unknown_type', type: envelope.data.type };
  }

  const parsed = ClientMessageSchema.safeParse(data);
  if (!parsed.success) {
    const error = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return { ok: false, kind: 'malformed', error };
  }
  return { ok: true, message: parsed.data };
}

export type ServerMessage =
  | { type: 'screenshot'; data: string; viewport: [number, number] }
  | { type: 'pages_info'; pages: PageInfo[] }
  | { type: 'page_switched' | 'page_closed'; success: boolean; page_index: number }
  | { type: 'tab_added'; success: boolean; reason?: string }
  | { type: 'error'; operation: ClientMessageType; message: string };

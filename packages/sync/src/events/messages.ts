import { z } from 'zod';

export const RELOAD_MESSAGE = 'RELOAD_POLICIES';

export type PolicyEventType = 'reload_permission' | 'add_permission' | 'remove_permission';

export interface PolicyEvent {
  type: PolicyEventType;
  reason?: string;
}

const PolicyEventMessageSchema = z.object({
  type: z.enum(['reload_permission', 'add_permission', 'remove_permission']),
  reason: z.string().optional(),
});

export function formatReloadMessage(reason?: string): string {
  return reason ? `${RELOAD_MESSAGE}:${reason}` : RELOAD_MESSAGE;
}

/**
 * Recognizes `RELOAD_POLICIES[:reason]` and JSON messages such as
 * `{"type":"add_permission"}`. Returns null for anything else.
 */
export function parsePolicyEvent(message: string): PolicyEvent | null {
  const text = message.trim();

  if (text.startsWith(RELOAD_MESSAGE)) {
    const rest = text.slice(RELOAD_MESSAGE.length);
    if (rest === '') return { type: 'reload_permission' };
    if (rest.startsWith(':')) {
      const reason = rest.slice(1).trim();
      return reason ? { type: 'reload_permission', reason } : { type: 'reload_permission' };
    }
    return null;
  }

  if (!text.startsWith('{')) return null;

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = PolicyEventMessageSchema.safeParse(body);
  return parsed.success ? parsed.data : null;
}

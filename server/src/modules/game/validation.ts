import { z } from 'zod';
import { PlayerAction } from '../../shared/logic/types.js';

// ハンドシェイクのクエリ: ?name=alice&tableId=abc
export const handshakeSchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(32),
  tableId: z.string().trim().min(1).max(64).optional(),
});

export type HandshakeQuery = z.infer<typeof handshakeSchema>;

// クライアントの action イベント: { action: 'bet' | 'fold', amount? }
export const actionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('fold') }),
  z.object({ action: z.literal('bet'), amount: z.number().int().nonnegative().default(0) }),
]);

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; message: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

export function parseHandshake(query: unknown): ParseResult<HandshakeQuery> {
  const result = handshakeSchema.safeParse(query);
  if (!result.success) {
    return { success: false, message: `Invalid handshake: ${formatIssues(result.error)}` };
  }
  return { success: true, data: result.data };
}

/**
 * クライアントの action メッセージをエンジンのアクションに変換する
 */
export function parseAction(data: unknown): ParseResult<PlayerAction> {
  const result = actionSchema.safeParse(data);
  if (!result.success) {
    return { success: false, message: `Invalid action: ${formatIssues(result.error)}` };
  }
  const message = result.data;
  return {
    success: true,
    data: message.action === 'fold' ? { type: 'fold' } : { type: 'bet', amount: message.amount },
  };
}

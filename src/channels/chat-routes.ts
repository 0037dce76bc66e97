import { FastifyInstance } from 'fastify';
import { ConversationRouter } from '../conversation/conversation-router';
import { logger } from '../observability/logger';

interface ChatMessageBody {
  session_key: string;
  user_id: string;
  display_name?: string;
  text?: string;
  action?: string;
}

const chatMessageSchema = {
  type: 'object',
  required: ['session_key', 'user_id'],
  properties: {
    session_key: { type: 'string', minLength: 1, maxLength: 200 },
    user_id: { type: 'string', minLength: 1, maxLength: 200 },
    display_name: { type: 'string', maxLength: 200 },
    text: { type: 'string', maxLength: 4000 },
    action: { type: 'string', maxLength: 500 },
  },
  anyOf: [{ required: ['text'] }, { required: ['action'] }],
} as const;

/**
 * Inbound endpoint for the chat transport.
 * POST /chat/messages
 *
 * The transport forwards each user message or button press; the reply
 * body carries the text, quick-reply options and any document to send.
 */
export function registerChatRoutes(app: FastifyInstance, router: ConversationRouter): void {
  app.post<{ Body: ChatMessageBody }>(
    '/chat/messages',
    { schema: { body: chatMessageSchema } },
    async (req, reply) => {
      const body = req.body;
      const log = logger.child({ component: 'chat-routes', sessionKey: body.session_key });

      try {
        const result = await router.handle({
          sessionKey: body.session_key,
          transportId: body.user_id,
          displayName: body.display_name ?? '',
          text: body.text,
          action: body.action,
        });
        return reply.status(200).send({ session_key: body.session_key, stage: result.stage, reply: result });
      } catch (err) {
        log.error({ err }, 'Chat message handling failed');
        return reply.status(500).send({ error: 'Internal error' });
      }
    },
  );

  logger.info('Chat endpoint registered: POST /chat/messages');
}

/**
 * HTTP API
 *
 * Express application over a CodebaseAssistant. The assistant is looked up
 * per request so the server can start before initialization finishes;
 * until then every assistant-backed route answers 503.
 *
 * Endpoints:
 *  - GET    /                              : name, version, endpoint list
 *  - GET    /health                        : liveness + readiness flag
 *  - GET    /status                        : index details
 *  - POST   /query                         : ask a question
 *  - GET    /conversations                 : conversation ids
 *  - GET    /conversations/:id/history     : messages of one conversation
 *  - GET    /conversations/:id/state       : full checkpoint
 *  - GET    /conversations/:id/summary     : counts and previews
 *  - DELETE /conversations/:id             : forget a conversation
 */

import express from 'express';
import { z } from 'zod';

import type { CodebaseAssistant } from '../agent/assistant.js';
import { CLIError, NotInitializedError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/logger.js';

export const QueryRequestSchema = z.object({
  question: z.string().min(1, 'question must not be empty'),
  conversation_id: z.string().min(1).default('default'),
});

export interface CreateAppOptions {
  /** Current assistant, or null while it is not available */
  getAssistant: () => CodebaseAssistant | null;
  logger?: Logger;
  version?: string;
}

const ENDPOINTS = [
  'GET /',
  'GET /health',
  'GET /status',
  'POST /query',
  'GET /conversations',
  'GET /conversations/:id/history',
  'GET /conversations/:id/state',
  'GET /conversations/:id/summary',
  'DELETE /conversations/:id',
];

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

/**
 * Express 4 does not catch rejected promises; forward them to the error
 * middleware.
 */
function asyncRoute(handler: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(options: CreateAppOptions): express.Express {
  const { getAssistant, version = '0.0.0' } = options;
  const logger = options.logger ?? consoleLogger;

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  const requireAssistant = (): CodebaseAssistant => {
    const assistant = getAssistant();
    if (!assistant || !assistant.isInitialized()) {
      throw new NotInitializedError();
    }
    return assistant;
  };

  app.get('/', (_req, res) => {
    res.json({ name: 'Codebase Intelligence API', version, endpoints: ENDPOINTS });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', system_ready: getAssistant()?.isInitialized() ?? false });
  });

  app.get('/status', (_req, res) => {
    const assistant = getAssistant();
    if (!assistant) {
      throw new NotInitializedError();
    }
    res.json(assistant.status());
  });

  app.post(
    '/query',
    asyncRoute(async (req, res) => {
      const assistant = requireAssistant();
      const body = QueryRequestSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: 'Invalid request body', issues: body.error.issues });
        return;
      }

      const { question, conversation_id } = body.data;
      const answer = await assistant.query(question, conversation_id);
      logger.info(`POST /query [${conversation_id}] answered (${answer.length} chars)`);
      res.json({ answer, question, conversation_id });
    })
  );

  app.get('/conversations', (_req, res) => {
    const conversations = requireAssistant().listConversations();
    res.json({ conversations, count: conversations.length });
  });

  app.get('/conversations/:id/history', (req, res) => {
    const messages = requireAssistant().getConversationHistory(req.params.id);
    res.json({ conversation_id: req.params.id, messages, message_count: messages.length });
  });

  app.get('/conversations/:id/state', (req, res) => {
    const state = requireAssistant().getConversationState(req.params.id);
    res.json({ conversation_id: req.params.id, exists: state !== null, state });
  });

  app.get('/conversations/:id/summary', (req, res) => {
    res.json(requireAssistant().getConversationSummary(req.params.id));
  });

  app.delete('/conversations/:id', (req, res) => {
    const success = requireAssistant().clearConversation(req.params.id);
    if (!success) {
      res.status(404).json({
        error: 'Conversation not found',
        detail: `No conversation with id '${req.params.id}'`,
      });
      return;
    }
    res.json({ success, conversation_id: req.params.id });
  });

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found', detail: `${req.method} ${req.path}` });
  });

  // Four parameters mark this as error middleware
  app.use(
    (error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (error instanceof NotInitializedError) {
        res.status(503).json({ error: 'System not initialized', detail: error.message });
        return;
      }
      if (error instanceof SyntaxError) {
        res.status(400).json({ error: 'Malformed JSON body', detail: error.message });
        return;
      }

      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`${req.method} ${req.path} failed: ${message}`);
      res.status(500).json({
        error: 'Internal server error',
        detail: message,
        ...(error instanceof CLIError && error.hint ? { hint: error.hint } : {}),
      });
    }
  );

  return app;
}

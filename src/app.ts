import express, { type Express, type Request, type Response } from 'express';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { callerFromHeaders } from './caller-context.js';
import { errorMessage } from './errors.js';
import type { JiraTools } from './jiraTool.js';
import { createJiraMcpServer } from './server.js';
import type { AppSettings } from './types.js';

/** The part of an SSE transport the message endpoint needs. */
export type MessageSink = Pick<SSEServerTransport, 'handlePostMessage'>;

/**
 * HTTP surface for MCP hosts. Each SSE connection gets its own MCP server
 * bound to the caller context taken from the connection's headers, so
 * per-user credentials never leave the connection that sent them.
 */
export function createApp(
  settings: AppSettings,
  tools: JiraTools,
  sseSessions: Map<string, MessageSink> = new Map()
): Express {
  const app: Express = express();

  app.get('/mcp/sse', async (req: Request, res: Response) => {
    const caller = callerFromHeaders(req.headers);
    const transport = new SSEServerTransport('/mcp', res);
    sseSessions.set(transport.sessionId, transport);
    console.log(`[SERVER] SSE connection ${transport.sessionId} opened for ${caller.userId ?? 'anonymous'}`);

    res.on('close', () => {
      sseSessions.delete(transport.sessionId);
      console.log(`[SERVER] SSE connection ${transport.sessionId} closed`);
    });

    try {
      await createJiraMcpServer(tools, caller).connect(transport);
    } catch (error) {
      console.error('[SERVER] Failed to start MCP session:', errorMessage(error));
      sseSessions.delete(transport.sessionId);
    }
  });

  app.post('/mcp', express.json(), async (req: Request, res: Response) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : '';
    const transport = sseSessions.get(sessionId);
    if (!transport) {
      res.status(400).send('Invalid session');
      return;
    }

    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (error) {
      console.error(`[SERVER] Failed to handle message for ${sessionId}:`, errorMessage(error));
      if (!res.headersSent) {
        res.status(500).send('Failed to handle message');
      }
    }
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      gateway: settings.serverUrl,
      readOnly: settings.readOnly,
      connections: sseSessions.size,
    });
  });

  return app;
}

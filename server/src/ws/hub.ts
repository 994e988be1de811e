import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'http';
import type { ActuationEvent, OrchestratorEmitters, StateEvent } from '../core/orchestrator.js';
import type { Logger } from '../logger.js';

export type EventHub = OrchestratorEmitters & {
  clientCount: () => number;
  close: () => Promise<void>;
};

type HelloMessage = {
  type: 'hello';
  ts_ms: number;
};

type FeedMessage = StateEvent | ActuationEvent | HelloMessage;

/** Broadcast-only feed of trigger state changes and actuation results. */
export function createEventHub(params: { server: HttpServer; path: string; logger: Logger }): EventHub {
  const log = params.logger.child({ component: 'event-hub' });
  const wss = new WebSocketServer({ server: params.server, path: params.path });

  const send = (ws: WebSocket, message: FeedMessage) => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  };

  const broadcast = (message: FeedMessage) => {
    for (const client of wss.clients) {
      send(client, message);
    }
  };

  wss.on('connection', (ws) => {
    send(ws, { type: 'hello', ts_ms: Date.now() });
    ws.on('error', (error) => {
      log.warn({ error: error.message }, 'event feed client error');
    });
  });

  wss.on('listening', () => {
    log.info({ path: params.path }, 'event feed listening');
  });

  return {
    state: broadcast,
    actuation: broadcast,
    clientCount: () => wss.clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close((error) => (error ? reject(error) : resolve()));
      })
  };
}

import type { FastifyInstance } from 'fastify';
import type { WebSocket } from 'ws';
import { registerWebSocketConnection } from '@/utils/events.js';
import { createContextLogger } from '@/utils/logger.js';

const logger = createContextLogger({ component: 'websocket' });

const isPing = (value: unknown) => typeof value === 'object' && value !== null && 'type' in value && value.type === 'ping';

export function registerWebSocketRoute(fastify: FastifyInstance) {
    fastify.get('/api/events', { websocket: true }, (socket: WebSocket, _req) => {
        socket.on('error', error => {
            logger.error({ err: error }, 'Connection error');
        });

        if (socket.readyState !== 1) {
            return;
        }

        registerWebSocketConnection(socket);

        socket.on('message', (message: Buffer | ArrayBuffer | Buffer[]) => {
            let data: unknown;
            try {
                data = JSON.parse(message.toString());
            } catch {
                logger.debug('Ignoring malformed message');
                return;
            }
            if (isPing(data)) {
                socket.send(JSON.stringify({ type: 'pong' }));
            }
        });
    });
}

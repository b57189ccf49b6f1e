import type { WebSocket } from 'ws';
import { createContextLogger } from './logger.js';

const logger = createContextLogger({ component: 'events' });

export type EventType = 'error' | 'mapping:updated' | 'mappings:reordered' | 'schema:evolved';

export interface BaseEvent {
    type: EventType;
    timestamp: string;
}

export interface ErrorEvent extends BaseEvent {
    type: 'error';
    message: string;
    details?: string;
}

export interface MappingUpdatedEvent extends BaseEvent {
    type: 'mapping:updated';
    mappingId: number;
    sourceSystem: string;
    externalCampaignId: string;
    isActive: boolean;
}

export interface MappingsReorderedEvent extends BaseEvent {
    type: 'mappings:reordered';
    mappingIds: number[];
}

export interface SchemaEvolvedEvent extends BaseEvent {
    type: 'schema:evolved';
    applied: string[];
    failed: string[];
    capabilitiesVersion: number;
}

export type Event = ErrorEvent | MappingUpdatedEvent | MappingsReorderedEvent | SchemaEvolvedEvent;

// Distributes over the union so each member keeps its own fields
type Payload<E extends Event> = E extends Event ? Omit<E, 'timestamp'> : never;

/**
 * Fan-out of events to every open WebSocket connection
 */
class EventEmitter {
    private connections: Set<WebSocket> = new Set();

    constructor() {
        // Clean up dead connections every 30 seconds
        setInterval(() => {
            for (const socket of this.connections) {
                if (socket.readyState !== 1) {
                    this.connections.delete(socket);
                }
            }
        }, 30000).unref();
    }

    addConnection(socket: WebSocket) {
        socket.on('close', () => {
            this.connections.delete(socket);
        });

        socket.on('error', error => {
            logger.error({ err: error }, 'WebSocket error');
            this.connections.delete(socket);
        });

        if (socket.readyState === 1) {
            this.connections.add(socket);
        }
    }

    /**
     * Emit an event to all connected clients
     */
    emitEvent(event: Event) {
        const message = JSON.stringify(event);

        for (const socket of this.connections) {
            try {
                if (socket.readyState === 1) {
                    socket.send(message);
                } else {
                    this.connections.delete(socket);
                }
            } catch (error) {
                logger.error({ err: error, eventType: event.type }, 'Failed to send message');
                this.connections.delete(socket);
            }
        }
    }
}

// Singleton instance
const eventEmitter = new EventEmitter();

/**
 * Utility function to emit events from anywhere in the codebase.
 * Overloads preserve the discriminated union at call sites.
 */
export function emitEvent(event: Payload<ErrorEvent>): void;
export function emitEvent(event: Payload<MappingUpdatedEvent>): void;
export function emitEvent(event: Payload<MappingsReorderedEvent>): void;
export function emitEvent(event: Payload<SchemaEvolvedEvent>): void;
export function emitEvent(event: Payload<Event>): void {
    const eventWithTimestamp: Event = {
        ...event,
        timestamp: new Date().toISOString(),
    };

    eventEmitter.emitEvent(eventWithTimestamp);
}

/**
 * Register a WebSocket connection with the event emitter
 */
export function registerWebSocketConnection(socket: WebSocket) {
    eventEmitter.addConnection(socket);
}

/**
 * Server-Sent Events (SSE) Manager
 * Manages SSE connections and broadcasts monitor snapshots to connected dashboards
 */

import type { Context } from 'koa';
import defaultLogger, { type SimpleLogger } from './logger.js';
import type { MonitorSnapshot } from './heartbeat.js';

export interface SSEClient {
    id: string;
    ctx: Context;
}

export type StatusStreamEvent =
    | { type: 'connected'; clientId: string; snapshot: MonitorSnapshot }
    | { type: 'status'; snapshot: MonitorSnapshot };

let logger: SimpleLogger = defaultLogger;

export function setLogger(loggerInstance: SimpleLogger): void {
    logger = loggerInstance;
}

export class SSEManager {
    private clients: Map<string, SSEClient> = new Map();
    private eventId: number = 0;

    /**
     * Register a new SSE client connection, starting it with the current snapshot
     */
    addClient(ctx: Context, snapshot: MonitorSnapshot): string {
        const clientId = `client_${Date.now()}_${Math.random().toString(36).substring(7)}`;

        // Tell Koa not to handle the response
        ctx.respond = false;

        ctx.res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            'Connection': 'keep-alive',
            'X-Accel-Buffering': 'no',
        });

        this.clients.set(clientId, { id: clientId, ctx });

        this.sendToClient(clientId, { type: 'connected', clientId, snapshot });

        ctx.req.on('close', () => {
            this.removeClient(clientId);
        });

        ctx.req.on('error', (error: Error) => {
            // "aborted" errors are normal when the dashboard is closed or reloaded
            if (error.message === 'aborted') {
                logger.debug('SSE client connection aborted', { clientId });
            } else {
                logger.error('SSE client error', { clientId, error: error.message });
            }
            this.removeClient(clientId);
        });

        logger.debug('SSE client connected', { clientId, clients: this.clients.size });
        return clientId;
    }

    removeClient(clientId: string): void {
        if (this.clients.delete(clientId)) {
            logger.debug('SSE client disconnected', { clientId, clients: this.clients.size });
        }
    }

    private sendToClient(clientId: string, data: StatusStreamEvent): boolean {
        const client = this.clients.get(clientId);
        if (!client) {
            return false;
        }

        try {
            const eventId = ++this.eventId;
            client.ctx.res.write(`id: ${eventId}\ndata: ${JSON.stringify(data)}\n\n`);
            return true;
        } catch (error) {
            logger.error('Failed to send to client', { clientId, error: String(error) });
            this.removeClient(clientId);
            return false;
        }
    }

    /**
     * Broadcast a snapshot to all connected clients
     */
    broadcastStatus(snapshot: MonitorSnapshot): void {
        const clientIds = Array.from(this.clients.keys());
        if (clientIds.length === 0) return;

        let successCount = 0;
        for (const clientId of clientIds) {
            if (this.sendToClient(clientId, { type: 'status', snapshot })) {
                successCount++;
            }
        }

        logger.debug('Status broadcast complete', {
            status: snapshot.status,
            sent: successCount,
            failed: clientIds.length - successCount
        });
    }

    /**
     * Send keep-alive comment to all clients
     */
    sendKeepAlive(): void {
        for (const [clientId, client] of this.clients) {
            try {
                client.ctx.res.write(': keep-alive\n\n');
            } catch (error) {
                logger.warn('Keep-alive failed for client', { clientId, error: String(error) });
                this.removeClient(clientId);
            }
        }
    }

    getClientCount(): number {
        return this.clients.size;
    }

    closeAll(): void {
        logger.info('Closing all SSE connections', { count: this.clients.size });

        for (const [clientId, client] of this.clients) {
            try {
                client.ctx.res.end();
            } catch (error) {
                logger.error('Error closing client connection', { clientId, error: String(error) });
            }
        }

        this.clients.clear();
    }
}

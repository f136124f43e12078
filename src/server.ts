// src/server.ts

import * as net from 'net';
import { setTimeout as sleep } from 'timers/promises';
import { handleConnection } from './http_handler';
import { errorMessage, Logger, ServerConfig } from './types';

export type RunningState = 'stopped' | 'running';

export interface StaticServerOptions {
    logger?: Logger;
}

// Owns the listening socket and every in-flight connection task.
// One task per accepted connection; there is no admission limit.
export class StaticServer {
    private state: RunningState = 'stopped';
    private server: net.Server | null = null;
    private abort: AbortController | null = null;
    private stopping: Promise<boolean> | null = null;
    private readonly inFlight = new Set<Promise<void>>();
    private readonly sockets = new Set<net.Socket>();
    private readonly logger: Logger;

    constructor(readonly config: ServerConfig, options: StaticServerOptions = {}) {
        this.logger = options.logger ?? console;
    }

    isRunning(): boolean {
        return this.state === 'running';
    }

    address(): net.AddressInfo | null {
        const address = this.server?.address();
        return address && typeof address === 'object' ? address : null;
    }

    // Resolves once the port is bound. A bind failure is logged, leaves the
    // server stopped and rejects, as does a stop() that lands before the
    // port is bound. A shutdown still in progress is waited for first.
    async start(): Promise<void> {
        if (this.stopping) {
            await this.stopping;
        }
        if (this.state === 'running') {
            throw new Error('Server is already running');
        }
        this.state = 'running';
        const abort = new AbortController();
        // Half-open so a response can still go out after the peer's FIN;
        // every connection is ended explicitly by its handler.
        const server = net.createServer({ allowHalfOpen: true }, (socket) => this.dispatch(socket));
        this.abort = abort;
        this.server = server;

        try {
            await new Promise<void>((resolve, reject) => {
                // An aborted listen emits neither 'listening' nor 'error'
                const onAbort = () => {
                    server.removeListener('error', onError);
                    reject(new Error('Server stopped before it was listening'));
                };
                const onError = (err: Error) => {
                    abort.signal.removeEventListener('abort', onAbort);
                    reject(err);
                };
                abort.signal.addEventListener('abort', onAbort, { once: true });
                server.once('error', onError);
                server.listen({ port: this.config.port, signal: abort.signal }, () => {
                    abort.signal.removeEventListener('abort', onAbort);
                    server.removeListener('error', onError);
                    resolve();
                });
            });
        } catch (e) {
            if (!abort.signal.aborted) {
                this.logger.error(`Failed to bind port ${this.config.port}:`, errorMessage(e));
                this.state = 'stopped';
                this.abort = null;
                abort.abort();
            }
            if (this.server === server) this.server = null;
            throw e;
        }

        server.on('error', (err) => {
            this.logger.error('Listener error:', err.message);
        });
        server.on('close', () => {
            if (this.server === server) this.server = null;
        });
        this.logger.log(`Serving ${this.config.baseDirectory} on port ${this.address()?.port ?? this.config.port}`);
    }

    // Stops accepting, then waits for in-flight connections: one grace period
    // for them to finish, a forced teardown, and a second grace period.
    // Resolves to false when connections are still pending after both.
    // Callers during a shutdown share its result.
    stop(): Promise<boolean> {
        if (this.stopping) {
            return this.stopping;
        }
        if (this.state === 'stopped') {
            return Promise.resolve(true);
        }
        this.state = 'stopped';
        this.abort?.abort();
        this.abort = null;
        this.stopping = this.shutdown().finally(() => {
            this.stopping = null;
        });
        return this.stopping;
    }

    private async shutdown(): Promise<boolean> {
        if (await this.drain(this.config.gracePeriod)) {
            return true;
        }
        this.logger.warn(`Forcing ${this.sockets.size} connection(s) closed`);
        for (const socket of this.sockets) {
            socket.destroy();
        }
        if (await this.drain(this.config.gracePeriod)) {
            return true;
        }
        this.logger.error(`Shutdown incomplete: ${this.inFlight.size} connection(s) still running`);
        return false;
    }

    private dispatch(socket: net.Socket): void {
        if (this.state !== 'running') {
            socket.destroy();
            return;
        }
        socket.setTimeout(this.config.readTimeout);
        this.sockets.add(socket);
        const task: Promise<void> = handleConnection(socket, this.config, this.logger).finally(() => {
            this.sockets.delete(socket);
            this.inFlight.delete(task);
        });
        this.inFlight.add(task);
    }

    private async drain(timeout: number): Promise<boolean> {
        if (this.inFlight.size === 0) {
            return true;
        }
        const timer = new AbortController();
        const settled = Promise.allSettled([...this.inFlight]).then(() => true);
        const expired = sleep(timeout, false, { signal: timer.signal }).catch(() => false);
        const done = await Promise.race([settled, expired]);
        timer.abort();
        return done && this.inFlight.size === 0;
    }
}

// src/socket_reader.ts

import { Socket } from 'net';
import { LineTooLongError } from './types';

export const K_MAX_LINE_LEN = 8 * 1024; // 8KB

const LF = 0x0a;
const CR = 0x0d;

// Pull-style line reader over a socket. The socket stays paused
// except while a read is waiting for more bytes.
export class SocketReader {
    private buffer: Buffer = Buffer.alloc(0);
    private ended = false;
    private error: Error | null = null;
    private waiter: { resolve: () => void; reject: (err: Error) => void } | null = null;

    constructor(private readonly socket: Socket, private readonly maxLineLength = K_MAX_LINE_LEN) {
        socket.on('data', this.onData);
        socket.on('end', this.onEnd);
        socket.on('error', this.onError);
        socket.on('close', this.onEnd);
        socket.pause();
    }

    // Next line without its terminator (LF, or CR LF), decoded as latin1.
    // Resolves to null once the peer has closed and nothing is left.
    async readLine(): Promise<string | null> {
        while (true) {
            const lf = this.buffer.indexOf(LF);
            if (lf !== -1) {
                const end = lf > 0 && this.buffer[lf - 1] === CR ? lf - 1 : lf;
                if (end > this.maxLineLength) {
                    throw new LineTooLongError();
                }
                const line = this.buffer.subarray(0, end).toString('latin1');
                this.buffer = this.buffer.subarray(lf + 1);
                return line;
            }
            // Room for a CR still waiting on its LF
            if (this.buffer.length > this.maxLineLength + 1) {
                throw new LineTooLongError();
            }
            if (this.error) {
                throw this.error;
            }
            if (this.ended) {
                if (this.buffer.length === 0) {
                    return null;
                }
                // Unterminated last line
                const line = this.buffer.toString('latin1');
                this.buffer = Buffer.alloc(0);
                return line;
            }
            await this.waitForData();
        }
    }

    // Fails the pending read, and every later one, with `err`.
    fail(err: Error): void {
        if (this.error) return;
        this.error = err;
        if (this.waiter) {
            this.waiter.reject(err);
            this.waiter = null;
        }
    }

    dispose(): void {
        this.socket.removeListener('data', this.onData);
        this.socket.removeListener('end', this.onEnd);
        this.socket.removeListener('error', this.onError);
        this.socket.removeListener('close', this.onEnd);
        this.buffer = Buffer.alloc(0);
        if (this.waiter) {
            this.waiter.reject(new Error('Reader disposed'));
            this.waiter = null;
        }
    }

    private waitForData(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.waiter = { resolve, reject };
            this.socket.resume();
        });
    }

    private wake(): void {
        if (this.waiter) {
            this.waiter.resolve();
            this.waiter = null;
        }
    }

    private onData = (chunk: Buffer): void => {
        this.socket.pause();
        this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
        this.wake();
    };

    private onEnd = (): void => {
        this.ended = true;
        this.wake();
    };

    private onError = (err: Error): void => {
        this.fail(err);
    };
}

import * as fs from 'fs/promises';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';

import type { Logger } from '../src/types';

export const silentLogger = (): Logger => ({
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
});

/**
 * A fresh directory under the os temp dir, realpath'd so that
 * comparisons against canonical paths hold on every platform.
 **/
export const makeTempDir = async (): Promise<string> =>
    fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'static-httpd-')));

export const removeDir = (dir: string): Promise<void> =>
    fs.rm(dir, { recursive: true, force: true });

/**
 * Both ends of a loopback TCP connection, for exercising code that
 * takes a socket without running the whole server.
 **/
export const socketPair = (): Promise<{
    client: net.Socket;
    server: net.Socket;
    close: () => Promise<void>;
}> =>
    new Promise((resolve, reject) => {
        let client: net.Socket;
        const listener = net.createServer();
        listener.once('error', reject);
        listener.once('connection', (server) => {
            const close = async () => {
                client.destroy();
                server.destroy();
                await new Promise<void>((done) => listener.close(() => done()));
            };
            resolve({ client, server, close });
        });
        listener.listen(0, '127.0.0.1', () => {
            const address = listener.address();
            if (!address || typeof address === 'string') {
                reject(new Error('listener has no port'));
                return;
            }
            client = net.connect(address.port, '127.0.0.1');
            client.on('error', () => {});
        });
    });

/**
 * Everything the peer sends until it closes the connection.
 **/
export const collect = (socket: net.Socket): Promise<Buffer> =>
    new Promise((resolve) => {
        const chunks: Buffer[] = [];
        socket.on('data', (chunk: Buffer) => chunks.push(chunk));
        socket.on('error', () => {});
        socket.on('close', () => resolve(Buffer.concat(chunks)));
    });

/**
 * Opens a connection, writes `request` and resolves with the raw bytes
 * the server sent back before closing.
 **/
export const rawRequest = (port: number, request: string | Buffer): Promise<Buffer> => {
    const socket = net.connect(port, '127.0.0.1');
    const response = collect(socket);
    socket.write(request);
    return response;
};

export type SplitResponse = {
    head: string;
    statusLine: string;
    headers: string[];
    body: Buffer;
};

export const splitResponse = (raw: Buffer): SplitResponse => {
    const idx = raw.indexOf('\r\n\r\n');
    if (idx < 0) {
        throw new Error(`no header block in ${JSON.stringify(raw.toString('latin1'))}`);
    }
    const head = raw.subarray(0, idx).toString('latin1');
    const [statusLine, ...headers] = head.split('\r\n');
    return { head, statusLine, headers, body: raw.subarray(idx + 4) };
};

export const errorResponse = (code: number, reason: string, body: string): string =>
    [
        `HTTP/1.0 ${code} ${reason}`,
        `Content-Length: ${Buffer.byteLength(body, 'latin1')}`,
        'Content-Type: text/plain; charset=ISO-8859-1',
        'Cache-Control: private, max-age=0',
        'Connection: close',
        'Server: httpd',
        '',
        body,
    ].join('\r\n');

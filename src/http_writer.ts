// src/http_writer.ts

import { Socket } from 'net';
import { FileHandle } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { errorMessage, HttpErrorCondition, Logger } from './types';

const HTTP_VERSION = 'HTTP/1.0';
const FIXED_HEADERS = ['Cache-Control: private, max-age=0', 'Connection: close', 'Server: httpd'];
const CRLF = '\r\n';
const CHUNK_SIZE = 16 * 1024;

function formatHead(statusLine: string, headers: string[]): Buffer {
    const lines = [statusLine, ...headers, ...FIXED_HEADERS];
    return Buffer.from(lines.join(CRLF) + CRLF + CRLF, 'latin1');
}

function write(socket: Socket, data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
        socket.write(data, (err) => (err ? reject(err) : resolve()));
    });
}

// Streams a 200 response for an already opened file. Failures are logged and
// swallowed: once the head is out there is nothing else the peer can be told.
export async function writeSuccess(socket: Socket, file: FileHandle, size: number, logger: Logger = console): Promise<void> {
    try {
        await write(socket, formatHead(`${HTTP_VERSION} 200 OK`, [`Content-Length: ${size}`]));
        const body = file.createReadStream({ autoClose: false, highWaterMark: CHUNK_SIZE, start: 0 });
        await pipeline(body, socket, { end: false });
    } catch (e) {
        logger.error('Failed to write response body:', errorMessage(e));
    }
}

// Writes a text/plain error response. Never rejects.
export async function writeError(socket: Socket, condition: HttpErrorCondition, bodyText: string, logger: Logger = console): Promise<void> {
    const body = Buffer.from(bodyText, 'latin1');
    const head = formatHead(`${HTTP_VERSION} ${condition.code} ${condition.reason}`, [
        `Content-Length: ${body.length}`,
        'Content-Type: text/plain; charset=ISO-8859-1',
    ]);
    try {
        await write(socket, Buffer.concat([head, body]));
    } catch (e) {
        logger.error(`Failed to write ${condition.code} response:`, errorMessage(e));
    }
}

// src/http_handler.ts

import { Socket } from 'net';
import { FileHandle } from 'fs/promises';
import { parseRequest } from './http_parser';
import { openTarget, resolvePath } from './path_resolver';
import { SocketReader } from './socket_reader';
import { writeError, writeSuccess } from './http_writer';
import { errorMessage, HTTP_ERRORS, HttpErrorCondition, Logger, RequestTimeoutError, ServerConfig } from './types';

export type ConnectionState =
    | 'start'
    | 'parsing'
    | 'resolving'
    | 'responding'
    | 'error-responding'
    | 'closed';

// Runs one request/response exchange on an accepted socket and always
// releases the file handle, the reader and the socket afterwards.
// The returned promise never rejects.
export async function handleConnection(socket: Socket, config: ServerConfig, logger: Logger = console): Promise<void> {
    const peer = `${socket.remoteAddress}:${socket.remotePort}`;
    let state: ConnectionState = 'start';
    let file: FileHandle | null = null;
    const reader = new SocketReader(socket);

    // A stall while reading the request is answered with a 408. A stall
    // while writing or closing tears the socket down. Resolving does not
    // touch the socket, so it is left alone.
    const onTimeout = () => {
        const err = new RequestTimeoutError();
        if (state === 'parsing') {
            reader.fail(err);
        } else if (state !== 'start' && state !== 'resolving') {
            socket.destroy(err);
        }
    };
    const onError = (err: Error) => {
        logger.warn(`Socket error for ${peer}:`, err.message);
    };
    socket.on('timeout', onTimeout);
    socket.on('error', onError);

    const respondWithError = async (condition: HttpErrorCondition, body: string) => {
        state = 'error-responding';
        logger.log(`- ${peer} ${condition.code} ${condition.reason}`);
        await writeError(socket, condition, body, logger);
    };

    try {
        state = 'parsing';
        const parsed = await parseRequest(reader);
        if (parsed === null) {
            return;
        }
        if (!parsed.ok) {
            await respondWithError(parsed.error, parsed.error.reason);
            return;
        }

        state = 'resolving';
        const { method, rawPath } = parsed.value;
        const resolved = await resolvePath(config.baseDirectory, rawPath);
        if (!resolved.ok) {
            await respondWithError(resolved.error, resolved.error.reason);
            return;
        }

        const opened = await openTarget(resolved.value);
        if (!opened.ok) {
            await respondWithError(opened.error, opened.error.reason);
            return;
        }
        file = opened.value.file;
        const { size } = opened.value;
        state = 'responding';
        logger.log(`- ${peer} ${method} ${rawPath} 200 (${size} bytes)`);
        await writeSuccess(socket, file, size, logger);
    } catch (e) {
        // Both writers swallow their own failures, so anything caught here
        // happened before a response was started.
        if (e instanceof RequestTimeoutError) {
            await respondWithError(HTTP_ERRORS.RequestTimeout, e.message);
        } else {
            await respondWithError(HTTP_ERRORS.InternalError, errorMessage(e) || HTTP_ERRORS.InternalError.reason);
        }
    } finally {
        state = 'closed';
        await closeFile(file, logger);
        reader.dispose();
        await closeSocket(socket);
        socket.removeListener('timeout', onTimeout);
    }
}

async function closeFile(file: FileHandle | null, logger: Logger): Promise<void> {
    if (!file) return;
    try {
        await file.close();
    } catch (e) {
        logger.warn('Failed to close file:', errorMessage(e));
    }
}

// Flushes what is buffered, then destroys the socket; resolves on 'close'.
function closeSocket(socket: Socket): Promise<void> {
    return new Promise((resolve) => {
        if (socket.destroyed) {
            resolve();
            return;
        }
        socket.once('close', () => resolve());
        socket.end(() => socket.destroy());
    });
}

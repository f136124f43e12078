// src/http_parser.ts

import { SocketReader } from './socket_reader';
import {
    failure,
    HTTP_ERRORS,
    LineTooLongError,
    Outcome,
    ParsedRequest,
    success,
    UnexpectedEndError,
} from './types';

const K_MAX_HEADER_LINES = 100;
const SUPPORTED_VERSIONS = new Set(['HTTP/1.0', 'HTTP/1.1']);

// Reads the request line and the header block of one request.
// Resolves to null when the peer closed without sending anything.
// I/O failures (timeouts, resets, an early end of stream) reject.
export async function parseRequest(reader: SocketReader): Promise<Outcome<ParsedRequest> | null> {
    let requestLine: string | null;
    try {
        requestLine = await reader.readLine();
        if (requestLine === null) {
            return null;
        }
        await skipHeaders(reader);
    } catch (e) {
        if (e instanceof LineTooLongError || e instanceof TooManyHeadersError) {
            return failure(HTTP_ERRORS.BadRequest);
        }
        throw e;
    }
    return parseRequestLine(requestLine);
}

// Validates `METHOD SP PATH SP VERSION`. Version is checked before method.
export function parseRequestLine(line: string): Outcome<ParsedRequest> {
    const parts = line.split(' ');
    if (parts.length !== 3) {
        return failure(HTTP_ERRORS.BadRequest);
    }
    const [method, rawPath, version] = parts;
    if (!SUPPORTED_VERSIONS.has(version)) {
        return failure(HTTP_ERRORS.BadRequest);
    }
    if (method !== 'GET') {
        return failure(HTTP_ERRORS.MethodNotAllowed);
    }
    return success({ method, rawPath, version });
}

class TooManyHeadersError extends Error {
    constructor() {
        super('Too many header lines');
        this.name = 'TooManyHeadersError';
    }
}

// Header values are never needed, so lines are read up to the blank one and dropped.
async function skipHeaders(reader: SocketReader): Promise<void> {
    for (let count = 0; ; count++) {
        const line = await reader.readLine();
        if (line === null) {
            throw new UnexpectedEndError();
        }
        if (line.length === 0) {
            return;
        }
        if (count >= K_MAX_HEADER_LINES) {
            throw new TooManyHeadersError();
        }
    }
}

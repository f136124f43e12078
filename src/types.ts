// src/types.ts

// Immutable settings shared read-only by the listener and every connection.
export interface ServerConfig {
    readonly port: number;
    readonly baseDirectory: string; // canonical, absolute
    readonly readTimeout: number; // ms of socket inactivity before a connection times out
    readonly gracePeriod: number; // ms to wait per shutdown phase
}

// The request line of one connection. rawPath is still percent-encoded.
export interface ParsedRequest {
    method: string;
    rawPath: string;
    version: string;
}

export interface ResolvedTarget {
    absoluteFilePath: string;
    exists: boolean;
    isDirectory: boolean;
    size: number;
}

export type HttpErrorKind =
    | 'BadRequest'
    | 'NotFound'
    | 'MethodNotAllowed'
    | 'RequestTimeout'
    | 'InternalError';

export interface HttpErrorCondition {
    readonly kind: HttpErrorKind;
    readonly code: number;
    readonly reason: string;
}

export const HTTP_ERRORS = {
    BadRequest: { kind: 'BadRequest', code: 400, reason: 'Bad Request' },
    NotFound: { kind: 'NotFound', code: 404, reason: 'Not Found' },
    MethodNotAllowed: { kind: 'MethodNotAllowed', code: 405, reason: 'Method Not Allowed' },
    RequestTimeout: { kind: 'RequestTimeout', code: 408, reason: 'Request Timeout' },
    InternalError: { kind: 'InternalError', code: 500, reason: 'Internal Server Error' },
} as const satisfies { [K in HttpErrorKind]: HttpErrorCondition & { kind: K } };

// Parse and resolve steps return one of these instead of throwing HTTP errors.
export type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: HttpErrorCondition };

export function success<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

export function failure<T>(error: HttpErrorCondition): Outcome<T> {
    return { ok: false, error };
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

// Errors from Node's fs and net bindings may come from another realm
// (test runners sandbox modules), so they are matched by shape.
export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return typeof e === 'object' && e !== null && 'code' in e && 'message' in e && typeof e.message === 'string';
}

export function errorMessage(e: unknown): string {
    if (typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string') {
        return e.message;
    }
    return String(e);
}

// Raised by the socket reader when the peer stays idle past the read timeout.
export class RequestTimeoutError extends Error {
    constructor(message = 'Read timed out') {
        super(message);
        this.name = 'RequestTimeoutError';
    }
}

// Raised when the peer closes its side before the header block is complete.
export class UnexpectedEndError extends Error {
    constructor(message = 'Unexpected end of stream') {
        super(message);
        this.name = 'UnexpectedEndError';
    }
}

export class LineTooLongError extends Error {
    constructor(message = 'Line too long') {
        super(message);
        this.name = 'LineTooLongError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

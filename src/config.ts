// src/config.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, ServerConfig } from './types';

export const DEFAULT_READ_TIMEOUT = 60_000;
export const DEFAULT_GRACE_PERIOD = 60_000;

export interface ServerConfigInput {
    port: number;
    baseDirectory: string;
    readTimeout?: number;
    gracePeriod?: number;
}

// Validates the input and canonicalizes the base directory once, up front.
export async function createServerConfig(input: ServerConfigInput): Promise<ServerConfig> {
    const { port, baseDirectory } = input;
    const readTimeout = input.readTimeout ?? DEFAULT_READ_TIMEOUT;
    const gracePeriod = input.gracePeriod ?? DEFAULT_GRACE_PERIOD;

    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigError(`Invalid port: ${port}`);
    }
    if (!Number.isInteger(readTimeout) || readTimeout <= 0) {
        throw new ConfigError(`Invalid read timeout: ${readTimeout}`);
    }
    if (!Number.isInteger(gracePeriod) || gracePeriod <= 0) {
        throw new ConfigError(`Invalid grace period: ${gracePeriod}`);
    }

    let canonical: string;
    try {
        canonical = await fs.realpath(path.resolve(baseDirectory));
    } catch (e) {
        throw new ConfigError(`Base directory not found: ${baseDirectory}`);
    }
    const stats = await fs.stat(canonical);
    if (!stats.isDirectory()) {
        throw new ConfigError(`Base directory is not a directory: ${baseDirectory}`);
    }

    return Object.freeze({ port, baseDirectory: canonical, readTimeout, gracePeriod });
}

// Parses the `<port> <directory>` command line arguments.
export function parsePortArgument(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new ConfigError(`Invalid port: ${value}`);
    }
    return parseInt(value, 10);
}

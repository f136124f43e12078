// src/path_resolver.ts

import { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FileHandle } from 'fs/promises';
import { failure, HTTP_ERRORS, isErrnoException, Outcome, ResolvedTarget, success } from './types';

// Form-style percent decoding where every %XX is one ISO-8859-1 character.
// Returns null for a malformed escape.
export function decodePath(encoded: string): string | null {
    let out = '';
    for (let i = 0; i < encoded.length; i++) {
        const ch = encoded[i];
        if (ch === '+') {
            out += ' ';
        } else if (ch === '%') {
            const hex = encoded.slice(i + 1, i + 3);
            if (!/^[0-9a-fA-F]{2}$/.test(hex)) {
                return null;
            }
            out += String.fromCharCode(parseInt(hex, 16));
            i += 2;
        } else {
            out += ch;
        }
    }
    return out;
}

function isMissing(err: unknown): boolean {
    return isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

// realpath() for paths that may not exist: the longest existing ancestor is
// resolved through symlinks and the remaining segments are appended as-is.
export async function canonicalize(target: string): Promise<string> {
    const absolute = path.resolve(target);
    try {
        return await fs.realpath(absolute);
    } catch (e) {
        if (!isMissing(e)) throw e;
        const parent = path.dirname(absolute);
        if (parent === absolute) return absolute;
        return path.join(await canonicalize(parent), path.basename(absolute));
    }
}

export function isContained(baseDirectory: string, candidate: string): boolean {
    if (candidate === baseDirectory) return true;
    const prefix = baseDirectory.endsWith(path.sep) ? baseDirectory : baseDirectory + path.sep;
    return candidate.startsWith(prefix);
}

// Maps a request path onto a regular file beneath baseDirectory, which must
// already be canonical. The containment check runs on the canonical form,
// before anything about the file's existence is looked at.
export async function resolvePath(baseDirectory: string, rawPath: string): Promise<Outcome<ResolvedTarget>> {
    const decoded = decodePath(rawPath);
    if (decoded === null || decoded.includes('\0')) {
        return failure(HTTP_ERRORS.BadRequest);
    }

    const absoluteFilePath = await canonicalize(path.join(baseDirectory, decoded));
    if (!isContained(baseDirectory, absoluteFilePath)) {
        return failure(HTTP_ERRORS.BadRequest);
    }

    let stats: Stats;
    try {
        stats = await fs.stat(absoluteFilePath);
    } catch (e) {
        if (isMissing(e)) return failure(HTTP_ERRORS.NotFound);
        throw e;
    }
    if (stats.isDirectory() || !stats.isFile()) {
        return failure(HTTP_ERRORS.NotFound);
    }

    return success({ absoluteFilePath, exists: true, isDirectory: false, size: stats.size });
}

export interface OpenedTarget {
    file: FileHandle;
    size: number;
}

// Opens a resolved file for reading and sizes it from the open handle. It
// may have been removed or replaced by a directory since it was resolved;
// that is still a 404.
export async function openTarget(target: ResolvedTarget): Promise<Outcome<OpenedTarget>> {
    let file: FileHandle;
    try {
        file = await fs.open(target.absoluteFilePath, 'r');
    } catch (e) {
        if (isMissing(e) || (isErrnoException(e) && e.code === 'EISDIR')) {
            return failure(HTTP_ERRORS.NotFound);
        }
        throw e;
    }
    try {
        const stats = await file.stat();
        if (stats.isFile()) {
            return success({ file, size: stats.size });
        }
    } catch (e) {
        await file.close();
        throw e;
    }
    await file.close();
    return failure(HTTP_ERRORS.NotFound);
}

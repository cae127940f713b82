/**
 * Relay Error Taxonomy
 * Every failure the fetch-relay pipeline can surface, tagged with a code
 *
 * @module lib/errors
 */

import { describeError } from '@/lib/services/shared/logger';

export enum RelayErrorCode {
    RESOLVE_FAILED = 'RESOLVE_FAILED',
    TOO_LARGE = 'TOO_LARGE',
    DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
    UPLOAD_FAILED = 'UPLOAD_FAILED',
    DELETE_FAILED = 'DELETE_FAILED',
}

export class RelayError extends Error {
    readonly code: RelayErrorCode;

    constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RelayError';
        this.code = code;
    }
}

/** Where a resolver call went wrong: the request itself, or the body it returned */
export type ResolveFailureSource = 'transport' | 'payload';

/** Resolver unreachable, non-2xx, or payload without a usable media URL */
export class ResolveError extends RelayError {
    readonly source: ResolveFailureSource;

    constructor(message: string, options?: { cause?: unknown; source?: ResolveFailureSource }) {
        super(RelayErrorCode.RESOLVE_FAILED, message, options);
        this.name = 'ResolveError';
        this.source = options?.source ?? 'transport';
    }
}

/** Media exceeds the upload ceiling. Never retried. */
export class TooLargeError extends RelayError {
    readonly size: number;
    readonly limit: number;

    constructor(size: number, limit: number) {
        super(RelayErrorCode.TOO_LARGE, `media is ${size} bytes, limit is ${limit} bytes`);
        this.name = 'TooLargeError';
        this.size = size;
        this.limit = limit;
    }
}

/** Download failed after the attempt budget ran out */
export class DownloadError extends RelayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(RelayErrorCode.DOWNLOAD_FAILED, message, options);
        this.name = 'DownloadError';
    }
}

export class UploadError extends RelayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(RelayErrorCode.UPLOAD_FAILED, message, options);
        this.name = 'UploadError';
    }
}

/** Logged only; a failed deletion is never surfaced to the user */
export class DeletionError extends RelayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(RelayErrorCode.DELETE_FAILED, message, options);
        this.name = 'DeletionError';
    }
}

/**
 * Normalize anything thrown inside the pipeline to a RelayError
 */
export function toRelayError(error: unknown, fallback: RelayErrorCode = RelayErrorCode.DOWNLOAD_FAILED): RelayError {
    if (error instanceof RelayError) return error;
    return new RelayError(fallback, describeError(error), { cause: error });
}

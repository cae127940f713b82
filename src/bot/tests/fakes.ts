/**
 * In-process stand-ins shared by the bot tests
 */

import { statSync } from 'fs';
import { Readable } from 'stream';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

import type { ChatGateway, VideoSource } from '../types';

// ============================================================================
// Chat gateway
// ============================================================================

export type GatewayCall =
    | { op: 'sendText'; chatId: number; text: string; replyTo?: number; messageId: number }
    | { op: 'editText'; chatId: number; messageId: number; text: string }
    | { op: 'deleteMessage'; chatId: number; messageId: number }
    | { op: 'sendVideo'; chatId: number; video: VideoSource; caption: string; messageId: number; bytes: number | null };

export class FakeGateway implements ChatGateway {
    readonly calls: GatewayCall[] = [];
    /** Return an error to make sendVideo reject for that source */
    rejectVideo: (video: VideoSource) => Error | null = () => null;
    private nextMessageId = 100;

    async sendText(chatId: number, text: string, replyTo?: number): Promise<number> {
        const messageId = this.nextMessageId++;
        this.calls.push({ op: 'sendText', chatId, text, replyTo, messageId });
        return messageId;
    }

    async editText(chatId: number, messageId: number, text: string): Promise<void> {
        this.calls.push({ op: 'editText', chatId, messageId, text });
    }

    async deleteMessage(chatId: number, messageId: number): Promise<void> {
        this.calls.push({ op: 'deleteMessage', chatId, messageId });
    }

    async sendVideo(chatId: number, video: VideoSource, caption: string): Promise<number> {
        const failure = this.rejectVideo(video);
        if (failure) throw failure;

        const messageId = this.nextMessageId++;
        const bytes = video.kind === 'file' ? statSync(video.path).size : null;
        this.calls.push({ op: 'sendVideo', chatId, video, caption, messageId, bytes });
        return messageId;
    }

    get sentTexts(): string[] {
        return this.calls.flatMap(call => (call.op === 'sendText' ? [call.text] : []));
    }

    get edits(): string[] {
        return this.calls.flatMap(call => (call.op === 'editText' ? [call.text] : []));
    }

    get videos(): Extract<GatewayCall, { op: 'sendVideo' }>[] {
        return this.calls.flatMap(call => (call.op === 'sendVideo' ? [call] : []));
    }
}

// ============================================================================
// HTTP
// ============================================================================

export interface FakeReply {
    status?: number;
    headers?: Record<string, string>;
    /** String body, or chunks streamed one by one */
    body?: string | Buffer[];
    /** Used as is for stream requests, e.g. one that fails midway */
    stream?: Readable;
}

export type FakeRoute = (url: string, config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>;

/**
 * axios adapter answering from `route`. Stream requests get a Readable body.
 */
export function fakeAdapter(route: FakeRoute): AxiosAdapter {
    return async (config): Promise<AxiosResponse> => {
        const reply = await route(config.url ?? '', config);
        const body = reply.body ?? '';
        return {
            status: reply.status ?? 200,
            statusText: '',
            headers: reply.headers ?? {},
            config,
            data: config.responseType === 'stream'
                ? reply.stream ?? Readable.from(typeof body === 'string' ? [Buffer.from(body)] : body)
                : typeof body === 'string' ? body : Buffer.concat(body).toString(),
        };
    };
}

/** `count` chunks of `size` bytes */
export function chunks(count: number, size: number): Buffer[] {
    return Array.from({ length: count }, (_, i) => Buffer.alloc(size, i % 256));
}

/** Emits `bytes` bytes, then fails like a dropped connection */
export function brokenStream(bytes: number): Readable {
    return Readable.from((async function* () {
        yield Buffer.alloc(bytes, 1);
        throw new Error('socket hang up');
    })());
}

/**
 * Telegram Chat Gateway
 * ChatGateway over grammY's Api
 */

import { InputFile, type Api } from 'grammy';

import type { ChatGateway, VideoSource } from '../types';

function toVideoInput(video: VideoSource): InputFile | string {
    return video.kind === 'file' ? new InputFile(video.path) : video.url;
}

export function createTelegramGateway(api: Api): ChatGateway {
    return {
        async sendText(chatId, text, replyTo) {
            const sent = await api.sendMessage(chatId, text, {
                reply_parameters: replyTo ? { message_id: replyTo, allow_sending_without_reply: true } : undefined,
                link_preview_options: { is_disabled: true },
            });
            return sent.message_id;
        },

        async editText(chatId, messageId, text) {
            await api.editMessageText(chatId, messageId, text, {
                link_preview_options: { is_disabled: true },
            });
        },

        async deleteMessage(chatId, messageId) {
            await api.deleteMessage(chatId, messageId);
        },

        async sendVideo(chatId, video, caption) {
            const sent = await api.sendVideo(chatId, toVideoInput(video), {
                caption,
                supports_streaming: true,
            });
            return sent.message_id;
        },
    };
}

import type { ChatGateway } from '../types';
import { log } from './log';

export async function safeDeleteMessage(gateway: ChatGateway, chatId: number, msgId?: number): Promise<boolean> {
  if (!msgId) return false;
  try {
    await gateway.deleteMessage(chatId, msgId);
    return true;
  } catch (err) {
    log.debug(`deleteMessage ${chatId}/${msgId} failed: ${String(err)}`);
    return false;
  }
}

export async function safeEditMessage(
  gateway: ChatGateway,
  chatId: number,
  msgId: number,
  text: string
): Promise<boolean> {
  try {
    await gateway.editText(chatId, msgId, text);
    return true;
  } catch (err) {
    log.debug(`editMessageText ${chatId}/${msgId} failed: ${String(err)}`);
    return false;
  }
}

/**
 * The single status message of one relay request.
 * Created once, edited in place, deleted on success.
 */
export class StatusMessage {
  private lastText: string;
  private removed = false;

  private constructor(
    private readonly gateway: ChatGateway,
    readonly chatId: number,
    readonly messageId: number,
    text: string
  ) {
    this.lastText = text;
  }

  static async open(gateway: ChatGateway, chatId: number, text: string, replyTo?: number): Promise<StatusMessage> {
    const messageId = await gateway.sendText(chatId, text, replyTo);
    return new StatusMessage(gateway, chatId, messageId, text);
  }

  get text(): string {
    return this.lastText;
  }

  /** Edit the message; identical text is skipped (Telegram rejects no-op edits) */
  async update(text: string): Promise<boolean> {
    if (this.removed || text === this.lastText) return false;
    const edited = await safeEditMessage(this.gateway, this.chatId, this.messageId, text);
    if (edited) this.lastText = text;
    return edited;
  }

  async remove(): Promise<boolean> {
    if (this.removed) return false;
    this.removed = await safeDeleteMessage(this.gateway, this.chatId, this.messageId);
    return this.removed;
  }
}

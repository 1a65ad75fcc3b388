import { HttpClient, defaultHttpClient, describeHttpError, httpStatusOf } from '../http';
import { TelegramConfig } from '../config';
import { NotificationFailure } from '../errors';

export const TELEGRAM_MAX_LENGTH = 4096;

export type DeliveryOutcome =
    | { status: 'sent'; httpStatus: number }
    | { status: 'skipped'; reason: string }
    | { status: 'failed'; error: NotificationFailure };

export interface Notifier {
    send(text: string): Promise<DeliveryOutcome>;
}

export function truncateMessage(text: string, max: number = TELEGRAM_MAX_LENGTH): string {
    if (text.length <= max) return text;
    const marker = '\n…(truncated)';
    let cut = max - marker.length;
    // don't split a surrogate pair
    const code = text.charCodeAt(cut - 1);
    if (code >= 0xd800 && code <= 0xdbff) cut -= 1;
    return text.slice(0, cut) + marker;
}

/**
 * Bot API sender. Echoes every message to the console, then posts it when a
 * token and chat id are configured. Delivery problems are logged, never thrown.
 */
export class TelegramNotifier implements Notifier {
    constructor(private readonly config: TelegramConfig, private readonly http: HttpClient = defaultHttpClient) {}

    get configured(): boolean {
        return Boolean(this.config.botToken && this.config.chatId);
    }

    async send(text: string): Promise<DeliveryOutcome> {
        console.log(text);

        const { botToken, chatId } = this.config;
        if (!botToken || !chatId) {
            console.warn('⚠️ No Telegram credentials present; skipping Telegram send.');
            return { status: 'skipped', reason: 'missing credentials' };
        }

        try {
            const response = await this.http.post(
                `${this.config.apiBaseUrl}/bot${botToken}/sendMessage`,
                { chat_id: chatId, text: truncateMessage(text) },
                { timeout: this.config.timeoutMs },
            );
            const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
            if (response.status < 200 || response.status >= 300) {
                throw new NotificationFailure(`HTTP ${response.status}: ${body.slice(0, 300)}`, { status: response.status });
            }
            console.log(`✅ Telegram OK ${response.status} ${body.slice(0, 300)}`);
            return { status: 'sent', httpStatus: response.status };
        } catch (error) {
            const failure = error instanceof NotificationFailure
                ? error
                : new NotificationFailure(describeHttpError(error), { cause: error, status: httpStatusOf(error) });
            console.error(`❌ Telegram send failed: ${failure.message}`);
            return { status: 'failed', error: failure };
        }
    }
}

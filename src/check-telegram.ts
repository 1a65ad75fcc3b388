require('dotenv').config();
import { loadConfig } from './config';
import { TelegramNotifier } from './notify/telegram';

async function main() {
    console.log('🚀 Checking Telegram bot delivery...');

    const { telegram } = loadConfig();
    const notifier = new TelegramNotifier(telegram);
    if (!notifier.configured) {
        console.log('ℹ️ Set TELEGRAM_BOT_TOKEN (or TELEGRAM_TOKEN) and TELEGRAM_CHAT_ID in .env first.');
    }

    const outcome = await notifier.send(`👋 Test message from the index RSI bot (${new Date().toISOString()})`);
    console.log(`📬 Outcome: ${outcome.status}`);
    process.exit(outcome.status === 'sent' ? 0 : 1);
}

main().catch((error) => {
    console.error(error);
    process.exit(1);
});

require('dotenv').config();
import { loadConfig } from './config';
import { YahooChartClient } from './data/yahoo';
import { TelegramNotifier } from './notify/telegram';
import { runDailyReport } from './agent/daily-report';

async function main() {
    const config = loadConfig();
    console.log(`🚀 Daily ${config.market.label} report (${config.market.ticker}, strategy: ${config.policy.strategy})`);

    const fetcher = new YahooChartClient({
        timeoutMs: config.market.timeoutMs,
        autoAdjust: config.market.autoAdjust,
    });
    const notifier = new TelegramNotifier(config.telegram);

    const outcome = await runDailyReport(config, { fetcher, notifier });
    console.log(`🏁 Done: ${outcome.kind}`);
}

main().catch((error) => {
    console.error('❌ Daily report failed:', error);
    process.exit(1);
});

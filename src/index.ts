import 'dotenv/config';
import type { Server } from 'node:http';
import { loadGatewayConfig, listApiKeys } from './config/config-loader.js';
import { ConfigError } from './core/errors.js';
import { createGateway } from './core/gateway.js';
import { startApiServer } from './api/router.js';
import { TelegramHandler } from './interfaces/telegram_handler.js';
import { configureLogger, createLogger } from './utils/logger.js';

const log = createLogger('main');

function loadConfigOrExit() {
    try {
        return loadGatewayConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            log.fatal({ issues: error.issues }, 'Startup blocked by configuration issues');
            process.exit(1);
        }
        throw error;
    }
}

const config = loadConfigOrExit();
configureLogger(config.logLevel);

const { processor, router } = createGateway({
    sessions: config.sessions,
    cliHistoryCapacity: config.cliHistoryCapacity,
});

log.info('Starting Multi-Protocol Gateway...');
await router.initializeAll();

const server: Server = await startApiServer(
    {
        router,
        processor,
        apiKeys: listApiKeys(config),
        corsOrigins: config.corsOrigins,
    },
    config.apiPort,
);

const telegram = config.telegramBotToken
    ? new TelegramHandler(config.telegramBotToken, router.adapters.telegram)
    : undefined;
if (telegram) {
    log.info('Telegram bot transport polling for updates');
}

log.info('Gateway started');

// ── Shutdown ─────────────────────────────────────────────────────────────────

let stopping = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Stopping gateway...');

    try {
        await telegram?.stop();
    } catch (err) {
        log.error({ err }, 'Failed to stop Telegram polling');
    }

    await new Promise<void>((resolve) => {
        server.close((err) => {
            if (err) log.error({ err }, 'HTTP server close failed');
            resolve();
        });
    });
    await router.shutdownAll();
    log.info('Gateway stopped');
    process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
        void shutdown(signal);
    });
}

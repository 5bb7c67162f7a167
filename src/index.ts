import 'dotenv/config';

import { createApp, startServer } from './api.js';
import { OpenAIBackend } from './backends/openai.js';
import { CommandGenerator, loadCommandExamples } from './command-generator.js';
import { loadSettings } from './config.js';
import { errorMessage } from './errors.js';
import { createExecutor } from './executors/index.js';
import { GatewayService } from './gateway-service.js';
import { AuditLedger, noopLedger } from './ledger.js';

async function main() {
    // Configuration problems stop the process here, before anything listens.
    const settings = loadSettings();

    const backend = new OpenAIBackend({
        baseUrl: settings.llm.baseUrl,
        apiKey: settings.llm.apiKey,
        model: settings.llm.modelName,
        provider: settings.llm.provider,
    });

    const generator = new CommandGenerator(backend, {
        systemPrompt: settings.llm.systemPrompt,
        examples: loadCommandExamples(),
        completion: {
            temperature: settings.llm.temperature,
            maxTokens: settings.llm.maxTokens,
            timeoutMs: settings.llm.timeoutMs,
        },
    });

    const executor = createExecutor(settings.execution);
    const ledger = settings.auditLedgerPath ? new AuditLedger(settings.auditLedgerPath) : noopLedger;

    const service = new GatewayService({
        services: settings.services,
        generator,
        executor,
        commandTimeoutMs: settings.execution.commandTimeoutMs,
        ledger,
    });

    console.log(`[GATEWAY] Instance: ${settings.instanceId}`);
    console.log(`[GATEWAY] LLM: ${backend.name} / ${settings.llm.modelName}`);
    console.log(`[GATEWAY] Executor: ${executor.kind}`);
    console.log(`[GATEWAY] Services: ${Object.keys(settings.services).join(', ')}`);
    console.log(`[LEDGER] ${settings.auditLedgerPath ?? 'disabled'}`);

    const app = createApp({ service, settings });
    const server = await startServer(app, settings);

    const shutdown = (signal: string) => {
        console.log(`[GATEWAY] ${signal} received, shutting down`);
        server.close(() => process.exit(0));
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    console.error(`[FAIL] Startup failed: ${errorMessage(err)}`);
    process.exit(1);
});

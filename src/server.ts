import 'dotenv/config';
import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, '[Server] Shutting down');
    await app.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await app.listen({ host: env.HOST, port: env.PORT });
  app.log.info(
    {
      smpc: env.SMPC_URL ?? null,
      orchestrator: env.ORCHESTRATOR_URL ?? null,
      clientId: env.CLIENT_ID ?? null,
      polling: env.POLLING_ENABLED,
    },
    '[Server] Vectorization service ready',
  );
}

main().catch((err: unknown) => {
  console.error('[Server] Failed to start:', err);
  process.exit(1);
});

import 'dotenv/config';
import { createApp } from './app.js';
import { loadGovernorConfig, loadRuntimeConfig } from './config/governor.js';
import { createRuntime } from './runtime.js';

const PORT = Number(process.env.PORT ?? 4000);

async function main(): Promise<void> {
  const config = loadGovernorConfig();
  const runtime = await createRuntime(config, loadRuntimeConfig());
  const app = createApp(runtime);

  // ─── Start ──────────────────────────────────────────────
  const server = app.listen(PORT, () => {
    console.log(`🗳️  Governor "${config.name}" (${runtime.mode}) running on http://localhost:${PORT}`);
    console.log(`   Health:     http://localhost:${PORT}/health`);
    console.log(`   Governance: http://localhost:${PORT}/api/governance/config`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    runtime.stop();
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('[server] failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});

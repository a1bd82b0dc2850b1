import { buildApp } from './app.js';
import { config } from './config/app.js';
import { shutdownTelemetry } from './orchestrator/telemetry.js';

const app = await buildApp();

async function shutdown(signal: NodeJS.Signals) {
  app.log.info(`Received ${signal}, shutting down gracefully.`);
  try {
    await app.close();
    await shutdownTelemetry();
    process.exit(0);
  } catch (error) {
    app.log.error({ err: error }, 'shutdown failed');
    process.exit(1);
  }
}

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((signal) => {
  process.once(signal, () => {
    void shutdown(signal);
  });
});

try {
  await app.listen({ port: config.PORT, host: '0.0.0.0' });
} catch (error) {
  app.log.error(error);
  process.exit(1);
}

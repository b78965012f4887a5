import { buildApp, buildHttpServer } from './app.js';
import { loadConfig } from './config/app-config.js';

function main() {
  const config = loadConfig();
  const httpServer = buildHttpServer(buildApp(config));

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
    console.log(
      `[server] analysis defaults: ${config.analysis.dateOrder}, ` +
        `offsets=${config.analysis.stopSummaryOffsetsM.join(',')}m, ` +
        `window=${config.analysis.decelerationWindowM}m, bucket=${config.analysis.resampleIntervalS}s`,
    );
  });

  const shutdown = () => {
    console.log('[server] shutting down...');
    httpServer.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

try {
  main();
} catch (err) {
  console.error('[server] fatal startup error', err);
  process.exit(1);
}

import 'dotenv/config';
import { readTrapConfig } from './config/trap.js';
import { createRuntime, failStartup, onUncaughtException, type Runtime } from './runtime.js';
import { maskAddr } from './security/log_mask.js';

process.on('uncaughtException', onUncaughtException);
process.on('unhandledRejection', (e) => {
  console.error('[tripwire] unhandledRejection', e);
});

let rt: Runtime;
let port: number;
try {
  const cfg = readTrapConfig();
  rt = createRuntime(cfg, { logger: true });
  port = cfg.healthPort;
  console.log(`[tripwire] watching ${cfg.pairId}: ${maskAddr(cfg.primaryFeed)} vs ${maskAddr(cfg.fallbackFeed)}, window=${cfg.windowSize}, every ${cfg.sampleIntervalMs}ms`);
} catch (e) {
  failStartup(e);
}

const stopPoller = rt.startPoller();

async function shutdown(signal: string) {
  console.log(`[tripwire] ${signal} received, shutting down`);
  stopPoller();
  try {
    await rt.close();
  } catch (e) {
    console.error('[tripwire] shutdown error', e);
    process.exitCode = 1;
  }
}
process.once('SIGINT', () => { void shutdown('SIGINT'); });
process.once('SIGTERM', () => { void shutdown('SIGTERM'); });

try {
  await rt.app.listen({ port, host: process.env.HOST || '0.0.0.0' });
} catch (e) {
  failStartup(e);
}

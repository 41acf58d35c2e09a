import { loadConfig } from './config';
import { runShowcase } from './showcase';

try {
  const config = loadConfig();
  console.log(`[Runner] Reading movement reports from ${config.movementReportsDir}`);
  runShowcase(config);
} catch (e) {
  console.error('[Runner] ERROR:', e instanceof Error ? e.message : e);
  process.exitCode = 1;
}

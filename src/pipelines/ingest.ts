/**
 * Fetch upstream datasets into the raw store.
 *
 * Usage: npm run ingest [-- <source> ...]
 */
import 'dotenv/config';
import { loadConfig } from '../core/config.js';
import { createEnvironment } from '../core/environment.js';
import { runIngest } from './handlers.js';

async function main() {
  const config = loadConfig();
  const env = createEnvironment(config);
  await env.bootstrap();

  const results = await runIngest(env, config, process.argv.slice(2));
  const failed = results.filter((r) => r.error !== null);

  console.log(`\nIngested ${results.length - failed.length}/${results.length} endpoints`);
  if (failed.length > 0) {
    for (const r of failed) console.error(`  ${r.name}: ${r.error}`);
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error('Ingest failed:', err);
  process.exitCode = 1;
});

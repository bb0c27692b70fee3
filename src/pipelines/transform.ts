/**
 * Normalize raw payloads into year-partitioned Parquet.
 *
 * Usage: npm run transform [-- <raw-key> ...]
 * With no keys, every object in the raw store is considered.
 */
import 'dotenv/config';
import { loadConfig } from '../core/config.js';
import { createEnvironment } from '../core/environment.js';
import { runTransform } from './handlers.js';

async function main() {
  const config = loadConfig();
  const env = createEnvironment(config);
  await env.bootstrap();

  const { counts } = await runTransform(env, process.argv.slice(2));

  console.log('\nTransform summary:');
  for (const [outcome, count] of Object.entries(counts)) {
    console.log(`  ${outcome}: ${count}`);
  }
}

main().catch((err) => {
  console.error('Transform failed:', err);
  process.exitCode = 1;
});

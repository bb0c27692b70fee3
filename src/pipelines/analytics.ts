/**
 * Run the query set against DuckDB (LOCAL) or Athena (CLOUD) and write the
 * results to the evidence sink.
 *
 * Usage: npm run analytics [-- --all-ddl]
 */
import 'dotenv/config';
import { loadConfig } from '../core/config.js';
import { createEnvironment } from '../core/environment.js';
import { runAnalytics } from './handlers.js';

async function main() {
  const args = process.argv.slice(2);
  const config = loadConfig();
  const env = createEnvironment(config);
  await env.bootstrap();

  console.log(`MODE=${config.mode} >> running ${env.mode === 'CLOUD' ? 'Athena' : 'DuckDB'} analytics`);
  const report = await runAnalytics(env, config, { includeAllDdls: args.includes('--all-ddl') });

  if (report.failures.length > 0) {
    console.warn(`${report.failures.length} queries failed: ${report.failures.map((f) => f.query).join(', ')}`);
  }
}

main().catch((err) => {
  console.error('Analytics failed:', err);
  process.exitCode = 1;
});

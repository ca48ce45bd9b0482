#!/usr/bin/env tsx

/**
 * Runner for a full scan
 * Loads environment variables, runs every enabled source and prints the summary.
 *
 *   npm run scan                       full run, snapshot + tracker written
 *   npm run scan -- --dry-run          nothing written
 *   npm run scan -- --source grants_gov --source usaspending
 */

import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const projectRoot = fileURLToPath(new URL('..', import.meta.url));

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import type { SourceName } from '../src/types/adapter';

// Static imports are hoisted above dotenv; the logger reads LOG_LEVEL when first loaded
const { runScan } = await import('../src/pipeline/runScan');
const { isSourceName } = await import('../src/config/environment');
const { SOURCE_NAMES } = await import('../src/types/adapter');

function parseArgs(argv: string[]): { dryRun: boolean; sources: SourceName[] } {
  const sources: SourceName[] = [];
  let dryRun = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg === '--source') {
      const value = argv[++i] ?? '';
      if (!isSourceName(value)) {
        throw new Error(`Unknown source "${value}" (expected one of: ${SOURCE_NAMES.join(', ')})`);
      }
      sources.push(value);
    } else {
      throw new Error(`Unknown argument "${arg}"`);
    }
  }

  return { dryRun, sources };
}

async function main() {
  const { dryRun, sources } = parseArgs(process.argv.slice(2));

  console.log(`Starting scan${dryRun ? ' (dry run)' : ''}\n`);
  console.log('═'.repeat(80));

  const result = await runScan({ dryRun, sources: sources.length > 0 ? sources : undefined });
  const { summary } = result;

  console.log('\n' + '═'.repeat(80));
  console.log('SCAN COMPLETE');
  console.log('═'.repeat(80));
  console.log(`   • Items: ${summary.totalItems}`);
  console.log(`   • Sources succeeded: ${summary.sourcesSucceeded.join(', ') || 'none'}`);
  for (const failed of summary.failedSources) {
    console.log(`   • ${failed.source}: ${failed.status} (${failed.reason})`);
  }
  console.log(`   • Added: ${summary.added}, reappeared: ${summary.reappeared}, removed: ${summary.removed}, modified: ${summary.modified}`);
  console.log(`   • Dormant tracked identifiers: ${summary.dormant}`);
  console.log(`   • Dormant CFDA programs: ${summary.dormantPrograms}`);
  console.log(`   • Snapshot written: ${summary.snapshotWritten ? 'yes' : 'no'}`);
  console.log(`   • Duration: ${summary.durationMs}ms`);
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error('\nSCAN FAILED');
    console.error('═'.repeat(80));
    console.error('Error:', error);
    process.exit(1);
  }
);

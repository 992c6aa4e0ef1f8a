/**
 * Demonstrate probe searching on both strands
 *
 * Features demonstrated:
 * - Matching a single probe with findMatches
 * - Overlapping and palindromic hits
 * - Loading a probe table with rejected rows
 * - Running the file pipeline and exporting the match CSV
 *
 * Usage: npx tsx examples/probe-search.ts
 */

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  describeInvalidProbes,
  findMatches,
  formatMatchTable,
  formatSearchSummary,
  matchProbeFile,
  ProbeLocatorError,
  reverseComplement,
} from '../src';
import { Either } from 'effect';

const target = 'GATTACAGATTACATGCATGCAAAATTTT';

function singleProbeDemo(): void {
  console.log('🔍 Single probe');
  console.log('='.repeat(40));

  const probe = { name: 'gattaca', sequence: 'GATTACA' };
  console.log(
    `Reverse complement of ${probe.sequence}: ${Either.getOrElse(reverseComplement(probe.sequence), () => '(invalid)')}`
  );
  console.log(formatMatchTable(findMatches(probe, target)));

  // TGCA is its own reverse complement, so every hit appears twice
  console.log('\nPalindromic probe TGCA:');
  console.log(formatMatchTable(findMatches({ name: 'tgca', sequence: 'TGCA' }, target)));

  // AA overlaps itself three times in AAAA
  console.log('\nOverlapping probe AA:');
  console.log(formatMatchTable(findMatches({ name: 'aa', sequence: 'AA' }, target)));
}

async function pipelineDemo(): Promise<void> {
  console.log('\n📄 Probe table pipeline');
  console.log('='.repeat(40));

  const workDir = mkdtempSync(join(tmpdir(), 'probe-search-example-'));
  const probeFile = join(workDir, 'probes.csv');
  writeFileSync(
    probeFile,
    ['Probe Name,Sequence', 'gattaca,GATTACA', 'tgca,tgca', 'polyN,NNNN', 'gcgc,GCGC'].join('\n')
  );

  const report = await matchProbeFile({
    probeFile,
    target,
    output: join(workDir, 'probe_matches.csv'),
  });

  console.log(describeInvalidProbes(report.invalid));
  console.log(formatSearchSummary(report.summary));
  console.log(`Probes without matches: ${report.summary.probesWithoutMatches.join(', ')}`);
  console.log(`Results saved to ${report.outputPath ?? '(nowhere)'}`);
}

async function main(): Promise<void> {
  try {
    singleProbeDemo();
    await pipelineDemo();
    console.log('\n✅ All examples completed successfully!');
  } catch (error) {
    console.error('❌ Error running examples:', error instanceof ProbeLocatorError ? error.toString() : error);
    process.exit(1);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await main();
}

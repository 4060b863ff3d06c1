import chalk from 'chalk';
import type { MatchSummary, ResolveSummary } from './pipeline.js';
import type { RelationshipSets } from './types.js';

function header(title: string): void {
  console.log(chalk.cyan('\n' + '═'.repeat(60)));
  console.log(chalk.cyan(`  ${title}`));
  console.log(chalk.cyan('═'.repeat(60)));
}

function line(label: string, value: number, colour: (text: string) => string = chalk.white): void {
  console.log(`  ${label.padEnd(28)} ${colour(value.toString())}`);
}

export function displayMatchSummary(summary: MatchSummary): void {
  header('SIDECAR MATCHING');

  line('Files scanned:', summary.scanned);
  line('Media matched:', summary.matched, chalk.green);
  line('Media unmatched:', summary.unmatched, summary.unmatched > 0 ? chalk.yellow : chalk.white);

  console.log('\n  By tier:');

  for (const [tier, count] of Object.entries(summary.byTier)) {
    if (count > 0 && tier !== 'Unmatched') {
      console.log(chalk.gray(`    - ${tier}: ${count}`));
    }
  }

  console.log('');
  line('Junk directories:', summary.junkDirectories, chalk.gray);
  line('Leftover directories:', summary.leftoverDirectories, chalk.yellow);
  line('Orphaned sidecars:', summary.orphanedSidecars, chalk.yellow);
  line('Sidecars renamed:', summary.renamed, chalk.gray);
  line('Sidecars copied:', summary.copied, chalk.gray);
  line('New matches this run:', summary.newMatches, chalk.green);

  console.log(chalk.cyan('\n' + '─'.repeat(60)));
}

export function displayResolveSummary(summary: ResolveSummary): void {
  header('METADATA RESOLUTION');

  line('Files resolved:', summary.total - summary.failures);
  line('Timestamps resolved:', summary.timestampsResolved, chalk.green);
  line('Timestamps unresolved:', summary.timestampsUnresolved, chalk.yellow);
  line('Geotags resolved:', summary.geotagsResolved, chalk.green);
  line('Geotags unresolved:', summary.geotagsUnresolved, chalk.yellow);

  if (summary.geotagConflicts > 0) {
    line('Geotag conflicts:', summary.geotagConflicts, chalk.red);
  }

  if (summary.failures > 0) {
    line('Failures:', summary.failures, chalk.red);
  }

  line('Written back:', summary.embedded, chalk.gray);
  line('Sidecars disposed:', summary.sidecarsDisposed, chalk.gray);

  console.log(chalk.cyan('\n' + '─'.repeat(60)));
}

export function displayClusterSummary(sets: RelationshipSets): void {
  const { statistics, thresholds } = sets;

  header('RELATIONSHIP CLUSTERS');

  console.log(chalk.gray(`  Thresholds: ${thresholds.time_seconds}s, ${thresholds.location_km} km\n`));
  line('Files considered:', statistics.total_files);
  line('With timestamp:', statistics.files_with_timestamp);
  line('With geotag:', statistics.files_with_geotag);
  line('Temporal sets (T′):', statistics.T_prime_sets, chalk.green);
  line('Location sets (L′):', statistics.L_prime_sets, chalk.green);
  line('Event sets (E′):', statistics.E_prime_sets, chalk.green);

  console.log(chalk.cyan('\n' + '─'.repeat(60)));
}

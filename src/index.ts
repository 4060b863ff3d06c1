#!/usr/bin/env node
import { confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import ora from 'ora';
import cliProgress from 'cli-progress';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import {
  dataPaths,
  openStageContext,
  runClusterStage,
  runMatchStage,
  runResolveStage,
  type StageContext,
} from './pipeline.js';
import { displayClusterSummary, displayMatchSummary, displayResolveSummary } from './report.js';

async function runMatch(context: StageContext): Promise<void> {
  console.log(chalk.cyan('\n🔗 Sidecar Matcher\n'));
  console.log(chalk.gray(`Extraction root: ${context.config.rootDirectory}\n`));

  const spinner = ora('Scanning extraction root...').start();

  try {
    const summary = await runMatchStage(context, {
      onScanProgress: (found) => {
        spinner.text = `Scanning extraction root... (${found} files)`;
      },
    });

    spinner.succeed(`Matched ${summary.matched} of ${summary.matched + summary.unmatched} media files`);
    displayMatchSummary(summary);
    console.log(chalk.gray(`\nLeftover report: ${dataPaths(context.config).leftovers}`));
  } catch (error) {
    spinner.fail('Matching failed');
    throw error;
  }
}

async function runResolve(context: StageContext, force = false): Promise<void> {
  console.log(chalk.cyan('\n🧭 Metadata Resolver\n'));

  const progressBar = new cliProgress.SingleBar({
    format: 'Resolving metadata |{bar}| {percentage}% | {value}/{total} files | {eta}s remaining',
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });

  try {
    const summary = await runResolveStage(
      context,
      {},
      {
        onStart: (total) => progressBar.start(total, 0),
        onFileResolved: (done) => progressBar.update(done),
      },
      { force }
    );

    progressBar.stop();
    displayResolveSummary(summary);
  } catch (error) {
    progressBar.stop();
    throw error;
  }
}

async function runCluster(context: StageContext): Promise<void> {
  console.log(chalk.cyan('\n🗺️  Relationship Clustering\n'));

  const spinner = ora('Extracting relationships...').start();
  const sets = await runClusterStage(context);

  spinner.succeed(`Wrote ${dataPaths(context.config).relationships}`);
  displayClusterSummary(sets);
}

async function runAll(context: StageContext): Promise<void> {
  console.log(chalk.cyan('\n📷 Takeout Reconciler\n'));
  console.log(chalk.gray('Complete workflow:'));
  console.log(chalk.gray('  1. Match - Pair every media file with its JSON sidecar'));
  console.log(chalk.gray('  2. Resolve - Pick one timestamp and geotag per file and write them back'));
  console.log(chalk.gray('  3. Cluster - Group files by time, place and event\n'));

  await runMatch(context);

  const resolve = await confirm({
    message: '\nContinue to resolve metadata?',
    default: true,
  });

  if (!resolve) {
    return;
  }

  await runResolve(context);

  const cluster = await confirm({
    message: '\nContinue to relationship clustering?',
    default: true,
  });

  if (cluster) {
    await runCluster(context);
  }

  console.log(chalk.green('\n✓ Done!'));
}

async function main(command: string | undefined, flags: string[]): Promise<void> {
  const config = await loadConfig();
  const context = await openStageContext(config);

  switch (command) {
    case 'match':
      await runMatch(context);
      break;

    case 'resolve':
      await runResolve(context, flags.includes('--force'));
      break;

    case 'cluster':
      await runCluster(context);
      break;

    default:
      await runAll(context);
  }

  console.log(chalk.gray(`\nRun log: ${context.runLog.path}`));
}

main(process.argv[2], process.argv.slice(3)).catch((error: unknown) => {
  console.error(chalk.red(`\n✗ ${describeError(error)}`));
  process.exitCode = 1;
});

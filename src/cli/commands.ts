import { Command } from 'commander';
import { WorkflowService } from '../services/WorkflowService.js';
import { Logger } from '../utils/logger.js';
import { config, printConfigSummary } from '../config/index.js';
import type { CLIOptions } from '../types/index.js';

export function parseOptions(raw: Record<string, unknown>): CLIOptions {
  return {
    input: typeof raw.input === 'string' ? raw.input : undefined,
    output: typeof raw.output === 'string' ? raw.output : undefined,
    open: raw.open !== false,
    dryRun: raw.dryRun === true ? true : undefined,
    verbose: raw.verbose === true,
  };
}

export function createCLI(workflow: WorkflowService = new WorkflowService(config)): Command {
  const program = new Command();

  program
    .name('rym-release-digest')
    .description('Extract albums from saved RateYourMusic pages and report the new releases')
    .version('1.0.0')
    .option('-i, --input <dir>', 'directory with saved .html/.mhtml pages', config.paths.inputDir)
    .option('-o, --output <dir>', 'directory for snapshots and reports', config.paths.outputDir)
    .option('--no-open', 'do not open the report in the browser')
    .option('--dry-run', 'process pages without writing files')
    .option('-v, --verbose', 'log debug output')
    .action(async (raw: Record<string, unknown>) => {
      const options = parseOptions(raw);
      if (options.verbose) {
        Logger.setLevel('debug');
      }

      const summary = await workflow.run(options);

      console.log(`\n✅ Processed ${summary.filesProcessed}/${summary.filesFound} saved pages`);
      for (const skipped of summary.filesSkipped) {
        console.log(`   ⚠️  Skipped ${skipped.file}: ${skipped.reason}`);
      }
      console.log(`   Albums extracted: ${summary.recordsExtracted} (${summary.duplicatesRemoved} duplicates removed)`);
      console.log(`   New releases: ${summary.newReleases}`);
      if (summary.snapshotPath) console.log(`   Snapshot: ${summary.snapshotPath}`);
      if (summary.reportPath) console.log(`   Report: ${summary.reportPath}`);
    });

  program
    .command('config')
    .description('print the effective configuration')
    .action(() => {
      printConfigSummary();
    });

  return program;
}

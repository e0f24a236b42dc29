import { config } from 'dotenv';
import { ConfigError, DEBUG_LOG_FILE, createLogger } from '@audio-batch/core';
import { USAGE, parseCliArgs } from './cli/args';
import { Orchestrator } from './orchestrator/orchestrator';
import { exitCodeFor, formatReport } from './report/report-formatter';

// Load environment variables
config();

const CONFIG_ERROR_EXIT_CODE = 2;

/**
 * Batch audio converter CLI
 * Converts, trims and normalizes every audio file under an input path
 */
async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const logger = createLogger('batch-audio', options.debug
    ? { level: 'debug', debugFile: DEBUG_LOG_FILE }
    : {});

  const orchestrator = new Orchestrator({ logger });
  const report = await orchestrator.run(options.inputPath, options.outputDir, options.config);

  if (report.totalJobs === 0) {
    process.stderr.write('No supported audio files found.\n');
    return 1;
  }

  const output = `\n${formatReport(report)}\n`;
  if (report.failed > 0) {
    process.stderr.write(output);
  } else {
    process.stdout.write(output);
  }

  return exitCodeFor(report);
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      process.exitCode = CONFIG_ERROR_EXIT_CODE;
      return;
    }

    createLogger('batch-audio').error({ error }, 'Batch run crashed');
    process.exitCode = 1;
  });

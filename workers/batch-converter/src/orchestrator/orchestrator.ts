import * as os from 'os';
import {
  ConfigError,
  createLogger,
  parseProcessingConfig,
  toErrorMessage,
  type BatchReport,
  type Logger,
  type ProcessingConfig
} from '@audio-batch/core';
import { CodecRegistry } from '../codec/codec-registry';
import { discoverFiles, type DiscoveryResult } from '../discovery/file-discovery';
import { DuplicateOutputJob } from '../pipeline/duplicate-output-job';
import { FileJob } from '../pipeline/file-job';
import { JobScheduler, type SchedulableJob } from '../scheduler/job-scheduler';

export type OrchestratorDeps = {
  codecs?: CodecRegistry;
  scheduler?: JobScheduler;
  logger?: Logger;
  maxWorkers?: number; // defaults to the available CPU count
};

/**
 * Owns a batch run: validates config, discovers files, builds one job per
 * file and hands them to the scheduler
 */
export class Orchestrator {
  private readonly codecs: CodecRegistry;
  private readonly scheduler: JobScheduler;
  private readonly logger: Logger;
  private readonly maxWorkers: number;

  constructor(deps: OrchestratorDeps = {}) {
    this.logger = deps.logger ?? createLogger('batch-audio');
    this.codecs = deps.codecs ?? CodecRegistry.createDefault(this.logger);
    this.scheduler = deps.scheduler ?? new JobScheduler(this.logger);
    this.maxWorkers = deps.maxWorkers ?? os.availableParallelism();
  }

  /**
   * @throws ConfigError for invalid options or a missing input path,
   * before any job starts
   */
  async run(inputPath: string, outputDir: string | undefined, rawConfig: unknown): Promise<BatchReport> {
    const config = parseProcessingConfig(rawConfig);
    const discovery = await this.discover(inputPath, outputDir, config);

    const workerCount = Math.min(config.jobCount, this.maxWorkers);
    if (workerCount < config.jobCount) {
      this.logger.info({ requested: config.jobCount, workerCount }, 'Worker count capped at CPU count');
    }

    this.logger.info({
      inputPath,
      outputDir: discovery.outputDir,
      files: discovery.files.length,
      workerCount,
      config
    }, 'Batch starting');

    const jobs = discovery.files.map((file): SchedulableJob => {
      if (file.duplicateOf !== undefined) {
        this.logger.warn({
          sourcePath: file.sourcePath,
          destPath: file.destPath,
          claimedBy: file.duplicateOf
        }, 'Output path collision');
        return new DuplicateOutputJob(file.sourcePath, file.destPath, file.duplicateOf);
      }
      return new FileJob(file.sourcePath, file.destPath, config, { codecs: this.codecs, logger: this.logger });
    });

    const report = await this.scheduler.run(jobs, workerCount, (outcome, completed, total) => {
      this.logger.info({
        completed,
        total,
        status: outcome.status,
        sourcePath: outcome.sourcePath
      }, 'Progress');
    });

    this.logger.info({
      totalJobs: report.totalJobs,
      succeeded: report.succeeded,
      skipped: report.skipped,
      failed: report.failed
    }, 'Batch complete');

    return report;
  }

  private async discover(
    inputPath: string,
    outputDir: string | undefined,
    config: ProcessingConfig
  ): Promise<DiscoveryResult> {
    try {
      return await discoverFiles(inputPath, outputDir, config.outputFormat);
    } catch (error) {
      throw new ConfigError(`Cannot read input ${inputPath}: ${toErrorMessage(error)}`, [], { inputPath });
    }
  }
}

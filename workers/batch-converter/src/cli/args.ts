import { parseArgs } from 'util';
import {
  ConfigError,
  DEFAULT_BIT_DEPTH,
  DEFAULT_SAMPLE_RATE,
  DEFAULT_SILENCE_THRESH_DB,
  DEFAULT_TARGET_LUFS,
  toErrorMessage,
  type ProcessingConfigInput
} from '@audio-batch/core';

export type CliOptions = {
  help: boolean;
  debug: boolean;
  inputPath: string;
  outputDir?: string;
  config: ProcessingConfigInput;
};

export const USAGE = `Usage: batch-audio <input> [options]

Batch convert / trim / normalize audio files.

Options:
  -o, --output-dir <dir>       Output directory (default: <input>/processed_audio)
  -r, --sample-rate <hz>       Target sample rate, or "source" [default: ${DEFAULT_SAMPLE_RATE}]
  -b, --bit-depth <bits>       Target bit depth: 16, 24, 32 or "source" [default: ${DEFAULT_BIT_DEPTH}]
  -t, --trim-silence           Trim leading/trailing silence
  -n, --normalize              Normalize loudness to target LUFS
      --target-lufs <lufs>     Target loudness in LUFS [default: ${DEFAULT_TARGET_LUFS}]
      --silence-thresh <db>    Silence threshold in dB for trimming [default: ${DEFAULT_SILENCE_THRESH_DB}]
  -j, --jobs <n>               Parallel workers [default: $MAX_CONCURRENT_JOBS or 1]
  -f, --format <fmt>           Output format: wav, flac or mp3 [default: wav]
      --skip-existing          Leave files that already exist in the output untouched
      --debug                  Debug logging, also written to batch-audio.debug.log
  -h, --help                   Show this help`;

/**
 * Parse command-line arguments into raw config input; values are validated
 * later by the processing config schema
 * @throws ConfigError for unknown flags or a missing input path
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const { values, positionals } = readArgs(argv);
  const help = values.help === true;

  if (!help && positionals.length !== 1) {
    throw new ConfigError(
      positionals.length === 0 ? 'Missing input path' : `Expected one input path, got ${positionals.length}`
    );
  }

  const config: ProcessingConfigInput = {
    targetSampleRate: sourceOr(values['sample-rate'], DEFAULT_SAMPLE_RATE),
    targetBitDepth: bitDepthOption(values['bit-depth']),
    trimSilence: values['trim-silence'] === true,
    normalize: values.normalize === true,
    targetLUFS: numberOption(values['target-lufs'], DEFAULT_TARGET_LUFS),
    silenceThreshDb: numberOption(values['silence-thresh'], DEFAULT_SILENCE_THRESH_DB),
    jobCount: numberOption(values.jobs ?? env.MAX_CONCURRENT_JOBS, 1),
    skipExisting: values['skip-existing'] === true
  };

  if (values.format !== undefined) {
    config.outputFormat = outputFormatOption(values.format);
  }

  return {
    help,
    debug: values.debug === true,
    inputPath: positionals[0] ?? '',
    outputDir: values['output-dir'],
    config
  };
}

function numberOption(value: string | undefined, fallback: number): number {
  return value === undefined || value.trim() === '' ? fallback : Number(value);
}

function sourceOr(value: string | undefined, fallback: number): number | undefined {
  return value === 'source' ? undefined : numberOption(value, fallback);
}

function bitDepthOption(value: string | undefined): ProcessingConfigInput['targetBitDepth'] {
  const bits = sourceOr(value, DEFAULT_BIT_DEPTH);
  switch (bits) {
    case undefined:
    case 16:
    case 24:
    case 32:
      return bits;
    default:
      throw new ConfigError(`Invalid bit depth: ${value} (expected 16, 24, 32 or "source")`);
  }
}

function outputFormatOption(value: string): ProcessingConfigInput['outputFormat'] {
  switch (value) {
    case 'wav':
    case 'flac':
    case 'mp3':
      return value;
    default:
      throw new ConfigError(`Invalid output format: ${value} (expected wav, flac or mp3)`);
  }
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'output-dir': { type: 'string', short: 'o' },
        'sample-rate': { type: 'string', short: 'r' },
        'bit-depth': { type: 'string', short: 'b' },
        'trim-silence': { type: 'boolean', short: 't', default: false },
        normalize: { type: 'boolean', short: 'n', default: false },
        'target-lufs': { type: 'string' },
        'silence-thresh': { type: 'string' },
        jobs: { type: 'string', short: 'j' },
        format: { type: 'string', short: 'f' },
        'skip-existing': { type: 'boolean', default: false },
        debug: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false }
      }
    });
  } catch (error) {
    throw new ConfigError(toErrorMessage(error));
  }
}

// Library exports only - no CLI execution
export { createSampleBuffer, frameCount, durationSec } from './audio/sample-buffer';
export { trimSilence } from './audio/silence-trimmer';
export { measureIntegratedLoudness } from './audio/loudness-meter';
export { normalizeLoudness, type NormalizationResult } from './audio/loudness-normalizer';
export { convertFormat, resample, requantize } from './audio/format-converter';
export type { AudioCodec } from './codec/codec.interface';
export { CodecRegistry } from './codec/codec-registry';
export { WavCodec } from './codec/wav-codec';
export { FfmpegCodec, type FfmpegCodecOptions } from './codec/ffmpeg-codec';
export { decodeWav, encodeWav } from './codec/wav-format';
export { FileJob, type FileJobDeps } from './pipeline/file-job';
export { DuplicateOutputJob } from './pipeline/duplicate-output-job';
export { JobScheduler, buildReport, type SchedulableJob, type OutcomeListener } from './scheduler/job-scheduler';
export { Orchestrator, type OrchestratorDeps } from './orchestrator/orchestrator';
export { discoverFiles, buildOutputPath, isSupportedAudioFile, type DiscoveredFile } from './discovery/file-discovery';
export { formatReport, exitCodeFor } from './report/report-formatter';
export { parseCliArgs, USAGE } from './cli/args';

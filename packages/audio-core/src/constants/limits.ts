/**
 * Processing defaults and numeric limits
 */

// Conversion defaults (CLI)
export const DEFAULT_SAMPLE_RATE = 44100;
export const DEFAULT_BIT_DEPTH = 16;
export const SUPPORTED_BIT_DEPTHS = [16, 24, 32] as const;
export const FLAC_MAX_BIT_DEPTH = 24;

// Loudness
export const DEFAULT_TARGET_LUFS = -12.0;
export const LOUDNESS_BLOCK_SEC = 0.4;
export const LOUDNESS_BLOCK_OVERLAP = 0.75;
export const LOUDNESS_ABSOLUTE_GATE_LUFS = -70;
export const LOUDNESS_RELATIVE_GATE_LU = -10;

// Silence trimming
export const DEFAULT_SILENCE_THRESH_DB = 60;

// Scheduling
export const DEFAULT_JOB_COUNT = 1;

// Output
export const DEFAULT_OUTPUT_DIR_NAME = 'processed_audio';
export const DEBUG_LOG_FILE = 'batch-audio.debug.log';
export const PARTIAL_FILE_SUFFIX = '.partial';

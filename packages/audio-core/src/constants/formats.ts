/**
 * Input extensions picked up by file discovery (lower case, with dot)
 */
export const SUPPORTED_INPUT_EXTENSIONS = [
  '.wav',
  '.flac',
  '.mp3',
  '.ogg',
  '.m4a',
  '.aiff',
  '.aif',
  '.wma'
] as const;

export const OUTPUT_FORMATS = ['wav', 'flac', 'mp3'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const OUTPUT_EXTENSIONS: Record<OutputFormat, string> = {
  wav: '.wav',
  flac: '.flac',
  mp3: '.mp3'
};

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  DEFAULT_OUTPUT_DIR_NAME,
  OUTPUT_EXTENSIONS,
  SUPPORTED_INPUT_EXTENSIONS,
  type OutputFormat
} from '@audio-batch/core';

export type DiscoveredFile = {
  sourcePath: string;
  destPath: string;
  duplicateOf?: string; // earlier source that maps to the same destPath
};

export type DiscoveryResult = {
  baseDir: string;
  outputDir: string;
  files: DiscoveredFile[];
};

const SUPPORTED = new Set<string>(SUPPORTED_INPUT_EXTENSIONS);

export function isSupportedAudioFile(filePath: string): boolean {
  return SUPPORTED.has(path.extname(filePath).toLowerCase());
}

/**
 * Collect input files and map each onto a mirrored destination.
 *
 * A single file is its own batch, with its directory as the base. A
 * directory is walked recursively; the output directory is never descended
 * into, so re-running into a nested output tree does not re-process results.
 *
 * Sources that differ only by extension map to one destination. The first
 * in sorted order keeps it; later ones are marked with `duplicateOf`.
 */
export async function discoverFiles(
  inputPath: string,
  outputDir: string | undefined,
  format: OutputFormat
): Promise<DiscoveryResult> {
  const input = path.resolve(inputPath);
  const stats = await fs.stat(input);

  const baseDir = stats.isDirectory() ? input : path.dirname(input);
  const resolvedOutput = path.resolve(outputDir ?? path.join(baseDir, DEFAULT_OUTPUT_DIR_NAME));

  const sources = stats.isDirectory()
    ? await walk(input, resolvedOutput)
    : [input];

  const claimed = new Map<string, string>();
  const files = sources.map((sourcePath): DiscoveredFile => {
    const destPath = buildOutputPath(sourcePath, baseDir, resolvedOutput, format);
    const owner = claimed.get(destPath);
    if (owner !== undefined) {
      return { sourcePath, destPath, duplicateOf: owner };
    }
    claimed.set(destPath, sourcePath);
    return { sourcePath, destPath };
  });

  return {
    baseDir,
    outputDir: resolvedOutput,
    files
  };
}

/**
 * Mirror `sourcePath` under `outputDir`, swapping in the output extension
 */
export function buildOutputPath(
  sourcePath: string,
  baseDir: string,
  outputDir: string,
  format: OutputFormat
): string {
  const relative = path.relative(baseDir, sourcePath);
  const parsed = path.parse(relative);
  return path.join(outputDir, parsed.dir, `${parsed.name}${OUTPUT_EXTENSIONS[format]}`);
}

async function walk(dir: string, excludeDir: string): Promise<string[]> {
  const found: string[] = [];
  const pending = [dir];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;

    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);

      if (entry.isDirectory()) {
        if (fullPath !== excludeDir) {
          pending.push(fullPath);
        }
      } else if (entry.isFile() && isSupportedAudioFile(fullPath)) {
        found.push(fullPath);
      }
    }
  }

  return found.sort();
}

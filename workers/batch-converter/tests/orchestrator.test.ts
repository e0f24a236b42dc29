import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, createLogger, type JobOutcome } from '@audio-batch/core';
import { CodecRegistry } from '../src/codec/codec-registry';
import { WavCodec } from '../src/codec/wav-codec';
import { Orchestrator } from '../src/orchestrator/orchestrator';
import { frameCount } from '../src/audio/sample-buffer';
import { sine } from './helpers/signals';

const logger = createLogger('orchestrator-test', { level: 'silent' });

describe('Orchestrator', () => {
  let dir: string;
  let input: string;
  const wav = new WavCodec();

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'orchestrator-'));
    input = path.join(dir, 'input');
    await fs.mkdir(path.join(input, 'sub'), { recursive: true });
    await wav.encode(sine({ sampleRate: 48000, seconds: 0.1 }), path.join(input, '01.wav'));
    await fs.writeFile(path.join(input, '02.wav'), 'corrupt');
    await wav.encode(sine({ sampleRate: 22050, seconds: 0.1, channelCount: 2 }), path.join(input, 'sub', '03.wav'));
    await fs.writeFile(path.join(input, 'notes.txt'), 'not audio');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function orchestrator(): Orchestrator {
    return new Orchestrator({ codecs: CodecRegistry.createDefault(logger), logger, maxWorkers: 4 });
  }

  it('should process every file and isolate the failing one', async () => {
    const report = await orchestrator().run(input, undefined, { jobCount: 4, targetSampleRate: 44100, targetBitDepth: 16 });

    expect(report.totalJobs).toBe(3);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);
    expect(report.failures).toEqual([
      { sourcePath: path.join(input, '02.wav'), error: `${path.join(input, '02.wav')}: Not a readable WAV file` }
    ]);

    const nested = await wav.decode(path.join(input, 'processed_audio', 'sub', '03.wav'));
    expect(nested.sampleRate).toBe(44100);
    expect(nested.channelCount).toBe(2);
    expect(frameCount(nested)).toBe(4410);
    await expect(fs.access(path.join(input, 'processed_audio', '02.wav'))).rejects.toThrow();
  });

  it('should write to an explicit output directory', async () => {
    const outputDir = path.join(input, 'elsewhere');

    const report = await orchestrator().run(input, outputDir, {});

    expect(report.succeeded).toBe(2);
    const first = report.outcomes.find(outcome => outcome.sourcePath === path.join(input, '01.wav'));
    expect(first?.destPath).toBe(path.join(outputDir, '01.wav'));
  });

  it('should not pick up its own output on a second run', async () => {
    await orchestrator().run(input, undefined, {});
    const second = await orchestrator().run(input, undefined, {});

    expect(second.totalJobs).toBe(3);
  });

  it('should skip outputs that exist when asked to', async () => {
    await orchestrator().run(input, undefined, {});
    const second = await orchestrator().run(input, undefined, { skipExisting: true });

    expect(second.skipped).toBe(2);
    expect(second.failed).toBe(1);
  });

  it('should accept a single file as input', async () => {
    const report = await orchestrator().run(path.join(input, '01.wav'), undefined, {});

    expect(report.totalJobs).toBe(1);
    expect(report.outcomes[0].destPath).toBe(path.join(input, 'processed_audio', '01.wav'));
  });

  it('should produce the same outcomes with one worker or many', async () => {
    const summarize = (outcomes: JobOutcome[]) =>
      outcomes.map(outcome => `${path.basename(outcome.sourcePath)}:${outcome.status}`).sort();

    const sequential = await orchestrator().run(input, path.join(dir, 'seq'), { jobCount: 1 });
    const parallel = await orchestrator().run(input, path.join(dir, 'par'), { jobCount: 4 });

    expect(summarize(parallel.outcomes)).toEqual(summarize(sequential.outcomes));
    expect(summarize(sequential.outcomes)).toEqual(['01.wav:success', '02.wav:failed', '03.wav:success']);
  });

  it('should fail a source whose output path is already taken, with concurrent workers', async () => {
    const songs = path.join(dir, 'songs');
    await fs.mkdir(songs);
    await wav.encode(sine({ sampleRate: 8000, seconds: 1 }), path.join(songs, 'song.aiff'));
    await wav.encode(sine({ sampleRate: 8000, seconds: 0.5 }), path.join(songs, 'song.wav'));

    const codecs = new CodecRegistry();
    codecs.registerDecoder('.wav', wav);
    codecs.registerDecoder('.aiff', wav);
    codecs.registerEncoder('.wav', wav);

    const report = await new Orchestrator({ codecs, logger, maxWorkers: 2 }).run(songs, undefined, { jobCount: 2 });

    const dest = path.join(songs, 'processed_audio', 'song.wav');
    expect(report.totalJobs).toBe(2);
    expect(report.succeeded).toBe(1);
    expect(report.failures).toEqual([
      { sourcePath: path.join(songs, 'song.wav'), error: `Output path ${dest} is already used by ${path.join(songs, 'song.aiff')}` }
    ]);
    expect(report.outcomes.find(outcome => outcome.status === 'failed')?.errorCode).toBe('ENCODE_ERROR');

    const written = await wav.decode(dest);
    expect(frameCount(written)).toBe(8000);
    expect(await fs.readdir(path.join(songs, 'processed_audio'))).toEqual(['song.wav']);
  });

  it('should return an empty report when there is nothing to process', async () => {
    const empty = path.join(input, 'empty');
    await fs.mkdir(empty);

    const report = await orchestrator().run(empty, undefined, {});

    expect(report.totalJobs).toBe(0);
  });

  it('should reject an invalid config before starting any job', async () => {
    await expect(orchestrator().run(input, undefined, { jobCount: 0 })).rejects.toBeInstanceOf(ConfigError);
    await expect(fs.access(path.join(input, 'processed_audio'))).rejects.toThrow();
  });

  it('should reject a missing input path', async () => {
    await expect(orchestrator().run(path.join(input, 'missing'), undefined, {}))
      .rejects.toThrow(`Cannot read input ${path.join(input, 'missing')}`);
  });
});

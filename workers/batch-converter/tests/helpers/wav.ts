export type WavLayout = {
  formatCode: number;
  channelCount: number;
  sampleRate: number;
  bitsPerSample: number;
  data: Buffer;
  extensible?: boolean;
  chunksBeforeData?: Buffer[];
};

/**
 * Hand-assemble a RIFF/WAVE file for decoder tests
 */
export function buildWav(layout: WavLayout): Buffer {
  const blockAlign = (layout.channelCount * layout.bitsPerSample) / 8;
  const fmt = Buffer.alloc(layout.extensible ? 40 : 16);

  fmt.writeUInt16LE(layout.extensible ? 0xfffe : layout.formatCode, 0);
  fmt.writeUInt16LE(layout.channelCount, 2);
  fmt.writeUInt32LE(layout.sampleRate, 4);
  fmt.writeUInt32LE(layout.sampleRate * blockAlign, 8);
  fmt.writeUInt16LE(blockAlign, 12);
  fmt.writeUInt16LE(layout.bitsPerSample, 14);
  if (layout.extensible) {
    fmt.writeUInt16LE(22, 16);
    fmt.writeUInt16LE(layout.bitsPerSample, 18);
    fmt.writeUInt16LE(layout.formatCode, 24);
  }

  const body = Buffer.concat([
    Buffer.from('WAVE', 'ascii'),
    chunk('fmt ', fmt),
    ...(layout.chunksBeforeData ?? []),
    chunk('data', layout.data)
  ]);

  const header = Buffer.alloc(8);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(body.length, 4);

  return Buffer.concat([header, body]);
}

export function chunk(id: string, body: Buffer): Buffer {
  const header = Buffer.alloc(8);
  header.write(id, 0, 'ascii');
  header.writeUInt32LE(body.length, 4);
  const pad = body.length % 2 === 1 ? Buffer.alloc(1) : Buffer.alloc(0);
  return Buffer.concat([header, body, pad]);
}

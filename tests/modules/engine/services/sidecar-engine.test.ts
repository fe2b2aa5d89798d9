/**
 * Sidecar Engine Tests
 * Runs against an in-process WebSocket server speaking the sidecar protocol
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { SidecarEngine, decodePcm16, parseSidecarMessage } from '@/modules/engine/services/sidecar-engine';
import { EngineError, EngineErrorType, type EngineChunk, type EngineGenerationParams } from '@/modules/engine/types';

const PARAMS: EngineGenerationParams = {
  text: 'Hello',
  voiceSamplePath: '/voices/default.wav',
  exaggeration: 0.5,
  cfgWeight: 0.5,
  temperature: 0.8,
  chunkSize: 25,
  contextWindow: 50,
  fadeDuration: 0.02,
  printMetrics: false,
};

function pcmBase64(samples: number[]): string {
  const bytes = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => bytes.writeInt16LE(sample, i * 2));
  return bytes.toString('base64');
}

function parse(data: RawData): { type: string; params?: EngineGenerationParams } {
  const message: { type: string; params?: EngineGenerationParams } = JSON.parse(data.toString());
  return message;
}

interface SidecarStub {
  url: string;
  received: Array<{ type: string; params?: EngineGenerationParams }>;
  close: () => Promise<void>;
}

/**
 * Scripted sidecar: text 'fail' reports an error after one chunk, 'hang'
 * sends one chunk and waits, anything else sends two chunks and ends.
 */
async function startSidecar(): Promise<SidecarStub> {
  const wss = new WebSocketServer({ port: 0, host: '127.0.0.1' });
  await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
  const address = wss.address();
  if (typeof address === 'string') throw new Error('expected a TCP address');

  const received: SidecarStub['received'] = [];

  wss.on('connection', (socket: WebSocket) => {
    socket.on('message', (data: RawData) => {
      const message = parse(data);
      received.push(message);

      if (message.type === 'describe') {
        socket.send(
          JSON.stringify({
            type: 'capabilities',
            name: 'test-engine',
            sampleRate: 24000,
            samplesPerToken: 960,
            overlapsContext: true,
          })
        );
        return;
      }

      if (message.type !== 'generate') return;
      const chunk = (samples: number[]) =>
        JSON.stringify({ type: 'chunk', audio: pcmBase64(samples), metrics: { generationTime: 0.05 } });

      socket.send(chunk([1, -2, 300]));
      if (message.params?.text === 'hang') return;
      if (message.params?.text === 'fail') {
        socket.send(JSON.stringify({ type: 'error', message: 'out of memory' }));
        return;
      }
      socket.send(chunk([4, 5]));
      socket.send(JSON.stringify({ type: 'end' }));
    });
  });

  return {
    url: `ws://127.0.0.1:${address.port}`,
    received,
    close: () =>
      new Promise<void>((resolve) => {
        for (const client of wss.clients) client.terminate();
        wss.close(() => resolve());
      }),
  };
}

async function collect(iterable: AsyncIterable<EngineChunk>): Promise<EngineChunk[]> {
  const chunks: EngineChunk[] = [];
  for await (const chunk of iterable) {
    chunks.push(chunk);
  }
  return chunks;
}

describe('SidecarEngine', () => {
  let sidecar: SidecarStub;

  beforeEach(async () => {
    sidecar = await startSidecar();
  });

  afterEach(async () => {
    await sidecar.close();
  });

  describe('connect', () => {
    it('should read capabilities from the sidecar', async () => {
      const engine = await SidecarEngine.connect(sidecar.url, { connectTimeoutMs: 2000 });

      expect(engine.name).toBe('test-engine');
      expect(engine.capabilities).toEqual({
        sampleRate: 24000,
        samplesPerToken: 960,
        overlapsContext: true,
      });
      expect(sidecar.received[0]).toEqual({ type: 'describe' });
    });

    it('should fail with a CONNECTION error when nothing is listening', async () => {
      const url = sidecar.url;
      await sidecar.close();

      await expect(SidecarEngine.connect(url, { connectTimeoutMs: 2000 })).rejects.toMatchObject({
        type: EngineErrorType.CONNECTION,
      });
    });
  });

  describe('generateStream', () => {
    it('should forward parameters and decode every chunk', async () => {
      const engine = await SidecarEngine.connect(sidecar.url, { connectTimeoutMs: 2000 });

      const chunks = await collect(engine.generateStream(PARAMS, new AbortController().signal));

      expect(chunks.map((chunk) => Array.from(chunk.audio))).toEqual([[1, -2, 300], [4, 5]]);
      expect(chunks[0].metrics.generationTime).toBe(0.05);
      expect(typeof chunks[0].metrics.readyAt).toBe('number');
      expect(sidecar.received).toContainEqual({ type: 'generate', params: PARAMS });
    });

    it('should raise a REMOTE error after the chunks sent before it', async () => {
      const engine = await SidecarEngine.connect(sidecar.url, { connectTimeoutMs: 2000 });
      const chunks: EngineChunk[] = [];

      let caught: unknown;
      try {
        for await (const chunk of engine.generateStream({ ...PARAMS, text: 'fail' }, new AbortController().signal)) {
          chunks.push(chunk);
        }
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(EngineError);
      expect(caught).toMatchObject({ type: EngineErrorType.REMOTE, message: 'out of memory' });
      expect(chunks).toHaveLength(1);
    });

    it('should send stop to the sidecar when aborted', async () => {
      const engine = await SidecarEngine.connect(sidecar.url, { connectTimeoutMs: 2000 });
      const controller = new AbortController();
      const chunks: EngineChunk[] = [];

      for await (const chunk of engine.generateStream({ ...PARAMS, text: 'hang' }, controller.signal)) {
        chunks.push(chunk);
        controller.abort();
      }

      expect(chunks).toHaveLength(1);
      await expect
        .poll(() => sidecar.received.some((message) => message.type === 'stop'))
        .toBe(true);
    });

    it('should produce nothing for an already aborted signal', async () => {
      const engine = await SidecarEngine.connect(sidecar.url, { connectTimeoutMs: 2000 });
      const controller = new AbortController();
      controller.abort();

      const chunks = await collect(engine.generateStream(PARAMS, controller.signal));

      expect(chunks).toEqual([]);
    });
  });
});

describe('decodePcm16', () => {
  it('should decode little-endian samples', () => {
    expect(Array.from(decodePcm16(pcmBase64([0, -1, 32767, -32768])))).toEqual([0, -1, 32767, -32768]);
  });

  it('should reject an odd byte length', () => {
    expect(() => decodePcm16(Buffer.from([1, 2, 3]).toString('base64'))).toThrow(
      'Engine audio has odd byte length 3'
    );
  });
});

describe('parseSidecarMessage', () => {
  it('should reject invalid JSON as a protocol error', () => {
    expect(() => parseSidecarMessage(Buffer.from('{oops'), false)).toThrow('Engine sent invalid JSON');
  });

  it('should reject binary frames', () => {
    expect(() => parseSidecarMessage(Buffer.from([1]), true)).toThrow(
      'Unexpected binary message from engine'
    );
  });

  it('should parse an end message', () => {
    expect(parseSidecarMessage(Buffer.from('{"type":"end"}'), false)).toEqual({ type: 'end' });
  });
});

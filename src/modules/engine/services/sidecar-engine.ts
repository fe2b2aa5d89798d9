/**
 * Sidecar Engine
 * Client of an out-of-process synthesis engine reached over WebSocket.
 *
 * Sidecar protocol (JSON text messages):
 *   client → sidecar: { type: 'describe' } | { type: 'generate', params } | { type: 'stop' }
 *   sidecar → client: { type: 'capabilities', ... } | { type: 'chunk', audio, metrics }
 *                     | { type: 'end' } | { type: 'error', message }
 * `audio` is base64 of 16-bit little-endian mono PCM.
 *
 * Every generation opens its own socket, so concurrent requests never share
 * generator state.
 */

import { WebSocket, type RawData } from 'ws';
import { z } from 'zod';
import { AsyncQueue, logger } from '@/shared/utils';
import { WebSocketUtils } from '@/modules/socket/utils';
import { engineConfig } from '../config';
import {
  EngineError,
  EngineErrorType,
  type EngineCapabilities,
  type EngineChunk,
  type EngineGenerationParams,
  type SynthesisEngine,
} from '../types';

const CapabilitiesMessageSchema = z.object({
  type: z.literal('capabilities'),
  name: z.string().optional(),
  sampleRate: z.number().int().positive(),
  samplesPerToken: z.number().int().positive(),
  overlapsContext: z.boolean(),
});

const ChunkMessageSchema = z.object({
  type: z.literal('chunk'),
  audio: z.string(),
  metrics: z.object({
    generationTime: z.number().nonnegative(),
    tokenCount: z.number().int().nonnegative().optional(),
    isFinal: z.boolean().optional(),
  }),
});

const SidecarMessageSchema = z.discriminatedUnion('type', [
  CapabilitiesMessageSchema,
  ChunkMessageSchema,
  z.object({ type: z.literal('end') }),
  z.object({ type: z.literal('error'), message: z.string() }),
]);

export type SidecarMessage = z.infer<typeof SidecarMessageSchema>;

export interface SidecarEngineOptions {
  connectTimeoutMs?: number;
  maxPayload?: number;
}

/**
 * Parse one sidecar frame
 */
export function parseSidecarMessage(data: RawData, isBinary: boolean): SidecarMessage {
  if (isBinary) {
    throw new EngineError(EngineErrorType.PROTOCOL, 'Unexpected binary message from engine');
  }

  let json: unknown;
  try {
    json = JSON.parse(WebSocketUtils.rawDataToString(data));
  } catch {
    throw new EngineError(EngineErrorType.PROTOCOL, 'Engine sent invalid JSON');
  }

  const result = SidecarMessageSchema.safeParse(json);
  if (!result.success) {
    throw new EngineError(
      EngineErrorType.PROTOCOL,
      `Engine sent an unrecognised message: ${result.error.issues[0]?.message ?? 'invalid'}`
    );
  }
  return result.data;
}

/**
 * Decode base64 16-bit little-endian PCM into samples
 */
export function decodePcm16(base64: string): Int16Array {
  const bytes = Buffer.from(base64, 'base64');
  if (bytes.length % 2 !== 0) {
    throw new EngineError(
      EngineErrorType.PROTOCOL,
      `Engine audio has odd byte length ${bytes.length}`
    );
  }

  const samples = new Int16Array(bytes.length / 2);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readInt16LE(i * 2);
  }
  return samples;
}

export class SidecarEngine implements SynthesisEngine {
  readonly name: string;
  readonly capabilities: EngineCapabilities;
  private readonly url: string;
  private readonly connectTimeoutMs: number;
  private readonly maxPayload: number;
  private readonly sockets = new Set<WebSocket>();

  constructor(
    url: string,
    capabilities: EngineCapabilities,
    name = 'sidecar',
    options: SidecarEngineOptions = {}
  ) {
    this.url = url;
    this.capabilities = capabilities;
    this.name = name;
    this.connectTimeoutMs = options.connectTimeoutMs ?? engineConfig.connectTimeoutMs;
    this.maxPayload = options.maxPayload ?? engineConfig.maxPayload;
  }

  /**
   * Connect to the sidecar, read its capabilities, and return a ready engine
   */
  static async connect(url: string, options: SidecarEngineOptions = {}): Promise<SidecarEngine> {
    const timeoutMs = options.connectTimeoutMs ?? engineConfig.connectTimeoutMs;
    const ws = new WebSocket(url, {
      handshakeTimeout: timeoutMs,
      maxPayload: options.maxPayload ?? engineConfig.maxPayload,
    });

    logger.info('Connecting to synthesis engine sidecar', { url });

    return new Promise<SidecarEngine>((resolve, reject) => {
      let settled = false;

      const settle = (outcome: { engine: SidecarEngine } | { error: EngineError }): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        closeQuietly(ws);
        if ('engine' in outcome) {
          resolve(outcome.engine);
        } else {
          reject(outcome.error);
        }
      };

      const timer = setTimeout(() => {
        settle({
          error: new EngineError(
            EngineErrorType.TIMEOUT,
            `Engine did not report capabilities within ${timeoutMs}ms`
          ),
        });
      }, timeoutMs);

      ws.on('open', () => {
        ws.send(JSON.stringify({ type: 'describe' }));
      });

      ws.on('message', (data: RawData, isBinary: boolean) => {
        try {
          const message = parseSidecarMessage(data, isBinary);
          if (message.type === 'capabilities') {
            const { name, sampleRate, samplesPerToken, overlapsContext } = message;
            settle({
              engine: new SidecarEngine(
                url,
                { sampleRate, samplesPerToken, overlapsContext },
                name,
                options
              ),
            });
          } else if (message.type === 'error') {
            settle({ error: new EngineError(EngineErrorType.REMOTE, message.message) });
          }
        } catch (error) {
          settle({ error: toEngineError(error) });
        }
      });

      ws.on('error', (error: Error) => {
        settle({
          error: new EngineError(
            EngineErrorType.CONNECTION,
            `Engine connection failed: ${error.message}`,
            { cause: error }
          ),
        });
      });

      ws.on('close', () => {
        settle({
          error: new EngineError(
            EngineErrorType.CONNECTION,
            'Engine closed the connection before reporting capabilities'
          ),
        });
      });
    });
  }

  async *generateStream(
    params: EngineGenerationParams,
    signal: AbortSignal
  ): AsyncGenerator<EngineChunk, void, undefined> {
    if (signal.aborted) {
      return;
    }

    const queue = new AsyncQueue<EngineChunk>();
    const ws = new WebSocket(this.url, {
      handshakeTimeout: this.connectTimeoutMs,
      maxPayload: this.maxPayload,
    });
    this.sockets.add(ws);
    let finished = false;

    ws.on('open', () => {
      ws.send(JSON.stringify({ type: 'generate', params }));
    });

    ws.on('message', (data: RawData, isBinary: boolean) => {
      try {
        const message = parseSidecarMessage(data, isBinary);
        switch (message.type) {
          case 'chunk':
            queue.push({
              audio: decodePcm16(message.audio),
              metrics: { ...message.metrics, readyAt: Date.now() },
            });
            break;
          case 'end':
            finished = true;
            queue.end();
            closeQuietly(ws);
            break;
          case 'error':
            queue.fail(new EngineError(EngineErrorType.REMOTE, message.message));
            break;
          case 'capabilities':
            break;
        }
      } catch (error) {
        queue.fail(toEngineError(error));
      }
    });

    // Stays attached after the generator finishes: ws emits 'error' on late failures
    ws.on('error', (error: Error) => {
      queue.fail(
        new EngineError(EngineErrorType.CONNECTION, `Engine connection error: ${error.message}`, {
          cause: error,
        })
      );
    });

    ws.on('close', (code: number) => {
      this.sockets.delete(ws);
      queue.fail(
        new EngineError(
          EngineErrorType.CONNECTION,
          `Engine connection closed before generation finished (code ${code})`
        )
      );
    });

    const onAbort = (): void => queue.end();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      for await (const chunk of queue) {
        yield chunk;
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      if (!finished) {
        logger.debug('Stopping engine generation', { engine: this.name });
        stopGeneration(ws);
      }
    }
  }

  async dispose(): Promise<void> {
    for (const ws of this.sockets) {
      stopGeneration(ws);
    }
    this.sockets.clear();
  }
}

function toEngineError(error: unknown): EngineError {
  if (error instanceof EngineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new EngineError(EngineErrorType.PROTOCOL, message, { cause: error });
}

function stopGeneration(ws: WebSocket): void {
  if (ws.readyState === WebSocket.OPEN) {
    try {
      ws.send(JSON.stringify({ type: 'stop' }));
    } catch (error) {
      logger.warn('Error sending stop to engine', { error });
    }
  }
  closeQuietly(ws);
}

function closeQuietly(ws: WebSocket): void {
  try {
    if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    } else if (ws.readyState === WebSocket.OPEN) {
      ws.close();
    }
  } catch (error) {
    logger.warn('Error closing engine WebSocket', { error });
  }
}

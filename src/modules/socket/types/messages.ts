/**
 * Wire Message Types
 * Every server → client control message is one of these, sent as JSON text.
 * Audio in raw mode travels as binary frames and has no type here.
 */

import type {
  EffectiveParameters,
  IgnoredParameter,
  OutputFormat,
  SessionMetricsSummary,
  StreamErrorCode,
} from '@/modules/streaming/types';

export interface ConnectedMessage {
  type: 'connected';
  connectionId: string;
  message: string;
}

export interface InfoMessage {
  type: 'info';
  requestId: string;
  message: string;
  textLength: number;
  voice: string;
  outputFormat: OutputFormat;
  sampleRate: number;
  effectiveParameters: EffectiveParameters;
  ignoredParameters: IgnoredParameter[];
}

export interface AudioMessage {
  type: 'audio';
  requestId: string;
  chunk: number;
  encoding: 'base64';
  data: string;
}

export interface MetricsMessage {
  type: 'metrics';
  requestId: string;
  chunk: number;
  firstChunkLatency: number | null;
  elapsedTime: number;
  audioDuration: number;
  rtf: number;
  frameSizeBytes: number;
  sampleRate: number;
}

export interface DoneMessage {
  type: 'done';
  requestId: string;
  totalChunks: number;
  cancelled: boolean;
  summary: SessionMetricsSummary;
}

export interface ErrorMessage {
  type: 'error';
  requestId?: string;
  code: StreamErrorCode;
  message: string;
}

export interface PongMessage {
  type: 'pong';
  timestamp: number;
}

export type ServerMessage =
  | ConnectedMessage
  | InfoMessage
  | AudioMessage
  | MetricsMessage
  | DoneMessage
  | ErrorMessage
  | PongMessage;

export type ServerMessageType = ServerMessage['type'];

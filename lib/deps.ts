/**
 * Dependency interfaces for testing and dependency injection
 */

import { promises as fs } from 'node:fs';
import WebSocket from 'ws';

import { GotHttpClient, type HttpResponse } from './http';

// ============================================================================
// HTTP Client Interface
// ============================================================================

export type { HttpResponse } from './http';

export interface HttpClient {
  get(url: string, headers?: Array<string>): Promise<HttpResponse>;
}

// ============================================================================
// File System Interface
// ============================================================================

export interface FileSystem {
  readFile(path: string, encoding: BufferEncoding): Promise<string>;
}

// ============================================================================
// Push Transport Interface
// ============================================================================

export interface PushRequest {
  url: string;
  headers: Record<string, string>;
  maxPayloadBytes?: number;
}

export interface PushHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onError(error: Error): void;
  onClose(code: number, reason: string): void;
}

export interface PushConnection {
  close(): void;
}

export interface PushTransport {
  /** Open a server-to-client message stream. Must not throw for network failures. */
  connect(request: PushRequest, handlers: PushHandlers): PushConnection;
}

function rawDataToString(data: WebSocket.RawData) {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

export class WsPushTransport implements PushTransport {
  constructor(private readonly handshakeTimeoutMs = 5000) {}

  connect(request: PushRequest, handlers: PushHandlers): PushConnection {
    const socket = new WebSocket(request.url, {
      headers: request.headers,
      handshakeTimeout: this.handshakeTimeoutMs,
      maxPayload: request.maxPayloadBytes,
    });

    socket.on('open', () => { handlers.onOpen(); });
    socket.on('message', (data) => { handlers.onMessage(rawDataToString(data)); });
    socket.on('error', (error) => { handlers.onError(error); });
    socket.on('close', (code, reason) => { handlers.onClose(code, reason.toString('utf-8')); });

    return {
      close: () => {
        if (socket.readyState === WebSocket.CLOSED || socket.readyState === WebSocket.CLOSING) return;
        if (socket.readyState === WebSocket.CONNECTING) {
          // Aborts the handshake; ws reports it through the error/close handlers
          socket.terminate();
          return;
        }
        socket.close(1001, 'going away');
      },
    };
  }
}

// ============================================================================
// Clock Interface
// ============================================================================

export interface Timer {
  cancel(): void;
}

export interface Clock {
  now(): number;
  /** Run once after `delayMs` */
  schedule(callback: () => void, delayMs: number): Timer;
  /** Run every `periodMs` until cancelled */
  every(callback: () => void, periodMs: number): Timer;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  schedule: (callback, delayMs) => {
    const handle = setTimeout(callback, delayMs);
    return { cancel: () => { clearTimeout(handle); } };
  },
  every: (callback, periodMs) => {
    const handle = setInterval(callback, periodMs);
    return { cancel: () => { clearInterval(handle); } };
  },
};

// ============================================================================
// Default Instances
// ============================================================================

export const defaultHttpClient = new GotHttpClient();
export const defaultFileSystem: FileSystem = {
  readFile: (path, encoding) => fs.readFile(path, encoding),
};
export const defaultPushTransport = new WsPushTransport();

/**
 * TCP/SSL Client for Electrum servers
 * Line-delimited JSON-RPC over a plain or TLS socket
 */

import * as net from 'node:net';
import * as tls from 'node:tls';
import type { Buffer } from 'node:buffer';

import type { ElectrumEndpoint } from '../config/wallet-config.ts';
import { NetworkError } from '../errors/index.ts';
import { isRecord } from '../utils/type-guards.ts';
import type { Logger } from '../utils/logger.ts';
import { noopLogger } from '../utils/logger.ts';

/**
 * JSON-RPC transport the chain source talks through
 */
export interface ElectrumRpc {
  connect(endpoint: ElectrumEndpoint): Promise<void>;
  request(method: string, params?: unknown[]): Promise<unknown>;
  disconnect(): void;
  isConnected(): boolean;
}

/**
 * The server answered with a JSON-RPC error; retrying the same call will not help
 */
export class ElectrumServerError extends NetworkError {
  public readonly method: string;
  public readonly rpcCode?: number;

  constructor(method: string, message: string, rpcCode?: number) {
    super(`${method}: ${message}`, { retryable: false });
    this.name = 'ElectrumServerError';
    this.method = method;
    this.rpcCode = rpcCode;
  }
}

export interface TCPClientOptions {
  /** Connect and per-request timeout in ms */
  timeout?: number;
  keepAlive?: boolean;
  rejectUnauthorized?: boolean;
  logger?: Logger;
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  method: string;
  timer: NodeJS.Timeout;
}

export class ElectrumTCPClient implements ElectrumRpc {
  private socket: net.Socket | tls.TLSSocket | null = null;
  private buffer = '';
  private requestId = 1;
  private pendingRequests = new Map<number, PendingRequest>();
  private connected = false;
  private readonly logger: Logger;

  constructor(private readonly options: TCPClientOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Connect to an Electrum server via TCP or SSL
   */
  connect(endpoint: ElectrumEndpoint): Promise<void> {
    if (this.connected) {
      return Promise.resolve();
    }

    const label = `${endpoint.host}:${endpoint.port}`;

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new NetworkError(`Connection timeout to ${label}`));
        this.cleanup();
      }, this.options.timeout ?? 10000);

      const onConnect = () => {
        clearTimeout(timeout);
        this.connected = true;
        resolve();
      };

      const onData = (data: Buffer) => {
        this.buffer += data.toString();
        const lines = this.buffer.split('\n');
        this.buffer = lines.pop() ?? '';

        for (const line of lines) {
          if (line.trim()) {
            this.handleLine(line);
          }
        }
      };

      const onError = (err: Error) => {
        clearTimeout(timeout);
        this.logger.warn(`Socket error for ${label}`, { error: err.message });
        if (!this.connected) {
          reject(new NetworkError(`Could not connect to ${label}: ${err.message}`, { cause: err }));
        }
        this.cleanup();
      };

      const onClose = () => {
        this.cleanup();
      };

      if (endpoint.protocol === 'ssl') {
        this.socket = tls.connect({
          host: endpoint.host,
          port: endpoint.port,
          servername: net.isIP(endpoint.host) ? undefined : endpoint.host,
          // Electrum servers commonly present self-signed certificates
          rejectUnauthorized: this.options.rejectUnauthorized ?? false,
        });
        this.socket.on('secureConnect', onConnect);
      } else {
        this.socket = net.createConnection({ host: endpoint.host, port: endpoint.port });
        this.socket.on('connect', onConnect);
      }

      this.socket.on('data', onData);
      this.socket.on('error', onError);
      this.socket.on('close', onClose);

      if (this.options.keepAlive) {
        this.socket.setKeepAlive(true, 60000);
      }
    });
  }

  /**
   * Send a request and wait for the matching response
   */
  request(method: string, params: unknown[] = []): Promise<unknown> {
    const socket = this.socket;
    if (!this.connected || !socket) {
      return Promise.reject(new NetworkError(`Not connected (${method})`));
    }

    const id = this.requestId++;

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRequests.delete(id);
        reject(new NetworkError(`Request timeout: ${method}`));
      }, this.options.timeout ?? 30000);

      this.pendingRequests.set(id, { resolve, reject, method, timer });
      socket.write(JSON.stringify({ jsonrpc: '2.0', id, method, params }) + '\n');
    });
  }

  private handleLine(line: string): void {
    let response: unknown;
    try {
      response = JSON.parse(line);
    } catch (error) {
      this.logger.error('Failed to parse response', { line, error: String(error) });
      return;
    }
    if (isRecord(response)) {
      this.handleResponse(response);
    }
  }

  /**
   * Handle response from server; notifications without an id are ignored
   */
  private handleResponse(response: Record<string, unknown>): void {
    if (typeof response.id !== 'number') return;
    const handler = this.pendingRequests.get(response.id);
    if (!handler) return;

    clearTimeout(handler.timer);
    this.pendingRequests.delete(response.id);

    const error = response.error;
    if (error !== undefined && error !== null) {
      const message = isRecord(error) && typeof error.message === 'string' ? error.message : JSON.stringify(error);
      const code = isRecord(error) && typeof error.code === 'number' ? error.code : undefined;
      handler.reject(new ElectrumServerError(handler.method, message, code));
    } else {
      handler.resolve(response.result);
    }
  }

  disconnect(): void {
    this.cleanup();
  }

  private cleanup(): void {
    this.connected = false;

    for (const handler of this.pendingRequests.values()) {
      clearTimeout(handler.timer);
      handler.reject(new NetworkError(`Connection closed (${handler.method})`));
    }
    this.pendingRequests.clear();

    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }

    this.buffer = '';
  }

  isConnected(): boolean {
    return this.connected;
  }
}

/**
 * Scripted Electrum transport for chain source tests
 */

import type { ElectrumEndpoint } from '../../src/config/wallet-config.ts';
import { ElectrumServerError, type ElectrumRpc } from '../../src/providers/electrum-client.ts';

type Handler = (params: unknown[]) => unknown;

export class FakeElectrumRpc implements ElectrumRpc {
  readonly calls: Array<{ method: string; params: unknown[] }> = [];
  connects = 0;
  disconnects = 0;

  private connected = false;
  private readonly handlers = new Map<string, Handler>();

  /**
   * Answer `method` with `handler`; a handler that throws rejects the request
   */
  on(method: string, handler: Handler): this {
    this.handlers.set(method, handler);
    return this;
  }

  connect(_endpoint: ElectrumEndpoint): Promise<void> {
    this.connects++;
    this.connected = true;
    return Promise.resolve();
  }

  request(method: string, params: unknown[] = []): Promise<unknown> {
    this.calls.push({ method, params });
    const handler = this.handlers.get(method);
    if (!handler) {
      return Promise.reject(new ElectrumServerError(method, 'unknown method'));
    }
    try {
      return Promise.resolve(handler(params));
    } catch (error) {
      return Promise.reject(error);
    }
  }

  disconnect(): void {
    this.disconnects++;
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  callsTo(method: string): unknown[][] {
    return this.calls.filter((call) => call.method === method).map((call) => call.params);
  }
}

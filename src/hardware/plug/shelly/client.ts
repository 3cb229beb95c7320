/**
 * Shelly RPC Client
 * Type-safe client for switching Shelly Gen2 relays via JSON-RPC
 */

import { PlugApiError, PlugError } from '$types/errors';
import { isRecord, readBoolean, readNumber, readString, readRecord } from '@utils/json';
import type { JSONValue } from '@utils/json';
import type { FetchFn } from '@logging';

import { postJson } from '../http';

import type { ShellyClientConfig, ShellyDeviceInfo, ShellySwitchStatus } from './types';

/**
 * Build the RPC endpoint for a device address
 */
export function toRpcUrl(address: string): string {
  const trimmed = address.trim().replace(/\/+$/, '');
  if (/^https?:\/\//.test(trimmed)) {
    return trimmed + '/rpc';
  }
  return 'http://' + trimmed + '/rpc';
}

export class ShellyRPCClient {
  private readonly baseUrl: string;
  private requestId = 1;
  private readonly timeoutMs: number;
  private readonly authHeader: string | null;
  private readonly fetchFn: FetchFn;

  constructor(config: ShellyClientConfig) {
    this.baseUrl = toRpcUrl(config.address);
    this.timeoutMs = config.timeoutMs;
    this.fetchFn = config.fetchFn ?? fetch;

    if (config.auth) {
      const credentials = Buffer.from(config.auth.user + ':' + config.auth.password).toString('base64');
      this.authHeader = 'Basic ' + credentials;
    } else {
      this.authHeader = null;
    }
  }

  /**
   * Send a raw RPC request and resolve its `result`
   * @throws {PlugApiError} When the device answers with an error object
   */
  async call(method: string, params?: Record<string, JSONValue>): Promise<unknown> {
    const request = {
      id: this.requestId++,
      method: method,
      params: params ?? {}
    };

    const data = await postJson(this.fetchFn, this.baseUrl, request, {
      timeoutMs: this.timeoutMs,
      headers: this.authHeader === null ? {} : { Authorization: this.authHeader }
    });

    if (!isRecord(data)) {
      throw new PlugError('Malformed RPC response from ' + this.baseUrl);
    }

    const error = readRecord(data, 'error');
    if (error !== null) {
      throw new PlugApiError(readNumber(error, 'code') ?? -1, readString(error, 'message') ?? 'unknown error');
    }

    return data.result;
  }

  async getSwitchStatus(id: number): Promise<ShellySwitchStatus> {
    const result = await this.call('Switch.GetStatus', { id: id });
    if (!isRecord(result)) {
      return { id: id, output: null, apower: null };
    }
    return {
      id: id,
      output: readBoolean(result, 'output'),
      apower: readNumber(result, 'apower')
    };
  }

  /**
   * Set a relay and resolve its previous output, when reported
   */
  async setSwitch(id: number, on: boolean): Promise<boolean | null> {
    const result = await this.call('Switch.Set', { id: id, on: on });
    return isRecord(result) ? readBoolean(result, 'was_on') : null;
  }

  async getDeviceInfo(): Promise<ShellyDeviceInfo> {
    const result = await this.call('Shelly.GetDeviceInfo', {});
    if (!isRecord(result)) {
      throw new PlugError('Malformed Shelly.GetDeviceInfo response');
    }
    return {
      id: readString(result, 'id') ?? 'unknown',
      name: readString(result, 'name'),
      model: readString(result, 'model'),
      mac: readString(result, 'mac'),
      gen: readNumber(result, 'gen'),
      ver: readString(result, 'ver')
    };
  }
}

/**
 * TP-Link cloud client
 * Login, device discovery and passthrough requests for Kasa and Tapo plugs
 */

import { PlugApiError, PlugError } from '$types/errors';
import { isRecord, parseJson } from '@utils/json';
import type { JSONValue } from '@utils/json';
import type { FetchFn } from '@logging';

import { postJson } from '../http';

import { TOKEN_EXPIRED_CODE, checkCloudEnvelope, readDeviceList } from './helpers';
import type { TPLinkCloudClientConfig, TPLinkCloudDevice } from './types';

export class TPLinkCloudClient {
  private readonly config: TPLinkCloudClientConfig;
  private readonly fetchFn: FetchFn;
  private token: string | null = null;

  constructor(config: TPLinkCloudClientConfig) {
    this.config = config;
    this.fetchFn = config.fetchFn ?? fetch;
  }

  /**
   * Log in and keep the session token
   * @throws {PlugApiError} On rejected credentials
   */
  async login(): Promise<void> {
    const data = await postJson(this.fetchFn, this.config.cloudUrl, {
      method: 'login',
      params: {
        appType: this.config.appType,
        cloudUserName: this.config.email,
        cloudPassword: this.config.password,
        terminalUUID: this.config.terminalUUID
      }
    }, { timeoutMs: this.config.timeoutMs });

    const result = checkCloudEnvelope(data);
    const token = result.token;
    if (typeof token !== 'string' || token === '') {
      throw new PlugError('Login response carried no token');
    }
    this.token = token;
  }

  async getDeviceList(): Promise<TPLinkCloudDevice[]> {
    const result = await this.authorized(this.config.cloudUrl, { method: 'getDeviceList' });
    return readDeviceList(result);
  }

  /**
   * Relay a request to a device through its app server
   * Resolves the device's own response object
   */
  async passthrough(device: TPLinkCloudDevice, request: Record<string, JSONValue>): Promise<Record<string, unknown>> {
    const result = await this.authorized(device.appServerUrl, {
      method: 'passthrough',
      params: {
        deviceId: device.deviceId,
        requestData: JSON.stringify(request)
      }
    });

    // Kasa answers with a JSON string, Tapo with an object
    let response: unknown = result.responseData;
    if (typeof response === 'string') {
      try {
        response = parseJson(response);
      } catch (_error) {
        throw new PlugError('Unreadable passthrough response from ' + device.alias);
      }
    }
    if (!isRecord(response)) {
      throw new PlugError('Empty passthrough response from ' + device.alias);
    }
    return response;
  }

  /**
   * POST with the session token, logging in first and once more on expiry
   */
  private async authorized(url: string, body: Record<string, JSONValue>): Promise<Record<string, unknown>> {
    if (this.token === null) {
      await this.login();
    }

    try {
      return await this.postWithToken(url, body);
    } catch (err) {
      if (err instanceof PlugApiError && err.code === TOKEN_EXPIRED_CODE) {
        await this.login();
        return this.postWithToken(url, body);
      }
      throw err;
    }
  }

  private async postWithToken(url: string, body: Record<string, JSONValue>): Promise<Record<string, unknown>> {
    const target = url + '?token=' + encodeURIComponent(this.token ?? '');
    const data = await postJson(this.fetchFn, target, body, { timeoutMs: this.config.timeoutMs });
    return checkCloudEnvelope(data);
  }
}

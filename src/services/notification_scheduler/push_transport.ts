/**
 * @file Push gateway client. The gateway owns APNs/FCM delivery; any non-2xx
 * response or network error is a failed delivery.
 */

import axios from 'axios';
import { logger, errorMessage, shortId } from '../../utils/logger';
import type { DevicePlatform } from '../../models/user';
import type { PushPayload, PushResult, PushTransport } from './models';

export interface PushGatewayConfig {
  baseUrl: string;
  timeoutMs: number;
}

export class PushGatewayTransport implements PushTransport {
  constructor(private readonly config: PushGatewayConfig) {}

  async send(deviceToken: string, platform: DevicePlatform, payload: PushPayload): Promise<PushResult> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/push`;
    try {
      await axios.post(
        url,
        { deviceToken, platform, payload },
        { timeout: this.config.timeoutMs, validateStatus: (status) => status >= 200 && status < 300 }
      );
      logger.debug(`[PushTransport] Delivered ${shortId(payload.data.notificationId)} to ${platform}`);
      return { success: true };
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn(`[PushTransport] Delivery of ${shortId(payload.data.notificationId)} failed: ${reason}`);
      return { success: false, reason };
    }
  }
}

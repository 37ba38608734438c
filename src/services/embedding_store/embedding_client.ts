/**
 * @file Client for the external text-embedding service.
 * Any failure yields null: the hint is kept and can be backfilled later.
 */

import axios from 'axios';
import { logger, errorMessage } from '../../utils/logger';
import { withTimeout } from '../../utils/async';
import type { Vector } from './models';

export interface EmbeddingProvider {
  embed(text: string): Promise<Vector | null>;
}

export interface EmbeddingClientConfig {
  baseUrl: string;
  timeoutMs: number;
  dimension: number;
}

interface EmbedResponse {
  embedding?: unknown;
}

function isVector(value: unknown): value is Vector {
  return Array.isArray(value) && value.every((v) => typeof v === 'number' && Number.isFinite(v));
}

export class EmbeddingServiceClient implements EmbeddingProvider {
  constructor(private readonly config: EmbeddingClientConfig) {
    logger.info(`[EmbeddingClient] Using ${config.baseUrl}`);
  }

  async embed(text: string): Promise<Vector | null> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/embed`;
    logger.debug(`[EmbeddingClient] Requesting embedding for text of length ${text.length}`);

    try {
      const response = await withTimeout(
        axios.post<EmbedResponse>(url, { text }, { timeout: this.config.timeoutMs }),
        this.config.timeoutMs,
        'Embedding request'
      );

      const embedding = response.data?.embedding;
      if (!isVector(embedding) || embedding.length !== this.config.dimension) {
        logger.warn(`[EmbeddingClient] Response missing a ${this.config.dimension}-dimension embedding`);
        return null;
      }
      return embedding;
    } catch (error) {
      logger.warn(`[EmbeddingClient] Embedding service unavailable: ${errorMessage(error)}`);
      return null;
    }
  }
}

// ============================================================================
// HTTP Capability Provider
// POSTs the ProviderRequest as JSON and validates the reply shape
// ============================================================================

import { z } from 'zod';
import { ProviderUnavailableError } from '@stem-tutor/shared';
import type { ProviderRequest, ProviderResponse } from '@stem-tutor/shared';
import type { CapabilityProvider, HttpProviderConfig } from './types.js';

const MAX_ERROR_BODY = 200;

const ProviderResponseSchema = z.object(
  {
    text: z.string({ required_error: 'missing text', invalid_type_error: 'text must be a string' }),
    metadata: z
      .record(z.unknown(), { invalid_type_error: 'metadata must be an object' })
      .nullish()
      .transform((value): Record<string, unknown> => value ?? {}),
  },
  { invalid_type_error: 'expected an object' }
);

/**
 * Validate an untrusted provider reply
 * @throws ProviderUnavailableError when the shape is wrong
 */
export function parseProviderResponse(capability: string, data: unknown): ProviderResponse {
  const parsed = ProviderResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProviderUnavailableError(capability, `malformed response: ${parsed.error.issues[0].message}`);
  }
  return parsed.data;
}

export class HttpCapabilityProvider implements CapabilityProvider {
  readonly name: string;
  private config: HttpProviderConfig;

  constructor(config: HttpProviderConfig) {
    this.config = config;
    this.name = `http:${config.capability}`;
  }

  async invoke(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse> {
    const response = await fetch(this.config.url, {
      method: 'POST',
      headers: this.buildHeaders(),
      body: JSON.stringify(request),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new ProviderUnavailableError(
        this.config.capability,
        `HTTP ${response.status}: ${body.slice(0, MAX_ERROR_BODY)}`
      );
    }

    const contentType = response.headers.get('content-type') || '';
    if (!contentType.includes('application/json')) {
      throw new ProviderUnavailableError(
        this.config.capability,
        `unexpected content type '${contentType}'`
      );
    }

    const data: unknown = await response.json();
    return parseProviderResponse(this.config.capability, data);
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...this.config.headers,
    };

    if (this.config.token) {
      headers['Authorization'] = `Bearer ${this.config.token}`;
    }

    return headers;
  }
}

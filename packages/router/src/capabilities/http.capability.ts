import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { CapabilityInvocationError, errorMessage } from '@switchboard/core';
import type { Capability, CapabilityContext, CapabilityResponse } from '../types.js';
import { failureResponse, toCapabilityResponse } from '../types.js';

export interface HttpCapabilityOptions {
  name: string;
  url: string;
  timeoutMs?: number;
  /** Must resolve for every HTTP status; non-2xx replies are inspected, not thrown. */
  client?: AxiosInstance;
}

/**
 * A capability served by another process. The request body is
 * `{ query, context }` and a 2xx reply must be a CapabilityResponse.
 */
export class HttpCapability implements Capability {
  readonly name: string;
  private readonly url: string;
  private readonly client: AxiosInstance;

  constructor(options: HttpCapabilityOptions) {
    this.name = options.name;
    this.url = options.url;
    this.client =
      options.client ??
      axios.create({ timeout: options.timeoutMs ?? 30_000, validateStatus: () => true });
  }

  async process(query: string, context: CapabilityContext): Promise<CapabilityResponse> {
    let status: number;
    let body: unknown;
    try {
      const response = await this.client.post<unknown>(this.url, { query, context });
      status = response.status;
      body = response.data;
    } catch (error) {
      throw new CapabilityInvocationError(
        `${this.name} capability unreachable: ${errorMessage(error)}`,
        this.name,
        error,
      );
    }

    if (status < 200 || status >= 300) {
      return failureResponse(`${this.name} capability returned HTTP ${status}`, { status });
    }

    const parsed = toCapabilityResponse(body);
    if (!parsed) {
      return failureResponse(`${this.name} capability returned a malformed response`, { status });
    }
    if (parsed.data.agent === undefined) {
      parsed.data = { ...parsed.data, agent: this.name };
    }
    return parsed;
  }
}

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { CapabilityInvocationError, errorMessage, isRecord } from '@switchboard/core';
import type { Intent, IntentClassifier } from '../types.js';
import { isIntentCategory } from '../types.js';

export interface HttpIntentClassifierOptions {
  url: string;
  timeoutMs?: number;
  client?: AxiosInstance;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function toIntent(value: unknown): Intent | undefined {
  if (!isRecord(value)) return undefined;
  const { intent, confidence, reasoning } = value;
  if (!isIntentCategory(intent) || typeof confidence !== 'number') return undefined;

  const result: Intent = {
    intent,
    confidence,
    reasoning: typeof reasoning === 'string' ? reasoning : '',
  };
  const productName = optionalString(value.product_name);
  const category = optionalString(value.category);
  const minPrice = optionalNumber(value.min_price);
  const maxPrice = optionalNumber(value.max_price);
  if (productName !== undefined) result.product_name = productName;
  if (category !== undefined) result.category = category;
  if (minPrice !== undefined) result.min_price = minPrice;
  if (maxPrice !== undefined) result.max_price = maxPrice;
  return result;
}

/** Asks a remote model endpoint to classify. Throws on any failure. */
export class HttpIntentClassifier implements IntentClassifier {
  private readonly client: AxiosInstance;

  constructor(private readonly options: HttpIntentClassifierOptions) {
    this.client = options.client ?? axios.create({ timeout: options.timeoutMs ?? 10_000 });
  }

  async classify(query: string): Promise<Intent> {
    let body: unknown;
    try {
      const response = await this.client.post<unknown>(this.options.url, { query });
      body = response.data;
    } catch (error) {
      throw new CapabilityInvocationError(
        `Classifier request failed: ${errorMessage(error)}`,
        'classifier',
        error,
      );
    }

    const intent = toIntent(body);
    if (!intent) {
      throw new CapabilityInvocationError('Classifier returned a malformed intent', 'classifier');
    }
    return intent;
  }
}

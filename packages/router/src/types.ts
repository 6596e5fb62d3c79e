import { isRecord } from '@switchboard/core';

export const INTENT_CATEGORIES = [
  'recommendation',
  'comparison',
  'review',
  'policy',
  'price',
  'general',
] as const;

export type IntentCategory = (typeof INTENT_CATEGORIES)[number];

/** Registry keys. Comparison has no capability of its own. */
export const CAPABILITY_NAMES = ['recommendation', 'review', 'price', 'policy', 'general'] as const;

export type CapabilityName = (typeof CAPABILITY_NAMES)[number];

export interface IntentHints {
  product_name?: string;
  category?: string;
  min_price?: number;
  max_price?: number;
}

export interface Intent extends IntentHints {
  intent: IntentCategory;
  /** In [0, 1]. */
  confidence: number;
  reasoning: string;
}

export interface CapabilityResponse {
  success: boolean;
  data: Record<string, unknown>;
  error?: string;
  metadata: Record<string, unknown>;
}

export interface StructuredHints {
  category?: string;
  min_price?: number;
  max_price?: number;
}

export interface CapabilityContext extends Record<string, unknown> {
  session_id?: string;
  max_results?: number;
  structured_hints?: StructuredHints;
  compare_mode?: boolean;
}

export interface Capability {
  readonly name: string;
  /**
   * Expected failures come back as `success: false`. Throwing is reserved for
   * conditions the capability cannot describe (transport down, bug).
   */
  process(query: string, context: CapabilityContext): Promise<CapabilityResponse>;
}

/** May throw. Wrap in SafeIntentResolver before handing to the orchestrator. */
export interface IntentClassifier {
  classify(query: string): Promise<Intent>;
}

/** Never rejects: classification failures resolve as a zero-confidence `general` intent. */
export interface IntentResolver {
  classify(query: string): Promise<Intent>;
}

const intentCategories: readonly string[] = INTENT_CATEGORIES;
const capabilityNames: readonly string[] = CAPABILITY_NAMES;

export function isIntentCategory(value: unknown): value is IntentCategory {
  return typeof value === 'string' && intentCategories.includes(value);
}

export function isCapabilityName(value: unknown): value is CapabilityName {
  return typeof value === 'string' && capabilityNames.includes(value);
}

export function isCapabilityResponse(value: unknown): value is CapabilityResponse {
  if (!isRecord(value)) return false;
  const { success, data, error, metadata } = value;
  return (
    typeof success === 'boolean' &&
    isRecord(data) &&
    (error === undefined || typeof error === 'string') &&
    isRecord(metadata)
  );
}

/**
 * Accepts a response produced outside this process, where `metadata` may be
 * missing and `error` may be null.
 */
export function toCapabilityResponse(value: unknown): CapabilityResponse | undefined {
  if (!isRecord(value)) return undefined;
  const { success, data, error, metadata } = value;
  if (typeof success !== 'boolean' || !isRecord(data)) return undefined;
  if (error !== undefined && error !== null && typeof error !== 'string') return undefined;
  if (metadata !== undefined && !isRecord(metadata)) return undefined;

  return {
    success,
    data,
    ...(typeof error === 'string' ? { error } : {}),
    metadata: metadata ?? {},
  };
}

export function failureResponse(error: string, metadata: Record<string, unknown> = {}): CapabilityResponse {
  return { success: false, data: {}, error, metadata };
}

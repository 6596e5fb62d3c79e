import type { Intent, IntentCategory, IntentClassifier, IntentHints } from '../types.js';

type KeywordCategory = Exclude<IntentCategory, 'general'>;

// Checked in order; the first category with a match wins.
const KEYWORDS: ReadonlyArray<[KeywordCategory, RegExp]> = [
  ['comparison', /\b(compare|comparison|versus|vs\.?|difference between|better than)\b/i],
  ['price', /\b(best price|cheapest|price (?:of|for)|how much|deal|discount|retailer)s?\b/i],
  ['review', /\b(reviews?|ratings?|opinions?|feedback|what do (?:people|customers) (?:say|think))\b/i],
  ['policy', /\b(return|refund|shipping|warranty|exchange|policy|policies)\b/i],
  ['recommendation', /\b(recommend|suggest|find|looking for|show me|need an?|best)\b/i],
];

const CATEGORIES: ReadonlyArray<[string, RegExp]> = [
  ['laptops', /\b(laptops?|notebooks?)\b/i],
  ['smartphones', /\b(smart)?phones?\b/i],
  ['headphones', /\b(headphones?|earbuds?)\b/i],
  ['tablets', /\btablets?\b/i],
  ['cameras', /\bcameras?\b/i],
  ['monitors', /\bmonitors?\b/i],
];

const AMOUNT = String.raw`\$?\s*(\d+(?:[.,]\d+)*)`;
const BETWEEN = new RegExp(String.raw`\bbetween\s+${AMOUNT}\s+(?:and|-|to)\s+${AMOUNT}`, 'i');
const UNDER = new RegExp(String.raw`\b(?:under|below|less than|cheaper than|up to|max(?:imum)?)\s+${AMOUNT}`, 'i');
const OVER = new RegExp(String.raw`\b(?:over|above|more than|at least|min(?:imum)?)\s+${AMOUNT}`, 'i');

function toAmount(raw: string): number {
  return Number(raw.replace(/,/g, ''));
}

export function extractHints(query: string): IntentHints {
  const hints: IntentHints = {};

  const between = BETWEEN.exec(query);
  if (between) {
    hints.min_price = toAmount(between[1]);
    hints.max_price = toAmount(between[2]);
  } else {
    const under = UNDER.exec(query);
    if (under) hints.max_price = toAmount(under[1]);
    const over = OVER.exec(query);
    if (over) hints.min_price = toAmount(over[1]);
  }

  const category = CATEGORIES.find(([, pattern]) => pattern.test(query));
  if (category) hints.category = category[0];

  return hints;
}

/**
 * Rule-based classifier used when no model endpoint is configured. Confidence
 * reflects only whether a keyword matched.
 */
export class KeywordIntentClassifier implements IntentClassifier {
  async classify(query: string): Promise<Intent> {
    const hints = extractHints(query);
    const match = KEYWORDS.find(([, pattern]) => pattern.test(query));

    if (!match) {
      return {
        intent: 'general',
        confidence: 0.5,
        reasoning: 'No capability keywords found',
        ...hints,
      };
    }

    const [intent, pattern] = match;
    const keyword = pattern.exec(query)?.[0] ?? intent;
    return {
      intent,
      confidence: 0.8,
      reasoning: `Matched "${keyword.toLowerCase()}"`,
      ...hints,
    };
  }
}

/**
 * Record Normalizer
 *
 * Turns one scraped listing into a NormalizedRecord, or rejects it when the
 * product name is missing. Pure: no I/O, no clock, no shared state.
 *
 * @module core/record-normalizer
 */

import type { CategoryVocabulary } from '../config/categories';
import type { NormalizedRecord, Promotion, RawRecord } from '../types/catalog';
import { ValidationError } from './errors';

export type NormalizeOutcome =
  | { status: 'accepted'; record: NormalizedRecord }
  | { status: 'rejected'; error: ValidationError };

// Control characters, zero-width spaces and BOM
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f\u200b-\u200d\u2060\ufeff]/g;

// Space-grouped thousands ("1 299,90") or a digit run with separators ("1.299,90", "45,00")
const AMOUNT_PATTERN = /\d{1,3}(?:[ \u00a0\u202f]\d{3})+(?:[.,]\d+)?(?!\d)|\d+(?:[.,'\u2019]\d+)*/g;

const CURRENCY_AFTER = /^\s*(?:dhs?\b|mad\b|dirhams?\b|eur\b|euros?\b|usd\b|gbp\b|[€$£])/i;
const CURRENCY_BEFORE = /(?:\bdhs?|\bmad|\beur|\busd|\bgbp|[€$£])\s*$/i;
const PERCENT_AFTER = /^\s*%/;

const BRAND_PATTERN = /\s-\s*(\p{Lu}[\p{Lu}\s&'\u2019.]*)$/u;
const SIZE_PATTERNS = [
  /(\d+(?:[.,]\d+)?\s*(?:ml|cl|l|g|kg|cm|pouces|x))(?![\p{L}\p{N}])/iu,
  /(\d+\s*(?:pièces|pieces|pack))(?![\p{L}\p{N}])/iu
];

/**
 * NFC-normalise, replace control characters with spaces, collapse whitespace
 * and trim. Missing values become the empty string.
 */
export const cleanText = (value: string | number | null | undefined): string => {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).normalize('NFC').replace(CONTROL_CHARS, ' ').replace(/\s+/g, ' ').trim();
};

const roundToCents = (value: number): number => Math.round(value * 100) / 100;

/**
 * Parse one numeric token, deciding which separator is the decimal one.
 * With both `.` and `,` present the last one is decimal. With a single
 * separator followed by exactly three digits after a short, non-zero integer
 * part ("1,299", "1.500") it is a thousands separator.
 */
export const parseAmount = (token: string): number | undefined => {
  const compact = token.replace(/[\s'\u2019]/g, '');
  const lastDot = compact.lastIndexOf('.');
  const lastComma = compact.lastIndexOf(',');

  let normalized: string;
  if (lastDot === -1 && lastComma === -1) {
    normalized = compact;
  } else if (lastDot !== -1 && lastComma !== -1) {
    const decimalSeparator = lastDot > lastComma ? '.' : ',';
    const groupSeparator = decimalSeparator === '.' ? ',' : '.';
    normalized = compact.split(groupSeparator).join('').replace(decimalSeparator, '.');
  } else {
    const separator = lastDot !== -1 ? '.' : ',';
    const parts = compact.split(separator);
    if (parts.length > 2) {
      normalized = parts.join('');
    } else {
      const [integerPart, fraction] = parts;
      const isGrouping = fraction.length === 3 && integerPart.length <= 3 && integerPart !== '0';
      normalized = isGrouping ? `${integerPart}${fraction}` : `${integerPart}.${fraction}`;
    }
  }

  const value = Number(normalized);
  return Number.isFinite(value) ? roundToCents(value) : undefined;
};

interface AmountMatch {
  value: number;
  hasCurrency: boolean;
  isPercent: boolean;
}

const scanAmounts = (text: string): AmountMatch[] => {
  const matches: AmountMatch[] = [];
  for (const match of text.matchAll(AMOUNT_PATTERN)) {
    const value = parseAmount(match[0]);
    if (value === undefined) {
      continue;
    }
    const start = match.index ?? 0;
    const before = text.slice(Math.max(0, start - 6), start);
    const after = text.slice(start + match[0].length);
    matches.push({
      value,
      hasCurrency: CURRENCY_AFTER.test(after) || CURRENCY_BEFORE.test(before),
      isPercent: PERCENT_AFTER.test(after)
    });
  }
  return matches;
};

/**
 * Monetary amounts in a price text, in order of appearance. Amounts tagged
 * with a currency win over bare numbers; percentages are never amounts.
 */
export const extractAmounts = (text: string | null | undefined): number[] => {
  const matches = scanAmounts(cleanText(text)).filter((match) => !match.isPercent);
  const tagged = matches.filter((match) => match.hasCurrency);
  return (tagged.length > 0 ? tagged : matches).map((match) => match.value);
};

/**
 * Price of a listing: the first amount in the price text, or undefined when
 * there is none.
 */
export const parsePrice = (text: string | null | undefined): number | undefined => extractAmounts(text)[0];

export const detectPromotion = (text: string | null | undefined): Promotion | undefined => {
  const cleaned = cleanText(text);
  if (!cleaned) {
    return undefined;
  }

  const amounts = extractAmounts(cleaned);
  const lower = cleaned.toLowerCase();
  const percentMatch = cleaned.match(/(\d+(?:[.,]\d+)?)\s*%/);
  const percent = percentMatch ? parseAmount(percentMatch[1]) : undefined;

  let reducedPrice: number | undefined;
  let discountPercent: number | undefined;
  if (amounts.length >= 2) {
    const [main] = amounts;
    reducedPrice = amounts[amounts.length - 1];
    if (main > 0) {
      const discount = ((main - reducedPrice) / main) * 100;
      discountPercent = roundToCents(Math.max(0, Math.min(100, discount)));
    }
  } else if (percent !== undefined) {
    discountPercent = Math.max(0, Math.min(100, percent));
  }

  let type: Promotion['type'] | undefined;
  if (lower.includes('remise') || reducedPrice !== undefined) {
    type = 'discount';
  } else if (percent !== undefined) {
    type = 'percentage';
  } else if (lower.includes('achetés') || lower.includes('achetes')) {
    type = 'multi_buy';
  } else if (lower.includes('offre')) {
    type = 'special_offer';
  }

  if (!type) {
    return undefined;
  }

  return {
    type,
    ...(reducedPrice !== undefined ? { reducedPrice } : {}),
    ...(discountPercent !== undefined ? { discountPercent } : {})
  };
};

/**
 * Trailing " - BRAND NAME" segment written in capitals.
 */
export const extractBrand = (name: string): string | undefined => {
  const match = name.match(BRAND_PATTERN);
  const brand = match?.[1].trim();
  return brand && brand.length >= 2 ? brand : undefined;
};

export const extractSize = (name: string): string | undefined => {
  for (const pattern of SIZE_PATTERNS) {
    const match = name.match(pattern);
    if (match) {
      return match[1].replace(/\s+/g, ' ').trim();
    }
  }
  return undefined;
};

export const parseTimestamp = (value: string | number | null | undefined): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  const cleaned = cleanText(value);
  if (!cleaned) {
    return undefined;
  }
  const parsed = /^\d+$/.test(cleaned) ? Number(cleaned) : Date.parse(cleaned);
  return Number.isFinite(parsed) ? parsed : undefined;
};

export const normalizeImageUrl = (value: string | null | undefined): string | undefined => {
  const cleaned = cleanText(value);
  if (!cleaned) {
    return undefined;
  }
  try {
    const url = new URL(cleaned);
    return url.protocol === 'http:' || url.protocol === 'https:' ? cleaned : undefined;
  } catch {
    return undefined;
  }
};

/**
 * Normalize one raw record. Only the name is mandatory; every other field
 * degrades to undefined, "" or "unknown".
 */
export const normalizeRecord = (raw: RawRecord, vocabulary: CategoryVocabulary): NormalizeOutcome => {
  const sourceUrl = cleanText(raw.sourceUrl);
  const name = cleanText(raw.rawName);

  if (!name) {
    return {
      status: 'rejected',
      error: new ValidationError('Product name is empty', 'name', sourceUrl)
    };
  }
  if (!/[\p{L}\p{N}]/u.test(name)) {
    return {
      status: 'rejected',
      error: new ValidationError(`Product name "${name}" has no letters or digits`, 'name', sourceUrl)
    };
  }

  const record: NormalizedRecord = {
    name,
    category: vocabulary.resolve(raw.rawCategoryText),
    description: cleanText(raw.rawDescription),
    sourceUrl
  };

  const price = parsePrice(raw.rawPriceText);
  if (price !== undefined) record.price = price;
  const imageUrl = normalizeImageUrl(raw.imageUrl);
  if (imageUrl !== undefined) record.imageUrl = imageUrl;
  const scrapedAt = parseTimestamp(raw.scrapeTimestamp);
  if (scrapedAt !== undefined) record.scrapedAt = scrapedAt;
  const brand = extractBrand(name);
  if (brand !== undefined) record.brand = brand;
  const size = extractSize(name);
  if (size !== undefined) record.size = size;
  const promotion = detectPromotion(raw.rawPriceText);
  if (promotion !== undefined) record.promotion = promotion;

  return { status: 'accepted', record };
};

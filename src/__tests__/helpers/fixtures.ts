import { CategoryVocabulary } from '../../config/categories';
import type { EmbeddingProvider } from '../../ai/embedding-provider';
import type { RedisKeyValueClient } from '../../services/redis-client';
import type { NormalizedRecord, RawRecord } from '../../types/catalog';

export const testVocabulary = (): CategoryVocabulary =>
  new CategoryVocabulary([
    { name: 'Alimentaire', aliases: ['Épicerie', 'Epicerie'] },
    { name: 'Boissons', aliases: ['Boisson'] },
    { name: 'Électronique', aliases: ['TV & Audio'] },
    { name: 'Hygiène & Beauté', aliases: ['Hygiène'] },
    { name: 'Bébé', aliases: ['Bebe'] }
  ]);

export const JAN_1 = Date.UTC(2024, 0, 1);
export const FEB_1 = Date.UTC(2024, 1, 1);
export const MAR_1 = Date.UTC(2024, 2, 1);

export const normalized = (overrides: Partial<NormalizedRecord> = {}): NormalizedRecord => ({
  name: "Huile d'olive 1L",
  category: 'Alimentaire',
  description: '',
  sourceUrl: 'https://shop.test/a',
  ...overrides
});

/**
 * Five products: one olive oil and four unrelated ones.
 */
export const catalogRecords = (): RawRecord[] => [
  {
    sourceUrl: 'https://shop.test/olive',
    rawName: "Huile d'olive vierge extra 1L - OLIVIA",
    rawPriceText: '47,00 DH',
    rawCategoryText: 'Épicerie',
    rawDescription: "Huile d'olive pressée à froid",
    scrapeTimestamp: FEB_1
  },
  {
    sourceUrl: 'https://shop.test/tv',
    rawName: 'Téléviseur LED 55 pouces',
    rawPriceText: '3 999,00 DH',
    rawCategoryText: 'TV & Audio',
    rawDescription: 'Écran Full HD avec télécommande'
  },
  {
    sourceUrl: 'https://shop.test/soap',
    rawName: 'Savon liquide mains 500 ml',
    rawPriceText: '12,50 DH',
    rawCategoryText: 'Hygiène',
    rawDescription: 'Savon doux au parfum de lavande'
  },
  {
    sourceUrl: 'https://shop.test/diapers',
    rawName: 'Couches bébé taille 3 12 pièces',
    rawPriceText: '89,90 DH',
    rawCategoryText: 'Bébé',
    rawDescription: 'Couches ultra absorbantes'
  },
  {
    sourceUrl: 'https://shop.test/juice',
    rawName: "Jus d'orange 1L",
    rawPriceText: '15,00 DH',
    rawCategoryText: 'Boissons',
    rawDescription: 'Jus de fruits pressés'
  }
];

type Embedder = (text: string, signal?: AbortSignal) => Promise<number[]>;

/**
 * Provider whose behaviour each test scripts through `embedder`.
 */
export class ScriptedProvider implements EmbeddingProvider {
  modelVersion = 'scripted-v1';
  readonly calls: string[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(
    public readonly dimensions = 3,
    public embedder: Embedder = async (text) => [text.length, 1, 0]
  ) {}

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    this.calls.push(...texts);
    if (signal) {
      this.signals.push(signal);
    }
    return Promise.all(texts.map((text) => this.embedder(text, signal)));
  }
}

/**
 * In-process stand-in for the few Redis commands the stores use. KEYS
 * supports `*` wildcards only.
 */
export class FakeRedis implements RedisKeyValueClient {
  readonly data = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<string> {
    this.data.set(key, value);
    return 'OK';
  }

  async keys(pattern: string): Promise<string[]> {
    const regex = new RegExp(`^${pattern.split('*').map(escapeRegex).join('.*')}$`);
    return [...this.data.keys()].filter((key) => regex.test(key));
  }

  async mGet(keys: string[]): Promise<Array<string | null>> {
    return keys.map((key) => this.data.get(key) ?? null);
  }
}

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

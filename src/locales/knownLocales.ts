/**
 * Known Google Play listing locales, loaded from data/locales.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ListingValidatorError, describeError } from '../errors/index.js';

const LocaleDataSchema = z.object({
  locales: z.array(z.string().min(1)),
});

const DEFAULT_LOCALES_URL = new URL('../../data/locales.json', import.meta.url);

let cached: ReadonlySet<string> | null = null;

export function loadKnownLocales(source: URL | string = DEFAULT_LOCALES_URL): ReadonlySet<string> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, 'utf-8'));
  } catch (err) {
    throw new ListingValidatorError(
      { code: 'LOCALE_DATA_UNREADABLE', message: `failed to load locale list: ${describeError(err)}` },
      { cause: err },
    );
  }

  const result = LocaleDataSchema.safeParse(raw);
  if (!result.success) {
    const msg = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ListingValidatorError({ code: 'LOCALE_DATA_UNREADABLE', message: `invalid locale list: ${msg}` });
  }
  return new Set(result.data.locales);
}

export function getKnownLocales(): ReadonlySet<string> {
  if (!cached) {
    cached = loadKnownLocales();
  }
  return cached;
}

export function isKnownLocale(locale: string, known: ReadonlySet<string> = getKnownLocales()): boolean {
  return known.has(locale);
}

/**
 * Static rule tables for Google Play listing assets.
 *
 * Adding a descriptive text file or an image kind is a table entry here;
 * the walker and rule functions read nothing else.
 */

import type { ImageFormat, ImageKey } from '../types/index.js';

// ─── Text ────────────────────────────────────────────────────────────

export const DESCRIPTIVE_TEXT_LIMITS: Readonly<Record<string, number>> = Object.freeze({
  'title.txt': 50,
  'short_description.txt': 80,
  'full_description.txt': 4000,
});

export const CHANGELOG_MAX_LENGTH = 500;

// ─── Images ──────────────────────────────────────────────────────────

export interface ImageRule {
  width: number;
  height: number;
  format?: ImageFormat;
  opaque?: boolean;
}

export const IMAGE_RULES: Readonly<Record<ImageKey, ImageRule>> = Object.freeze({
  icon: { width: 512, height: 512, format: 'png' },
  featureGraphic: { width: 1024, height: 500, opaque: true },
  promoGraphic: { width: 180, height: 120, opaque: true },
  tvBanner: { width: 1280, height: 720, opaque: true },
});

export function isImageKey(key: string): key is ImageKey {
  return Object.hasOwn(IMAGE_RULES, key);
}

// ─── Screenshots ─────────────────────────────────────────────────────

export const SCREENSHOT_GROUP_SUFFIX = 'Screenshots';

export const SCREENSHOT_RULE = Object.freeze({
  minEdge: 320,
  maxEdge: 3840,
  maxAspectRatio: 2.0,
});

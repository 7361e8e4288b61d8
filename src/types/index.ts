/**
 * Listing Validator - Data Models and Types
 */

// ─── Enums ───────────────────────────────────────────────────────────────────

export const ImageFormat = {
  png: 'png',
  jpeg: 'jpeg',
} as const;
export type ImageFormat = (typeof ImageFormat)[keyof typeof ImageFormat];

export const ImageKey = {
  icon: 'icon',
  featureGraphic: 'featureGraphic',
  promoGraphic: 'promoGraphic',
  tvBanner: 'tvBanner',
} as const;
export type ImageKey = (typeof ImageKey)[keyof typeof ImageKey];

export const RuleId = {
  text_length: 'text_length',
  image_dimensions: 'image_dimensions',
  image_format: 'image_format',
  image_opacity: 'image_opacity',
  screenshot_width: 'screenshot_width',
  screenshot_height: 'screenshot_height',
  screenshot_aspect_ratio: 'screenshot_aspect_ratio',
  known_locale: 'known_locale',
} as const;
export type RuleId = (typeof RuleId)[keyof typeof RuleId];

export const ReportFormat = {
  text: 'text',
  json: 'json',
} as const;
export type ReportFormat = (typeof ReportFormat)[keyof typeof ReportFormat];

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const ListingValidatorErrorCode = {
  METADATA_ROOT_UNREADABLE: 'METADATA_ROOT_UNREADABLE',
  INVALID_CONFIG: 'INVALID_CONFIG',
  LOCALE_DATA_UNREADABLE: 'LOCALE_DATA_UNREADABLE',
} as const;
export type ListingValidatorErrorCode =
  (typeof ListingValidatorErrorCode)[keyof typeof ListingValidatorErrorCode];

export interface ListingValidatorErrorInfo {
  code: ListingValidatorErrorCode;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

// ─── Decoded Assets ──────────────────────────────────────────────────────────

export interface DecodedImage {
  width: number;
  height: number;
  format: ImageFormat;
  /** Only known for PNG; formats without an alpha channel leave it undefined. */
  opaque?: boolean;
}

/**
 * Outcome of a rule. A rule that cannot evaluate its input (opacity of a JPEG)
 * reports `io_failure` instead of a violation.
 */
export type RuleFinding =
  | { kind: 'violation'; rule: RuleId; message: string }
  | { kind: 'io_failure'; message: string };

// ─── Report Entries ──────────────────────────────────────────────────────────

export interface AssetRef {
  locale: string;
  /** Full path, joined from the configured fastlane path */
  assetPath: string;
  /** Path below the locale directory, `.` for the locale itself */
  relativePath: string;
}

export interface Violation extends AssetRef {
  kind: 'violation';
  rule: RuleId;
  message: string;
}

export interface IoFailure extends AssetRef {
  kind: 'io_failure';
  message: string;
}

export type ReportEntry = Violation | IoFailure;

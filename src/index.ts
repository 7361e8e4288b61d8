/**
 * Listing Validator - public API
 */

export * from './types/index.js';
export { ListingValidatorError, formatFatalError } from './errors/index.js';
export { ERROR_CATALOG, getCatalogEntry } from './errors/catalog.js';
export { ValidatorConfigSchema, loadConfig, resolveMetadataRoot } from './config/schema.js';
export type { ValidatorConfig, ValidatorConfigInput } from './config/schema.js';
export { countCharacters, readCharacterCount } from './readers/textReader.js';
export { decodeImage, decodeImageBuffer } from './readers/imageReader.js';
export {
  CHANGELOG_MAX_LENGTH,
  DESCRIPTIVE_TEXT_LIMITS,
  IMAGE_RULES,
  SCREENSHOT_RULE,
} from './rules/tables.js';
export type { ImageRule } from './rules/tables.js';
export { checkTextLength } from './rules/textRules.js';
export { checkImage, checkScreenshot } from './rules/imageRules.js';
export { RunReport } from './report/RunReport.js';
export { renderReport, formatEntry, formatAnnotation, escapeAnnotationData } from './report/Reporter.js';
export type { ReporterOptions, ReportSink } from './report/Reporter.js';
export { walkMetadata } from './walker/LocaleWalker.js';
export type { WalkOptions } from './walker/LocaleWalker.js';
export { loadKnownLocales, isKnownLocale } from './locales/knownLocales.js';
export { runValidation } from './validate.js';
export type { ValidationResult, ValidationStreams } from './validate.js';

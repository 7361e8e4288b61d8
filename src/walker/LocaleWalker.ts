/**
 * LocaleWalker — enumerates locale directories under the metadata root and
 * runs every asset-category check for each one.
 *
 * One synchronous pass. Locales and files are visited in directory-listing
 * order; every non-fatal problem becomes a report entry and the walk moves on.
 */

import { readdirSync, type Dirent } from 'node:fs';
import { extname, join, posix } from 'node:path';
import { ListingValidatorError, describeError } from '../errors/index.js';
import { createLogger } from '../logger/index.js';
import { decodeImage } from '../readers/imageReader.js';
import { readCharacterCount } from '../readers/textReader.js';
import { checkImage, checkScreenshot } from '../rules/imageRules.js';
import {
  CHANGELOG_MAX_LENGTH,
  DESCRIPTIVE_TEXT_LIMITS,
  SCREENSHOT_GROUP_SUFFIX,
  isImageKey,
} from '../rules/tables.js';
import { checkTextLength } from '../rules/textRules.js';
import { RunReport } from '../report/RunReport.js';
import { RuleId, type AssetRef, type DecodedImage } from '../types/index.js';

const log = createLogger('walker');

export interface WalkOptions {
  /** When set, locale directory names must be members of this set. */
  knownLocales?: ReadonlySet<string>;
}

/** A locale directory being checked. */
export interface LocaleContext {
  locale: string;
  localePath: string;
}

// ─── Entry point ─────────────────────────────────────────────────────

/**
 * Walks `metadataRoot` and returns the finished report. Throws
 * `ListingValidatorError` (METADATA_ROOT_UNREADABLE) before checking
 * anything if the root itself cannot be listed.
 */
export function walkMetadata(metadataRoot: string, options: WalkOptions = {}): RunReport {
  let dirents: Dirent[];
  try {
    dirents = readdirSync(metadataRoot, { withFileTypes: true });
  } catch (err) {
    throw new ListingValidatorError(
      {
        code: 'METADATA_ROOT_UNREADABLE',
        message: `failed to read directory "${metadataRoot}": ${describeError(err)}`,
        details: { metadataRoot },
      },
      { cause: err },
    );
  }

  const report = new RunReport();
  for (const dirent of dirents) {
    // only directories are locales
    if (!dirent.isDirectory()) continue;
    checkLocale({ locale: dirent.name, localePath: join(metadataRoot, dirent.name) }, report, options);
  }

  log.debug({ metadataRoot, entries: report.count }, 'walk finished');
  return report;
}

export function checkLocale(ctx: LocaleContext, report: RunReport, options: WalkOptions = {}): void {
  log.debug({ locale: ctx.locale }, 'checking locale');

  if (options.knownLocales && !options.knownLocales.has(ctx.locale)) {
    report.add({
      kind: 'violation',
      rule: RuleId.known_locale,
      locale: ctx.locale,
      assetPath: ctx.localePath,
      relativePath: '.',
      message: `unknown locale "${ctx.locale}"`,
    });
  }

  checkDescriptiveTexts(ctx, report);
  checkImages(ctx, report);
  checkChangelogs(ctx, report);
}

// ─── Descriptive texts ───────────────────────────────────────────────

/** title.txt, short_description.txt and full_description.txt are all required. */
export function checkDescriptiveTexts(ctx: LocaleContext, report: RunReport): void {
  for (const [fileName, maxLength] of Object.entries(DESCRIPTIVE_TEXT_LIMITS)) {
    checkTextFile(assetRef(ctx, fileName), maxLength, report);
  }
}

// ─── Changelogs ──────────────────────────────────────────────────────

export function checkChangelogs(ctx: LocaleContext, report: RunReport): void {
  const dirents = readOptionalDir(assetRef(ctx, 'changelogs'), report);
  for (const dirent of dirents) {
    if (dirent.isDirectory()) continue;
    checkTextFile(assetRef(ctx, 'changelogs', dirent.name), CHANGELOG_MAX_LENGTH, report);
  }
}

function checkTextFile(asset: AssetRef, maxLength: number, report: RunReport): void {
  let count: number;
  try {
    count = readCharacterCount(asset.assetPath);
  } catch (err) {
    report.addIoFailure(asset, `failed to read file "${asset.assetPath}": ${describeError(err)}`);
    return;
  }
  report.addFindings(asset, checkTextLength(count, maxLength));
}

// ─── Images ──────────────────────────────────────────────────────────

export function checkImages(ctx: LocaleContext, report: RunReport): void {
  const dirents = readOptionalDir(assetRef(ctx, 'images'), report);
  for (const dirent of dirents) {
    if (dirent.isDirectory()) {
      if (dirent.name.endsWith(SCREENSHOT_GROUP_SUFFIX)) {
        checkScreenshots(ctx, dirent.name, report);
      }
      continue;
    }

    const key = dirent.name.slice(0, dirent.name.length - extname(dirent.name).length);
    // unknown image kinds are left alone
    if (!isImageKey(key)) continue;

    const asset = assetRef(ctx, 'images', dirent.name);
    const image = readImage(asset, report);
    if (image) {
      report.addFindings(asset, checkImage(key, image, asset.assetPath));
    }
  }
}

// ─── Screenshots ─────────────────────────────────────────────────────

export function checkScreenshots(ctx: LocaleContext, groupName: string, report: RunReport): void {
  const group = assetRef(ctx, 'images', groupName);
  let dirents: Dirent[];
  try {
    dirents = readdirSync(group.assetPath, { withFileTypes: true });
  } catch (err) {
    report.addIoFailure(group, `failed to read directory "${group.assetPath}": ${describeError(err)}`);
    return;
  }

  for (const dirent of dirents) {
    if (dirent.isDirectory()) continue;
    const asset = assetRef(ctx, 'images', groupName, dirent.name);
    const image = readImage(asset, report);
    if (image) {
      report.addFindings(asset, checkScreenshot(image));
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────

function assetRef(ctx: LocaleContext, ...segments: string[]): AssetRef {
  return {
    locale: ctx.locale,
    assetPath: join(ctx.localePath, ...segments),
    relativePath: posix.join(...segments),
  };
}

function readImage(asset: AssetRef, report: RunReport): DecodedImage | undefined {
  try {
    return decodeImage(asset.assetPath);
  } catch (err) {
    report.addIoFailure(asset, `failed to read image "${asset.assetPath}": ${describeError(err)}`);
    return undefined;
  }
}

/** Lists an optional directory. A missing directory yields no entries and no report entry. */
function readOptionalDir(dir: AssetRef, report: RunReport): Dirent[] {
  try {
    return readdirSync(dir.assetPath, { withFileTypes: true });
  } catch (err) {
    if (!isNotFound(err)) {
      report.addIoFailure(dir, `failed to read directory "${dir.assetPath}": ${describeError(err)}`);
    }
    return [];
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Image constraint rules
 *
 * Pure functions over decoded image headers. Each sub-check of a rule is
 * independent and reports on its own.
 */

import { RuleId, type DecodedImage, type ImageKey, type RuleFinding } from '../types/index.js';
import { IMAGE_RULES, SCREENSHOT_RULE } from './tables.js';

const FORMAT_LABEL: Record<DecodedImage['format'], string> = {
  png: 'PNG',
  jpeg: 'JPEG',
};

export function checkImage(key: ImageKey, image: DecodedImage, assetPath: string): RuleFinding[] {
  const rule = IMAGE_RULES[key];
  const findings: RuleFinding[] = [];

  if (image.width !== rule.width || image.height !== rule.height) {
    findings.push({
      kind: 'violation',
      rule: RuleId.image_dimensions,
      message: `${key} must be ${rule.width}x${rule.height}: got=${image.width}x${image.height}`,
    });
  }

  if (rule.format && image.format !== rule.format) {
    findings.push({
      kind: 'violation',
      rule: RuleId.image_format,
      message: `${key} must be a ${FORMAT_LABEL[rule.format]}`,
    });
  }

  if (rule.opaque) {
    if (image.opaque === undefined) {
      findings.push({
        kind: 'io_failure',
        message:
          `unable to determine opacity of "${assetPath}": ` +
          `${FORMAT_LABEL[image.format]} has no alpha channel`,
      });
    } else if (!image.opaque) {
      findings.push({
        kind: 'violation',
        rule: RuleId.image_opacity,
        message: `${key} must be opaque`,
      });
    }
  }

  return findings;
}

export function checkScreenshot(image: DecodedImage): RuleFinding[] {
  const { minEdge, maxEdge, maxAspectRatio } = SCREENSHOT_RULE;
  const findings: RuleFinding[] = [];

  if (image.width < minEdge || image.width > maxEdge) {
    findings.push({
      kind: 'violation',
      rule: RuleId.screenshot_width,
      message: `width should be in range ${minEdge}px-${maxEdge}px: got=${image.width}px`,
    });
  }

  if (image.height < minEdge || image.height > maxEdge) {
    findings.push({
      kind: 'violation',
      rule: RuleId.screenshot_height,
      message: `height should be in range ${minEdge}px-${maxEdge}px: got=${image.height}px`,
    });
  }

  const ratio = Math.max(image.width, image.height) / Math.min(image.width, image.height);
  if (ratio > maxAspectRatio) {
    findings.push({
      kind: 'violation',
      rule: RuleId.screenshot_aspect_ratio,
      message: `'max:min' edge ratio should be at most ${maxAspectRatio.toFixed(1)}: got=${ratio.toFixed(2)}`,
    });
  }

  return findings;
}

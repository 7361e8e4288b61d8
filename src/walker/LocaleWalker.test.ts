import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { writeFileSync } from 'node:fs';
import { checkChangelogs, checkImages, checkLocale, walkMetadata } from './LocaleWalker.js';
import { RunReport } from '../report/RunReport.js';
import { ListingValidatorError } from '../errors/index.js';
import { MetadataTree, makeJpeg, makePng } from '../test-utils/fixtures.js';

let tree: MetadataTree;

beforeEach(() => {
  tree = new MetadataTree();
});

afterEach(() => {
  tree.cleanup();
});

function contextFor(locale: string) {
  return { locale, localePath: tree.localePath(locale) };
}

describe('walkMetadata', () => {
  it('should pass a locale with valid texts and no optional directories', () => {
    tree.writeValidTexts('en-US');
    const report = walkMetadata(tree.metadataRoot);
    expect(report.entries).toEqual([]);
    expect(report.passed).toBe(true);
  });

  it('should throw a fatal error when the metadata root is missing', () => {
    const missing = join(tree.fastlanePath, 'nope', 'metadata', 'android');
    expect(() => walkMetadata(missing)).toThrow(ListingValidatorError);
    try {
      walkMetadata(missing);
    } catch (err) {
      expect(err).toBeInstanceOf(ListingValidatorError);
      expect(err instanceof ListingValidatorError && err.code).toBe('METADATA_ROOT_UNREADABLE');
    }
  });

  it('should ignore plain files at the metadata root', () => {
    tree.writeValidTexts('en-US');
    writeFileSync(join(tree.metadataRoot, 'README.md'), '# listings');
    expect(walkMetadata(tree.metadataRoot).count).toBe(0);
  });

  it('should check every locale', () => {
    tree.writeValidTexts('en-US');
    tree.writeValidTexts('fr-FR');
    tree.write('en-US', 'title.txt', 'x'.repeat(51));
    tree.write('fr-FR', 'title.txt', 'é'.repeat(60));

    const report = walkMetadata(tree.metadataRoot);
    const lines = report.entries.map((e) => `${e.locale}/${e.relativePath}: ${e.message}`).sort();
    expect(lines).toEqual([
      'en-US/title.txt: content length exceeded: expected=50, got=51',
      'fr-FR/title.txt: content length exceeded: expected=50, got=60',
    ]);
  });

  it('should report unknown locales when a known set is given', () => {
    tree.writeValidTexts('xx-XX');
    const report = walkMetadata(tree.metadataRoot, { knownLocales: new Set(['en-US']) });
    expect(report.entries).toEqual([
      {
        kind: 'violation',
        rule: 'known_locale',
        locale: 'xx-XX',
        assetPath: tree.localePath('xx-XX'),
        relativePath: '.',
        message: 'unknown locale "xx-XX"',
      },
    ]);
  });

  it('should not check locale names without a known set', () => {
    tree.writeValidTexts('xx-XX');
    expect(walkMetadata(tree.metadataRoot).count).toBe(0);
  });
});

describe('descriptive texts', () => {
  it('should report a missing title as a read failure', () => {
    tree.write('en-US', 'short_description.txt', 'Short');
    tree.write('en-US', 'full_description.txt', 'Full');

    const report = new RunReport();
    checkLocale(contextFor('en-US'), report);

    const titlePath = join(tree.localePath('en-US'), 'title.txt');
    expect(report.entries).toHaveLength(1);
    const [entry] = report.entries;
    expect(entry?.kind).toBe('io_failure');
    expect(entry?.relativePath).toBe('title.txt');
    expect(entry?.assetPath).toBe(titlePath);
    expect(entry?.message.startsWith(`failed to read file "${titlePath}": ENOENT`)).toBe(true);
  });

  it('should report all three missing files in table order', () => {
    tree.mkdir('en-US');
    const report = new RunReport();
    checkLocale(contextFor('en-US'), report);
    expect(report.entries.map((e) => e.relativePath)).toEqual([
      'title.txt',
      'short_description.txt',
      'full_description.txt',
    ]);
  });

  it('should count after trimming surrounding whitespace', () => {
    tree.writeValidTexts('en-US');
    tree.write('en-US', 'short_description.txt', `\n  ${'a'.repeat(80)}  \n`);
    expect(walkMetadata(tree.metadataRoot).count).toBe(0);
  });

  it('should report an oversized full description with both counts', () => {
    tree.writeValidTexts('en-US');
    tree.write('en-US', 'full_description.txt', 'b'.repeat(4001));
    expect(walkMetadata(tree.metadataRoot).entries.map((e) => e.message)).toEqual([
      'content length exceeded: expected=4000, got=4001',
    ]);
  });
});

describe('checkChangelogs', () => {
  it('should do nothing when the changelogs directory is absent', () => {
    tree.mkdir('en-US');
    const report = new RunReport();
    checkChangelogs(contextFor('en-US'), report);
    expect(report.count).toBe(0);
  });

  it('should report changelogs over 500 characters', () => {
    tree.write('en-US', 'changelogs/41.txt', 'c'.repeat(500));
    tree.write('en-US', 'changelogs/42.txt', 'c'.repeat(501));

    const report = new RunReport();
    checkChangelogs(contextFor('en-US'), report);
    expect(report.entries).toEqual([
      {
        kind: 'violation',
        rule: 'text_length',
        locale: 'en-US',
        assetPath: join(tree.localePath('en-US'), 'changelogs', '42.txt'),
        relativePath: 'changelogs/42.txt',
        message: 'content length exceeded: expected=500, got=501',
      },
    ]);
  });

  it('should skip subdirectories inside changelogs', () => {
    tree.write('en-US', 'changelogs/archive/1.txt', 'c'.repeat(900));
    const report = new RunReport();
    checkChangelogs(contextFor('en-US'), report);
    expect(report.count).toBe(0);
  });

  it('should report a changelogs path that is not a directory', () => {
    tree.write('en-US', 'changelogs', 'not a directory');
    const report = new RunReport();
    checkChangelogs(contextFor('en-US'), report);

    const changelogsPath = join(tree.localePath('en-US'), 'changelogs');
    expect(report.entries).toHaveLength(1);
    expect(report.entries[0]?.kind).toBe('io_failure');
    expect(report.entries[0]?.message.startsWith(`failed to read directory "${changelogsPath}": ENOTDIR`)).toBe(true);
  });
});

describe('checkImages', () => {
  function imagesReport(): RunReport {
    const report = new RunReport();
    checkImages(contextFor('en-US'), report);
    return report;
  }

  it('should do nothing when the images directory is absent', () => {
    tree.mkdir('en-US');
    expect(imagesReport().count).toBe(0);
  });

  it('should report an images path that is not a directory', () => {
    tree.write('en-US', 'images', 'not a directory');
    const imagesPath = join(tree.localePath('en-US'), 'images');
    const entries = imagesReport().entries;
    expect(entries).toHaveLength(1);
    expect(entries[0]?.kind).toBe('io_failure');
    expect(entries[0]?.relativePath).toBe('images');
    expect(entries[0]?.message.startsWith(`failed to read directory "${imagesPath}": ENOTDIR`)).toBe(true);
  });

  it('should accept a 512x512 PNG icon', () => {
    tree.write('en-US', 'images/icon.png', makePng(512, 512));
    expect(imagesReport().count).toBe(0);
  });

  it('should report a 511x511 icon once', () => {
    tree.write('en-US', 'images/icon.png', makePng(511, 511));
    expect(imagesReport().entries).toEqual([
      {
        kind: 'violation',
        rule: 'image_dimensions',
        locale: 'en-US',
        assetPath: join(tree.localePath('en-US'), 'images', 'icon.png'),
        relativePath: 'images/icon.png',
        message: 'icon must be 512x512: got=511x511',
      },
    ]);
  });

  it('should report a JPEG icon as a format violation only', () => {
    tree.write('en-US', 'images/icon.jpg', makeJpeg(512, 512));
    expect(imagesReport().entries.map((e) => e.message)).toEqual(['icon must be a PNG']);
  });

  it('should report a transparent feature graphic as an opacity violation only', () => {
    tree.write('en-US', 'images/featureGraphic.png', makePng(1024, 500, { transparentPixel: true }));
    expect(imagesReport().entries.map((e) => e.message)).toEqual(['featureGraphic must be opaque']);
  });

  it('should report undeterminable opacity of a JPEG feature graphic as an I/O failure', () => {
    const file = tree.write('en-US', 'images/featureGraphic.jpg', makeJpeg(1024, 500));
    expect(imagesReport().entries.map((e) => [e.kind, e.message])).toEqual([
      ['io_failure', `unable to determine opacity of "${file}": JPEG has no alpha channel`],
    ]);
  });

  it('should ignore unknown image names and non-screenshot directories', () => {
    tree.write('en-US', 'images/banner.png', makePng(3, 3));
    tree.write('en-US', 'images/notes.txt', 'not an image');
    tree.write('en-US', 'images/drafts/icon.png', makePng(3, 3));
    expect(imagesReport().count).toBe(0);
  });

  it('should report an undecodable known image without further checks', () => {
    const file = tree.write('en-US', 'images/tvBanner.png', 'garbage bytes');
    const entries = imagesReport().entries;
    expect(entries).toHaveLength(1);
    expect(entries[0]?.kind).toBe('io_failure');
    expect(entries[0]?.message.startsWith(`failed to read image "${file}": `)).toBe(true);
  });

  it('should check every screenshot group by suffix', () => {
    tree.write('en-US', 'images/phoneScreenshots/1.png', makePng(300, 400));
    tree.write('en-US', 'images/tenInchScreenshots/1.jpg', makeJpeg(646, 320));
    tree.write('en-US', 'images/tenInchScreenshots/2.png', makePng(640, 320));
    tree.write('en-US', 'images/tenInchScreenshots/nested/3.png', makePng(10, 10));

    const lines = imagesReport().entries.map((e) => `${e.relativePath}: ${e.message}`).sort();
    expect(lines).toEqual([
      "images/phoneScreenshots/1.png: width should be in range 320px-3840px: got=300px",
      "images/tenInchScreenshots/1.jpg: 'max:min' edge ratio should be at most 2.0: got=2.02",
    ]);
  });

  it('should report undecodable screenshots', () => {
    const file = tree.write('en-US', 'images/phoneScreenshots/broken.png', 'nope');
    const entries = imagesReport().entries;
    expect(entries).toHaveLength(1);
    expect(entries[0]?.relativePath).toBe('images/phoneScreenshots/broken.png');
    expect(entries[0]?.message.startsWith(`failed to read image "${file}": `)).toBe(true);
  });
});

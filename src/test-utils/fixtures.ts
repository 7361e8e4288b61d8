/**
 * Builders for on-disk fastlane metadata trees used by the tests.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { deflateSync } from 'node:zlib';
import { encode as encodeJpeg } from 'jpeg-js';
import { PNG } from 'pngjs';

export interface PngOptions {
  /** Makes the top-left pixel fully transparent. */
  transparentPixel?: boolean;
}

export function makePng(width: number, height: number, opts: PngOptions = {}): Buffer {
  const png = new PNG({ width, height });
  png.data.fill(0xff);
  if (opts.transparentPixel) {
    png.data[3] = 0;
  }
  return PNG.sync.write(png);
}

/**
 * Hand-assembled 16-bit RGBA PNG (colour type 6, depth 16). Every sample is
 * 0xffff except the alphas listed in `alphaOverrides` by pixel index.
 */
export function makePng16(width: number, height: number, alphaOverrides: Record<number, number> = {}): Buffer {
  const rowBytes = 1 + width * 8;
  const raw = Buffer.alloc(rowBytes * height, 0xff);
  for (let y = 0; y < height; y++) {
    raw[y * rowBytes] = 0; // filter: none
  }
  for (const [pixel, alpha] of Object.entries(alphaOverrides)) {
    const index = Number(pixel);
    const y = Math.floor(index / width);
    const x = index % width;
    raw.writeUInt16BE(alpha, y * rowBytes + 1 + x * 8 + 6);
  }

  const ihdr = Buffer.alloc(13);
  ihdr.writeUInt32BE(width, 0);
  ihdr.writeUInt32BE(height, 4);
  ihdr[8] = 16;
  ihdr[9] = 6;

  return Buffer.concat([
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    pngChunk('IHDR', ihdr),
    pngChunk('IDAT', deflateSync(raw)),
    pngChunk('IEND', Buffer.alloc(0)),
  ]);
}

function pngChunk(type: string, data: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length, 0);
  const body = Buffer.concat([Buffer.from(type, 'ascii'), data]);
  const crc = Buffer.alloc(4);
  crc.writeUInt32BE(crc32(body), 0);
  return Buffer.concat([length, body, crc]);
}

function crc32(bytes: Buffer): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc ^= byte;
    for (let k = 0; k < 8; k++) {
      crc = crc & 1 ? (crc >>> 1) ^ 0xedb88320 : crc >>> 1;
    }
  }
  return (crc ^ 0xffffffff) >>> 0;
}

export function makeJpeg(width: number, height: number): Buffer {
  const data = Buffer.alloc(width * height * 4, 0xff);
  return encodeJpeg({ width, height, data }, 90).data;
}

export function makeGif(width: number, height: number): Buffer {
  const header = Buffer.alloc(13);
  header.write('GIF89a', 0, 'ascii');
  header.writeUInt16LE(width, 6);
  header.writeUInt16LE(height, 8);
  return header;
}

export class MetadataTree {
  readonly fastlanePath: string;
  readonly metadataRoot: string;

  constructor(prefix = 'listing-validator-test-') {
    this.fastlanePath = mkdtempSync(join(tmpdir(), prefix));
    this.metadataRoot = join(this.fastlanePath, 'metadata', 'android');
    mkdirSync(this.metadataRoot, { recursive: true });
  }

  localePath(locale: string): string {
    return join(this.metadataRoot, locale);
  }

  write(locale: string, relativePath: string, content: string | Buffer): string {
    const filePath = join(this.localePath(locale), relativePath);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, content);
    return filePath;
  }

  mkdir(locale: string, relativePath = ''): string {
    const dir = join(this.localePath(locale), relativePath);
    mkdirSync(dir, { recursive: true });
    return dir;
  }

  /** Writes title, short and full description within their limits. */
  writeValidTexts(locale: string): void {
    this.write(locale, 'title.txt', 'Trail Notes\n');
    this.write(locale, 'short_description.txt', 'Offline hiking journal');
    this.write(locale, 'full_description.txt', 'Keep notes about every trail you walk.');
  }

  cleanup(): void {
    rmSync(this.fastlanePath, { recursive: true, force: true });
  }
}

export class MemorySink {
  private readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }

  get lines(): string[] {
    return this.text.split('\n').filter((line) => line.length > 0);
  }
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ContentHash } from './content-hash.js';
import { HashFormatError, LibraryIOError } from './library-errors.js';

const HELLO_WORLD_SHA256 = 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9';
const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('ContentHash', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'content-hash-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('fromFile', () => {
    it('should hash file content with SHA-256', () => {
      const file = join(tempDir, 'hello.txt');
      writeFileSync(file, 'hello world');

      expect(ContentHash.fromFile(file).encode()).toBe(HELLO_WORLD_SHA256);
    });

    it('should hash an empty file', () => {
      const file = join(tempDir, 'empty.jpg');
      writeFileSync(file, '');

      expect(ContentHash.fromFile(file).encode()).toBe(EMPTY_SHA256);
    });

    it('should produce equal hashes for identical content under different names', () => {
      const a = join(tempDir, 'IMG_0001.jpg');
      const b = join(tempDir, 'copy of IMG_0001.jpg');
      writeFileSync(a, 'same bytes');
      writeFileSync(b, 'same bytes');

      expect(ContentHash.fromFile(a).equals(ContentHash.fromFile(b))).toBe(true);
    });

    it('should produce different hashes for different content', () => {
      const a = join(tempDir, 'a.jpg');
      const b = join(tempDir, 'b.jpg');
      writeFileSync(a, 'first');
      writeFileSync(b, 'second');

      expect(ContentHash.fromFile(a).equals(ContentHash.fromFile(b))).toBe(false);
    });

    it('should hash files larger than one read chunk', () => {
      const file = join(tempDir, 'large.bin');
      const content = Buffer.alloc(200 * 1024, 7);
      writeFileSync(file, content);

      const expected = createHash('sha256').update(content).digest('hex');
      expect(ContentHash.fromFile(file).encode()).toBe(expected);
    });

    it('should raise an IO error for a missing file', () => {
      const missing = join(tempDir, 'missing.jpg');

      expect(() => ContentHash.fromFile(missing)).toThrow(LibraryIOError);
    });
  });

  describe('encode/decode', () => {
    it('should round-trip through hex', () => {
      const hash = ContentHash.decode(HELLO_WORLD_SHA256);
      expect(ContentHash.decode(hash.encode()).equals(hash)).toBe(true);
      expect(hash.encode()).toBe(HELLO_WORLD_SHA256);
    });

    it('should normalize upper-case hex to lower case', () => {
      const hash = ContentHash.decode(HELLO_WORLD_SHA256.toUpperCase());
      expect(hash.encode()).toBe(HELLO_WORLD_SHA256);
    });

    it('should reject text of the wrong length', () => {
      expect(() => ContentHash.decode(HELLO_WORLD_SHA256.slice(1))).toThrow(HashFormatError);
      expect(() => ContentHash.decode(`${HELLO_WORLD_SHA256}0`)).toThrow(HashFormatError);
      expect(() => ContentHash.decode('')).toThrow(HashFormatError);
    });

    it('should reject non-hex characters', () => {
      const invalid = `${HELLO_WORLD_SHA256.slice(0, 63)}g`;
      expect(() => ContentHash.decode(invalid)).toThrow(HashFormatError);
    });

    it('should reject digests that are not 32 bytes', () => {
      expect(() => ContentHash.fromBytes(new Uint8Array(16))).toThrow(HashFormatError);
      expect(ContentHash.fromBytes(new Uint8Array(32)).encode()).toBe('0'.repeat(64));
    });
  });

  describe('comparison', () => {
    it('should order hashes byte-wise', () => {
      const low = ContentHash.decode('00'.repeat(32));
      const high = ContentHash.decode('ff'.repeat(32));

      expect(low.compare(high)).toBe(-1);
      expect(high.compare(low)).toBe(1);
      expect(low.compare(ContentHash.decode('00'.repeat(32)))).toBe(0);
    });

    it('should describe itself with the hex digest', () => {
      const hash = ContentHash.decode(EMPTY_SHA256);
      expect(String(hash)).toBe(`ContentHash(${EMPTY_SHA256})`);
      expect(JSON.stringify({ hash })).toBe(`{"hash":"${EMPTY_SHA256}"}`);
    });
  });
});

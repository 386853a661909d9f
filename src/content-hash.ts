/**
 * SHA-256 content identity for library files
 */

import { createHash } from 'crypto';
import { closeSync, openSync, readSync } from 'fs';
import { HashFormatError, LibraryIOError } from './library-errors.js';

const READ_CHUNK_BYTES = 64 * 1024;
const HEX_PATTERN = /^[0-9a-fA-F]+$/;

export class ContentHash {
  static readonly BYTE_LENGTH = 32;
  static readonly HEX_LENGTH = ContentHash.BYTE_LENGTH * 2;

  private constructor(private readonly bytes: Buffer) {}

  /**
   * Hash the full content of a file, reading it in fixed-size chunks
   */
  static fromFile(filePath: string): ContentHash {
    let fd: number;
    try {
      fd = openSync(filePath, 'r');
    } catch (error) {
      throw new LibraryIOError('Failed to open file for hashing', filePath, error);
    }

    const hasher = createHash('sha256');
    const buffer = Buffer.alloc(READ_CHUNK_BYTES);
    try {
      let bytesRead = readSync(fd, buffer, 0, buffer.length, null);
      while (bytesRead > 0) {
        hasher.update(buffer.subarray(0, bytesRead));
        bytesRead = readSync(fd, buffer, 0, buffer.length, null);
      }
    } catch (error) {
      throw new LibraryIOError('Failed to read file for hashing', filePath, error);
    } finally {
      closeSync(fd);
    }

    return new ContentHash(hasher.digest());
  }

  static fromBytes(bytes: Uint8Array): ContentHash {
    if (bytes.length !== ContentHash.BYTE_LENGTH) {
      throw new HashFormatError(
        `Expected a ${ContentHash.BYTE_LENGTH}-byte digest, got ${bytes.length} bytes`
      );
    }
    return new ContentHash(Buffer.from(bytes));
  }

  static decode(text: string): ContentHash {
    if (text.length !== ContentHash.HEX_LENGTH) {
      throw new HashFormatError(
        `Expected ${ContentHash.HEX_LENGTH} hex characters, got ${text.length}`
      );
    }
    if (!HEX_PATTERN.test(text)) {
      throw new HashFormatError(`Hash contains non-hex characters: ${text}`);
    }
    return new ContentHash(Buffer.from(text, 'hex'));
  }

  encode(): string {
    return this.bytes.toString('hex');
  }

  equals(other: ContentHash): boolean {
    return this.bytes.equals(other.bytes);
  }

  compare(other: ContentHash): number {
    return Buffer.compare(this.bytes, other.bytes);
  }

  toString(): string {
    return `ContentHash(${this.encode()})`;
  }

  toJSON(): string {
    return this.encode();
  }
}

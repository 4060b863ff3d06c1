import type { Extraction, MetadataExtractor } from '../../src/extractor';
import type { LogBuffer } from '../../src/logger';
import type { MetadataEmbedder, Resolution } from '../../src/writer';

/**
 * Returns canned field values per file instead of running exiftool.
 */
export class FakeExtractor implements MetadataExtractor {
  readonly name = 'fake';
  readonly calls: Array<{ file: string; fields: string[] }> = [];

  constructor(private readonly byFile: Record<string, Record<string, string>> = {}) {}

  async extract(file: string, fields: string[]): Promise<Extraction> {
    this.calls.push({ file, fields });

    const known = this.byFile[file] ?? {};
    const values: Record<string, string> = {};

    for (const field of fields) {
      if (known[field] !== undefined) {
        values[field] = known[field];
      }
    }

    return { source: 'exif', values };
  }
}

export class RecordingEmbedder implements MetadataEmbedder {
  readonly name = 'recording';
  readonly written = new Map<string, Resolution>();

  async embed(file: string, resolution: Resolution, log: LogBuffer): Promise<boolean> {
    this.written.set(file, resolution);
    log.debug('recorded', file);
    return true;
  }
}

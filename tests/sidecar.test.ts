import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { RecoverableParseError } from '../src/errors';
import {
  parseSidecar,
  readSidecar,
  readSidecarTitle,
  sidecarGeotagCandidates,
  sidecarTimestampCandidates,
} from '../src/sidecar';
import { TempDirectory } from './helpers/temp-directory';

describe('parseSidecar', () => {
  it('types known fields and keeps the rest', () => {
    const record = parseSidecar('a.json', {
      title: 'IMG_0001.jpg',
      photoTakenTime: { timestamp: '1673789101', formatted: 'Jan 15, 2023, 1:25:01 PM UTC' },
      geoData: { latitude: 45.5, longitude: -122.6, altitude: 10 },
      url: 'https://example.invalid/photo',
    });

    expect(record.title).toBe('IMG_0001.jpg');
    expect(record.photoTakenTime).toEqual({ timestamp: '1673789101', formatted: 'Jan 15, 2023, 1:25:01 PM UTC' });
    expect(record.geoData).toEqual({ latitude: 45.5, longitude: -122.6, altitude: 10 });
    expect(record.creationTime).toBeNull();
    expect(record.extra).toEqual({ url: 'https://example.invalid/photo' });
  });

  it('coerces numeric epoch timestamps to strings', () => {
    expect(parseSidecar('a.json', { photoTakenTime: { timestamp: 1673789101 } }).photoTakenTime).toEqual({
      timestamp: '1673789101',
    });
  });

  it('treats a malformed known field as absent', () => {
    const record = parseSidecar('a.json', { geoData: { latitude: 'north' }, title: 7 });

    expect(record.geoData).toBeNull();
    expect(record.title).toBeNull();
  });

  it('rejects values that are not objects', () => {
    expect(() => parseSidecar('a.json', [1, 2])).toThrow(RecoverableParseError);
  });
});

describe('sidecar candidates', () => {
  it('prefers photoTakenTime over creationTime and the epoch over the formatted text', () => {
    const record = parseSidecar('a.json', {
      photoTakenTime: { timestamp: '1673789101', formatted: 'Jan 15, 2023, 1:25:01 PM UTC' },
      creationTime: { formatted: 'Feb 1, 2023, 9:00:00 AM UTC' },
    });

    const candidates = sidecarTimestampCandidates(record);

    expect(candidates.map((candidate) => [candidate.field, candidate.parsedValue])).toEqual([
      ['photoTakenTime.timestamp', '2023:01:15 13:25:01+00:00'],
      ['creationTime.formatted', '2023:02:01 09:00:00+00:00'],
    ]);
    expect(candidates.every((candidate) => candidate.source === 'json')).toBe(true);
  });

  it('never treats 0,0 as a location', () => {
    const record = parseSidecar('a.json', {
      geoData: { latitude: 0, longitude: 0 },
      geoDataExif: { latitude: 45.5, longitude: -122.6 },
    });

    expect(sidecarGeotagCandidates(record)).toEqual([
      { source: 'json', field: 'geoData', rawValue: '0, 0', parsedValue: null, isValid: false, reason: 'no location' },
      {
        source: 'json',
        field: 'geoDataExif',
        rawValue: '45.5, -122.6',
        parsedValue: { latitude: 45.5, latitudeRef: 'N', longitude: 122.6, longitudeRef: 'W' },
        isValid: true,
      },
    ]);
  });
});

describe('reading sidecars from disk', () => {
  let tempDir: TempDirectory;

  beforeEach(async () => {
    tempDir = new TempDirectory();
    await tempDir.create();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it('reads the title', async () => {
    const path = await tempDir.writeJson('IMG_0001.jpg.json', { title: 'IMG_0001.jpg' });

    expect(await readSidecarTitle(path)).toBe('IMG_0001.jpg');
  });

  it('reports invalid JSON as a recoverable error', async () => {
    const path = await tempDir.writeFile('broken.json', '{"title": ');

    await expect(readSidecar(path)).rejects.toThrow(RecoverableParseError);
    expect(await readSidecarTitle(path)).toBeNull();
  });
});

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { timestampCandidate } from '../src/candidates';
import { ConflictingGeotagError } from '../src/errors';
import { LogBuffer } from '../src/logger';
import { embeddedGeotagCandidates, resolveMediaFile, selectGeotag, selectTimestamp } from '../src/resolver';
import { ExifToolEmbedder } from '../src/writer';
import { FakeExtractor, RecordingEmbedder } from './helpers/fakes';
import { TempDirectory } from './helpers/temp-directory';

describe('selectTimestamp', () => {
  it('picks the earliest valid candidate and explains the rest', () => {
    const selection = selectTimestamp([
      timestampCandidate('filename', 'yyyyMMdd_HHmmss', '20230115_134501'),
      timestampCandidate('json', 'photoTakenTime.timestamp', '1673789101'),
      timestampCandidate('exif', 'DateTimeOriginal', '0000:00:00 00:00:00'),
    ]);

    expect(selection.value).toBe('2023:01:15 13:25:01+00:00');
    expect(selection.provenance.map((entry) => [entry.source, entry.accepted, entry.reason])).toEqual([
      ['filename', false, 'later than json photoTakenTime.timestamp'],
      ['json', true, undefined],
      ['exif', false, 'placeholder date'],
    ]);
  });

  it('prefers an earlier name over a later embedded date', () => {
    const selection = selectTimestamp([
      timestampCandidate('filename', 'yyyy-MM-dd', '2023-01-01'),
      timestampCandidate('exif', 'DateTimeOriginal', '2023:06:01 00:00:00'),
    ]);

    expect(selection.value).toBe('2023:01:01 00:00:00+00:00');
  });

  it('never lets a placeholder date with an offset win', () => {
    const selection = selectTimestamp([
      timestampCandidate('json', 'photoTakenTime.formatted', '0001:01:01 00:00:00-05:00'),
      timestampCandidate('exif', 'DateTimeOriginal', '2023:06:01 00:00:00'),
    ]);

    expect(selection.value).toBe('2023:06:01 00:00:00+00:00');
    expect(selection.provenance[0].reason).toBe('placeholder date');
  });

  it('compares offsets, not wall-clock text', () => {
    const selection = selectTimestamp([
      timestampCandidate('exif', 'DateTimeOriginal', '2023:01:15 12:30:00+00:00'),
      timestampCandidate('exif', 'CreateDate', '2023:01:15 13:00:00+02:00'),
    ]);

    expect(selection.value).toBe('2023:01:15 13:00:00+02:00');
  });

  it('returns null when nothing is valid', () => {
    const selection = selectTimestamp([timestampCandidate('exif', 'DateTimeOriginal', '0001:01:01 00:00:00+00:00')]);

    expect(selection.value).toBeNull();
    expect(selection.provenance).toHaveLength(1);
    expect(selection.provenance[0].accepted).toBe(false);
  });
});

describe('selectGeotag', () => {
  it('takes the first valid candidate in priority order', () => {
    const north = { latitude: 1, latitudeRef: 'N' as const, longitude: 2, longitudeRef: 'E' as const };
    const south = { latitude: 3, latitudeRef: 'S' as const, longitude: 4, longitudeRef: 'W' as const };

    const selection = selectGeotag([
      { source: 'exif', field: 'GPSPosition', rawValue: 'x', parsedValue: null, isValid: false, reason: 'no location' },
      { source: 'json', field: 'geoData', rawValue: '1, 2', parsedValue: north, isValid: true },
      { source: 'filename', field: 'ISO 6709', rawValue: '-3-4', parsedValue: south, isValid: true },
    ]);

    expect(selection.value).toEqual(north);
    expect(selection.provenance[2]).toEqual({
      kind: 'geotag',
      source: 'filename',
      field: 'ISO 6709',
      rawValue: '-3-4',
      parsedValue: '3,S,4,W',
      accepted: false,
      reason: 'lower priority than json geoData',
    });
  });
});

describe('embeddedGeotagCandidates', () => {
  it('accepts a position that agrees with the discrete fields', () => {
    const candidates = embeddedGeotagCandidates('a.jpg', 'exif', {
      GPSPosition: '40.1 -3.5',
      GPSLatitude: '40.1',
      GPSLatitudeRef: 'N',
      GPSLongitude: '3.5',
      GPSLongitudeRef: 'W',
    });

    expect(candidates.map((candidate) => candidate.field)).toEqual(['GPSPosition', 'GPSLatitude/GPSLongitude']);
    expect(candidates[1].rawValue).toBe('40.1,N,3.5,W');
  });

  it('throws when the position and discrete fields disagree', () => {
    expect(() =>
      embeddedGeotagCandidates('a.jpg', 'exif', {
        GPSPosition: '10 20',
        GPSLatitude: '11',
        GPSLatitudeRef: 'N',
        GPSLongitude: '20',
        GPSLongitudeRef: 'E',
      })
    ).toThrow(ConflictingGeotagError);
  });
});

describe('resolveMediaFile', () => {
  let tempDir: TempDirectory;
  let log: LogBuffer;

  beforeEach(async () => {
    tempDir = new TempDirectory();
    await tempDir.create();
    log = new LogBuffer('test');
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it('combines name, sidecar and embedded metadata', async () => {
    const media = await tempDir.writeFile('IMG_20230115_134501.jpg', 'jpeg');
    const sidecar = await tempDir.writeJson('IMG_20230115_134501.jpg.json', {
      photoTakenTime: { timestamp: '1673789101' },
      geoData: { latitude: 0, longitude: 0 },
      geoDataExif: { latitude: 45.5, longitude: -122.6 },
    });
    const extractor = new FakeExtractor({
      [media]: {
        DateTimeOriginal: '2023:01:15 13:45:01',
        GPSLatitude: '40.1',
        GPSLatitudeRef: 'N',
        GPSLongitude: '3.5',
        GPSLongitudeRef: 'W',
      },
    });
    const embedder = new RecordingEmbedder();

    const resolution = await resolveMediaFile(media, sidecar, { extractor, embedder }, log);

    expect(resolution.timestamp).toBe('2023:01:15 13:25:01+00:00');
    expect(resolution.geotag).toEqual({ latitude: 40.1, latitudeRef: 'N', longitude: 3.5, longitudeRef: 'W' });
    expect(resolution.sidecarRead).toBe(true);
    expect(resolution.embedded).toBe(true);
    expect(resolution.geotagConflict).toBe(false);
    expect(resolution.provenance.map((entry) => `${entry.kind}:${entry.source}:${entry.field}:${entry.accepted}`)).toEqual([
      'timestamp:filename:yyyyMMdd_HHmmss:false',
      'timestamp:json:photoTakenTime.timestamp:true',
      'timestamp:exif:DateTimeOriginal:false',
      'geotag:exif:GPSLatitude/GPSLongitude:true',
      'geotag:json:geoData:false',
      'geotag:json:geoDataExif:false',
    ]);
    expect(embedder.written.get(media)).toEqual({ timestamp: resolution.timestamp, geotag: resolution.geotag });
    expect(extractor.calls[0].fields).toEqual([
      'DateTimeOriginal',
      'CreateDate',
      'ModifyDate',
      'GPSPosition',
      'GPSLatitude',
      'GPSLatitudeRef',
      'GPSLongitude',
      'GPSLongitudeRef',
    ]);
  });

  it('drops the geotag and records the conflict', async () => {
    const media = await tempDir.writeFile('holiday.jpg', 'jpeg');
    const sidecar = await tempDir.writeJson('holiday.jpg.json', { geoData: { latitude: 45.5, longitude: -122.6 } });
    const extractor = new FakeExtractor({
      [media]: {
        GPSPosition: '10 20',
        GPSLatitude: '11',
        GPSLatitudeRef: 'N',
        GPSLongitude: '20',
        GPSLongitudeRef: 'E',
      },
    });

    const resolution = await resolveMediaFile(media, sidecar, { extractor }, log);

    expect(resolution.sidecarRead).toBe(true);
    expect(resolution.geotag).toBeNull();
    expect(resolution.geotagConflict).toBe(true);
    expect(resolution.provenance).toEqual([
      {
        kind: 'geotag',
        source: 'exif',
        field: 'GPSPosition',
        rawValue: '10,N,20,E',
        parsedValue: null,
        accepted: false,
        reason: `GPS position 10,N,20,E disagrees with discrete GPS fields 11,N,20,E in ${media}`,
      },
    ]);
    expect(log.snapshot().filter((entry) => entry.level === 'error')).toHaveLength(1);
  });

  it('leaves both values unresolved when there is nothing to go on', async () => {
    const media = await tempDir.writeFile('holiday.jpg', 'jpeg');
    const embedder = new RecordingEmbedder();

    const resolution = await resolveMediaFile(media, null, { extractor: new FakeExtractor(), embedder }, log);

    expect(resolution).toEqual({
      timestamp: null,
      geotag: null,
      provenance: [],
      geotagConflict: false,
      embedded: false,
      sidecarRead: false,
    });
    expect(embedder.written.size).toBe(0);
  });

  it('keeps the resolved values when embedding fails', async () => {
    const media = await tempDir.writeFile('holiday.jpg', 'jpeg');
    const extractor = new FakeExtractor({ [media]: { DateTimeOriginal: '2023:01:01 10:00:00' } });
    const embedder = new ExifToolEmbedder('exiftool', async () => {
      throw new Error('read-only file');
    });

    const resolution = await resolveMediaFile(media, null, { extractor, embedder }, log);

    expect(resolution.timestamp).toBe('2023:01:01 10:00:00+00:00');
    expect(resolution.embedded).toBe(false);
    expect(log.snapshot().filter((entry) => entry.level === 'warn').map((entry) => entry.message)).toEqual([
      'exiftool could not embed: read-only file',
    ]);
  });

  it('ignores a sidecar that has gone missing', async () => {
    const media = await tempDir.writeFile('holiday.jpg', 'jpeg');

    const resolution = await resolveMediaFile(media, tempDir.resolve('gone.json'), { extractor: new FakeExtractor() }, log);

    expect(resolution.sidecarRead).toBe(false);
    expect(log.snapshot().filter((entry) => entry.level === 'warn')).toHaveLength(1);
  });
});

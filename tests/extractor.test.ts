import { describe, expect, it } from '@jest/globals';
import { MissingToolError } from '../src/errors';
import {
  ChainedExtractor,
  ExifToolExtractor,
  FfprobeExtractor,
  verifyTools,
  type ToolRunner,
} from '../src/extractor';
import { LogBuffer } from '../src/logger';
import { GPS_FIELDS, VIDEO_TIMESTAMP_FIELDS } from '../src/metadata';
import { FakeExtractor } from './helpers/fakes';

interface RunnerCall {
  command: string;
  args: string[];
}

function scriptedRunner(outcomes: Array<string | Error>): { run: ToolRunner; calls: RunnerCall[] } {
  const calls: RunnerCall[] = [];
  const run: ToolRunner = async (command, args) => {
    calls.push({ command, args });
    const outcome = outcomes[Math.min(calls.length - 1, outcomes.length - 1)];

    if (outcome instanceof Error) {
      throw outcome;
    }

    return { stdout: outcome, stderr: '' };
  };

  return { run, calls };
}

describe('ExifToolExtractor', () => {
  it('asks only for the requested fields and keeps the ones present', async () => {
    const { run, calls } = scriptedRunner([
      JSON.stringify([{ SourceFile: 'a.jpg', DateTimeOriginal: '2023:01:15 13:45:01', GPSLatitude: 40.1, ModifyDate: '  ' }]),
    ]);
    const extractor = new ExifToolExtractor('exiftool', { attempts: 1, backoffMs: 0 }, run);

    const extraction = await extractor.extract('a.jpg', ['DateTimeOriginal', 'ModifyDate', 'GPSLatitude'], new LogBuffer('t'));

    expect(calls).toEqual([
      { command: 'exiftool', args: ['-j', '-n', '-DateTimeOriginal', '-ModifyDate', '-GPSLatitude', 'a.jpg'] },
    ]);
    expect(extraction).toEqual({
      source: 'exif',
      values: { DateTimeOriginal: '2023:01:15 13:45:01', GPSLatitude: '40.1' },
    });
  });

  it('retries with a pause between attempts', async () => {
    const { run, calls } = scriptedRunner([
      new Error('busy'),
      new Error('busy'),
      JSON.stringify([{ CreateDate: '2023:01:15 13:45:01' }]),
    ]);
    const pauses: number[] = [];
    const log = new LogBuffer('t');
    const extractor = new ExifToolExtractor(
      'exiftool',
      {
        attempts: 3,
        backoffMs: 25,
        sleep: async (ms) => {
          pauses.push(ms);
        },
      },
      run
    );

    const extraction = await extractor.extract('a.jpg', ['CreateDate'], log);

    expect(calls).toHaveLength(3);
    expect(pauses).toEqual([25, 25]);
    expect(extraction.values).toEqual({ CreateDate: '2023:01:15 13:45:01' });
    expect(log.snapshot().map((entry) => entry.message)).toEqual([
      'exiftool attempt 1 failed: busy',
      'exiftool attempt 2 failed: busy',
    ]);
  });

  it('gives up with no values once every attempt fails', async () => {
    const { run } = scriptedRunner([new Error('no such file')]);
    const log = new LogBuffer('t');
    const extractor = new ExifToolExtractor('exiftool', { attempts: 2, backoffMs: 0, sleep: async () => {} }, run);

    const extraction = await extractor.extract('a.jpg', ['CreateDate'], log);

    expect(extraction).toEqual({ source: 'exif', values: {} });
    expect(log.snapshot().map((entry) => [entry.level, entry.message])).toEqual([
      ['warn', 'exiftool attempt 1 failed: no such file'],
      ['error', 'exiftool failed after 2 attempts: no such file'],
    ]);
  });
});

describe('FfprobeExtractor', () => {
  it('maps container tags onto metadata field names', async () => {
    const { run, calls } = scriptedRunner([
      JSON.stringify({
        format: {
          tags: {
            creation_time: '2023-01-15T13:45:01.000000Z',
            'com.apple.quicktime.location.ISO6709': '+40.7128-074.0060/',
          },
        },
        streams: [{ tags: { language: 'und' } }],
      }),
    ]);
    const extractor = new FfprobeExtractor('ffprobe', { attempts: 1, backoffMs: 0 }, run);

    const extraction = await extractor.extract('clip.mp4', [...VIDEO_TIMESTAMP_FIELDS, ...GPS_FIELDS], new LogBuffer('t'));

    expect(calls[0].args).toEqual(['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', 'clip.mp4']);
    expect(extraction).toEqual({
      source: 'probe',
      values: {
        CreateDate: '2023-01-15T13:45:01.000000Z',
        MediaCreateDate: '2023-01-15T13:45:01.000000Z',
        TrackCreateDate: '2023-01-15T13:45:01.000000Z',
        GPSPosition: '+40.7128-074.0060/',
      },
    });
  });
});

describe('ChainedExtractor', () => {
  it('falls through to the next strategy when nothing was found', async () => {
    const empty = new FakeExtractor();
    const full = new FakeExtractor({ 'a.jpg': { CreateDate: '2023:01:15 13:45:01' } });
    const chain = new ChainedExtractor([empty, full]);

    const extraction = await chain.extract('a.jpg', ['CreateDate'], new LogBuffer('t'));

    expect(chain.name).toBe('fake > fake');
    expect(extraction.values).toEqual({ CreateDate: '2023:01:15 13:45:01' });
    expect(empty.calls).toHaveLength(1);
    expect(full.calls).toHaveLength(1);
  });
});

describe('verifyTools', () => {
  const tools = { exiftool: 'exiftool', ffprobe: 'ffprobe', ffmpeg: 'ffmpeg' };

  it('reports which optional tools can run', async () => {
    const run: ToolRunner = async (command) => {
      if (command === 'ffmpeg') {
        throw new Error('not found');
      }

      return { stdout: '1.0', stderr: '' };
    };

    await expect(verifyTools(tools, run)).resolves.toEqual({ exiftool: true, ffprobe: true, ffmpeg: false });
  });

  it('requires exiftool', async () => {
    const run: ToolRunner = async () => {
      throw new Error('not found');
    };

    await expect(verifyTools(tools, run)).rejects.toThrow(MissingToolError);
  });
});

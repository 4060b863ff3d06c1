import { stat } from 'node:fs/promises';
import { extname } from 'node:path';

export type MediaKind = 'image' | 'video' | 'other';

const IMAGE_EXTENSIONS = new Set([
  '.jpg', '.jpeg', '.png', '.gif', '.tif', '.tiff', '.bmp', '.heic', '.heif', '.webp', '.dng', '.raw',
]);

const VIDEO_EXTENSIONS = new Set([
  '.mp4', '.m4v', '.mov', '.avi', '.mkv', '.wmv', '.flv', '.webm', '.3gp', '.mts', '.m2ts', '.mpg',
]);

export const IMAGE_TIMESTAMP_FIELDS = ['DateTimeOriginal', 'CreateDate', 'ModifyDate'];
export const VIDEO_TIMESTAMP_FIELDS = ['CreationDate', 'CreateDate', 'MediaCreateDate', 'TrackCreateDate'];
export const GPS_FIELDS = ['GPSPosition', 'GPSLatitude', 'GPSLatitudeRef', 'GPSLongitude', 'GPSLongitudeRef'];

export function mediaKind(filePath: string): MediaKind {
  const ext = extname(filePath).toLowerCase();

  if (IMAGE_EXTENSIONS.has(ext)) {
    return 'image';
  }

  if (VIDEO_EXTENSIONS.has(ext)) {
    return 'video';
  }

  return 'other';
}

export function timestampFields(filePath: string): string[] {
  return mediaKind(filePath) === 'video' ? VIDEO_TIMESTAMP_FIELDS : IMAGE_TIMESTAMP_FIELDS;
}

export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const fileStats = await stat(filePath);
    return fileStats.size;
  } catch {
    return null;
  }
}


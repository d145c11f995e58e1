/**
 * Image decoding and metadata extraction with sharp.
 *
 * Both calls run inside scheduler tasks; sharp and fs do their work on the
 * libuv thread pool so several decodes overlap.
 */

import fs from 'fs/promises';
import sharp from 'sharp';
import { DecodedImage, ImageMetadata } from '../../shared/image-cache-types';
import { ImageIdentity } from '../../shared/types';
import { MetadataStore } from '../database/metadata-store';
import { TaskFailure, isErrnoException } from '../errors';
import { describeError } from '../logging';
import { CancellationToken } from '../scheduler/task-scheduler';

export interface DecodeResult {
  content: DecodedImage;
  metadata: ImageMetadata;
}

export interface ImageDecoder {
  decode(identity: ImageIdentity, token: CancellationToken): Promise<DecodeResult>;
  readMetadata(identity: ImageIdentity, token: CancellationToken): Promise<ImageMetadata>;
}

export interface SharpImageDecoderOptions {
  metadataStore?: MetadataStore;
}

interface FileStat {
  byteSize: number;
  modifiedAt: number;
}

async function statFile(identity: ImageIdentity): Promise<FileStat> {
  const stat = await fs.stat(identity);
  if (!stat.isFile()) {
    throw new TaskFailure('not-found', `Not a file: ${identity}`);
  }
  return { byteSize: stat.size, modifiedAt: Math.floor(stat.mtimeMs) };
}

/**
 * A sharp failure on a file that vanished after the stat is a not-found, not a decode error.
 */
async function sharpFailure(identity: ImageIdentity, message: string, error: unknown): Promise<TaskFailure> {
  try {
    await fs.stat(identity);
  } catch (statError) {
    if (isErrnoException(statError) && statError.code === 'ENOENT') {
      return new TaskFailure('not-found', `File disappeared: ${identity}`, error);
    }
  }
  return new TaskFailure('decode', message, error);
}

/**
 * EXIF orientations 5 to 8 rotate by 90 degrees, so the displayed image has its
 * width and height swapped relative to the stored pixels.
 */
function orientedSize(width: number, height: number, orientation: number | undefined): [number, number] {
  return orientation !== undefined && orientation >= 5 ? [height, width] : [width, height];
}

// ============================================================================
// CONTRACT: SharpImageDecoder class
// ============================================================================

/**
 * CONTRACT:
 *   Invariants:
 *     - decode() returns raw pixels with EXIF orientation applied;
 *       content.data.byteLength === width * height * channels
 *     - A missing file surfaces as ENOENT (mapped to not-found by the scheduler)
 *     - Any sharp failure surfaces as TaskFailure('decode'), or as
 *       TaskFailure('not-found') when the file is gone by then
 *     - readMetadata() consults the metadata store first and fills it on a miss
 *     - Work stops early (throwing nothing extra) once the token is cancelled;
 *       the scheduler discards the result
 */
export class SharpImageDecoder implements ImageDecoder {
  private readonly metadataStore: MetadataStore | undefined;

  constructor(options: SharpImageDecoderOptions = {}) {
    this.metadataStore = options.metadataStore;
  }

  async decode(identity: ImageIdentity, token: CancellationToken): Promise<DecodeResult> {
    const stat = await statFile(identity);
    if (token.cancelled) {
      throw new TaskFailure('cancelled', `Decode of ${identity} cancelled`);
    }

    let output: { data: Buffer; info: sharp.OutputInfo };
    let format: string | undefined;
    try {
      const image = sharp(identity);
      format = (await image.metadata()).format;
      output = await image.rotate().raw().toBuffer({ resolveWithObject: true });
    } catch (error) {
      throw await sharpFailure(identity, `Cannot decode ${identity}: ${describeError(error)}`, error);
    }

    const content: DecodedImage = {
      data: output.data,
      width: output.info.width,
      height: output.info.height,
      channels: output.info.channels,
    };
    const metadata: ImageMetadata = {
      identity,
      width: content.width,
      height: content.height,
      byteSize: stat.byteSize,
      format: format ?? 'unknown',
      modifiedAt: stat.modifiedAt,
    };
    this.metadataStore?.put(metadata);
    return { content, metadata };
  }

  async readMetadata(identity: ImageIdentity, token: CancellationToken): Promise<ImageMetadata> {
    const stat = await statFile(identity);
    const stored = this.metadataStore?.get(identity, stat);
    if (stored) {
      return stored;
    }
    if (token.cancelled) {
      throw new TaskFailure('cancelled', `Metadata read of ${identity} cancelled`);
    }

    let info: sharp.Metadata;
    try {
      info = await sharp(identity).metadata();
    } catch (error) {
      throw await sharpFailure(identity, `Cannot read metadata of ${identity}: ${describeError(error)}`, error);
    }
    if (!info.width || !info.height) {
      throw new TaskFailure('decode', `Unable to read image dimensions of ${identity}`);
    }

    const [width, height] = orientedSize(info.width, info.height, info.orientation);
    const metadata: ImageMetadata = {
      identity,
      width,
      height,
      byteSize: stat.byteSize,
      format: info.format ?? 'unknown',
      modifiedAt: stat.modifiedAt,
    };
    this.metadataStore?.put(metadata);
    return metadata;
  }
}

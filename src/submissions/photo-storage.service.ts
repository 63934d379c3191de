import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { compactUtcTimestamp } from '../common/utils/date.util';
import { IMAGE_EXTENSIONS, ImageMimeType } from '../common/utils/image-signature.util';

// Stored names are always server-generated: 20250131_142233_9f86d081884c7d65.jpg
const STORED_NAME_PATTERN = /^\d{8}_\d{6}_[0-9a-f]{16}\.(jpg|png)$/;

const CONTENT_TYPES: Record<string, ImageMimeType> = {
  jpg: 'image/jpeg',
  png: 'image/png',
};

export function buildStoredName(imageType: ImageMimeType, now: Date = new Date()): string {
  return `${compactUtcTimestamp(now)}_${crypto.randomBytes(8).toString('hex')}.${IMAGE_EXTENSIONS[imageType]}`;
}

export interface StoredPhoto {
  absolutePath: string;
  contentType: ImageMimeType;
}

@Injectable()
export class PhotoStorageService implements OnModuleInit {
  private readonly logger = new Logger(PhotoStorageService.name);
  private readonly uploadDir: string;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.uploadDir = config.uploads.dir;
  }

  async onModuleInit() {
    await fs.promises.mkdir(this.uploadDir, { recursive: true });
  }

  async save(content: Buffer, imageType: ImageMimeType): Promise<string> {
    const fileName = buildStoredName(imageType);
    await fs.promises.writeFile(path.join(this.uploadDir, fileName), content, { flag: 'wx' });
    return fileName;
  }

  /**
   * Best effort; a failure is logged and left for manual cleanup
   */
  async remove(fileName: string): Promise<void> {
    if (!STORED_NAME_PATTERN.test(fileName)) {
      return;
    }

    try {
      await fs.promises.unlink(path.join(this.uploadDir, fileName));
    } catch (error) {
      this.logger.error(
        `Could not remove orphaned upload ${fileName}`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  /**
   * Resolves a stored name to its file; undefined for unknown or foreign names
   */
  async locate(fileName: string): Promise<StoredPhoto | undefined> {
    const match = STORED_NAME_PATTERN.exec(fileName);
    if (!match) {
      return undefined;
    }

    const absolutePath = path.join(this.uploadDir, fileName);
    try {
      await fs.promises.access(absolutePath, fs.constants.R_OK);
    } catch {
      return undefined;
    }

    return { absolutePath, contentType: CONTENT_TYPES[match[1]] };
  }
}

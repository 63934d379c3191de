import { BadRequestException } from '@nestjs/common';
import { detectImageType, ImageMimeType } from '../common/utils/image-signature.util';

export interface UploadedPhoto {
  originalname: string;
  size: number;
  buffer: Buffer;
}

export interface PhotoRules {
  maxFileSize: number;
  allowedExtensions: readonly string[];
}

export function fileTooLargeMessage(maxFileSize: number): string {
  return `File too large (max ${Math.round(maxFileSize / (1024 * 1024))}MB)`;
}

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot + 1).toLowerCase();
}

/**
 * Checks size, extension and file signature, in that order.
 * Returns the detected image type.
 */
export function validatePhoto(photo: UploadedPhoto, rules: PhotoRules): ImageMimeType {
  if (photo.size === 0 || photo.buffer.length === 0) {
    throw new BadRequestException('Uploaded file is empty');
  }

  if (photo.size > rules.maxFileSize || photo.buffer.length > rules.maxFileSize) {
    throw new BadRequestException(fileTooLargeMessage(rules.maxFileSize));
  }

  if (!rules.allowedExtensions.includes(extensionOf(photo.originalname))) {
    throw new BadRequestException('Only JPG/PNG images allowed');
  }

  const imageType = detectImageType(photo.buffer);
  if (!imageType) {
    throw new BadRequestException('Invalid image file. File signature check failed');
  }

  return imageType;
}

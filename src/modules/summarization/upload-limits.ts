import { MulterModuleOptions } from '@nestjs/platform-express';
import { AppConfig } from '../../config/app.config';

/**
 * Multer stops reading the request once a limit is hit; an oversized file
 * becomes a 413 before it is buffered.
 */
export function transcriptUploadOptions(config: AppConfig): MulterModuleOptions {
  return {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
      fields: 4,
    },
  };
}

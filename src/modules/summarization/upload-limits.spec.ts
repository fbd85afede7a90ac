import { loadAppConfig } from '../../config/app.config';
import { transcriptUploadOptions } from './upload-limits';

describe('transcriptUploadOptions', () => {
  it('caps multer at one file of the configured size', () => {
    expect(transcriptUploadOptions(loadAppConfig({ MAX_UPLOAD_BYTES: '2048' }))).toEqual({
      limits: { fileSize: 2048, files: 1, fields: 4 },
    });
  });
});

import { BadRequestException, HttpStatus } from '@nestjs/common';
import { toHttpException } from './http-exception.util';
import { ServiceNotConfiguredError, UpstreamServiceError } from './service.errors';

describe('toHttpException', () => {
  it('passes HTTP exceptions through', () => {
    const original = new BadRequestException('transcript must not be empty');

    expect(toHttpException(original, 'fallback')).toBe(original);
  });

  it('maps provider failures to 502 with the provider message', () => {
    const exception = toHttpException(
      new UpstreamServiceError('gemini', 'Gemini API error: quota exceeded'),
      'fallback',
    );

    expect(exception.getStatus()).toBe(HttpStatus.BAD_GATEWAY);
    expect(exception.getResponse()).toEqual({
      statusCode: 502,
      message: 'Gemini API error: quota exceeded',
      error: 'Bad Gateway',
    });
  });

  it('maps missing configuration to 503', () => {
    const exception = toHttpException(
      new ServiceNotConfiguredError('smtp', 'SMTP not configured on server.'),
      'fallback',
    );

    expect(exception.getStatus()).toBe(HttpStatus.SERVICE_UNAVAILABLE);
    expect(exception.message).toBe('SMTP not configured on server.');
  });

  it('maps anything else to 500', () => {
    expect(toHttpException(new Error('boom'), 'fallback').message).toBe('boom');

    const fromString = toHttpException('boom', 'Summarization failed');
    expect(fromString.getStatus()).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
    expect(fromString.message).toBe('Summarization failed');
  });
});

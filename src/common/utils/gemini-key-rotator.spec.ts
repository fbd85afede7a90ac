import { ServiceNotConfiguredError } from '../errors/service.errors';
import { GeminiKeyRotator } from './gemini-key-rotator';

describe('GeminiKeyRotator', () => {
  it('hands out keys round-robin', () => {
    const rotator = new GeminiKeyRotator(['key-a', 'key-b']);

    expect([rotator.next(), rotator.next(), rotator.next()]).toEqual(['key-a', 'key-b', 'key-a']);
  });

  it('throws when no key is configured', () => {
    const rotator = new GeminiKeyRotator([]);

    expect(() => rotator.next()).toThrow(ServiceNotConfiguredError);
    expect(() => rotator.next()).toThrow('Gemini API keys are not configured');
  });
});

import { ServiceNotConfiguredError } from '../errors/service.errors';

export class GeminiKeyRotator {
  private currentKeyIndex = 0;

  constructor(private readonly keys: readonly string[]) {}

  get size(): number {
    return this.keys.length;
  }

  next(): string {
    if (this.keys.length === 0) {
      throw new ServiceNotConfiguredError('gemini', 'Gemini API keys are not configured');
    }

    const apiKey = this.keys[this.currentKeyIndex];
    this.currentKeyIndex = (this.currentKeyIndex + 1) % this.keys.length;
    return apiKey;
  }
}

import { describe, it, expect } from 'vitest';
import { PortraitService, seedFromName } from '../src/services/image/portrait-service.js';

const service = new PortraitService({ baseUrl: 'https://image.test/prompt', width: 640, height: 480 });

describe('seedFromName', () => {
  it('should ignore case and surrounding whitespace', () => {
    expect(seedFromName('  MESSI ')).toBe(seedFromName('messi'));
  });

  it('should stay within six digits', () => {
    const seed = seedFromName('Ronaldo');
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThan(1_000_000);
  });
});

describe('PortraitService', () => {
  it('should encode the portrait prompt into the path', () => {
    const url = service.buildPortraitUrl('Messi', 'Football');
    const prompt =
      'Create a professional portrait photo of Messi, known for Football, photorealistic, high quality, ' +
      'studio lighting, neutral background, facing camera, serious expression, head and shoulders shot';

    expect(url.startsWith(`https://image.test/prompt/${encodeURIComponent(prompt)}?`)).toBe(true);
  });

  it('should append size, seed and nologo parameters', () => {
    const url = new URL(service.buildPortraitUrl('Messi'));

    expect(url.searchParams.get('width')).toBe('640');
    expect(url.searchParams.get('height')).toBe('480');
    expect(url.searchParams.get('seed')).toBe(String(seedFromName('Messi')));
    expect(url.searchParams.get('nologo')).toBe('true');
  });

  it('should return the same URL for the same persona', () => {
    expect(service.buildPortraitUrl('Messi')).toBe(service.buildPortraitUrl('Messi'));
    expect(service.buildPortraitUrl('Messi')).not.toBe(service.buildPortraitUrl('Ronaldo'));
  });
});

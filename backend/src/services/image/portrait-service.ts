/**
 * Portrait Service
 *
 * Builds an image-generation URL for a persona portrait. The provider renders
 * on GET, so the URL is handed to the client as-is.
 */

import { imageConfig, type ImageConfig } from '../../config/providers.js';
import { buildPortraitPrompt } from '../content/prompts.js';

/**
 * Stable seed for a name (djb2), so a persona always gets the same picture
 */
export function seedFromName(name: string): number {
  const normalized = name.trim().toLowerCase();
  let hash = 5381;
  for (let i = 0; i < normalized.length; i++) {
    hash = ((hash * 33) ^ normalized.charCodeAt(i)) >>> 0;
  }
  return hash % 1_000_000;
}

export class PortraitService {
  constructor(private readonly config: ImageConfig = imageConfig) {}

  buildPortraitUrl(characterName: string, domain?: string): string {
    const prompt = buildPortraitPrompt(characterName, domain);
    const params = new URLSearchParams({
      width: String(this.config.width),
      height: String(this.config.height),
      seed: String(seedFromName(characterName)),
      nologo: 'true',
    });

    return `${this.config.baseUrl}/${encodeURIComponent(prompt)}?${params.toString()}`;
  }
}

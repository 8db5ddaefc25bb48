/**
 * Audio Store
 *
 * Writes synthesized audio into the static directory under a unique name.
 */

import fs from 'fs/promises';
import path from 'path';
import pino from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { assetConfig, type AssetConfig } from '../../config/providers.js';
import type { AudioFormat, AudioSink } from './types.js';

const logger = pino({
  name: 'audio-store',
  level: process.env.LOG_LEVEL || 'info',
});

export class AudioStore implements AudioSink {
  private readonly config: AssetConfig;
  private readonly generateId: () => string;

  constructor(config: AssetConfig = assetConfig, generateId: () => string = () => uuidv4()) {
    this.config = config;
    this.generateId = generateId;
  }

  /**
   * Absolute-or-relative directory the files are written to
   */
  get directory(): string {
    return this.config.staticDir;
  }

  async save(audio: Buffer, format: AudioFormat): Promise<string> {
    const fileName = `audio_${this.generateId()}.${format}`;
    const filePath = path.join(this.config.staticDir, fileName);

    await fs.mkdir(this.config.staticDir, { recursive: true });
    await fs.writeFile(filePath, audio);

    logger.debug({ filePath, bytes: audio.length }, 'Audio file written');

    return `${this.config.publicPath}/${fileName}`;
  }
}

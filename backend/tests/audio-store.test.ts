import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AudioStore } from '../src/services/audio/audio-store.js';

describe('AudioStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audio-store-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write the bytes and return the public path', async () => {
    const staticDir = path.join(tempDir, 'static');
    const store = new AudioStore({ staticDir, publicPath: '/static' }, () => 'fixed-id');

    const url = await store.save(Buffer.from('mp3-bytes'), 'mp3');

    expect(url).toBe('/static/audio_fixed-id.mp3');
    const written = await fs.readFile(path.join(staticDir, 'audio_fixed-id.mp3'), 'utf8');
    expect(written).toBe('mp3-bytes');
  });

  it('should use a fresh name for every file', async () => {
    const store = new AudioStore({ staticDir: tempDir, publicPath: '/static' });

    const first = await store.save(Buffer.from('a'), 'mp3');
    const second = await store.save(Buffer.from('b'), 'mp3');

    expect(first).toMatch(/^\/static\/audio_[0-9a-f-]{36}\.mp3$/);
    expect(second).not.toBe(first);
  });
});

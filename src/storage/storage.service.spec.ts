import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { OperationCancelledError } from '../common/abort';
import { createTestConfig } from '../testing/test-config';
import { StorageService } from './storage.service';

describe('StorageService', () => {
  let audioDir: string;

  beforeEach(async () => {
    audioDir = await fs.mkdtemp(path.join(os.tmpdir(), 'debator-audio-'));
  });

  afterEach(async () => {
    await fs.rm(audioDir, { recursive: true, force: true });
  });

  it('writes audio under the local directory and serves it from the public path', async () => {
    const storage = new StorageService(createTestConfig({ LOCAL_AUDIO_DIR: audioDir, PUBLIC_AUDIO_PATH: 'media/' }));

    const stored = await storage.uploadAudio(Buffer.from('ID3-audio'), { extension: '.wav', contentType: 'audio/wav' });

    expect(stored.key).toMatch(/^audio\/[0-9a-f-]{36}\.wav$/);
    expect(stored.url).toBe(`/media/${stored.key}`);
    expect(stored.localPath).toBe(path.join(audioDir, stored.key));
    await expect(fs.readFile(path.join(audioDir, stored.key), 'utf8')).resolves.toBe('ID3-audio');
  });

  it('uses a fresh key for every upload', async () => {
    const storage = new StorageService(createTestConfig({ LOCAL_AUDIO_DIR: audioDir }));

    const first = await storage.uploadAudio(Buffer.from('one'));
    const second = await storage.uploadAudio(Buffer.from('two'));

    expect(first.key).not.toBe(second.key);
    expect(first.key.endsWith('.mp3')).toBe(true);
    expect(storage.publicPath).toBe('/static');
  });

  it('writes nothing once the upload has been cancelled', async () => {
    const storage = new StorageService(createTestConfig({ LOCAL_AUDIO_DIR: audioDir }));
    const controller = new AbortController();
    controller.abort();

    await expect(storage.uploadAudio(Buffer.from('late'), { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
    expect(await fs.readdir(audioDir)).toEqual([]);
  });
});

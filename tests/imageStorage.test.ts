import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { ImageStorage } from '../server/imageStorage';
import { captureLogger } from './helpers';

describe('ImageStorage', () => {
  let uploadDir: string;
  let images: ImageStorage;

  beforeEach(() => {
    uploadDir = mkdtempSync(path.join(tmpdir(), 'images-'));
    images = new ImageStorage(uploadDir, captureLogger());
  });

  afterEach(() => {
    rmSync(uploadDir, { recursive: true, force: true });
  });

  it('should build sanitized paths', () => {
    const target = images.buildPath('../p 1', 'ct_2d', 'scan.final.DCM', new Date('2024-03-15T14:25:01.000Z'));

    expect(path.dirname(target)).toBe(path.join(uploadDir, '___p_1'));
    expect(path.basename(target)).toMatch(/^ct_2d_20240315_142501_[0-9a-f]{8}\.dcm$/);
  });

  it('should drop unusual extensions', () => {
    const target = images.buildPath('p-1', 'xray', 'noextension', new Date('2024-03-15T14:25:01.000Z'));
    expect(path.basename(target)).toMatch(/^xray_20240315_142501_[0-9a-f]{8}$/);
  });

  it('should save, detect and remove files', async () => {
    const saved = await images.save('p-1', 'xray', { buffer: Buffer.from('pixels'), originalName: 'a.png' });

    expect(readFileSync(saved, 'utf8')).toBe('pixels');
    expect(await images.exists(saved)).toBe(true);
    expect(await images.remove(saved)).toBe(true);
    expect(await images.exists(saved)).toBe(false);
    expect(await images.remove(saved)).toBe(false);
  });
});

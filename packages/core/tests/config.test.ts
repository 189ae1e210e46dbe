import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_VIEWER_CONFIG, parseViewerConfig } from '../src/config.js';
import { loadViewerConfig } from '../src/node.js';
import { ConfigError, InputReadError } from '../src/errors.js';

describe('viewer config', () => {
  it('should fill every default from an empty object', () => {
    expect(DEFAULT_VIEWER_CONFIG.camera.sensitivity).toBe(0.01);
    expect(DEFAULT_VIEWER_CONFIG.camera.minDistance).toBe(0.5);
    expect(DEFAULT_VIEWER_CONFIG.camera.pitchLimit).toBe(1.5);
    expect(DEFAULT_VIEWER_CONFIG.layers.step).toBe(0.5);
    expect(DEFAULT_VIEWER_CONFIG.normalize).toEqual({ targetExtent: 2, epsilon: 1e-6 });
    expect(DEFAULT_VIEWER_CONFIG.gcode).toEqual({ extrusionMode: 'coupled', trimPriming: false });
    expect(DEFAULT_VIEWER_CONFIG.logLevel).toBe('warn');
  });

  it('should merge partial sections with defaults', () => {
    const config = parseViewerConfig({ camera: { sensitivity: 0.02 }, layers: { step: 0.2 } });
    expect(config.camera.sensitivity).toBe(0.02);
    expect(config.camera.zoomStep).toBe(0.1);
    expect(config.layers.step).toBe(0.2);
  });

  it('should treat undefined as empty', () => {
    expect(parseViewerConfig(undefined)).toEqual(DEFAULT_VIEWER_CONFIG);
  });

  it('should reject a pitch limit at or beyond 90 degrees', () => {
    expect(() => parseViewerConfig({ camera: { pitchLimit: 2 } })).toThrow(ConfigError);
    expect(() => parseViewerConfig({ camera: { pitchLimit: 2 } })).toThrow(
      'Invalid viewer configuration: camera.pitchLimit: Pitch limit must stay below 90 degrees'
    );
  });

  it('should reject unknown enum values', () => {
    expect(() => parseViewerConfig({ gcode: { extrusionMode: 'split' } })).toThrow(ConfigError);
  });

  describe('loadViewerConfig', () => {
    it('should read a JSON file', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'pathview-config-'));
      const path = join(dir, 'viewer.json');
      await writeFile(path, JSON.stringify({ normalize: { targetExtent: 4 } }));
      const config = await loadViewerConfig(path);
      expect(config.normalize.targetExtent).toBe(4);
    });

    it('should reject invalid JSON', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'pathview-config-'));
      const path = join(dir, 'viewer.json');
      await writeFile(path, '{ nope');
      await expect(loadViewerConfig(path)).rejects.toBeInstanceOf(ConfigError);
    });

    it('should fail on a missing file', async () => {
      await expect(loadViewerConfig('/nonexistent/viewer.json')).rejects.toBeInstanceOf(InputReadError);
    });
  });
});

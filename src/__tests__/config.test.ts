import { describe, it, expect } from 'vitest';
import { parseExportConfig } from '../converters/ls3/ls3-exporter';
import { parseImportConfig } from '../converters/ls3/ls3-importer';
import { Ls3ConfigError } from '../errors';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

describe('parseExportConfig', () => {
  it('fills in defaults', () => {
    const config = parseExportConfig();

    expect(config.exportScope).toBe('ALL');
    expect(config.exportAnimations).toBe(false);
    expect(config.optimizeMesh).toBe(true);
    expect(config.maxCoordDelta).toBe(0.001);
    expect(config.maxUVDelta).toBe(0.02);
    expect(config.maxNormalAngle).toBeCloseTo(Math.PI / 18, 12);
    expect(config.lineSeparator).toBe('\r\n');
    expect(config.upAxis).toBe('Y');
    expect(config.framesPerSecond).toBe(24);
  });

  it('rejects negative tolerances', () => {
    const error = captureError(() => parseExportConfig({ maxCoordDelta: -1 }));

    expect(error).toBeInstanceOf(Ls3ConfigError);
    if (error instanceof Ls3ConfigError) {
      expect(error.configKey).toBe('ExportConfig');
      expect(error.code).toBe('LS3_CONFIG_VALIDATION_ERROR');
      expect(error.message).toBe('Invalid export configuration');
    }
  });

  it('rejects normal angles above pi', () => {
    expect(() => parseExportConfig({ maxNormalAngle: 4 })).toThrow(Ls3ConfigError);
  });
});

describe('parseImportConfig', () => {
  it('fills in defaults', () => {
    const config = parseImportConfig({});

    expect(config.linkedFiles).toBe('embed');
    expect(config.maxEmbedDepth).toBe(1);
    expect(config.lodMask).toBe(15);
    expect(config.weldVertices).toBe(false);
  });

  it('rejects a fractional embed depth', () => {
    const error = captureError(() => parseImportConfig({ maxEmbedDepth: 1.5 }));

    expect(error).toBeInstanceOf(Ls3ConfigError);
    if (error instanceof Ls3ConfigError) {
      expect(error.configKey).toBe('ImportConfig');
    }
  });
});

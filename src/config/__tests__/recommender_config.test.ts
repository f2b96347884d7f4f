/**
 * @fileoverview Tests for recommender configuration resolution and loading
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  createDefaultConfig,
  loadRecommenderConfig,
  resolveRecommenderConfig,
} from '../recommender_config.js';
import { ConfigurationError } from '../../core/errors.js';

const tempDirs: string[] = [];

function writeTempConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'marquee-config-'));
  tempDirs.push(dir);
  const file = path.join(dir, 'recommender.yaml');
  fs.writeFileSync(file, contents, 'utf-8');
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('resolveRecommenderConfig', () => {
  it('returns the defaults for an empty override', () => {
    expect(resolveRecommenderConfig({})).toEqual(createDefaultConfig());
  });

  it('orders source weights preference > seed graph > embedding by default', () => {
    const { weights } = createDefaultConfig();
    expect(weights.preference).toBeGreaterThan(weights.seedGraph);
    expect(weights.seedGraph).toBeGreaterThan(weights.embedding);
  });

  it('merges partial weight overrides', () => {
    const config = resolveRecommenderConfig({ weights: { embedding: 0.2 } });
    expect(config.weights).toEqual({ preference: 2.0, seedGraph: 1.0, embedding: 0.2 });
  });

  it('adds vocabulary entries without dropping the defaults', () => {
    const config = resolveRecommenderConfig({ vocabulary: { cinematographer: 'P344' } });
    expect(config.vocabulary.cinematographer).toBe('P344');
    expect(config.vocabulary.genre).toBe('P136');
  });

  it('rejects unknown keys naming the key', () => {
    expect(() => resolveRecommenderConfig({ lambda: 0.5 })).toThrow(ConfigurationError);
  });

  it('rejects a wrongly typed value with its path', () => {
    try {
      resolveRecommenderConfig({ weights: { embedding: 'high' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).configKey).toBe('weights.embedding');
    }
  });

  it('rejects an embedding weight that could outrank a structural match', () => {
    try {
      resolveRecommenderConfig({ weights: { embedding: 0.6 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).configKey).toBe('weights.embedding');
    }
  });

  it('rejects a preference weight not above the seed graph weight', () => {
    expect(() => resolveRecommenderConfig({ weights: { preference: 1.0 } })).toThrow(
      /weights\.preference/
    );
  });

  it('rejects a preference match score that a single shared property can reach', () => {
    expect(() => resolveRecommenderConfig({ preferenceMatchScore: 1.0 })).toThrow(
      /preferenceMatchScore/
    );
  });

  it('rejects a rating weight that lets a top rating reach a structural match', () => {
    expect(() => resolveRecommenderConfig({ ratingWeight: 0.05 })).toThrow(/ratingWeight/);
    expect(resolveRecommenderConfig({ ratingWeight: 0.04 }).ratingWeight).toBe(0.04);
  });

  it('measures the rating bound against the weakest shared property', () => {
    expect(() =>
      resolveRecommenderConfig({
        sharedProperties: [{ kind: 'cast member', predicate: 'P161', weight: 0.15, reason: 'shares an actor' }],
        weights: { embedding: 0.1 },
      })
    ).toThrow(/ratingWeight/);
  });

  it('rejects an mmr lambda outside [0, 1]', () => {
    expect(() => resolveRecommenderConfig({ mmrLambda: 1.5 })).toThrow(ConfigurationError);
  });
});

describe('loadRecommenderConfig', () => {
  it('returns defaults when no path is given', async () => {
    const config = await loadRecommenderConfig(undefined);
    expect(config.verificationCap).toBe(200);
  });

  it('reads overrides from YAML', async () => {
    const file = writeTempConfig(
      [
        'verificationCap: 50',
        'mmrLambda: 0.5',
        'sharedProperties:',
        '  - kind: genre',
        '    predicate: P136',
        '    weight: 1.0',
        '    reason: shares the genre',
      ].join('\n')
    );

    const config = await loadRecommenderConfig(file);

    expect(config.verificationCap).toBe(50);
    expect(config.mmrLambda).toBe(0.5);
    expect(config.sharedProperties).toEqual([
      { kind: 'genre', predicate: 'P136', weight: 1.0, reason: 'shares the genre' },
    ]);
  });

  it('treats an empty file as no overrides', async () => {
    const file = writeTempConfig('');
    const config = await loadRecommenderConfig(file);
    expect(config).toEqual(createDefaultConfig());
  });

  it('raises ConfigurationError for a missing file', async () => {
    const missing = path.join(os.tmpdir(), 'marquee-missing-config.yaml');
    await expect(loadRecommenderConfig(missing)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('raises ConfigurationError for malformed YAML', async () => {
    const file = writeTempConfig('weights: [unclosed');
    await expect(loadRecommenderConfig(file)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

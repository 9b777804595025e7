import path from 'node:path';
import { promises as fs } from 'node:fs';
import { enumerateScenarios } from '../collection/scenarios';
import {
  ConfigurationError,
  loadRuntimeSettings,
  loadScenarioConfig,
  parseScenarioConfig,
  type ScenarioConfig
} from '../config/settings';
import { test, expect } from '../fixtures/test.fixture';

const SCENARIO_FILE = path.join(__dirname, '..', 'config', 'scenarios.json');

const minimal: ScenarioConfig = {
  calculatorUrl: 'https://calculator.test/vram',
  hardware: 'H100 (80GB)',
  kvCacheQuantization: 'FP16',
  models: [{ displayName: 'Test model', siteName: 'Gemma 3 27B', quantization: 'FP16' }],
  batchSizes: [1],
  contextLengths: [{ tokens: 2048, label: '2K' }],
  concurrentUsers: [1]
};

test.describe('scenario configuration', () => {
  test('loads the shipped scenario file', async () => {
    const config = await loadScenarioConfig(SCENARIO_FILE);

    expect(config.models.map((model) => model.siteName)).toEqual([
      'Qwen3-32B',
      'Gemma 3 27B',
      'Qwen2.5-14B',
      'Qwen3-30B-A3B'
    ]);
    expect(config.hardware).toBe('H200 (141GB)');
    expect(enumerateScenarios(config)).toHaveLength(4 * 3 * 5 * 5);
  });

  test('rejects non-positive batch sizes with the offending path', () => {
    let caught: unknown;
    try {
      parseScenarioConfig({ ...minimal, batchSizes: [0] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) {
      return;
    }
    expect(caught.issues).toHaveLength(1);
    expect(caught.issues[0].startsWith('batchSizes.0: ')).toBe(true);
  });

  test('rejects an empty model list', () => {
    expect(() => parseScenarioConfig({ ...minimal, models: [] })).toThrow(ConfigurationError);
  });

  test('reports malformed JSON as a configuration error', async ({}, testInfo) => {
    const file = testInfo.outputPath('broken.json');
    await fs.writeFile(file, '{ "models": [', 'utf-8');

    await expect(loadScenarioConfig(file)).rejects.toThrow(ConfigurationError);
  });
});

test.describe('runtime settings', () => {
  test('defaults to a visible browser and project-relative paths', () => {
    expect(loadRuntimeSettings({}, '/work')).toEqual({
      headless: false,
      outputDir: '/work/Reports/vram-results',
      scenarioFile: '/work/config/scenarios.json',
      calculatorUrlOverride: undefined
    });
  });

  test('reads overrides from the environment', () => {
    const settings = loadRuntimeSettings(
      {
        HEADLESS: 'true',
        OUTPUT_DIR: '/data/out',
        SCENARIO_FILE: 'custom.json',
        VRAM_CALCULATOR_URL: 'https://calculator.test/vram'
      },
      '/work'
    );

    expect(settings).toEqual({
      headless: true,
      outputDir: '/data/out',
      scenarioFile: '/work/custom.json',
      calculatorUrlOverride: 'https://calculator.test/vram'
    });
  });

  test('rejects an unrecognised HEADLESS value', () => {
    expect(() => loadRuntimeSettings({ HEADLESS: 'yes' }, '/work')).toThrow(ConfigurationError);
  });
});

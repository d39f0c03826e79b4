import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfigFromEnv } from '../src/config';
import { DEFAULT_FILTER_CONFIG } from '../src/types';
import { captureConsole } from './helpers/test-setup';

describe('loadConfigFromEnv', function() {
  it('should use defaults when nothing is set', function() {
    expect(loadConfigFromEnv({})).to.deep.equal({
      cacheMaxSize: DEFAULT_FILTER_CONFIG.cacheMaxSize,
      maxVariants: DEFAULT_FILTER_CONFIG.maxVariants,
      useSuffixRules: false,
    });
  });

  it('should read numeric and boolean settings', function() {
    const config = loadConfigFromEnv({
      SWEAR_FILTER_CACHE_SIZE: '250',
      SWEAR_FILTER_MAX_VARIANTS: ' 2000 ',
      SWEAR_FILTER_SUFFIX_RULES: 'TRUE',
    });

    expect(config.cacheMaxSize).to.equal(250);
    expect(config.maxVariants).to.equal(2000);
    expect(config.useSuffixRules).to.equal(true);
  });

  it('should allow a cache size of zero', function() {
    expect(loadConfigFromEnv({ SWEAR_FILTER_CACHE_SIZE: '0' }).cacheMaxSize).to.equal(0);
  });

  it('should warn and keep defaults for invalid values', async function() {
    let config = {};
    const warnings = await captureConsole('warn', () => {
      config = loadConfigFromEnv({
        SWEAR_FILTER_CACHE_SIZE: 'lots',
        SWEAR_FILTER_MAX_VARIANTS: '0',
        SWEAR_FILTER_SUFFIX_RULES: 'maybe',
      });
    });

    expect(config).to.deep.equal({
      cacheMaxSize: 1000,
      maxVariants: 50_000,
      useSuffixRules: false,
    });
    expect(warnings).to.deep.equal([
      '[config] Ignoring SWEAR_FILTER_CACHE_SIZE="lots": expected an integer >= 0, using 1000',
      '[config] Ignoring SWEAR_FILTER_MAX_VARIANTS="0": expected an integer >= 1, using 50000',
      '[config] Ignoring SWEAR_FILTER_SUFFIX_RULES="maybe": expected true or false, using false',
    ]);
  });

  it('should load safe words from the configured file', function() {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'swear-config-'));
    try {
      const file = path.join(dir, 'dictionary.txt');
      fs.writeFileSync(file, 'teapot\nshitty\n');

      const config = loadConfigFromEnv({ SWEAR_FILTER_SAFE_WORDS_PATH: file }, ['shit']);
      const safeWords = new Set(config.safeWords);

      expect(safeWords.has('teapot')).to.equal(true);
      expect(safeWords.has('shitty')).to.equal(false);
      expect(safeWords.has('classic')).to.equal(true);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

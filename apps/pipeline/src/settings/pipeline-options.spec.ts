import {
  mergeRawSettings,
  parseBoolSetting,
  parseFloatSetting,
  parseIntSetting,
  parseListSetting,
  redactOptions,
  resolvePipelineOptions,
} from './pipeline-options';

describe('pipeline-options', () => {
  describe('parseListSetting', () => {
    it('accepts JSON arrays and comma-separated strings', () => {
      expect(parseListSetting('["en","fr"]', ['xx'])).toEqual(['en', 'fr']);
      expect(parseListSetting('en, fr ,,de', ['xx'])).toEqual(['en', 'fr', 'de']);
      expect(parseListSetting(['netflix', ' hulu '], [])).toEqual(['netflix', 'hulu']);
    });

    it('falls back on malformed JSON-looking input', () => {
      expect(parseListSetting('["en",', ['en'])).toEqual(['en']);
      expect(parseListSetting('[not json]', ['en'])).toEqual(['en']);
    });

    it('treats blank, None and null as unset', () => {
      expect(parseListSetting('', ['en'])).toEqual(['en']);
      expect(parseListSetting('None', ['en'])).toEqual(['en']);
      expect(parseListSetting('null', ['en'])).toEqual(['en']);
      expect(parseListSetting(undefined, [])).toEqual([]);
    });

    it('keeps an explicit empty JSON array', () => {
      expect(parseListSetting('[]', ['en'])).toEqual([]);
    });
  });

  it('parses numbers with fallbacks and bounds', () => {
    expect(parseIntSetting('7', 3)).toBe(7);
    expect(parseIntSetting('abc', 3)).toBe(3);
    expect(parseIntSetting('2.5', 3)).toBe(3);
    expect(parseIntSetting('500', 3, { min: 1, max: 50 })).toBe(50);
    expect(parseIntSetting('0', 3, { min: 1, max: 50 })).toBe(1);
    expect(parseIntSetting(12, 3)).toBe(12);

    expect(parseFloatSetting('0.4', 0.25)).toBe(0.4);
    expect(parseFloatSetting('nope', 0.25)).toBe(0.25);
    expect(parseFloatSetting(null, 58)).toBe(58);
  });

  it('parses booleans', () => {
    expect(parseBoolSetting('true', false)).toBe(true);
    expect(parseBoolSetting('1', false)).toBe(true);
    expect(parseBoolSetting('off', true)).toBe(false);
    expect(parseBoolSetting('maybe', true)).toBe(true);
    expect(parseBoolSetting(false, true)).toBe(false);
  });

  it('lets env win over the file, except when the env value is blank', () => {
    const merged = mergeRawSettings(
      { REGION: 'gb', LANGUAGE: '  ' },
      { region: 'DE', language: 'de-DE', topN: 5 },
    );
    expect(merged.region).toBe('gb');
    expect(merged.language).toBe('de-DE');
    expect(merged.topN).toBe(5);
  });

  it('resolves defaults relative to the data dir', () => {
    const opts = resolvePipelineOptions({ env: {}, dataDir: '/srv/picks' });
    expect(opts).toEqual({
      region: 'US',
      language: 'en-US',
      originalLangs: ['en'],
      subsInclude: [],
      discoverPages: 3,
      tmdbApiKey: '',
      ratingsCsvPath: '/srv/picks/ratings.csv',
      imdbUserId: '',
      imdbPublicMaxPages: 10,
      outDir: '/srv/picks/out',
      minMatchCut: 58,
      topN: 10,
      criticWeight: 0.25,
      audienceWeight: 0.75,
      commitmentCostScale: 1,
      disableSymlink: false,
      cron: '0 6 * * *',
      timezone: null,
    });
  });

  it('resolves env values and clamps discover pages', () => {
    const opts = resolvePipelineOptions({
      env: {
        REGION: 'ca',
        ORIGINAL_LANGS: '["en","fr"]',
        SUBS_INCLUDE: 'netflix,hulu',
        DISCOVER_PAGES: '99',
        PIPELINE_DISABLE_SYMLINK: 'yes',
        PIPELINE_TIMEZONE: 'America/Toronto',
      },
      file: { minMatchCut: 70 },
      dataDir: '/data',
    });
    expect(opts.region).toBe('CA');
    expect(opts.originalLangs).toEqual(['en', 'fr']);
    expect(opts.subsInclude).toEqual(['netflix', 'hulu']);
    expect(opts.discoverPages).toBe(50);
    expect(opts.disableSymlink).toBe(true);
    expect(opts.timezone).toBe('America/Toronto');
    expect(opts.minMatchCut).toBe(70);
  });

  it('redacts the API key', () => {
    const opts = resolvePipelineOptions({
      env: { TMDB_API_KEY: 'test-secret' },
      dataDir: '/data',
    });
    const redacted = redactOptions(opts);
    expect(redacted.tmdbApiKeySet).toBe(true);
    expect('tmdbApiKey' in redacted).toBe(false);
    expect(JSON.stringify(redacted)).not.toContain('test-secret');
  });
});

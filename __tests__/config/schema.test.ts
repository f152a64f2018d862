import { appConfigSchema, rateLimitSchema, siblingConfigSchema } from '../../app/config/schema.js';
import { defaultConfig, getDefaultConfigDir } from '../../app/config/defaults.js';

describe('Config Schema', () => {
  it('fills every default for an empty document', () => {
    expect(appConfigSchema.parse({})).toEqual(defaultConfig());
  });

  it('keeps fields it does not describe', () => {
    const config = appConfigSchema.parse({ theme: 'dark', providers: { openai: { api_key: 'test-secret', org: 'x' } } });
    expect(config.theme).toBe('dark');
    expect(config.providers.openai).toEqual({ api_key: 'test-secret', org: 'x' });
  });

  it('accepts any auth_mode spelling', () => {
    expect(appConfigSchema.parse({ auth_mode: 'Google Cloud Account' }).auth_mode).toBe('Google Cloud Account');
  });

  it('rejects non-positive rate limits', () => {
    expect(rateLimitSchema.safeParse({ calls: 0, window: 60 }).success).toBe(false);
    expect(rateLimitSchema.safeParse({ calls: 1.5, window: 60 }).success).toBe(false);
    expect(rateLimitSchema.safeParse({ calls: 5, window: -1 }).success).toBe(false);
    expect(rateLimitSchema.safeParse({ calls: 5, window: 0.5 }).success).toBe(true);
  });

  it('reads only importable fields from a sibling document', () => {
    const sibling = siblingConfigSchema.parse({
      providers: { openai: { api_key: 'test-secret' } },
      auth_mode: 'api_key',
      window_size: [800, 600],
    });
    expect(sibling).toEqual({ providers: { openai: { api_key: 'test-secret' } }, auth_mode: 'api_key' });
  });
});

describe('getDefaultConfigDir', () => {
  it('honours the override variable', () => {
    expect(getDefaultConfigDir({ PROMPTSMITH_CONFIG_DIR: '/tmp/ps' }, 'linux', '/home/u')).toBe('/tmp/ps');
  });

  it('uses XDG_CONFIG_HOME or ~/.config on Linux', () => {
    expect(getDefaultConfigDir({}, 'linux', '/home/u')).toBe('/home/u/.config/PromptSmith');
    expect(getDefaultConfigDir({ XDG_CONFIG_HOME: '/xdg' }, 'linux', '/home/u')).toBe('/xdg/PromptSmith');
  });

  it('uses Application Support on macOS', () => {
    expect(getDefaultConfigDir({}, 'darwin', '/Users/u')).toBe('/Users/u/Library/Application Support/PromptSmith');
  });
});

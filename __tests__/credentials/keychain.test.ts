import { OsKeychain, apiKeyAccount } from '../../app/credentials/keychain.js';

describe('OsKeychain', () => {
  it('names accounts after the provider', () => {
    expect(apiKeyAccount('openai')).toBe('openai_api_key');
  });

  describe('on a platform without keychain tools', () => {
    const keychain = new OsKeychain('aix');

    it('reports itself unavailable', async () => {
      expect(await keychain.isAvailable()).toBe(false);
    });

    it('reads nothing and rejects writes', async () => {
      expect(await keychain.load('PromptSmith', 'openai_api_key')).toBeNull();
      await expect(keychain.save('PromptSmith', 'openai_api_key', 'test-secret')).rejects.toThrow(
        'System keychain is not available on this platform',
      );
      await expect(keychain.delete('PromptSmith', 'openai_api_key')).resolves.toBeUndefined();
    });
  });
});

import { ConfigStore } from '../../app/config/index.js';
import { ConfigImportMerger, normalizeAuthMode } from '../../app/config/import.js';
import { CredentialVault } from '../../app/credentials/vault.js';
import { MemoryBackend, quietLogger, tempDir } from '../support/fakes.js';

describe('normalizeAuthMode', () => {
  it('maps the sibling spellings', () => {
    expect(normalizeAuthMode('api_key')).toBe('api-key');
    expect(normalizeAuthMode('API Key')).toBe('api-key');
    expect(normalizeAuthMode('Google Cloud Account')).toBe('gcloud');
    expect(normalizeAuthMode('gcloud')).toBe('gcloud');
  });
});

describe('ConfigImportMerger', () => {
  let backend: MemoryBackend;
  let config: ConfigStore;
  let vault: CredentialVault;
  let merger: ConfigImportMerger;

  const source = {
    providers: {
      openai: { api_key: 'sibling-openai' },
      google: { api_key: 'sibling-google' },
      stability: {},
    },
    auth_mode: 'Google Cloud Account',
    gcloud_project_id: 'sibling-project',
    gcloud_auth_validated: true,
  };

  beforeEach(() => {
    backend = new MemoryBackend();
    config = new ConfigStore(tempDir(), quietLogger());
    vault = CredentialVault.create({ backend, config, siblingService: null, logger: quietLogger() });
    merger = new ConfigImportMerger(config, vault, quietLogger());
  });

  it('copies every missing field', async () => {
    expect(await merger.importOnce(source)).toBe(true);

    expect(await vault.get('openai')).toBe('sibling-openai');
    expect(await vault.get('google')).toBe('sibling-google');
    expect(config.data.auth_mode).toBe('gcloud');
    expect(config.getGcloudProjectId()).toBe('sibling-project');
    expect(config.getAuthValidated('gemini')).toBe(true);
  });

  it('never overwrites a local value', async () => {
    await vault.set('openai', 'local-openai');
    config.update({ auth_mode: 'api-key', gcloud_project_id: 'local-project' });

    await merger.importOnce(source);

    expect(await vault.get('openai')).toBe('local-openai');
    expect(config.data.auth_mode).toBe('api-key');
    expect(config.getGcloudProjectId()).toBe('local-project');
    expect(await vault.get('google')).toBe('sibling-google');
  });

  it('is idempotent', async () => {
    expect(await merger.importOnce(source)).toBe(true);
    const afterFirst = { config: config.data, secrets: [...backend.secrets] };

    expect(await merger.importOnce(source)).toBe(false);
    expect(config.data).toEqual(afterFirst.config);
    expect([...backend.secrets]).toEqual(afterFirst.secrets);
  });

  it('ignores documents it cannot read', async () => {
    expect(await merger.importOnce(null)).toBe(false);
    expect(await merger.importOnce({ providers: 'none' })).toBe(false);
    expect(await merger.importOnce({})).toBe(false);
  });

  it('imports the valid fields of a partly malformed document', async () => {
    const partial = {
      providers: { openai: { api_key: 'test-secret' }, google: { api_key: 7 } },
      auth_mode: 'API Key',
      gcloud_project_id: null,
      gcloud_auth_validated: 'yes',
    };

    expect(await merger.importOnce(partial)).toBe(true);
    expect(await vault.get('openai')).toBe('test-secret');
    expect(await vault.get('google')).toBeNull();
    expect(config.data.auth_mode).toBe('api-key');
    expect(config.getGcloudProjectId()).toBeNull();
    expect(config.getAuthValidated('gemini')).toBe(false);
  });

  it('does not persist the config itself', async () => {
    await merger.importOnce({ gcloud_project_id: 'sibling-project' });
    expect(new ConfigStore(config.configDir, quietLogger()).getGcloudProjectId()).toBeNull();
  });
});

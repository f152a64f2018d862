export { CredentialVault, defaultCredentialChain } from './vault.js';
export type { CredentialChain, CredentialLocation, CredentialVaultOptions } from './vault.js';
export { OsKeychain, apiKeyAccount } from './keychain.js';
export type { SecretBackend } from './keychain.js';
export { ConfigFileResolver, KeychainResolver, MigratingKeychainResolver } from './resolvers.js';
export type { CredentialResolver } from './resolvers.js';

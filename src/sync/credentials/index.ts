export { CredentialCache } from "./cache.js";
export { EncryptedFileCredentialStore, defaultMachineId } from "./fileStore.js";
export type { EncryptedFileStoreOptions } from "./fileStore.js";
export { MemoryCredentialStore } from "./memoryStore.js";
export { CredentialProvider } from "./provider.js";
export type { CredentialProviderOptions } from "./provider.js";
export { CREDENTIAL_KINDS, isCompatible, isExpired } from "./types.js";
export type { CredentialStore, StoredCredential } from "./types.js";

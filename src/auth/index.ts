export type { CredentialKey, CredentialStore } from "./types.ts";
export { CREDENTIAL_KEYS, isCredentialKey } from "./types.ts";
export { getStore, setStore, getCredential, getCredentialStatuses } from "./store.ts";
export type { CredentialSource, CredentialStatus } from "./store.ts";
export { EncryptedFileStore } from "./encrypted-file.ts";
export { exchangeToken, IAM_URL } from "./iam.ts";

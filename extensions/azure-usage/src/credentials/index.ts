export {
  AzureCredentialsManager,
  createCredentialsManager,
  createCredentialsManagerFromConfig,
} from "./manager.js";

export type { CredentialsManagerOptions, CredentialResolutionResult } from "./manager.js";

import { ConfigurationSource } from "../source.js";

export class EnvironmentSource implements ConfigurationSource {
  async load() {
    return {
      identity: {
        authority:
          process.env.KEY_PROVIDER_AUTHORITY || process.env.AZURE_AUTHORITY_HOST,
        timeoutMs: process.env.KEY_PROVIDER_TIMEOUT_MS,
        expiryBufferMs: process.env.KEY_PROVIDER_EXPIRY_BUFFER_MS,
      },
      retry: {
        maxAttempts: process.env.KEY_PROVIDER_RETRY_MAX_ATTEMPTS,
        initialDelayMs: process.env.KEY_PROVIDER_RETRY_INITIAL_DELAY_MS,
        maxDelayMs: process.env.KEY_PROVIDER_RETRY_MAX_DELAY_MS,
        multiplier: process.env.KEY_PROVIDER_RETRY_MULTIPLIER,
        jitter: process.env.KEY_PROVIDER_RETRY_JITTER,
      },
      vault: {
        hostSuffix: process.env.KEY_PROVIDER_VAULT_HOST_SUFFIX,
        resource: process.env.KEY_PROVIDER_VAULT_RESOURCE,
      },
    };
  }
}

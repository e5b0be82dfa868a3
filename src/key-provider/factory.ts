import type {
  EncryptionContext,
  KeyProviderFactory,
  KeyProviderOptions,
} from "../types.js";
import {
  keyProviderOptionsSchema,
  type ParsedKeyProviderOptions,
} from "../config/configuration.js";
import { ConfigurationManager } from "../config/manager.js";
import { ConfigurationSource } from "../config/source.js";
import { ServicePrincipalCredentials } from "../credentials/service-principal.js";
import { createStableCacheKey } from "../utils/cache.js";
import { configurationError } from "../utils/errors.js";
import { getLogger } from "../utils/logging.js";
import { AzureKeyProvider } from "./provider.js";

const logger = getLogger("azure-key-provider-factory");

export class AzureKeyProviderFactory implements KeyProviderFactory {
  private readonly providers = new Map<string, AzureKeyProvider>();

  constructor(private readonly configManager: ConfigurationManager) {}

  /**
   * Validates `options` and returns the shared provider for them. Nothing is
   * sent over the network until the provider is asked for authorization.
   */
  async getProvider(
    context: EncryptionContext,
    options: KeyProviderOptions,
  ): Promise<AzureKeyProvider> {
    const parsed = parseOptions(options);
    const defaults = await this.configManager.getCredentialDefaults();

    const cacheKey = createStableCacheKey(serializeOptions(parsed));
    const existing = this.providers.get(cacheKey);
    if (existing) {
      logger.debug("Reusing shared key provider", {
        provider: existing.name,
        references: existing.references + 1,
      });
      return existing.retain();
    }

    const [vaultName, keyName] = splitMasterKey(parsed.master_key);

    const credentials = new ServicePrincipalCredentials({
      tenantId: parsed.azure_tenant_id,
      clientId: parsed.azure_client_id,
      clientSecret: parsed.azure_client_secret,
      clientCertificatePath: parsed.azure_client_certificate_path,
      authority: parsed.azure_authority_host ?? defaults.authority,
      truststore: parsed.truststore,
      priorityString: parsed.priority_string,
      retry: defaults.retry,
      timeoutMs: defaults.timeoutMs,
      expiryBufferMs: defaults.expiryBufferMs,
      signal: context.shutdownSignal,
      transportFactory: context.createTransport?.bind(context),
      logContext: parsed.master_key,
    });

    const provider = new AzureKeyProvider({
      vaultName,
      keyName,
      vaultHostSuffix: parsed.azure_vault_host_suffix ?? defaults.vaultHostSuffix,
      resource: defaults.vaultResource,
      credentials,
      onRelease: () => this.providers.delete(cacheKey),
    });
    this.providers.set(cacheKey, provider);

    logger.debug("Key provider created", {
      provider: provider.name,
      method: credentials.method,
      vaultUrl: provider.vaultUrl,
    });

    return provider;
  }

  get size(): number {
    return this.providers.size;
  }
}

export function createKeyProviderFactory(options?: {
  configSource?: ConfigurationSource;
}): AzureKeyProviderFactory {
  return new AzureKeyProviderFactory(
    new ConfigurationManager(options?.configSource),
  );
}

function parseOptions(options: KeyProviderOptions): ParsedKeyProviderOptions {
  const parsed = keyProviderOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw configurationError(
      `Invalid Azure key provider options: ${parsed.error.issues
        .map((issue) => issue.message)
        .join("; ")}`,
    );
  }
  return parsed.data;
}

function splitMasterKey(masterKey: string): [string, string] {
  const separator = masterKey.indexOf("/");
  return [masterKey.slice(0, separator), masterKey.slice(separator + 1)];
}

function serializeOptions(options: ParsedKeyProviderOptions): string {
  return JSON.stringify(options, Object.keys(options).sort());
}

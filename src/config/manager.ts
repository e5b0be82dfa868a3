import {
  configSchema,
  type CredentialDefaults,
  type KeyProviderConfiguration,
} from "./configuration.js";
import { ConfigurationSource } from "./source.js";
import { EnvironmentSource, AppConfigSource } from "./sources/index.js";
import { configurationError } from "../utils/errors.js";
import { getLogger } from "../utils/logging.js";

const logger = getLogger("config-manager");

export class ConfigurationManager {
  private source: ConfigurationSource;
  private configPromise?: Promise<KeyProviderConfiguration>;

  constructor(source?: ConfigurationSource) {
    this.source = source || this.createConfigSource();
  }

  async getConfiguration(): Promise<KeyProviderConfiguration> {
    if (!this.configPromise) {
      logger.debug("Loading configuration for first time");
      this.configPromise = this.loadAndValidateConfig();
    }
    return this.configPromise;
  }

  private async loadAndValidateConfig(): Promise<KeyProviderConfiguration> {
    logger.debug("Loading raw configuration from source");
    const raw = await this.source.load();
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      throw configurationError(
        `Invalid key provider configuration: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`,
      );
    }
    this.validate(parsed.data);
    return parsed.data;
  }

  private createConfigSource(): ConfigurationSource {
    if (process.env.AZURE_APPCONFIG_ENDPOINT) {
      logger.debug("Using AppConfigSource", {
        endpoint: process.env.AZURE_APPCONFIG_ENDPOINT,
      });
      return new AppConfigSource();
    }
    return new EnvironmentSource();
  }

  private validate(config: KeyProviderConfiguration): void {
    if (config.retry.maxDelayMs < config.retry.initialDelayMs) {
      throw configurationError(
        "retry.maxDelayMs must not be smaller than retry.initialDelayMs",
      );
    }
  }

  async getCredentialDefaults(): Promise<CredentialDefaults> {
    const config = await this.getConfiguration();
    return {
      authority: config.identity.authority,
      timeoutMs: config.identity.timeoutMs,
      expiryBufferMs: config.identity.expiryBufferMs,
      retry: { ...config.retry },
      vaultHostSuffix: config.vault.hostSuffix,
      vaultResource: config.vault.resource,
    };
  }
}

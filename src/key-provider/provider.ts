import type {
  ClosableCredentials,
  Credentials,
  KeyProvider,
  ResourceScope,
} from "../types.js";
import { AuthError, AUTH_ERROR_CODES } from "../utils/errors.js";
import { getLogger } from "../utils/logging.js";

const logger = getLogger("azure-key-provider");

export interface AzureKeyProviderSettings {
  vaultName: string;
  keyName: string;
  vaultHostSuffix: string;
  resource: ResourceScope;
  credentials: ClosableCredentials;
  onRelease?: (provider: AzureKeyProvider) => void;
}

/**
 * Vault-backed key provider. Instances are shared; every holder calls
 * `release()` once and the last release closes the credential transport.
 */
export class AzureKeyProvider implements KeyProvider {
  readonly name: string;
  readonly vaultUrl: string;
  readonly keyName: string;
  readonly resource: ResourceScope;

  private readonly credentials: ClosableCredentials;
  private readonly onRelease?: (provider: AzureKeyProvider) => void;
  private refCount = 1;

  constructor(settings: AzureKeyProviderSettings) {
    this.name = `azure:${settings.vaultName}/${settings.keyName}`;
    this.vaultUrl = `https://${settings.vaultName}.${settings.vaultHostSuffix}`;
    this.keyName = settings.keyName;
    this.resource = settings.resource;
    this.credentials = settings.credentials;
    this.onRelease = settings.onRelease;
  }

  get references(): number {
    return this.refCount;
  }

  retain(): this {
    this.assertLive();
    this.refCount++;
    return this;
  }

  getCredentials(): Credentials {
    return this.credentials;
  }

  async getAuthorizationHeader(): Promise<string> {
    this.assertLive();
    const token = await this.credentials.getToken(this.resource);
    return `Bearer ${token.token}`;
  }

  async release(): Promise<void> {
    if (this.refCount === 0) {
      return;
    }

    this.refCount--;
    if (this.refCount > 0) {
      return;
    }

    logger.debug("Last reference released, closing key provider", {
      provider: this.name,
    });
    this.onRelease?.(this);
    await this.credentials.close?.();
  }

  private assertLive(): void {
    if (this.refCount === 0) {
      throw new AuthError(
        AUTH_ERROR_CODES.provider_released,
        `Key provider ${this.name} has been released`,
      );
    }
  }
}

import { createKeyProviderFactory, getLogger } from "../src/index.js";

async function main() {
  const logger = getLogger("vault-example");
  const factory = createKeyProviderFactory();
  const shutdown = new AbortController();

  const provider = await factory.getProvider(
    { shutdownSignal: shutdown.signal },
    {
      azure_tenant_id: process.env.AZURE_TENANT_ID,
      azure_client_id: process.env.AZURE_CLIENT_ID,
      azure_client_secret: process.env.AZURE_CLIENT_SECRET,
      azure_client_certificate_path: process.env.AZURE_CLIENT_CERTIFICATE_PATH,
      master_key: process.env.MASTER_KEY,
    },
  );

  try {
    const authorization = await provider.getAuthorizationHeader();
    logger.info("Vault request authorized", {
      provider: provider.name,
      vaultUrl: provider.vaultUrl,
      scheme: authorization.split(" ")[0],
    });
  } finally {
    await provider.release();
  }
}

main().catch((error: unknown) => {
  getLogger("vault-example").error("Error during execution", { error });
  process.exitCode = 1;
});

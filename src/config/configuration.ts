import { z } from "zod";

const SECONDS = 1000;
const MINUTES = 60 * SECONDS;

export const DEFAULT_CONFIG = {
  identity: {
    authority: "https://login.microsoftonline.com",
    timeoutMs: 30 * SECONDS,
    expiryBufferMs: 5 * MINUTES,
  },
  retry: {
    maxAttempts: 3,
    initialDelayMs: 500,
    maxDelayMs: 8 * SECONDS,
    multiplier: 2,
    jitter: true,
  },
  vault: {
    hostSuffix: "vault.azure.net",
    resource: "https://vault.azure.net",
  },
} as const;

const booleanFlag = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((value) => value === "true"),
]);

const identitySchema = z
  .object({
    authority: z
      .string()
      .url()
      .default(DEFAULT_CONFIG.identity.authority),
    timeoutMs: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_CONFIG.identity.timeoutMs),
    expiryBufferMs: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_CONFIG.identity.expiryBufferMs),
  })
  .default(DEFAULT_CONFIG.identity);

const retrySchema = z
  .object({
    maxAttempts: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_CONFIG.retry.maxAttempts),
    initialDelayMs: z.coerce
      .number()
      .nonnegative()
      .default(DEFAULT_CONFIG.retry.initialDelayMs),
    maxDelayMs: z.coerce
      .number()
      .nonnegative()
      .default(DEFAULT_CONFIG.retry.maxDelayMs),
    multiplier: z.coerce
      .number()
      .min(1)
      .default(DEFAULT_CONFIG.retry.multiplier),
    jitter: booleanFlag.default(DEFAULT_CONFIG.retry.jitter),
  })
  .default(DEFAULT_CONFIG.retry);

const vaultSchema = z
  .object({
    hostSuffix: z.string().min(1).default(DEFAULT_CONFIG.vault.hostSuffix),
    resource: z.string().url().default(DEFAULT_CONFIG.vault.resource),
  })
  .default(DEFAULT_CONFIG.vault);

export const configSchema = z.object({
  identity: identitySchema,
  retry: retrySchema,
  vault: vaultSchema,
});

export type KeyProviderConfiguration = z.infer<typeof configSchema>;

/** Settings every credential and key provider built by the factory starts from. */
export interface CredentialDefaults {
  authority: string;
  timeoutMs: number;
  expiryBufferMs: number;
  retry: KeyProviderConfiguration["retry"];
  vaultHostSuffix: string;
  vaultResource: string;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => value || undefined);

const requiredString = (name: string) =>
  z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);

/**
 * Per-provider options as handed over by the encryption subsystem. Empty
 * strings count as absent.
 */
export const keyProviderOptionsSchema = z
  .object({
    azure_tenant_id: requiredString("azure_tenant_id"),
    azure_client_id: requiredString("azure_client_id"),
    azure_client_secret: optionalString,
    azure_client_certificate_path: optionalString,
    azure_authority_host: optionalString,
    master_key: requiredString("master_key").regex(
      /^[^/\s]+\/[^/\s]+$/,
      "master_key must have the form <vault>/<key>",
    ),
    truststore: optionalString,
    priority_string: optionalString,
    azure_vault_host_suffix: optionalString,
  })
  .superRefine((options, ctx) => {
    const hasSecret = !!options.azure_client_secret;
    const hasCertificate = !!options.azure_client_certificate_path;
    if (hasSecret && hasCertificate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "azure_client_secret and azure_client_certificate_path are mutually exclusive",
        path: ["azure_client_secret"],
      });
    } else if (!hasSecret && !hasCertificate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "one of azure_client_secret or azure_client_certificate_path is required",
        path: ["azure_client_secret"],
      });
    }
  });

export type ParsedKeyProviderOptions = z.infer<typeof keyProviderOptionsSchema>;

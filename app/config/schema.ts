import { z } from 'zod';

/**
 * Zod schemas for the on-disk configuration document (config.json)
 */

export const AUTH_MODES = ['api-key', 'gcloud'] as const;

export const providerConfigSchema = z
  .object({
    api_key: z.string().optional(),
  })
  .passthrough();

export const rateLimitSchema = z.object({
  calls: z.number().int().positive(),
  window: z.number().positive().finite(),
});

export const enhancementDefaultsSchema = z.object({
  role: z.string().default('an expert assistant'),
  reasoning: z.string().default('Standard'),
  verbosity: z.string().default('medium'),
  tools: z.array(z.string()).default(['web', 'code']),
  self_reflect: z.boolean().default(true),
  meta_fix: z.boolean().default(true),
});

export const appConfigSchema = z
  .object({
    providers: z.record(providerConfigSchema).default({}),
    default_provider: z.string().default('openai'),
    default_model: z.string().default('gpt-4o-mini'),
    enhancement_defaults: enhancementDefaultsSchema.default({}),
    auth_mode: z.string().optional(),
    gcloud_project_id: z.string().optional(),
    gcloud_auth_validated: z.boolean().optional(),
    rate_limits: z.record(rateLimitSchema).default({}),
  })
  .passthrough();

/**
 * Record whose entries are validated one by one. A value that is not an
 * object becomes `{}` and an invalid entry is dropped.
 */
function recoverableRecord<T extends z.ZodTypeAny>(entry: T) {
  return z
    .record(z.unknown())
    .catch({})
    .transform((entries) => {
      const kept: Record<string, z.output<T>> = {};
      for (const [key, value] of Object.entries(entries)) {
        const parsed = entry.safeParse(value);
        if (parsed.success) {
          kept[key] = parsed.data;
        }
      }
      return kept;
    });
}

/**
 * Field-by-field view of config.json used once the strict parse fails.
 * Each invalid field falls back to its default; unknown keys are kept.
 */
export const recoverableConfigSchema = z
  .object({
    providers: recoverableRecord(providerConfigSchema),
    default_provider: z.string().catch('openai'),
    default_model: z.string().catch('gpt-4o-mini'),
    enhancement_defaults: enhancementDefaultsSchema.default({}).catch(() => enhancementDefaultsSchema.parse({})),
    auth_mode: z.string().optional().catch(undefined),
    gcloud_project_id: z.string().optional().catch(undefined),
    gcloud_auth_validated: z.boolean().optional().catch(undefined),
    rate_limits: recoverableRecord(rateLimitSchema),
  })
  .passthrough();

/**
 * Lenient view of a sibling application's config. Only the fields that
 * can be imported are described; a field of the wrong type (or null) is
 * read as absent and everything else is ignored.
 */
export const siblingConfigSchema = z.object({
  providers: recoverableRecord(providerConfigSchema).optional(),
  auth_mode: z.string().nullish().catch(undefined),
  gcloud_project_id: z.string().nullish().catch(undefined),
  gcloud_auth_validated: z.boolean().nullish().catch(undefined),
});

export const uiStateSchema = z.record(z.unknown());

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type RateLimitConfig = z.infer<typeof rateLimitSchema>;
export type EnhancementDefaults = z.infer<typeof enhancementDefaultsSchema>;
export type AuthMode = (typeof AUTH_MODES)[number];
export type SiblingConfig = z.infer<typeof siblingConfigSchema>;
export type UiState = z.infer<typeof uiStateSchema>;

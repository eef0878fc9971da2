import { z } from 'zod';

export const SiteCredentialsSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional(),
});

/**
 * Shape check only. Completeness against the enabled sites is enforced by
 * `validateCredentials`, which knows which sites the run needs.
 */
export const CredentialFileSchema = z.object({
  sites: z.record(SiteCredentialsSchema).default({}),
  notificationAddress: z.string().optional(),
});

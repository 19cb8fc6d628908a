/**
 * On-disk format of config.json.
 */

import { z } from 'zod';

export const CONFIG_FILE_NAME = 'config.json';
export const VERIFIER_FILE_NAME = 'hash';

export const PersistedConfigSchema = z.object({
  storage_path: z.string().min(1),
  password_salt: z.string().min(1, 'password_salt must not be empty'),
});

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

/**
 * Flatten zod issues into one line per field, e.g.
 * `password_salt: Required`.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

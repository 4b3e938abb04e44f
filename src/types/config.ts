import { z } from 'zod';

/**
 * Persisted launcher preferences. Unknown keys are dropped on load.
 */
export const LauncherConfigSchema = z.object({
  /** Directory holding one subdirectory per installed engine version. */
  rootDirectory: z.string().nullable().default(null),
  /** Version identifier -> last executable chosen for it. */
  defaultExecutables: z.record(z.string()).default({})
});

export type LauncherConfig = z.infer<typeof LauncherConfigSchema>;

export interface SaveResult {
  success: boolean;
  error?: string;
}

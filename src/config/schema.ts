import { z } from 'zod';

// ─── Repository ────────────────────────────────────────────────────

export const RepositorySchema = z.object({
  url: z.string({ required_error: 'url is required', invalid_type_error: 'url must be a string' }),
  id: z.string().nullish(),
  branch: z.string().nullish(),
  revision: z.string().nullish(),
  /** Branch the work is based on; `reset` falls back to it when no revision is set. */
  'base-branch': z.string().nullish(),
  labels: z.array(z.string()).nullish(),
});

export type Repository = z.infer<typeof RepositorySchema>;

// ─── Root Manifest ─────────────────────────────────────────────────

export const ManifestSchema = z.object({
  repositories: z.array(RepositorySchema, {
    required_error: 'repositories is required',
    invalid_type_error: 'repositories must be a list',
  }),
});

export type Manifest = z.infer<typeof ManifestSchema>;

// ─── Status (derived per run) ──────────────────────────────────────

/** Base synchronization classification of a checkout against its remote branch. */
export type SyncState = 'clean' | 'unpushed';

export interface StatusRow {
  /** Display name: the checkout directory name. */
  repo: string;
  /** Configured `branch/revision`, whichever parts are set. */
  configRef: string;
  /** Local `branch/shortHash`, whichever parts are known. */
  localBranchRev: string;
  /** Remote branch head, truncated to 7 characters. Empty when unknown or absent. */
  remoteRev: string;
  /** Current branch; `HEAD` when detached, empty when unknown. */
  branchName: string;
  localHead: string;
  remoteHead: string;
  sync: SyncState;
  /** Remote has commits the local branch lacks. Only set by refinement. */
  isPullable: boolean;
  /** Pulling would conflict. Only set by refinement. */
  hasConflict: boolean;
  repoDir: string;
}

// ─── Operation Results ─────────────────────────────────────────────

export type OperationStatus = 'success' | 'error' | 'skipped';

export interface OperationResult {
  repo: string;
  status: OperationStatus;
  message: string;
}

export type PullStrategy = 'default' | 'merge' | 'rebase';

// ─── Root Brand Primitives ──────────────────────────────────────────

/** This tool's name (package name, default manifest filename). */
export const APP_NAME = 'repofleet';

/** Tool version reported by `--version` and `fleet version`. */
export const APP_VERSION = '0.1.0';

// ─── Derived CLI metadata ────────────────────────────────────────

/** CLI binary name: fleet */
export const CLI_BIN_NAME = 'fleet';

// ─── Derived Values ─────────────────────────────────────────────────

/** Manifest filename looked up in the working directory: repofleet.json */
export const MANIFEST_FILENAME = `${APP_NAME}.json`;

/** Manifest path that means "read from standard input". */
export const STDIN_MANIFEST = '-';

/** Environment variable naming the directory that holds the git executable. */
export const ENV_GIT_EXEC_PATH = 'GIT_EXEC_PATH';

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import yaml from 'js-yaml';
import { ManifestSchema } from './schema.js';
import type { Manifest, Repository } from './schema.js';
import { MANIFEST_FILENAME, STDIN_MANIFEST } from './branding.js';
import { ConfigError } from '../core/errors.js';
import { resolveRepoDir } from '../core/repo-dir.js';

/** Safe characters for checkout directory names. */
const ID_PATTERN = /^[a-zA-Z0-9._-]+$/;

/** Subset of what git accepts in ref names, enough for branch and revision values. */
const SAFE_REF_PATTERN = /^[a-zA-Z0-9./_-]+$/;

const CONTROL_CHARS = /[\x00-\x1f\x7f]/;

/**
 * Loads the repository manifest (JSON, or YAML by extension), validates it with Zod
 * and the semantic checks below, and writes snapshots back out.
 */
export class ManifestManager {
  private manifest: Manifest;
  private filePath: string;

  private constructor(manifest: Manifest, filePath: string) {
    this.manifest = manifest;
    this.filePath = filePath;
  }

  // ─── Load ─────────────────────────────────────────────────────────

  /** Load from a path, `-` for standard input, or the default manifest in `cwd`. */
  static load(file: string | undefined, readStdin: () => string = () => readFileSync(0, 'utf-8')): ManifestManager {
    if (file === STDIN_MANIFEST) {
      return ManifestManager.fromText(readStdin(), '<stdin>');
    }
    const filePath = resolve(file ?? MANIFEST_FILENAME);
    if (!existsSync(filePath)) {
      throw new ConfigError('not-found', `File not found: ${filePath}`);
    }
    return ManifestManager.fromText(readFileSync(filePath, 'utf-8'), filePath);
  }

  /** Parse and validate manifest text. The extension of `source` selects YAML or JSON. */
  static fromText(raw: string, source: string): ManifestManager {
    let parsed: unknown;
    try {
      parsed = isYamlPath(source) ? yaml.load(raw) : JSON.parse(raw);
    } catch (err) {
      throw new ConfigError('invalid-format', `Invalid data format in ${source}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = ManifestSchema.safeParse(parsed);
    if (!result.success) {
      const detail = result.error.issues
        .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
        .join('; ');
      throw new ConfigError('invalid-format', `Invalid data format in ${source}: ${detail}`);
    }

    validateRepositories(result.data.repositories);
    return new ManifestManager(result.data, source);
  }

  get repositories(): Repository[] {
    return this.manifest.repositories;
  }

  get manifestPath(): string {
    return this.filePath;
  }

  // ─── Selection ────────────────────────────────────────────────────

  /** Repositories carrying at least one of `labels`; all of them when `labels` is empty. */
  filterByLabels(labels: string[]): Repository[] {
    return filterRepositories(this.manifest.repositories, labels);
  }

  // ─── Save ─────────────────────────────────────────────────────────

  /** Serialize a manifest; YAML when the target path ends in .yaml/.yml. */
  static serialize(manifest: Manifest, targetPath: string): string {
    if (isYamlPath(targetPath)) {
      return yaml.dump(manifest, { indent: 2, lineWidth: 100, noRefs: true });
    }
    return JSON.stringify(manifest, null, 2) + '\n';
  }

  /** Write a manifest to a new file. Throws if the file already exists. */
  static write(manifest: Manifest, targetPath: string): void {
    if (existsSync(targetPath)) {
      throw new ConfigError('invalid-option', `Output file '${targetPath}' already exists.`);
    }
    writeFileSync(targetPath, ManifestManager.serialize(manifest, targetPath), 'utf-8');
  }
}

// ─── Validation ─────────────────────────────────────────────────────

export function validateRepositories(repos: Repository[]): void {
  const seen = new Set<string>();

  for (const repo of repos) {
    const id = resolveRepoDir(repo);
    if (!ID_PATTERN.test(id)) {
      throw new ConfigError('invalid-id', `Invalid repository ID: ${id} (contains unsafe characters)`);
    }
    if (id === '.' || id === '..') {
      throw new ConfigError('invalid-id', `Invalid repository ID: ${id} (cannot be . or ..)`);
    }

    if (repo.url.startsWith('ext::')) {
      throw new ConfigError('invalid-url', `Invalid repository URL: ${repo.url} (ext:: protocol not allowed)`);
    }
    if (CONTROL_CHARS.test(repo.url)) {
      throw new ConfigError('invalid-url', `Invalid repository URL: ${JSON.stringify(repo.url)} (contains control characters)`);
    }

    for (const ref of [repo.branch, repo.revision, repo['base-branch']]) {
      if (ref && !isValidGitRef(ref)) {
        throw new ConfigError('invalid-ref', `Invalid git reference: ${ref}`);
      }
    }

    if (seen.has(id)) {
      throw new ConfigError('duplicate-id', `Duplicate repository ID: ${id}`);
    }
    seen.add(id);
  }
}

/** Rejects anything git could read as an option, and characters outside the safe set. */
export function isValidGitRef(ref: string): boolean {
  return !ref.startsWith('-') && SAFE_REF_PATTERN.test(ref);
}

export function filterRepositories(repos: Repository[], labels: string[]): Repository[] {
  if (labels.length === 0) return repos;
  const wanted = new Set(labels);
  return repos.filter((r) => (r.labels ?? []).some((l) => wanted.has(l)));
}

/** Split a `--labels a,b` value into trimmed, non-empty labels. */
export function parseLabels(value: string | undefined): string[] {
  return value?.split(',').map((l) => l.trim()).filter((l) => l.length > 0) ?? [];
}

function isYamlPath(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

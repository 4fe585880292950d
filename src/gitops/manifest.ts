import { PatchApplyError } from '../shared/errors.js';

export interface ManifestPatch {
  /** `namespace/name` of the workload image whose line is rewritten. */
  repository: string;
  /** Replacement reference, always the pinned `namespace/name:tag`. */
  fullImageRef: string;
}

export interface PatchResult {
  content: string;
  /** Number of image lines that matched the pattern. */
  matched: number;
  changed: boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches `image: <repository>:<anything>` through the end of its line, with
 * optional indentation, a YAML list dash and a quote. Group 1 is the prefix to
 * keep. A trailing `\r` is left alone so CRLF files keep their endings.
 */
export function imageLinePattern(repository: string): RegExp {
  const repo = escapeRegExp(repository);
  return new RegExp(`^([ \\t]*(?:-[ \\t]+)?)image:[ \\t]*["']?${repo}:[^\\r\\n]*`, 'gm');
}

/**
 * Replace every matching image line with `image: {fullImageRef}`. Applying the
 * same patch twice leaves the content unchanged.
 */
export function applyManifestPatch(content: string, patch: ManifestPatch, manifestPath = '<manifest>'): PatchResult {
  const pattern = imageLinePattern(patch.repository);
  let matched = 0;
  const next = content.replace(pattern, (_line, prefix: string) => {
    matched++;
    return `${prefix}image: ${patch.fullImageRef}`;
  });

  if (matched === 0) {
    throw new PatchApplyError(
      manifestPath,
      `No line matching "image: ${patch.repository}:<tag>" in ${manifestPath}; the manifest repository has drifted`,
    );
  }

  return { content: next, matched, changed: next !== content };
}

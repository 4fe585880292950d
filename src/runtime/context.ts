import { ConfigError } from '../shared/errors.js';
import type { PipelineContext } from './types.js';

export const SHORT_HASH_LENGTH = 8;
export const DEFAULT_RELEASE_BRANCH = 'main';
export const LATEST_TAG = 'latest';

export interface BuildInputs {
  commitHash: string;
  branch: string;
  buildNumber: number;
}

export interface ImageCoordinates {
  registryNamespace: string;
  imageName: string;
  releaseBranch?: string;
}

/** `origin/main` and `refs/heads/main` both name branch `main`. */
export function normalizeBranch(branch: string): string {
  return branch
    .trim()
    .replace(/^refs\/heads\//, '')
    .replace(/^origin\//, '');
}

export function shortenCommitHash(hash: string): string {
  const trimmed = hash.trim().toLowerCase();
  if (!/^[0-9a-f]+$/.test(trimmed) || trimmed.length < SHORT_HASH_LENGTH) {
    throw new ConfigError(
      `Commit hash must be at least ${SHORT_HASH_LENGTH} hex characters, got "${hash}"`,
    );
  }
  return trimmed.slice(0, SHORT_HASH_LENGTH);
}

export function imageTagFor(commitHash: string, buildNumber: number): string {
  return `${commitHash}-${buildNumber}`;
}

export function imageRef(registryNamespace: string, imageName: string, tag: string): string {
  return `${registryNamespace}/${imageName}:${tag}`;
}

/**
 * Registry destinations for a build: always the pinned ref, plus the `latest`
 * alias if and only if the branch is the release branch.
 */
export function destinationsFor(
  coords: ImageCoordinates,
  branch: string,
  imageTag: string,
): string[] {
  const releaseBranch = coords.releaseBranch ?? DEFAULT_RELEASE_BRANCH;
  const destinations = [imageRef(coords.registryNamespace, coords.imageName, imageTag)];
  if (branch === releaseBranch) {
    destinations.push(imageRef(coords.registryNamespace, coords.imageName, LATEST_TAG));
  }
  return destinations;
}

/**
 * Derive the immutable context for one run. The result is frozen; identical
 * inputs always produce an identical context.
 */
export function createPipelineContext(inputs: BuildInputs, coords: ImageCoordinates): PipelineContext {
  if (!Number.isSafeInteger(inputs.buildNumber) || inputs.buildNumber < 1) {
    throw new ConfigError(`Build number must be a positive integer, got ${inputs.buildNumber}`);
  }
  const branch = normalizeBranch(inputs.branch);
  if (!branch) {
    throw new ConfigError('Branch must not be empty');
  }
  if (!coords.registryNamespace || !coords.imageName) {
    throw new ConfigError('Registry namespace and image name are required');
  }

  const commitHash = shortenCommitHash(inputs.commitHash);
  const imageTag = imageTagFor(commitHash, inputs.buildNumber);
  const releaseBranch = coords.releaseBranch ?? DEFAULT_RELEASE_BRANCH;

  return Object.freeze({
    commitHash,
    branch,
    buildNumber: inputs.buildNumber,
    registryNamespace: coords.registryNamespace,
    imageName: coords.imageName,
    releaseBranch,
    imageTag,
    fullImageRef: imageRef(coords.registryNamespace, coords.imageName, imageTag),
    destinations: Object.freeze(destinationsFor(coords, branch, imageTag)),
  });
}

/**
 * Read build inputs from flags, falling back to the variables CI servers export
 * (GIT_COMMIT, BRANCH_NAME / GIT_BRANCH, BUILD_NUMBER).
 */
export function resolveBuildInputs(
  flags: { commit?: string; branch?: string; buildNumber?: string },
  env: NodeJS.ProcessEnv = process.env,
): BuildInputs {
  const commitHash = flags.commit ?? env['GIT_COMMIT'];
  const branch = flags.branch ?? env['BRANCH_NAME'] ?? env['GIT_BRANCH'];
  const rawBuild = flags.buildNumber ?? env['BUILD_NUMBER'];

  if (!commitHash) throw new ConfigError('Commit hash required: pass --commit or set GIT_COMMIT');
  if (!branch) throw new ConfigError('Branch required: pass --branch or set BRANCH_NAME');
  if (!rawBuild) throw new ConfigError('Build number required: pass --build-number or set BUILD_NUMBER');
  if (!/^\d+$/.test(rawBuild.trim())) {
    throw new ConfigError(`Build number must be a positive integer, got "${rawBuild}"`);
  }

  return { commitHash, branch, buildNumber: Number(rawBuild.trim()) };
}

import { describe, it, expect } from '@jest/globals';
import {
  createPipelineContext,
  destinationsFor,
  normalizeBranch,
  resolveBuildInputs,
  shortenCommitHash,
} from '../runtime/context.js';
import { ConfigError } from '../shared/errors.js';

const coords = { registryNamespace: 'ns', imageName: 'app' };

describe('createPipelineContext', () => {
  it('tags a release-branch build with the pinned ref and latest', () => {
    const ctx = createPipelineContext({ commitHash: 'a1b2c3d4', branch: 'main', buildNumber: 42 }, coords);
    expect(ctx.imageTag).toBe('a1b2c3d4-42');
    expect(ctx.fullImageRef).toBe('ns/app:a1b2c3d4-42');
    expect(ctx.destinations).toEqual(['ns/app:a1b2c3d4-42', 'ns/app:latest']);
  });

  it('publishes only the pinned ref for other branches', () => {
    const ctx = createPipelineContext({ commitHash: 'a1b2c3d4', branch: 'feature-x', buildNumber: 42 }, coords);
    expect(ctx.destinations).toEqual(['ns/app:a1b2c3d4-42']);
  });

  it('is deterministic for identical inputs', () => {
    const inputs = { commitHash: 'a1b2c3d4', branch: 'main', buildNumber: 7 };
    expect(createPipelineContext(inputs, coords)).toEqual(createPipelineContext(inputs, coords));
  });

  it('gives different build numbers of one commit different refs', () => {
    const a = createPipelineContext({ commitHash: 'a1b2c3d4', branch: 'main', buildNumber: 1 }, coords);
    const b = createPipelineContext({ commitHash: 'a1b2c3d4', branch: 'main', buildNumber: 2 }, coords);
    expect(a.fullImageRef).not.toBe(b.fullImageRef);
  });

  it('shortens a full commit hash and normalizes the branch', () => {
    const ctx = createPipelineContext(
      { commitHash: 'A1B2C3D4E5F60718293A4B5C6D7E8F9012345678', branch: 'origin/main', buildNumber: 3 },
      coords,
    );
    expect(ctx.commitHash).toBe('a1b2c3d4');
    expect(ctx.branch).toBe('main');
    expect(ctx.destinations).toEqual(['ns/app:a1b2c3d4-3', 'ns/app:latest']);
  });

  it('honours a custom release branch', () => {
    const ctx = createPipelineContext(
      { commitHash: 'a1b2c3d4', branch: 'main', buildNumber: 1 },
      { ...coords, releaseBranch: 'release' },
    );
    expect(ctx.destinations).toEqual(['ns/app:a1b2c3d4-1']);
  });

  it('is frozen', () => {
    const ctx = createPipelineContext({ commitHash: 'a1b2c3d4', branch: 'main', buildNumber: 1 }, coords);
    expect(Object.isFrozen(ctx)).toBe(true);
    expect(Object.isFrozen(ctx.destinations)).toBe(true);
  });

  it('rejects a non-positive build number', () => {
    expect(() => createPipelineContext({ commitHash: 'a1b2c3d4', branch: 'main', buildNumber: 0 }, coords)).toThrow(
      ConfigError,
    );
  });
});

describe('shortenCommitHash', () => {
  it('rejects short or non-hex hashes', () => {
    expect(() => shortenCommitHash('abc123')).toThrow(ConfigError);
    expect(() => shortenCommitHash('zzzzzzzzzz')).toThrow(ConfigError);
  });
});

describe('normalizeBranch', () => {
  it('strips remote and ref prefixes', () => {
    expect(normalizeBranch('refs/heads/feature-x')).toBe('feature-x');
    expect(normalizeBranch('origin/main')).toBe('main');
    expect(normalizeBranch('feature/origin/x')).toBe('feature/origin/x');
  });
});

describe('destinationsFor', () => {
  it('adds latest only on the release branch', () => {
    expect(destinationsFor(coords, 'main', 't')).toEqual(['ns/app:t', 'ns/app:latest']);
    expect(destinationsFor(coords, 'mainline', 't')).toEqual(['ns/app:t']);
  });
});

describe('resolveBuildInputs', () => {
  it('prefers flags over the environment', () => {
    const inputs = resolveBuildInputs(
      { commit: 'deadbeef', branch: 'dev', buildNumber: '5' },
      { GIT_COMMIT: 'a1b2c3d4', BRANCH_NAME: 'main', BUILD_NUMBER: '9' },
    );
    expect(inputs).toEqual({ commitHash: 'deadbeef', branch: 'dev', buildNumber: 5 });
  });

  it('falls back to CI environment variables', () => {
    const inputs = resolveBuildInputs({}, { GIT_COMMIT: 'a1b2c3d4', GIT_BRANCH: 'origin/main', BUILD_NUMBER: '9' });
    expect(inputs).toEqual({ commitHash: 'a1b2c3d4', branch: 'origin/main', buildNumber: 9 });
  });

  it('requires every input', () => {
    expect(() => resolveBuildInputs({ commit: 'a1b2c3d4', branch: 'main' }, {})).toThrow('Build number required');
    expect(() => resolveBuildInputs({ commit: 'a1b2c3d4', branch: 'main', buildNumber: '4x' }, {})).toThrow(
      'Build number must be a positive integer',
    );
  });
});

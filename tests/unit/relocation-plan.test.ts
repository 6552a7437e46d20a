/**
 * Unit Tests: Relocation Planning
 *
 * Tests destination mirroring, move strategy selection and the free-space
 * preflight against an in-memory filesystem.
 *
 * @see src/reconcilers/relocation/plan.ts
 */

import { describe, it, expect } from 'vitest';
import {
  mirrorDestination,
  planRelocation,
  preflightSpace,
  resolveMoveStrategy,
  selectMoveStrategy,
} from '../../src/reconcilers/relocation/plan.js';
import type { RelocationOptions } from '../../src/reconcilers/relocation/types.js';
import { FakeRelocationFs } from '../helpers/fake-relocation-fs.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const SOURCE = '/src/addons/vendor-klax';
const DEST = '/dst/relocated/vendor-klax';

function createOptions(overrides: Partial<RelocationOptions> = {}): RelocationOptions {
  return {
    sourceRoot: '/src/addons',
    destRoot: '/dst/relocated',
    spaceMarginBytes: 50,
    apply: false,
    spaceCheckFailurePolicy: 'skip',
    ...overrides,
  };
}

function crossVolumeFs(size: number, free: number): FakeRelocationFs {
  const fs = new FakeRelocationFs({ dirs: [SOURCE], volumes: { '/src': 'A', '/dst': 'B' } });
  fs.sizes.set(SOURCE, size);
  fs.free.set('B', free);
  return fs;
}

// =============================================================================
// mirrorDestination Tests
// =============================================================================

describe('mirrorDestination', () => {
  it('should keep the position relative to the source root', () => {
    expect(mirrorDestination('/src', '/dst', '/src/a/b')).toBe('/dst/a/b');
  });

  it('should fall back to the folder name outside the source root', () => {
    expect(mirrorDestination('/src', '/dst', '/other/pkg')).toBe('/dst/pkg');
  });

  it('should fall back to the folder name for the source root itself', () => {
    expect(mirrorDestination('/src', '/dst', '/src')).toBe('/dst/src');
  });
});

// =============================================================================
// Strategy Tests
// =============================================================================

describe('selectMoveStrategy', () => {
  it('should rename within one volume', () => {
    expect(selectMoveStrategy('1', '1')).toBe('rename');
  });

  it('should copy across volumes', () => {
    expect(selectMoveStrategy('1', '2')).toBe('copy+delete');
  });

  it('should copy when either volume is unknown', () => {
    expect(selectMoveStrategy(null, '1')).toBe('copy+delete');
    expect(selectMoveStrategy('1', null)).toBe('copy+delete');
  });
});

describe('resolveMoveStrategy', () => {
  it('should treat a failed volume lookup as a different volume', () => {
    const fs = new FakeRelocationFs({ volumes: { '/': 'A' } });
    fs.failures.set('volumeOf', new Error('stat failed'));
    expect(resolveMoveStrategy(fs, SOURCE, '/dst/relocated')).toBe('copy+delete');
  });

  it('should look up the destination root by its nearest known volume', () => {
    const fs = new FakeRelocationFs({ volumes: { '/': 'A' } });
    expect(resolveMoveStrategy(fs, SOURCE, '/dst/relocated')).toBe('rename');
  });
});

// =============================================================================
// preflightSpace Tests
// =============================================================================

describe('preflightSpace', () => {
  it('should pass when size plus margin fits exactly', () => {
    expect(preflightSpace(crossVolumeFs(100, 150), SOURCE, '/dst/relocated', 50)).toEqual({
      status: 'ok',
      sizeBytes: 100,
      freeBytes: 150,
      requiredBytes: 150,
    });
  });

  it('should fail when size plus margin exceeds free space', () => {
    expect(preflightSpace(crossVolumeFs(100, 149), SOURCE, '/dst/relocated', 50)).toEqual({
      status: 'insufficient',
      sizeBytes: 100,
      freeBytes: 149,
      requiredBytes: 150,
    });
  });

  it('should report unknown when a query fails', () => {
    const fs = crossVolumeFs(100, 1000);
    fs.failures.set('freeBytes', new Error('statfs failed'));
    expect(preflightSpace(fs, SOURCE, '/dst/relocated', 50)).toEqual({ status: 'unknown', cause: 'statfs failed' });
  });

  it('should query free space on every call', () => {
    const fs = crossVolumeFs(100, 1000);
    expect(preflightSpace(fs, SOURCE, '/dst/relocated', 0).status).toBe('ok');
    fs.free.set('B', 10);
    expect(preflightSpace(fs, SOURCE, '/dst/relocated', 0).status).toBe('insufficient');
  });
});

// =============================================================================
// planRelocation Tests
// =============================================================================

describe('planRelocation', () => {
  it('should skip when the destination exists', () => {
    const fs = crossVolumeFs(100, 1000);
    fs.dirs.add(DEST);
    expect(planRelocation(fs, SOURCE, createOptions())).toEqual({
      action: 'skip_exist',
      source: SOURCE,
      destination: DEST,
    });
  });

  it('should plan a rename without a preflight on one volume', () => {
    const fs = new FakeRelocationFs({ dirs: [SOURCE], volumes: { '/': 'A' } });
    fs.failures.set('directorySize', new Error('should not be called'));
    expect(planRelocation(fs, SOURCE, createOptions())).toEqual({
      action: 'move',
      source: SOURCE,
      destination: DEST,
      strategy: 'rename',
    });
  });

  it('should plan a copy with its preflight across volumes', () => {
    expect(planRelocation(crossVolumeFs(100, 1000), SOURCE, createOptions())).toEqual({
      action: 'move',
      source: SOURCE,
      destination: DEST,
      strategy: 'copy+delete',
      preflight: { status: 'ok', sizeBytes: 100, freeBytes: 1000, requiredBytes: 150 },
    });
  });

  it('should plan no_space when the copy does not fit', () => {
    const plan = planRelocation(crossVolumeFs(100, 120), SOURCE, createOptions());
    expect(plan.action).toBe('no_space');
  });

  it('should block the move when the space check fails under the skip policy', () => {
    const fs = crossVolumeFs(100, 1000);
    fs.failures.set('freeBytes', new Error('statfs failed'));
    expect(planRelocation(fs, SOURCE, createOptions())).toEqual({
      action: 'blocked',
      source: SOURCE,
      destination: DEST,
      strategy: 'copy+delete',
      cause: 'space check failed: statfs failed',
    });
  });

  it('should move anyway when the space check fails under the attempt policy', () => {
    const fs = crossVolumeFs(100, 1000);
    fs.failures.set('freeBytes', new Error('statfs failed'));
    expect(planRelocation(fs, SOURCE, createOptions({ spaceCheckFailurePolicy: 'attempt' }))).toEqual({
      action: 'move',
      source: SOURCE,
      destination: DEST,
      strategy: 'copy+delete',
      preflight: { status: 'unknown', cause: 'statfs failed' },
    });
  });
});

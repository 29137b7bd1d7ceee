import { RELEASE_KINDS, ReleaseKind } from '../types';
import { AppError, ErrorType } from './error-handler';

export const DEFAULT_RELEASE_KINDS: ReleaseKind[] = ['album'];

export function isReleaseKind(value: string): value is ReleaseKind {
  return RELEASE_KINDS.some((kind) => kind === value);
}

/**
 * Parse a comma separated list of release kinds ("album,single", "appears-on", "all").
 * Matching ignores case and treats "-" like "_". The result is deduplicated and
 * kept in the canonical album, single, appears_on, compilation order.
 */
export function parseReleaseKinds(input: string): ReleaseKind[] {
  if (input.trim() === '') {
    throw new AppError(ErrorType.ValidationError, 'Release type list cannot be empty');
  }

  const selected = new Set<ReleaseKind>();
  for (const segment of input.split(',')) {
    const normalized = segment.trim().toLowerCase().replace(/-/g, '_');
    if (normalized === '') {
      throw new AppError(ErrorType.ValidationError, `Release type list "${input}" contains an empty segment`);
    }
    if (normalized === 'all') {
      RELEASE_KINDS.forEach((kind) => selected.add(kind));
      continue;
    }
    if (!isReleaseKind(normalized)) {
      throw new AppError(
        ErrorType.ValidationError,
        `Invalid release type '${segment.trim()}'. Expected one of: ${RELEASE_KINDS.join(', ')}, all`,
      );
    }
    selected.add(normalized);
  }

  return RELEASE_KINDS.filter((kind) => selected.has(kind));
}

/**
 * Canonical comma separated form, used as the key of release sync state
 */
export function formatReleaseKinds(kinds: readonly ReleaseKind[]): string {
  return RELEASE_KINDS.filter((kind) => kinds.includes(kind)).join(',');
}

/**
 * Map a Spotify album_group / album_type onto a release kind
 */
export function releaseKindOf(group: string | undefined, type: string): ReleaseKind | null {
  const candidate = (group ?? type).toLowerCase();
  return isReleaseKind(candidate) ? candidate : null;
}

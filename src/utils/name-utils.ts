/**
 * Name Utilities
 *
 * Naming rules for scene nodes and exported asset files.
 */

/**
 * Characters not allowed in asset file stems. The engine's asset processor
 * rejects '.' inside file stems, so it is replaced along with separators.
 */
const ASSET_NAME_SANITIZATION_PATTERN = /[^A-Za-z0-9_-]/g;

export const DEFAULT_NODE_NAME = 'Unnamed';

/**
 * Node names are kept as authored; only an empty name gets a default
 */
export function normalizeNodeName(name: string): string {
  const trimmed = name.trim();
  return trimmed.length > 0 ? trimmed : DEFAULT_NODE_NAME;
}

/**
 * Sanitizes a name for use as an asset file stem.
 * Example: "Cube.001" -> "Cube_001"
 */
export function sanitizeAssetName(name: string, fallback: string): string {
  const sanitized = name
    .trim()
    .replace(ASSET_NAME_SANITIZATION_PATTERN, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
  return sanitized || fallback;
}

/**
 * Returns `base`, or `base_<n>` with the smallest n >= 1 not already taken,
 * and records the result in `taken`. `toKey` maps a candidate to the key
 * stored in `taken`.
 */
export function claimUniqueName(
  base: string,
  taken: Set<string>,
  toKey: (name: string) => string = name => name
): string {
  let candidate = base;
  let suffix = 1;
  while (taken.has(toKey(candidate))) {
    candidate = `${base}_${suffix}`;
    suffix++;
  }
  taken.add(toKey(candidate));
  return candidate;
}

/**
 * 32-bit signed string hash (h = 31 * h + code unit, wrapped).
 * Depends only on the key text, so equal keys hash equally across runs and hosts.
 */
export function hashKey(key: string): number {
  let h = 0;
  for (let i = 0; i < key.length; i++) {
    h = (Math.imul(31, h) + key.charCodeAt(i)) | 0;
  }
  return h;
}
